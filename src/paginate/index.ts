export {
  collectPages,
  linkHeaderCursor,
  type NextCursor,
  type PageContext,
  type PageOptions,
  type ParamPaging,
  paginate,
  startIndexCursor,
  type StartIndexCursorOptions,
  tokenCursor,
  type UrlPaging,
} from './paginator.js';

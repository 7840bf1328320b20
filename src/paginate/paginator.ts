import { bind, rebindParam, withUrl } from '../call/bind.js';
import type { BoundCall, CallArgs, CallDescriptor, ParamValue } from '../call/types.js';
import { ConfigurationError } from '../error/configurationError.js';
import { PaginationError } from '../error/paginationError.js';
import type { CallExecutor, ExecuteOptions } from '../executor/executor.js';
import { type Logger, silentLogger } from '../types/logger.js';
import type { RawResponse } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

/**
 * Computes the next cursor from the page just decoded. `bound` is the call
 * that fetched it. Returning `null` (or `undefined`) ends the session.
 */
export type NextCursor<T, C> = (page: T, response: RawResponse, bound: BoundCall<T>) => C | null | undefined;

/** Follow a URL supplied by the server. */
export interface UrlPaging<T> {
  method: 'url';
  next: NextCursor<T, string>;
}

/** Re-bind one query or path parameter for each page. */
export interface ParamPaging<T> {
  method: 'param';
  param: string;
  next: NextCursor<T, ParamValue>;
}

/** Paging strategy plus per-call options. */
export type PageOptions<T> = (UrlPaging<T> | ParamPaging<T>) &
  ExecuteOptions & {
    /** Optional bound on the number of pages fetched, at least 1; no bound by default. */
    maxPages?: number;
  };

/** Where a paging session sends its calls. */
export interface PageContext {
  executor: CallExecutor;
  logger?: Logger;
}

/**
 * Lazily pages through an endpoint.
 *
 * Each pulled element costs one execute; the next cursor is only computed
 * once the previous page has been consumed. The sequence ends the first time
 * `next` returns nothing, or on the first error, which is yielded once.
 *
 * @example
 * for await (const [err, page] of paginate(listItems, {}, options, { executor })) {
 *   if (err) break;
 *   console.log(page.items.length);
 * }
 */
export async function* paginate<T>(
  descriptor: CallDescriptor<T>,
  args: CallArgs,
  options: PageOptions<T>,
  { executor, logger = silentLogger }: PageContext,
): AsyncGenerator<SafeWrap<Error, T>, void, undefined> {
  const { maxPages, signal, timeout } = options;
  if (maxPages !== undefined && !(Number.isInteger(maxPages) && maxPages >= 1)) {
    yield [new ConfigurationError(`error maxPages must be a positive integer, got ${maxPages}`), null];
    return;
  }

  const [errBind, first] = bind(descriptor, args);
  if (errBind) {
    yield [errBind, null];
    return;
  }

  let bound = first;
  for (let index = 0; ; index += 1) {
    logger.debug('fetching page', { id: descriptor.id, page: index + 1, url: bound.url });
    const [errExec, response] = await executor.execute(bound, { signal, timeout });
    if (errExec) {
      yield [new Error(`error fetching page ${index + 1} of ${descriptor.id}`, { cause: errExec }), null];
      return;
    }

    const [errDecode, page] = await descriptor.decode(response);
    if (errDecode) {
      yield [new Error(`error decoding page ${index + 1} of ${descriptor.id}`, { cause: errDecode }), null];
      return;
    }

    yield [null, page];

    if (maxPages !== undefined && index + 1 >= maxPages) {
      logger.debug('page limit reached', { id: descriptor.id, pages: index + 1 });
      return;
    }

    const [errNext, next] = advance(options, page, response, bound);
    if (errNext) {
      yield [new Error(`error advancing past page ${index + 1} of ${descriptor.id}`, { cause: errNext }), null];
      return;
    }

    if (!next) {
      logger.debug('paging done', { id: descriptor.id, pages: index + 1 });
      return;
    }

    bound = next;
  }
}

/** Next bound call, or `null` once the cursor runs out. */
function advance<T>(
  options: UrlPaging<T> | ParamPaging<T>,
  page: T,
  response: RawResponse,
  bound: BoundCall<T>,
): SafeWrap<Error, BoundCall<T> | null> {
  if (options.method === 'url') {
    const [errNext, url] = safeWrap(() => options.next(page, response, bound));
    if (errNext) {
      return [errNext, null];
    }

    return [null, url === null || url === undefined ? null : withUrl(bound, url)];
  }

  const [errNext, value] = safeWrap(() => options.next(page, response, bound));
  if (errNext) {
    return [errNext, null];
  }

  if (value === null || value === undefined) {
    return [null, null];
  }

  return rebindParam(bound, options.param, value);
}

/**
 * Drains a paging session. On error, the pages decoded so far travel on the
 * {@link PaginationError}.
 */
export async function collectPages<T>(
  pages: AsyncIterable<SafeWrap<Error, T>>,
): SafeWrapAsync<PaginationError<T>, T[]> {
  const collected: T[] = [];
  for await (const [err, page] of pages) {
    if (err) {
      return [
        new PaginationError(`error paging stopped after ${collected.length} pages`, collected, { cause: err }),
        null,
      ];
    }

    collected.push(page);
  }

  return [null, collected];
}

/** Options for {@link startIndexCursor}. */
export interface StartIndexCursorOptions<T> {
  /** Parameter holding the start index. */
  startParam: string;
  pageSize: number;
  /** Total number of results, read from a page. */
  total: (page: T) => number;
  /** Index of the first result; 1 for `start-index`, 0 for plain offsets. @default 1 */
  first?: number;
}

/**
 * Offset paging (`start-index` style): the next start is the current one plus
 * the page size, as long as it does not pass the total.
 */
export function startIndexCursor<T>({
  startParam,
  pageSize,
  total,
  first = 1,
}: StartIndexCursorOptions<T>): NextCursor<T, number> {
  return (page, _response, bound) => {
    const current = Number(bound.query[startParam] ?? bound.path[startParam] ?? first);
    const next = current + pageSize;
    return next - first < total(page) ? next : null;
  };
}

/** Continuation-token paging: the next cursor is read from the decoded page. */
export function tokenCursor<T>(read: (page: T) => string | null | undefined): NextCursor<T, string> {
  return (page) => read(page) || null;
}

/**
 * Follows the `rel="next"` entry of an RFC 8288 `Link` header.
 */
export function linkHeaderCursor<T>(): NextCursor<T, string> {
  return (_page, response) => {
    const link = response.headers.link;
    if (!link) {
      return null;
    }

    for (const entry of link.split(/,\s*(?=<)/)) {
      const match = entry.match(/<([^>]+)>\s*;(.*)$/);
      if (match?.[1] && /\brel="?next"?/i.test(match[2] ?? '')) {
        return match[1];
      }
    }

    return null;
  };
}

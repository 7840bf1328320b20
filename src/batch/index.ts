export {
  type BatchCacheMode,
  type BatcherOptions,
  type BatchExecutor,
  type BatchOptions,
  type BatchResult,
  Batcher,
} from './batcher.js';
export {
  type BatchRequestPart,
  type BatchResponsePart,
  contentId,
  decodeBatchRequest,
  decodeBatchResponse,
  encodeBatchRequest,
  encodeBatchResponse,
  parseBoundary,
  parseContentId,
} from './multipart.js';
export { isCacheableBatch } from './predicates.js';

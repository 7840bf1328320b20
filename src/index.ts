/**
 * Root entrypoint: re-exports the client, the call model, the building blocks
 * (executor, cache, paginator, batcher, walker) and the error helpers.
 * @module
 */

/**
 * Client facade wiring executor, retry, cache, batching, paging and walking together.
 */
export * from './core/index.js';

/** Call descriptors, binding and cache identity. */
export * from './call/index.js';

/** Cache layer and stores. */
export * from './cache/index.js';

/** Multipart batching. */
export * from './batch/index.js';

/** Pagination sessions and cursor helpers. */
export * from './paginate/index.js';

/** Batched walks over one varying parameter. */
export * from './walk/index.js';

/** Single round-trip executor and the retry decorator around it. */
export {
  type AuthProvider,
  type CallExecutor,
  type ExecuteOptions,
  Executor,
  type ExecutorOptions,
} from './executor/executor.js';
export { DEFAULT_RETRY, RetryingExecutor, type RetryPolicy, resolveRetry } from './executor/retrying.js';

/** Transports. */
export { FetchTransport, type FetchTransportOptions } from './transport/fetchTransport.js';
export { headersToRecord, mergeHeaderOptions } from './transport/headers.js';
export type { Transport, TransportRequest } from './transport/types.js';

/** Stock decoders. */
export { type DecoderOptions, jsonDecoder, rawDecoder, readResponseData, schemaDecoder, textDecoder } from './decode/decoders.js';
export { validate } from './decode/validate.js';

export { type LogContext, type Logger, silentLogger } from './types/logger.js';
export {
  type CallOptions,
  createRawResponse,
  type HeaderOptions,
  type HttpMethod,
  type RawResponse,
  type RequestBody,
  type RetryOptions,
  responseHeader,
  responseText,
  type StatusCode,
} from './types/request.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/** Error classes and cause-chain helpers. */
export * from './error/index.js';

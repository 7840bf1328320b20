import { createHash } from 'node:crypto';
import { bind } from '../call/bind.js';
import { defineCall, rawCall } from '../call/descriptor.js';
import { callIdentity } from '../call/identity.js';
import type { BoundCall, CallDescriptor } from '../call/types.js';
import { cachedExecute, type CacheLayer, type InvalidationPredicate } from '../cache/cacheLayer.js';
import { BatchPartError } from '../error/batchPartError.js';
import { ConfigurationError } from '../error/configurationError.js';
import type { TransportError } from '../error/transportError.js';
import type { CallExecutor, ExecuteOptions, Executor } from '../executor/executor.js';
import { type Logger, silentLogger } from '../types/logger.js';
import { type RawResponse, responseText } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { type BatchRequestPart, contentId, decodeBatchResponse, encodeBatchRequest, parseContentId } from './multipart.js';
import { isCacheableBatch } from './predicates.js';

/** Outcome of one call inside a batch. */
export type BatchResult = SafeWrap<TransportError | BatchPartError, RawResponse>;

/**
 * - `per-call`: each sub-call is looked up and stored under its own identity; only misses are sent.
 * - `whole-batch`: the batch round trip is cached as one entry keyed by the batch request.
 */
export type BatchCacheMode = 'per-call' | 'whole-batch';

/** Executor the batcher sends through; it also resolves sub-call URLs into part paths. */
export type BatchExecutor = CallExecutor & Pick<Executor, 'resolveUrl'>;

/** Options for {@link Batcher}. */
export interface BatcherOptions {
  executor: BatchExecutor;
  /** Batch endpoint URL per API family. */
  endpoints?: Record<string, string>;
  /** Cache consulted for batches; `null` disables caching. */
  cache?: CacheLayer | null;
  /** @default 'per-call' */
  cacheMode?: BatchCacheMode;
  /** Predicate for whole-batch entries. @default isCacheableBatch */
  batchPredicate?: InvalidationPredicate;
  /** @default 1000 */
  maxBatchSize?: number;
  logger?: Logger;
}

/** Per-batch options. */
export type BatchOptions = ExecuteOptions & {
  /** Set to false to bypass the cache for this batch. */
  cache?: boolean;
};

const sha256 = (input: string) => createHash('sha256').update(input).digest('hex');

/**
 * Multiplexes bound calls of one API family into a single `multipart/mixed`
 * round trip and demultiplexes the response by correlation id.
 *
 * Results always come back in submission order, one per call.
 */
export class Batcher {
  #executor: BatchExecutor;
  #endpoints: Record<string, string>;
  #cache: CacheLayer | null;
  #cacheMode: BatchCacheMode;
  #batchPredicate: InvalidationPredicate;
  #maxBatchSize: number;
  #logger: Logger;
  #descriptors = new Map<string, CallDescriptor<RawResponse>>();

  constructor({
    executor,
    endpoints = {},
    cache = null,
    cacheMode = 'per-call',
    batchPredicate = isCacheableBatch,
    maxBatchSize = 1000,
    logger = silentLogger,
  }: BatcherOptions) {
    this.#executor = executor;
    this.#endpoints = { ...endpoints };
    this.#cache = cache;
    this.#cacheMode = cacheMode;
    this.#batchPredicate = batchPredicate;
    this.#maxBatchSize = maxBatchSize;
    this.#logger = logger;
  }

  get maxBatchSize(): number {
    return this.#maxBatchSize;
  }

  /** Updates endpoints (merged), cache settings, size limit or logger. */
  config(opts: Partial<Omit<BatcherOptions, 'executor'>>) {
    if (opts.endpoints) {
      this.#endpoints = { ...this.#endpoints, ...opts.endpoints };
      this.#descriptors.clear();
    }

    if (opts.cache !== undefined) {
      this.#cache = opts.cache;
    }

    if (opts.cacheMode) {
      this.#cacheMode = opts.cacheMode;
    }

    if (opts.batchPredicate) {
      this.#batchPredicate = opts.batchPredicate;
    }

    if (opts.maxBatchSize !== undefined) {
      this.#maxBatchSize = opts.maxBatchSize;
    }

    if (opts.logger) {
      this.#logger = opts.logger;
    }
  }

  /**
   * Checks that `size` calls of `family` could be batched, without sending anything.
   */
  validate(family: string, size: number): ConfigurationError | null {
    if (!this.#endpoints[family]) {
      return new ConfigurationError(`error no batch endpoint configured for API family "${family}"`);
    }

    if (size > this.#maxBatchSize) {
      return new ConfigurationError(`error batch of ${size} calls exceeds the limit of ${this.#maxBatchSize}`);
    }

    return null;
  }

  /**
   * Sends `calls` as one batch.
   *
   * Configuration problems (mixed families, no endpoint, too many calls) fail the
   * whole batch before anything is sent. Everything else is reported per call:
   * a failed round trip gives every pending call the TransportError, and a
   * missing or unparsable part gives that call a BatchPartError.
   */
  async batch(calls: readonly BoundCall[], opts: BatchOptions = {}): SafeWrapAsync<ConfigurationError, BatchResult[]> {
    const [first] = calls;
    if (!first) {
      return [null, []];
    }

    const family = first.descriptor.family;
    const mixed = calls.find((call) => call.descriptor.family !== family);
    if (mixed) {
      return [
        new ConfigurationError(
          `error batch mixes API families "${family}" and "${mixed.descriptor.family}"; split it per family`,
        ),
        null,
      ];
    }

    const errConfig = this.validate(family, calls.length);
    if (errConfig) {
      return [errConfig, null];
    }

    const cache = opts.cache === false ? null : this.#cache;
    const perCall = cache && this.#cacheMode === 'per-call' ? cache : null;
    const keys = calls.map((call) => callIdentity(call));
    const results: Array<BatchResult | undefined> = [];

    if (perCall) {
      await Promise.all(
        keys.map(async (key, index) => {
          const cached = await perCall.lookup(key);
          if (cached) {
            results[index] = [null, cached];
          }
        }),
      );
    }

    const pending = calls.flatMap((call, index) => (results[index] ? [] : [{ call, index }]));
    this.#logger.debug('batch prepared', { family, size: calls.length, cached: calls.length - pending.length });

    if (pending.length > 0) {
      const boundary = `batch_${sha256(pending.map(({ index }) => keys[index]).join('\n')).slice(0, 32)}`;
      const parts = pending.map(({ call, index }) => this.#part(call, index));
      const [errBind, batchCall] = bind(this.#descriptor(family), {
        body: encodeBatchRequest(parts, boundary),
        headers: { 'content-type': `multipart/mixed; boundary=${boundary}` },
      });
      if (errBind) {
        return [new ConfigurationError(`error preparing batch for API family "${family}"`, { cause: errBind }), null];
      }

      const [errSend, response] =
        cache && this.#cacheMode === 'whole-batch'
          ? await cachedExecute(
              batchCall,
              this.#executor,
              { store: cache.store, predicate: this.#batchPredicate, logger: this.#logger },
              opts,
            )
          : await this.#executor.execute(batchCall, opts);

      if (errSend) {
        this.#logger.warn('batch round trip failed', { family, size: pending.length, kind: errSend.kind });
        for (const { index } of pending) {
          results[index] = [errSend, null];
        }
      } else {
        await this.#demultiplex(response, boundary, pending, keys, results, perCall);
      }
    }

    return [
      null,
      calls.map(
        (_call, index): BatchResult =>
          results[index] ?? [new BatchPartError(`error batch response has no part for ${contentId(index)}`, index), null],
      ),
    ];
  }

  async #demultiplex(
    response: RawResponse,
    boundary: string,
    pending: ReadonlyArray<{ index: number }>,
    keys: readonly string[],
    results: Array<BatchResult | undefined>,
    perCall: CacheLayer | null,
  ) {
    const [errSplit, parts] = decodeBatchResponse(response, boundary);
    if (errSplit) {
      this.#logger.warn('batch response could not be split', { status: response.status, error: errSplit.message });
      const body = responseText(response).slice(0, 200);
      for (const { index } of pending) {
        results[index] = [
          new BatchPartError(`error batch response unusable (status ${response.status}): ${body}`, index, {
            cause: errSplit,
          }),
          null,
        ];
      }

      return;
    }

    const expected = new Set(pending.map(({ index }) => index));
    for (const part of parts) {
      const index = parseContentId(part.id);
      if (index === null || !expected.has(index)) {
        this.#logger.debug('batch part ignored', { id: part.id });
        continue;
      }

      expected.delete(index);
      const [errPart, partResponse] = part.response;
      if (errPart) {
        results[index] = [
          new BatchPartError(`error parsing batch part ${contentId(index)}`, index, { cause: errPart }),
          null,
        ];
        continue;
      }

      results[index] = [null, partResponse];
      const key = keys[index];
      if (perCall && key) {
        await perCall.save(key, partResponse);
      }
    }
  }

  #part(call: BoundCall, index: number): BatchRequestPart {
    const absolute = this.#executor.resolveUrl(call);
    const [errUrl, url] = safeWrap(() => new URL(absolute));
    const headers = { ...call.headers };
    let body: string | null = null;
    if (call.body !== null) {
      body = typeof call.body === 'string' ? call.body : new TextDecoder().decode(call.body);
    }

    return {
      id: contentId(index),
      method: call.method,
      path: errUrl ? call.url : `${url.pathname}${url.search}`,
      headers,
      body,
    };
  }

  #descriptor(family: string): CallDescriptor<RawResponse> {
    const known = this.#descriptors.get(family);
    if (known) {
      return known;
    }

    const descriptor = rawCall(
      defineCall({ id: `batch:${family}`, method: 'POST', url: this.#endpoints[family] ?? '', family }),
    );
    this.#descriptors.set(family, descriptor);
    return descriptor;
  }
}

import { bind } from '../call/bind.js';
import type { BoundCall, CallArgs, CallDescriptor, ParamValue } from '../call/types.js';
import type { BatchOptions, BatchResult, Batcher } from '../batch/batcher.js';
import { ConfigurationError } from '../error/configurationError.js';
import { type Logger, silentLogger } from '../types/logger.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Outcome for one walked value. */
export interface WalkResult<R> {
  value: ParamValue;
  result: SafeWrap<Error, R>;
}

/** Options for {@link walk}. */
export type WalkOptions = BatchOptions & {
  /** The one parameter that varies; a query or path parameter of the descriptor. */
  param: string;
  values: readonly ParamValue[];
  /** Fixed arguments shared by every call. Must not contain `param`. */
  args?: CallArgs;
  /** @default 100 */
  batchSize?: number;
  /** Number of batches in flight at once. @default 1 */
  concurrency?: number;
  logger?: Logger;
};

/** {@link WalkOptions} with a post-processing step applied to each decoded item. */
export type WalkPostOptions<T, R> = WalkOptions & {
  post: (data: T, value: ParamValue, index: number) => R | Promise<R>;
};

/** The part of {@link Batcher} a walk needs. */
export type WalkBatcher = Pick<Batcher, 'batch' | 'validate'>;

function declares(descriptor: CallDescriptor, param: string): 'query' | 'path' | null {
  if (param in descriptor.queryParams) {
    return 'query';
  }

  if (param in descriptor.pathParams || descriptor.placeholders.some(({ name }) => name === param)) {
    return 'path';
  }

  return null;
}

/**
 * Issues one call per value of `param`, grouped into batches of `batchSize`.
 *
 * Only configuration problems fail the walk as a whole, and they are found
 * before anything is sent. Every other failure stays with its item.
 *
 * @example
 * const [err, results] = await walk(getItem, { param: 'id', values: ids }, batcher);
 * const { data, errors } = mergeWalk(results ?? []);
 */
export async function walk<T, R>(
  descriptor: CallDescriptor<T>,
  options: WalkPostOptions<T, R>,
  batcher: WalkBatcher,
): SafeWrapAsync<ConfigurationError, WalkResult<R>[]>;
export async function walk<T>(
  descriptor: CallDescriptor<T>,
  options: WalkOptions,
  batcher: WalkBatcher,
): SafeWrapAsync<ConfigurationError, WalkResult<T>[]>;
export async function walk<T>(
  descriptor: CallDescriptor<T>,
  options: WalkOptions & { post?: (data: T, value: ParamValue, index: number) => unknown },
  batcher: WalkBatcher,
): SafeWrapAsync<ConfigurationError, WalkResult<unknown>[]> {
  const {
    param,
    values,
    args = {},
    batchSize = 100,
    concurrency = 1,
    post,
    logger = silentLogger,
    ...batchOpts
  } = options;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    return [new ConfigurationError(`error walk batch size must be a positive integer, got ${batchSize}`), null];
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    return [new ConfigurationError(`error walk concurrency must be a positive integer, got ${concurrency}`), null];
  }

  const slot = declares(descriptor, param);
  if (!slot) {
    return [new ConfigurationError(`error ${descriptor.id} has no parameter "${param}" to walk`), null];
  }

  if (args.query?.[param] !== undefined || args.path?.[param] !== undefined) {
    return [new ConfigurationError(`error walked parameter "${param}" must not be fixed in args`), null];
  }

  if (values.length === 0) {
    return [null, []];
  }

  const errConfig = batcher.validate(descriptor.family, Math.min(batchSize, values.length));
  if (errConfig) {
    return [errConfig, null];
  }

  const results = values.map((value): WalkResult<unknown> => ({
    value,
    result: [new Error('error item was not walked'), null],
  }));

  const chunks: number[] = [];
  for (let start = 0; start < values.length; start += batchSize) {
    chunks.push(start);
  }

  const runChunk = async (start: number): Promise<ConfigurationError | null> => {
    const end = Math.min(start + batchSize, values.length);
    const calls: Array<{ index: number; bound: BoundCall<T> }> = [];

    for (let index = start; index < end; index += 1) {
      const value = values[index];
      const [errBind, bound] = bind(
        descriptor,
        slot === 'query'
          ? { ...args, query: { ...args.query, [param]: value } }
          : { ...args, path: { ...args.path, [param]: value } },
      );
      if (errBind) {
        results[index] = { value, result: [errBind, null] };
        continue;
      }

      calls.push({ index, bound });
    }

    logger.debug('walk batch', { id: descriptor.id, from: start, size: calls.length });
    const [errBatch, batched] = await batcher.batch(
      calls.map(({ bound }) => bound),
      batchOpts,
    );
    if (errBatch) {
      return errBatch;
    }

    await Promise.all(
      calls.map(async ({ index }, position) => {
        const value = values[index];
        results[index] = { value, result: await finish(descriptor, batched[position], value, index, post) };
      }),
    );

    return null;
  };

  let next = 0;
  let stopped = false;
  const worker = async (): Promise<ConfigurationError | null> => {
    while (next < chunks.length && !stopped) {
      const start = chunks[next];
      next += 1;
      const errChunk = await runChunk(start);
      if (errChunk) {
        stopped = true;
        return errChunk;
      }
    }

    return null;
  };

  const outcomes = await Promise.all(Array.from({ length: Math.min(concurrency, chunks.length) }, worker));
  const failed = outcomes.find((outcome) => outcome !== null);
  if (failed) {
    return [failed, null];
  }

  return [null, results];
}

async function finish<T>(
  descriptor: CallDescriptor<T>,
  batched: BatchResult | undefined,
  value: ParamValue,
  index: number,
  post: ((data: T, value: ParamValue, index: number) => unknown) | undefined,
): Promise<SafeWrap<Error, unknown>> {
  if (!batched) {
    return [new Error(`error no batch result for value ${String(value)}`), null];
  }

  const [errCall, response] = batched;
  if (errCall) {
    return [errCall, null];
  }

  const [errDecode, data] = await descriptor.decode(response);
  if (errDecode) {
    return [errDecode, null];
  }

  if (!post) {
    return [null, data];
  }

  const [errPost, processed] = await safeWrapAsync(async () => post(data, value, index));
  if (errPost) {
    return [new Error(`error post-processing value ${String(value)}`, { cause: errPost }), null];
  }

  return [null, processed];
}

/** Successful items and failures of a walk, each in input order. */
export interface MergedWalk<R> {
  data: R[];
  errors: Array<{ value: ParamValue; index: number; error: Error }>;
}

/** Splits walk results into successes and failures. */
export function mergeWalk<R>(results: readonly WalkResult<R>[]): MergedWalk<R> {
  const merged: MergedWalk<R> = { data: [], errors: [] };
  for (const [index, { value, result }] of results.entries()) {
    const [error, data] = result;
    if (error) {
      merged.errors.push({ value, index, error });
    } else {
      merged.data.push(data);
    }
  }

  return merged;
}

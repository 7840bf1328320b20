import { describe, expect, it, vi } from 'vitest';
import { bind } from '../call/bind.js';
import { defineCall } from '../call/descriptor.js';
import type { BoundCall } from '../call/types.js';
import { TransportError } from '../error/transportError.js';
import type { CallExecutor } from '../executor/executor.js';
import type { Logger } from '../types/logger.js';
import { createRawResponse, type RawResponse, responseText } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { CacheLayer, cachedExecute, isCacheable } from './cacheLayer.js';
import { MemoryStore } from './memoryStore.js';
import type { CacheStore } from './store.js';

const getItem = defineCall({ id: 'items.get', url: '/items/{itemId}' });

function item(itemId: number): BoundCall {
  const [err, bound] = bind(getItem, { path: { itemId } });
  if (err) throw err;
  return bound;
}

function countingExecutor(respond: (bound: BoundCall) => SafeWrap<TransportError, RawResponse>) {
  const execute = vi.fn<CallExecutor['execute']>(async (bound) => respond(bound));
  return { execute };
}

const ok = (body = '{}') => createRawResponse(200, body, { 'content-type': 'application/json' });

const recordingLogger = (): Logger & { warnings: string[] } => {
  const warnings: string[] = [];
  return { warnings, debug: () => {}, info: () => {}, warn: (message) => warnings.push(message) };
};

describe('isCacheable', () => {
  it('accepts only 200 responses', () => {
    expect(isCacheable(ok())).toBe(true);
    expect(isCacheable(createRawResponse(201))).toBe(false);
    expect(isCacheable(createRawResponse(404))).toBe(false);
  });
});

describe('cachedExecute', () => {
  it('executes once for repeated identical calls', async () => {
    const executor = countingExecutor(() => [null, ok('{"id":1}')]);
    const policy = { store: new MemoryStore() };

    const first = await cachedExecute(item(1), executor, policy);
    const second = await cachedExecute(item(1), executor, policy);

    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
  });

  it('executes once per distinct call', async () => {
    const executor = countingExecutor(() => [null, ok()]);
    const policy = { store: new MemoryStore() };

    for (const itemId of [1, 2, 3, 1, 2, 3]) {
      await cachedExecute(item(itemId), executor, policy);
    }

    expect(executor.execute).toHaveBeenCalledTimes(3);
  });

  it('never stores transport failures', async () => {
    const store = new MemoryStore();
    const executor = countingExecutor(() => [new TransportError('connection reset', 'network'), null]);

    const [err] = await cachedExecute(item(1), executor, { store });
    await cachedExecute(item(1), executor, { store });

    expect(err?.kind).toBe('network');
    expect(executor.execute).toHaveBeenCalledTimes(2);
    expect(store.size).toBe(0);
  });

  it('returns but does not store responses the predicate rejects', async () => {
    const store = new MemoryStore();
    const executor = countingExecutor(() => [null, createRawResponse(500, 'boom')]);

    const [, response] = await cachedExecute(item(1), executor, { store });

    expect(response?.status).toBe(500);
    expect(store.size).toBe(0);
  });

  it('executes every call when the predicate rejects every response', async () => {
    const store = new MemoryStore();
    const executor = countingExecutor(() => [null, ok('{"id":1}')]);
    const policy = { store, predicate: () => false };

    for (let i = 0; i < 4; i += 1) {
      await cachedExecute(item(1), executor, policy);
    }

    expect(executor.execute).toHaveBeenCalledTimes(4);
    expect(store.size).toBe(0);
  });

  it('serves the stored body even after the caller changed the first response', async () => {
    const executor = countingExecutor(() => [null, ok('{"v":1}')]);
    const policy = { store: new MemoryStore() };

    const [, first] = await cachedExecute(item(1), executor, policy);
    first?.body.fill(0x41);
    if (first) first.headers['x-changed'] = 'yes';
    const [, second] = await cachedExecute(item(1), executor, policy);

    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(second && responseText(second)).toBe('{"v":1}');
    expect(second?.headers).toEqual({ 'content-type': 'application/json' });
  });

  it('treats a failing store as a miss and still returns the response', async () => {
    const logger = recordingLogger();
    const broken: CacheStore = {
      get: async () => [new Error('disk gone'), null],
      put: async () => [new Error('disk gone'), null],
    };
    const executor = countingExecutor(() => [null, ok()]);

    const [err, response] = await cachedExecute(item(1), executor, { store: broken, logger });

    expect(err).toBeNull();
    expect(response?.status).toBe(200);
    expect(logger.warnings).toEqual(['cache read failed, treating as miss', 'cache write failed']);
  });
});

describe('CacheLayer', () => {
  it('shares one round trip between concurrent identical calls', async () => {
    const layer = new CacheLayer();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const execute = vi.fn<CallExecutor['execute']>(async () => {
      await gate;
      return [null, ok()];
    });

    const first = layer.execute(item(1), { execute });
    const second = layer.execute(item(1), { execute });
    release();

    expect(await first).toEqual(await second);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('serves later calls from the store', async () => {
    const layer = new CacheLayer();
    const executor = countingExecutor(() => [null, ok()]);

    await layer.execute(item(1), executor);
    await layer.execute(item(1), executor);

    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  it('uses a custom predicate', async () => {
    const layer = new CacheLayer({ predicate: (response) => response.status < 500 });
    const executor = countingExecutor(() => [null, createRawResponse(404)]);

    await layer.execute(item(1), executor);
    await layer.execute(item(1), executor);

    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  it('clears stored entries', async () => {
    const layer = new CacheLayer();
    const executor = countingExecutor(() => [null, ok()]);

    await layer.execute(item(1), executor);
    const [errClear] = await layer.clear();
    await layer.execute(item(1), executor);

    expect(errClear).toBeNull();
    expect(executor.execute).toHaveBeenCalledTimes(2);
  });

  it('disposes the old store when swapping stores', async () => {
    const previous = new MemoryStore();
    const dispose = vi.spyOn(previous, 'dispose');
    const layer = new CacheLayer({ store: previous });
    const next = new MemoryStore();

    layer.config({ store: next });

    expect(dispose).toHaveBeenCalledTimes(1);
    expect(layer.store).toBe(next);
  });
});

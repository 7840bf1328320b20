import { describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { bind } from '../call/bind.js';
import { defineCall } from '../call/descriptor.js';
import type { BoundCall, CallArgs, CallDescriptor } from '../call/types.js';
import { MemoryStore } from '../cache/memoryStore.js';
import { schemaDecoder } from '../decode/decoders.js';
import { isBindingError } from '../error/bindingError.js';
import { getDecodeError, isDecodeError } from '../error/decodeError.js';
import { getHttpError } from '../error/httpError.js';
import { isRetryExhaustedError } from '../error/retryExhaustedError.js';
import { isTransportError, TransportError } from '../error/transportError.js';
import { getValidationError } from '../error/validationError.js';
import { collectPages, startIndexCursor } from '../paginate/paginator.js';
import { jsonResponse, MockTransport, type MockTransportOptions } from '../testing/mockTransport.js';
import { createRawResponse, responseText } from '../types/request.js';
import { mergeWalk } from '../walk/walker.js';
import { ApiClient, type ApiClientProps } from './client.js';

const BATCH_URL = 'https://api.example.com/batch';

const Item = z.object({ id: z.number(), name: z.string() });

const getItem = defineCall({ id: 'items.get', url: '/items/{itemId}', decode: schemaDecoder(Item) });

interface ItemList {
  totalResults: number;
  items: number[];
}

const listItems = defineCall<ItemList>({
  id: 'items.list',
  url: '/items',
  query: { 'start-index': { default: 1 }, 'max-results': 2 },
});

function bound<T>(descriptor: CallDescriptor<T>, args?: CallArgs): BoundCall<T> {
  const [err, call] = bind(descriptor, args);
  if (err) throw err;
  return call;
}

function itemsTransport(opts?: MockTransportOptions) {
  return new MockTransport(opts).when(
    (request) => request.method === 'GET' && /^\/v1\/items\/\d+$/.test(request.path),
    (request) => {
      const id = Number(request.path.split('/').pop());
      return jsonResponse({ id, name: `item ${id}` });
    },
  );
}

function createClient(transport: MockTransport, props: Partial<ApiClientProps> = {}) {
  return new ApiClient({
    baseUrl: 'https://api.example.com/v1/',
    transport,
    retry: { timeout: 1 },
    batchEndpoints: { default: BATCH_URL },
    ...props,
  });
}

describe('ApiClient', () => {
  describe('call', () => {
    test('binds, executes and decodes', async () => {
      const transport = itemsTransport();
      const client = createClient(transport);

      const [err, item] = await client.call(getItem, { path: { itemId: 7 } });

      expect(err).toBeNull();
      expect(item).toEqual({ id: 7, name: 'item 7' });
      expect(transport.requests[0]?.url).toBe('https://api.example.com/v1/items/7');
    });

    test('returns the raw response when asked, whatever its status', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/7', jsonResponse({ error: 'gone' }, 410));
      const client = createClient(transport);

      const [err, response] = await client.call(getItem, { path: { itemId: 7 } }, { raw: true });

      expect(err).toBeNull();
      expect(response?.status).toBe(410);
      expect(response && responseText(response)).toBe('{"error":"gone"}');
    });

    test('reports an unexpected status as a decode error carrying the HTTP error', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/7', jsonResponse({ error: 'gone' }, 410));
      const client = createClient(transport);

      const [err, item] = await client.call(getItem, { path: { itemId: 7 } });

      expect(item).toBeNull();
      expect(isDecodeError(err)).toBe(true);
      expect(err?.message).toBe('error unexpected status 410');
      expect(getHttpError(err)?.response.status).toBe(410);
    });

    test('reports a schema mismatch as a decode error carrying the validation error', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/7', jsonResponse({ id: 'seven' }));
      const client = createClient(transport);

      const [err] = await client.call(getItem, { path: { itemId: 7 } });

      expect(getDecodeError(err)?.message).toBe('error validating response body');
      expect(getValidationError(err)).not.toBeNull();
    });

    test('fails binding without sending', async () => {
      const transport = itemsTransport();
      const client = createClient(transport);

      const [err] = await client.call(getItem);

      expect(isBindingError(err)).toBe(true);
      expect(err?.message).toBe('error unresolved path parameter "itemId" in items.get');
      expect(transport.requests).toHaveLength(0);
    });

    test('sends configured headers and credentials', async () => {
      const transport = itemsTransport();
      const client = createClient(transport, {
        headers: { 'X-Client': 'test' },
        auth: async () => [null, 'test-token'],
      });

      await client.call(getItem, { path: { itemId: 1 } });
      client.config({ headers: { 'X-Client': null, 'X-Trace': 'abc' } });
      await client.call(getItem, { path: { itemId: 1 } });

      expect(transport.requests[0]?.headers).toEqual({
        accept: 'application/json',
        'x-client': 'test',
        authorization: 'Bearer test-token',
      });
      expect(transport.requests[1]?.headers).toEqual({
        accept: 'application/json',
        'x-trace': 'abc',
        authorization: 'Bearer test-token',
      });
    });
  });

  describe('cache', () => {
    test('is off unless configured', async () => {
      const transport = itemsTransport();
      const client = createClient(transport);

      await client.call(getItem, { path: { itemId: 1 } });
      await client.call(getItem, { path: { itemId: 1 } });

      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('serves repeated calls from the cache once configured', async () => {
      const transport = itemsTransport();
      const client = createClient(transport, { cache: {} });

      const [, first] = await client.call(getItem, { path: { itemId: 1 } });
      const [, second] = await client.call(getItem, { path: { itemId: 1 } });
      await client.call(getItem, { path: { itemId: 1 } }, { cache: false });

      expect(second).toEqual(first);
      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('shares one round trip between concurrent identical calls', async () => {
      const transport = itemsTransport();
      const client = createClient(transport, { cache: {} });

      const results = await Promise.all([
        client.call(getItem, { path: { itemId: 1 } }),
        client.call(getItem, { path: { itemId: 1 } }),
      ]);

      expect(results.map(([, item]) => item)).toEqual([
        { id: 1, name: 'item 1' },
        { id: 1, name: 'item 1' },
      ]);
      expect(transport.count('GET', '/v1/items/1')).toBe(1);
    });

    test('does not store responses the predicate rejects', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/1', jsonResponse({ error: 'busy' }, 503));
      const client = createClient(transport, { cache: {}, retry: 0 });

      await client.call(getItem, { path: { itemId: 1 } });
      await client.call(getItem, { path: { itemId: 1 } });

      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('clearCache drops stored responses', async () => {
      const transport = itemsTransport();
      const client = createClient(transport, { cache: { store: new MemoryStore() } });

      await client.call(getItem, { path: { itemId: 1 } });
      const [errClear] = await client.clearCache();
      await client.call(getItem, { path: { itemId: 1 } });

      expect(errClear).toBeNull();
      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('can be switched on at runtime', async () => {
      const transport = itemsTransport();
      const client = createClient(transport);

      client.config({ cache: { enabled: true } });
      await client.call(getItem, { path: { itemId: 1 } });
      await client.call(getItem, { path: { itemId: 1 } });

      expect(transport.count('GET', '/v1/items/1')).toBe(1);
    });
  });

  describe('retry', () => {
    test('retries listed status codes until one succeeds', async () => {
      const transport = itemsTransport().on('GET', '/v1/items/1', jsonResponse({ error: 'busy' }, 503), 1);
      const client = createClient(transport, { retry: { limit: 2, timeout: 1, statusCodes: [503] } });

      const [err, item] = await client.call(getItem, { path: { itemId: 1 } });

      expect(err).toBeNull();
      expect(item).toEqual({ id: 1, name: 'item 1' });
      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('wraps exhausted retries of a retryable transport error', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/1', new TransportError('error connection reset', 'network'));
      const client = createClient(transport, { retry: { limit: 1, timeout: 1 } });

      const [err] = await client.call(getItem, { path: { itemId: 1 } });

      expect(isTransportError(err)).toBe(true);
      expect(err?.message).toBe('error retries exhausted after 2 attempts');
      expect(isRetryExhaustedError(err?.cause)).toBe(true);
      expect(transport.count('GET', '/v1/items/1')).toBe(2);
    });

    test('takes a per-call retry limit', async () => {
      const failure = new TransportError('error connection reset', 'network');
      const transport = new MockTransport().on('GET', '/v1/items/1', failure);
      const client = createClient(transport, { retry: { limit: 3, timeout: 1 } });

      const [err] = await client.call(getItem, { path: { itemId: 1 } }, { retry: 0 });

      expect(err).toBe(failure);
      expect(transport.count('GET', '/v1/items/1')).toBe(1);
    });

    test('does not retry a non-retryable transport error', async () => {
      const failure = new TransportError('error refused', 'network', { retryable: false });
      const transport = new MockTransport().on('GET', '/v1/items/1', failure);
      const client = createClient(transport, { retry: { limit: 3, timeout: 1 } });

      const [err] = await client.call(getItem, { path: { itemId: 1 } });

      expect(err).toBe(failure);
      expect(transport.count('GET', '/v1/items/1')).toBe(1);
    });
  });

  describe('batch', () => {
    test('decodes each item with its descriptor, in order', async () => {
      const transport = itemsTransport({ batchEndpoints: [BATCH_URL] });
      const client = createClient(transport);

      const [err, results] = await client.batch([
        bound(getItem, { path: { itemId: 2 } }),
        bound(getItem, { path: { itemId: 1 } }),
      ]);

      expect(err).toBeNull();
      expect(results).toEqual([
        [null, { id: 2, name: 'item 2' }],
        [null, { id: 1, name: 'item 1' }],
      ]);
      expect(transport.count('POST', '/batch')).toBe(1);
    });

    test('batchRaw returns each raw response', async () => {
      const transport = itemsTransport({ batchEndpoints: [BATCH_URL] }).on(
        'GET',
        '/v1/items/9',
        jsonResponse({ error: 'gone' }, 404),
      );
      const client = createClient(transport);

      const [, results] = await client.batchRaw([
        bound(getItem, { path: { itemId: 1 } }),
        bound(getItem, { path: { itemId: 9 } }),
      ]);

      expect(results?.map(([, response]) => response?.status)).toEqual([200, 404]);
    });

    test('retries a batch round trip that failed in transport', async () => {
      const transport = itemsTransport({ batchEndpoints: [BATCH_URL] }).on(
        'GET',
        '/v1/items/1',
        new TransportError('error connection reset', 'network'),
        1,
      );
      const client = createClient(transport, { retry: { limit: 1, timeout: 1 } });

      const [, results] = await client.batch([bound(getItem, { path: { itemId: 1 } })]);

      expect(results).toEqual([[null, { id: 1, name: 'item 1' }]]);
      expect(transport.count('POST', '/batch')).toBe(2);
    });

    test('uses the cache per call when configured', async () => {
      const transport = itemsTransport({ batchEndpoints: [BATCH_URL] });
      const client = createClient(transport, { cache: {} });

      await client.call(getItem, { path: { itemId: 1 } });
      const [, results] = await client.batch([bound(getItem, { path: { itemId: 1 } })]);

      expect(results).toEqual([[null, { id: 1, name: 'item 1' }]]);
      expect(transport.count('POST', '/batch')).toBe(0);
    });
  });

  describe('walk', () => {
    test('walks values through batches and post-processes them', async () => {
      const transport = itemsTransport({ batchEndpoints: [BATCH_URL] });
      const client = createClient(transport);

      const [err, results] = await client.walk(getItem, {
        param: 'itemId',
        values: [1, 2, 3],
        batchSize: 2,
        post: (item) => item.name,
      });

      expect(err).toBeNull();
      expect(mergeWalk(results ?? []).data).toEqual(['item 1', 'item 2', 'item 3']);
      expect(transport.count('POST', '/batch')).toBe(2);
    });
  });

  describe('page', () => {
    test('pages through the executor', async () => {
      const transport = new MockTransport().on('GET', '/v1/items', (request) => {
        const start = Number(new URL(request.url).searchParams.get('start-index'));
        return jsonResponse({ totalResults: 5, items: [start, start + 1].filter((n) => n <= 5) });
      });
      const client = createClient(transport);

      const [err, pages] = await collectPages(
        client.page(
          listItems,
          {},
          {
            method: 'param',
            param: 'start-index',
            next: startIndexCursor<ItemList>({ startParam: 'start-index', pageSize: 2, total: (page) => page.totalResults }),
          },
        ),
      );

      expect(err).toBeNull();
      expect(pages?.map((page) => page.items)).toEqual([[1, 2], [3, 4], [5]]);
    });
  });

  describe('lifecycle', () => {
    test('dispose cancels further calls and logs', async () => {
      const transport = itemsTransport();
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
      const client = createClient(transport, { logger });

      client.dispose();
      const [err] = await client.call(getItem, { path: { itemId: 1 } });

      expect(isTransportError(err)).toBe(true);
      expect(err instanceof TransportError && err.kind).toBe('aborted');
      expect(transport.requests).toHaveLength(0);
      expect(logger.info).toHaveBeenCalledWith('client disposed');
    });

    test('execute returns non-2xx responses untouched', async () => {
      const transport = new MockTransport().on('GET', '/v1/items/1', createRawResponse(500, 'boom'));
      const client = createClient(transport);

      const [err, response] = await client.execute(bound(getItem, { path: { itemId: 1 } }));

      expect(err).toBeNull();
      expect(response?.status).toBe(500);
    });
  });
});

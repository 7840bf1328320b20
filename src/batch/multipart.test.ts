import { describe, expect, it } from 'vitest';
import { createRawResponse, responseText } from '../types/request.js';
import {
  decodeBatchRequest,
  decodeBatchResponse,
  decodeEmbeddedResponse,
  encodeBatchRequest,
  encodeBatchResponse,
  parseBoundary,
  parseContentId,
} from './multipart.js';
import type { BatchRequestPart } from './multipart.js';

const CRLF = '\r\n';

describe('encodeBatchRequest', () => {
  it('writes one application/http part per call', () => {
    const body = encodeBatchRequest(
      [
        { id: 'item-0', method: 'GET', path: '/v1/items/1', headers: {}, body: null },
        {
          id: 'item-1',
          method: 'POST',
          path: '/v1/items',
          headers: { 'content-type': 'application/json' },
          body: '{"name":"x"}',
        },
      ],
      'batch_abc',
    );

    expect(body).toBe(
      [
        '--batch_abc',
        'Content-Type: application/http',
        'Content-ID: <item-0>',
        '',
        'GET /v1/items/1 HTTP/1.1',
        '',
        '',
        '--batch_abc',
        'Content-Type: application/http',
        'Content-ID: <item-1>',
        '',
        'POST /v1/items HTTP/1.1',
        'content-type: application/json',
        '',
        '{"name":"x"}',
        '--batch_abc--',
        '',
      ].join(CRLF),
    );
  });

  it('is read back by decodeBatchRequest', () => {
    const parts: BatchRequestPart[] = [
      { id: 'item-0', method: 'GET' as const, path: '/v1/items/1?fields=id', headers: { 'x-trace': '1' }, body: null },
      { id: 'item-1', method: 'PUT' as const, path: '/v1/items/2', headers: {}, body: 'line one\r\n\r\nline two' },
    ];

    const [err, decoded] = decodeBatchRequest(encodeBatchRequest(parts, 'b1'), 'multipart/mixed; boundary=b1');

    expect(err).toBeNull();
    expect(decoded).toEqual(parts);
  });
});

describe('decodeBatchResponse', () => {
  it('maps content ids to embedded responses', () => {
    const raw = createRawResponse(
      200,
      [
        'preamble is ignored',
        '--resp',
        'Content-Type: application/http',
        'Content-ID: <response-item-1>',
        '',
        'HTTP/1.1 404 Not Found',
        'Content-Type: application/json',
        '',
        '{"error":"missing"}',
        '--resp',
        'Content-Type: application/http',
        'Content-ID: <response-item-0>',
        '',
        'HTTP/1.1 200 OK',
        '',
        'found',
        '--resp--',
        '',
      ].join(CRLF),
      { 'content-type': 'multipart/mixed; boundary="resp"' },
    );

    const [err, parts] = decodeBatchResponse(raw);

    expect(err).toBeNull();
    expect(parts?.map(({ id }) => parseContentId(id))).toEqual([1, 0]);

    const first = parts?.[0]?.response[1];
    expect(parts?.[0]?.response[0]).toBeNull();
    expect(first?.status).toBe(404);
    expect(first?.headers).toEqual({ 'content-type': 'application/json' });
    expect(first && responseText(first)).toBe('{"error":"missing"}');
  });

  it('rejects a response that is not multipart', () => {
    const [err] = decodeBatchResponse(createRawResponse(502, 'bad gateway', { 'content-type': 'text/html' }));

    expect(err?.message).toBe('error batch response is not multipart (status 502, "text/html")');
  });

  it('falls back to the given boundary', () => {
    const raw = encodeBatchResponse([{ id: 'item-0', response: createRawResponse(200, 'ok') }], 'given');
    const bare = { ...raw, headers: { 'content-type': 'multipart/mixed' } };

    const [err, parts] = decodeBatchResponse(bare, 'given');

    expect(err).toBeNull();
    expect(parts).toHaveLength(1);
  });

  it('reads back encodeBatchResponse', () => {
    const raw = encodeBatchResponse(
      [{ id: 'item-3', response: createRawResponse(201, '{"id":3}', { 'content-type': 'application/json' }) }],
      'r',
    );

    expect(raw.headers['content-type']).toBe('multipart/mixed; boundary=r');
    const [, parts] = decodeBatchResponse(raw);
    expect(parts?.[0]?.id).toBe('<response-item-3>');
    expect(parts?.[0]?.response).toEqual([
      null,
      createRawResponse(201, '{"id":3}', { 'content-type': 'application/json' }),
    ]);
  });
});

describe('decodeEmbeddedResponse', () => {
  it('rejects a malformed status line', () => {
    const [err] = decodeEmbeddedResponse('this is not http');

    expect(err?.message).toBe('error malformed status line "this is not http"');
  });
});

describe('parseContentId', () => {
  it('accepts the id shapes servers answer with', () => {
    expect(parseContentId('<response-item-12>')).toBe(12);
    expect(parseContentId('response-item-0')).toBe(0);
    expect(parseContentId('<item-4>')).toBe(4);
    expect(parseContentId('<other-4>')).toBeNull();
    expect(parseContentId(null)).toBeNull();
  });
});

describe('parseBoundary', () => {
  it('reads quoted and bare boundaries', () => {
    expect(parseBoundary('multipart/mixed; boundary="a b"')).toBe('a b');
    expect(parseBoundary('multipart/mixed; boundary=batch_1; charset=utf-8')).toBe('batch_1');
    expect(parseBoundary('multipart/mixed')).toBeNull();
  });
});

import { STATUS_CODES } from 'node:http';
import { createRawResponse, type HttpMethod, type RawResponse, responseHeader, responseText } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

const CRLF = '\r\n';
const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'];

/** One embedded request of a batch. */
export interface BatchRequestPart {
  /** Correlation id, without angle brackets (e.g. `item-0`). */
  id: string;
  method: HttpMethod;
  /** Path plus query string, e.g. `/v1/items/3?fields=id`. */
  path: string;
  headers: Record<string, string>;
  body: string | null;
}

/** One embedded response of a batch, as found in the multipart body. */
export interface BatchResponsePart {
  /** Correlation id as sent by the server (e.g. `response-item-0`), or `null` when absent. */
  id: string | null;
  response: SafeWrap<Error, RawResponse>;
}

/** Correlation id of the call at `index`. */
export function contentId(index: number): string {
  return `item-${index}`;
}

/**
 * Index encoded in a correlation id. Accepts `<response-item-3>`, `response-item-3`,
 * `<item-3>` and `item-3`.
 */
export function parseContentId(value: string | null | undefined): number | null {
  const match = value?.trim().match(/^<?(?:response-)?item-(\d+)>?$/);
  if (!match?.[1]) {
    return null;
  }

  return Number.parseInt(match[1], 10);
}

/** Reads the `boundary` parameter of a multipart content type. */
export function parseBoundary(contentType: string | undefined): string | null {
  const match = contentType?.match(/boundary=(?:"([^"]+)"|([^;\s]+))/i);
  return match?.[1] ?? match?.[2] ?? null;
}

/** Splits at the first blank line: `[head, rest]`. */
function splitHead(text: string): [string, string] {
  const match = /\r?\n\r?\n/.exec(text);
  if (!match) {
    return [text, ''];
  }

  return [text.slice(0, match.index), text.slice(match.index + match[0].length)];
}

function parseHeaderLines(lines: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      continue;
    }

    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }

  return headers;
}

function headerLines(headers: Record<string, string>): string[] {
  return Object.entries(headers).map(([key, value]) => `${key}: ${value}`);
}

/**
 * Returns the content of each part between `--boundary` delimiters, dropping the
 * preamble, the epilogue and the line break that precedes each delimiter.
 */
export function splitMultipart(text: string, boundary: string): string[] {
  const delimiter = `--${boundary}`;
  const segments = text.split(delimiter);
  const parts: string[] = [];

  for (const segment of segments.slice(1)) {
    if (segment.startsWith('--')) {
      break;
    }

    parts.push(segment.replace(/^[ \t]*\r?\n/, '').replace(/\r?\n$/, ''));
  }

  return parts;
}

/**
 * Parses an embedded `HTTP/1.1 200 OK` response.
 */
export function decodeEmbeddedResponse(text: string): SafeWrap<Error, RawResponse> {
  const [head, body] = splitHead(text.replace(/^(\r?\n)+/, ''));
  const [statusLine = '', ...lines] = head.split(/\r?\n/);
  const status = statusLine.match(/^HTTP\/\d(?:\.\d)?\s+(\d{3})(?:\s.*)?$/);
  if (!status?.[1]) {
    return [new Error(`error malformed status line "${statusLine.slice(0, 80)}"`), null];
  }

  return [null, createRawResponse(Number.parseInt(status[1], 10), body, parseHeaderLines(lines))];
}

/**
 * Parses an embedded `GET /path HTTP/1.1` request.
 */
export function decodeEmbeddedRequest(id: string, text: string): SafeWrap<Error, BatchRequestPart> {
  const [head, body] = splitHead(text.replace(/^(\r?\n)+/, ''));
  const [requestLine = '', ...lines] = head.split(/\r?\n/);
  const match = requestLine.match(/^([A-Z]+)\s+(\S+)(?:\s+HTTP\/\d(?:\.\d)?)?$/);
  const method = HTTP_METHODS.find((candidate) => candidate === match?.[1]);
  if (!match?.[2] || !method) {
    return [new Error(`error malformed request line "${requestLine.slice(0, 80)}"`), null];
  }

  return [null, { id, method, path: match[2], headers: parseHeaderLines(lines), body: body || null }];
}

/**
 * Serializes calls into a `multipart/mixed` batch body. Each part is an
 * `application/http` request tagged with its `Content-ID`.
 */
export function encodeBatchRequest(parts: readonly BatchRequestPart[], boundary: string): string {
  let out = '';
  for (const part of parts) {
    const embedded = [`${part.method} ${part.path} HTTP/1.1`, ...headerLines(part.headers)].join(CRLF);
    out += [`--${boundary}`, 'Content-Type: application/http', `Content-ID: <${part.id}>`, '', embedded, '', part.body ?? '']
      .join(CRLF)
      .concat(CRLF);
  }

  return `${out}--${boundary}--${CRLF}`;
}

/**
 * Splits a batch request body back into its parts; the mirror of {@link encodeBatchRequest}.
 */
export function decodeBatchRequest(body: string, contentType: string | undefined): SafeWrap<Error, BatchRequestPart[]> {
  const boundary = parseBoundary(contentType);
  if (!boundary) {
    return [new Error(`error batch request has no boundary in "${contentType ?? ''}"`), null];
  }

  const parts: BatchRequestPart[] = [];
  for (const [position, part] of splitMultipart(body, boundary).entries()) {
    const [head, embedded] = splitHead(part);
    const id = parseHeaderLines(head.split(/\r?\n/))['content-id']?.replace(/^<|>$/g, '') ?? contentId(position);
    const [errPart, decoded] = decodeEmbeddedRequest(id, embedded);
    if (errPart) {
      return [new Error(`error decoding batch request part ${id}`, { cause: errPart }), null];
    }

    parts.push(decoded);
  }

  return [null, parts];
}

/**
 * Builds a multipart batch response. Parts are written in the order given, each
 * answering `<response-{id}>`.
 */
export function encodeBatchResponse(
  parts: ReadonlyArray<{ id: string; response: RawResponse }>,
  boundary: string,
  status = 200,
): RawResponse {
  let out = '';
  for (const { id, response } of parts) {
    const statusLine = `HTTP/1.1 ${response.status} ${STATUS_CODES[response.status] ?? ''}`.trimEnd();
    const embedded = [statusLine, ...headerLines(response.headers)].join(CRLF);
    out += [`--${boundary}`, 'Content-Type: application/http', `Content-ID: <response-${id}>`, '', embedded, '', responseText(response)]
      .join(CRLF)
      .concat(CRLF);
  }

  return createRawResponse(status, `${out}--${boundary}--${CRLF}`, {
    'content-type': `multipart/mixed; boundary=${boundary}`,
  });
}

/**
 * Splits a multipart batch response into its embedded responses.
 *
 * The boundary comes from the response `content-type`, falling back to
 * `fallbackBoundary`. A response that is not multipart at all is an error; a
 * single unparsable part only fails that part.
 */
export function decodeBatchResponse(
  raw: RawResponse,
  fallbackBoundary?: string,
): SafeWrap<Error, BatchResponsePart[]> {
  const contentType = responseHeader(raw, 'content-type');
  if (!contentType?.toLowerCase().startsWith('multipart/')) {
    return [new Error(`error batch response is not multipart (status ${raw.status}, "${contentType ?? ''}")`), null];
  }

  const boundary = parseBoundary(contentType) ?? fallbackBoundary;
  if (!boundary) {
    return [new Error('error batch response has no boundary'), null];
  }

  return [
    null,
    splitMultipart(responseText(raw), boundary).map((part) => {
      const [head, embedded] = splitHead(part);
      const id = parseHeaderLines(head.split(/\r?\n/))['content-id'] ?? null;
      return { id, response: decodeEmbeddedResponse(embedded) };
    }),
  ];
}

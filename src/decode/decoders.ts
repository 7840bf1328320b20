import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Decoder } from '../call/types.js';
import { DecodeError } from '../error/decodeError.js';
import { HTTPError } from '../error/httpError.js';
import { type RawResponse, responseHeader, responseText } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { validate } from './validate.js';

/** Options shared by the stock decoders. */
export interface DecoderOptions {
  /**
   * Statuses accepted as success.
   * @default 2xx
   */
  accept?: (status: number) => boolean;
}

const is2xx = (status: number) => status >= 200 && status < 300;

/**
 * Reads a response body into a value.
 *
 * - 204 and 205 responses, and empty bodies, read as `null`.
 * - JSON content types (`application/json`, `*+json`) are parsed.
 * - Everything else reads as text.
 */
export function readResponseData<ReturnValue = unknown>(response: RawResponse): SafeWrap<Error, ReturnValue> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205 || response.body.byteLength === 0) {
    return [null, null as ReturnValue];
  }

  const text = responseText(response);
  const contentType = responseHeader(response, 'content-type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text as ReturnValue];
  }

  const [errJson, json] = safeWrap<ReturnValue>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body', { cause: errJson }), null];
  }

  return [null, json];
}

function checkStatus(response: RawResponse, accept: (status: number) => boolean): DecodeError | null {
  if (accept(response.status)) {
    return null;
  }

  return new DecodeError(`error unexpected status ${response.status}`, response, {
    cause: new HTTPError(response),
  });
}

/**
 * Decodes a JSON (or text) body without checking its shape.
 *
 * The type parameter is trusted; use {@link schemaDecoder} to verify it.
 */
export function jsonDecoder<T = unknown>({ accept = is2xx }: DecoderOptions = {}): Decoder<T> {
  return async (response) => {
    const errStatus = checkStatus(response, accept);
    if (errStatus) {
      return [errStatus, null];
    }

    const [errRead, data] = readResponseData<T>(response);
    if (errRead) {
      return [new DecodeError('error reading response body', response, { cause: errRead }), null];
    }

    return [null, data];
  };
}

/** Decodes the body as UTF-8 text. */
export function textDecoder({ accept = is2xx }: DecoderOptions = {}): Decoder<string> {
  return async (response) => {
    const errStatus = checkStatus(response, accept);
    if (errStatus) {
      return [errStatus, null];
    }

    return [null, responseText(response)];
  };
}

/**
 * Decodes the body like {@link jsonDecoder} and validates it against a Standard Schema.
 */
export function schemaDecoder<S extends StandardSchemaV1>(
  schema: S,
  { accept = is2xx }: DecoderOptions = {},
): Decoder<StandardSchemaV1.InferOutput<S>> {
  return async (response) => {
    const errStatus = checkStatus(response, accept);
    if (errStatus) {
      return [errStatus, null];
    }

    const [errRead, data] = readResponseData(response);
    if (errRead) {
      return [new DecodeError('error reading response body', response, { cause: errRead }), null];
    }

    const [errValidate, validated] = await validate(data, schema);
    if (errValidate) {
      return [new DecodeError('error validating response body', response, { cause: errValidate }), null];
    }

    return [null, validated];
  };
}

/** Hands the response back untouched, whatever its status. */
export const rawDecoder: Decoder<RawResponse> = async (response) => [null, response];

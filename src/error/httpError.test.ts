import { describe, expect, it } from 'vitest';
import { createRawResponse } from '../types/request.js';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('expect shallow to correctly return true', () => {
    const err = new HTTPError(createRawResponse(400));

    expect(isHttpError(err)).toEqual(true);
    expect(err.message).toBe('HTTP Error: 400');
  });

  it('exposes the wrapped response and its status', () => {
    const response = createRawResponse(401, '{"error":true}', { 'Content-Type': 'application/json' });
    const err = new Error('outer', { cause: new HTTPError(response, 'unauthorized') });

    expect(getHttpError(err)?.response).toBe(response);
    expect(getHttpError(err)?.status).toBe(401);
    expect(getHttpError(err)?.message).toBe('unauthorized');
  });
});

import type { RawResponse } from '../types/request.js';
import { decodeBatchResponse } from './multipart.js';

/**
 * Predicate for whole-batch caching: a 200 multipart response whose every part
 * parsed and carries a 200 status.
 */
export function isCacheableBatch(response: RawResponse): boolean {
  if (response.status !== 200) {
    return false;
  }

  const [err, parts] = decodeBatchResponse(response);
  if (err || parts.length === 0) {
    return false;
  }

  return parts.every(({ response: [errPart, part] }) => !errPart && part.status === 200);
}

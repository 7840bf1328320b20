import { createHash } from 'node:crypto';
import type { BoundCall } from './types.js';

const sha256 = (input: string | Uint8Array) => createHash('sha256').update(input).digest('hex');

const sorted = (record: Readonly<Record<string, string>>) =>
  Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

/**
 * Cache identity of a bound call: descriptor id, method, sorted path and query
 * pairs, the URL override (if any) and a digest of the body.
 * Headers are not part of the identity.
 */
export function callIdentity(bound: BoundCall): string {
  return sha256(
    JSON.stringify([
      bound.descriptor.id,
      bound.method,
      sorted(bound.path),
      sorted(bound.query),
      bound.urlOverride,
      bound.body === null ? null : sha256(bound.body),
    ]),
  );
}

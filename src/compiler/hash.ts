import { createHash } from 'node:crypto';

/** Short stable id for generated location and action names. */
export function hashParts(parts: readonly unknown[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex').slice(0, 8);
}

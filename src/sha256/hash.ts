import { createHash } from 'node:crypto';
import type { BoundedBytes } from '../bytes/bounded-bytes.js';

export function hashFixed(buffer: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha256').update(buffer).digest());
}

/** Hashes only the used bytes of `buffer`; spare capacity is ignored. */
export function hashVariable(buffer: BoundedBytes): Uint8Array {
  return hashFixed(buffer.used());
}

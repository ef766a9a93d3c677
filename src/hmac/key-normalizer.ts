import type { BoundedBytes } from '../bytes/bounded-bytes.js';
import { hashVariable } from '../sha256/hash.js';
import { BLOCK_SIZE } from './constants.js';

/**
 * Maps a secret key of any length onto one SHA-256 block.
 *
 * - exactly one block: copied verbatim
 * - longer: replaced by its digest, then zero-filled to the block size
 * - shorter: zero-filled to the block size
 *
 * Reads only `key.used()`, never the spare capacity behind it.
 */
export function normalizeKey(key: BoundedBytes): Uint8Array {
  const normalized = new Uint8Array(BLOCK_SIZE);
  if (key.length > BLOCK_SIZE) {
    normalized.set(hashVariable(key));
  } else {
    normalized.set(key.used());
  }
  return normalized;
}

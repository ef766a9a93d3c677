import { BoundedBytes } from '../bytes/bounded-bytes.js';
import { computeHmac } from './hmac-engine.js';
import { normalizeKey } from './key-normalizer.js';

export { BLOCK_SIZE, DIGEST_SIZE, INNER_PAD_BYTE, OUTER_PAD_BYTE } from './constants.js';
export { computeHmac, derivePads, type PadKeys } from './hmac-engine.js';
export { normalizeKey } from './key-normalizer.js';
export { BoundedBytes } from '../bytes/bounded-bytes.js';
export { CapacityError } from '../core/errors.js';

/** HMAC-SHA256 tag (32 bytes) of the used bytes of `message` under the used bytes of `key`. */
export function hmacSha256(key: BoundedBytes, message: BoundedBytes): Uint8Array {
  return computeHmac(normalizeKey(key), message);
}

/**
 * Same as `hmacSha256` for plain arrays with explicit used lengths.
 * Each array's length is its capacity; a used length past it throws `CapacityError`.
 */
export function hmacSha256Var(
  key: Uint8Array,
  keyLength: number,
  message: Uint8Array,
  messageLength: number,
): Uint8Array {
  return hmacSha256(BoundedBytes.wrap(key, keyLength), BoundedBytes.wrap(message, messageLength));
}

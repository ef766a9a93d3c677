import { BoundedBytes } from '../bytes/bounded-bytes.js';
import { CapacityError } from '../core/errors.js';
import { hashFixed, hashVariable } from '../sha256/hash.js';
import { BLOCK_SIZE, DIGEST_SIZE, INNER_PAD_BYTE, OUTER_PAD_BYTE } from './constants.js';

export interface PadKeys {
  innerPad: Uint8Array;
  outerPad: Uint8Array;
}

/** XOR every byte of the normalized key with the two pad constants. No branching on key bytes. */
export function derivePads(normalizedKey: Uint8Array): PadKeys {
  if (normalizedKey.length !== BLOCK_SIZE) {
    throw new CapacityError(BLOCK_SIZE, normalizedKey.length, `normalized key must be ${BLOCK_SIZE} bytes, got ${normalizedKey.length}`);
  }
  const innerPad = new Uint8Array(BLOCK_SIZE);
  const outerPad = new Uint8Array(BLOCK_SIZE);
  for (let i = 0; i < BLOCK_SIZE; i++) {
    innerPad[i] = normalizedKey[i] ^ INNER_PAD_BYTE;
    outerPad[i] = normalizedKey[i] ^ OUTER_PAD_BYTE;
  }
  return { innerPad, outerPad };
}

/**
 * Two-pass HMAC over an already normalized key:
 * H(outerPad ‖ H(innerPad ‖ message)).
 */
export function computeHmac(normalizedKey: Uint8Array, message: BoundedBytes): Uint8Array {
  const { innerPad, outerPad } = derivePads(normalizedKey);

  // the inner input's capacity is exactly what it holds: 64 + L_m
  const innerInput = new Uint8Array(BLOCK_SIZE + message.length);
  innerInput.set(innerPad);
  innerInput.set(message.used(), BLOCK_SIZE);
  const innerDigest = hashVariable(BoundedBytes.wrap(innerInput, innerInput.length));

  const outerInput = new Uint8Array(BLOCK_SIZE + DIGEST_SIZE);
  outerInput.set(outerPad);
  outerInput.set(innerDigest, BLOCK_SIZE);
  return hashFixed(outerInput);
}

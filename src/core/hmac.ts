import { timingSafeEqual } from 'crypto';
import { BoundedBytes, hmacSha256 } from '../hmac/index.js';
import { decodeInput, encodeTag, type TagEncoding } from '../utils/encoding.js';

export function signMessage(key: BoundedBytes, message: BoundedBytes, encoding: TagEncoding = 'hex'): string {
  return encodeTag(hmacSha256(key, message), encoding);
}

/** Constant-time comparison; a signature that does not decode or has the wrong length is simply invalid. */
export function verifyMessage(
  key: BoundedBytes,
  message: BoundedBytes,
  signature: string,
  encoding: TagEncoding = 'hex',
): boolean {
  let provided: Uint8Array;
  try {
    provided = decodeInput(signature, encoding);
  } catch {
    return false;
  }
  const expected = hmacSha256(key, message);
  if (provided.length !== expected.length) return false;
  return timingSafeEqual(provided, expected);
}

export function hmacSign(body: string, key: string, encoding: TagEncoding = 'hex'): string {
  return signMessage(BoundedBytes.fromString(key), BoundedBytes.fromString(body), encoding);
}

export function hmacVerify(body: string, key: string, signature: string, encoding: TagEncoding = 'hex'): boolean {
  return verifyMessage(BoundedBytes.fromString(key), BoundedBytes.fromString(body), signature, encoding);
}

/**
 * HMAC-SHA256 constants (RFC 2104, FIPS 198-1)
 */
export const BLOCK_SIZE = 64; // SHA-256 block
export const DIGEST_SIZE = 32;
export const INNER_PAD_BYTE = 0x36;
export const OUTER_PAD_BYTE = 0x5c;

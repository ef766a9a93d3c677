import { CapacityError } from '../core/errors.js';

function isSize(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Byte sequence with a fixed capacity and a tracked used length.
 *
 * Only the first `length` bytes are meaningful. Whatever sits in the rest of
 * the backing storage is never read by `used()`, so hashing stays independent
 * of unused capacity.
 */
export class BoundedBytes {
  private readonly bytes: Uint8Array;
  readonly length: number;

  private constructor(bytes: Uint8Array, length: number) {
    this.bytes = bytes;
    this.length = length;
  }

  /**
   * Adopt `storage` as-is; its length is the capacity.
   * No copy is made: the result shares memory with the caller's array, so the
   * caller must not write to it while the value is in use. Use `from` for an owned copy.
   */
  static wrap(storage: Uint8Array, length: number): BoundedBytes {
    if (!isSize(length)) {
      throw new CapacityError(storage.length, length, `length must be a non-negative integer, got ${length}`);
    }
    if (length > storage.length) {
      throw new CapacityError(storage.length, length);
    }
    return new BoundedBytes(storage, length);
  }

  /** Copy `bytes` into fresh zeroed storage of `capacity` bytes. */
  static from(bytes: Uint8Array, capacity: number = bytes.length): BoundedBytes {
    if (!isSize(capacity)) {
      throw new CapacityError(capacity, bytes.length, `capacity must be a non-negative integer, got ${capacity}`);
    }
    if (bytes.length > capacity) {
      throw new CapacityError(capacity, bytes.length);
    }
    const storage = new Uint8Array(capacity);
    storage.set(bytes);
    return new BoundedBytes(storage, bytes.length);
  }

  static fromString(text: string, capacity?: number): BoundedBytes {
    const encoded = new TextEncoder().encode(text);
    return BoundedBytes.from(encoded, capacity ?? encoded.length);
  }

  get capacity(): number {
    return this.bytes.length;
  }

  /** View over the used bytes. Shares memory with the storage; treat it as read-only. */
  used(): Uint8Array {
    return this.bytes.subarray(0, this.length);
  }

  get storage(): Readonly<Uint8Array> {
    return this.bytes;
  }
}

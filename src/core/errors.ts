/** Raised when a bounded byte sequence would hold more bytes than its capacity. */
export class CapacityError extends Error {
  readonly capacity: number;
  readonly length: number;

  constructor(capacity: number, length: number, message?: string) {
    super(message ?? `length ${length} exceeds capacity ${capacity}`);
    this.name = 'CapacityError';
    this.capacity = capacity;
    this.length = length;
  }
}

export class EncodingError extends Error {
  readonly encoding: string;

  constructor(encoding: string, message: string) {
    super(message);
    this.name = 'EncodingError';
    this.encoding = encoding;
  }
}

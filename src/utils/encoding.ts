import { EncodingError } from '../core/errors.js';

export type InputEncoding = 'utf8' | 'hex' | 'base64';
export type TagEncoding = 'hex' | 'base64';

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function decodeInput(value: string, encoding: InputEncoding): Uint8Array {
  switch (encoding) {
    case 'utf8':
      return new TextEncoder().encode(value);
    case 'hex':
      if (!HEX_RE.test(value)) {
        throw new EncodingError('hex', 'value is not valid hex');
      }
      return new Uint8Array(Buffer.from(value, 'hex'));
    case 'base64':
      if (!BASE64_RE.test(value)) {
        throw new EncodingError('base64', 'value is not valid base64');
      }
      return new Uint8Array(Buffer.from(value, 'base64'));
  }
}

export function encodeTag(tag: Uint8Array, encoding: TagEncoding): string {
  return Buffer.from(tag).toString(encoding);
}

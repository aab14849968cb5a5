/**
 * SafeDataView: Safe byte reading wrapper
 *
 * Provides bounds-checked sequential reads over a CSA header buffer.
 * Every failed read, peek or seek throws before any byte is returned.
 */

import { createParseError } from '../core/errors';

/**
 * Cursor over a read-only byte buffer (little endian)
 */
export class SafeDataView {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset: number;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.bytes.byteLength) {
      throw createParseError(
        'OutOfBounds',
        `Position ${offset} out of bounds (max: ${this.bytes.byteLength})`,
        { offset: this.offset }
      );
    }
    this.offset = offset;
  }

  /**
   * Return the next `length` bytes without advancing.
   * The returned array is a view into the underlying buffer.
   */
  peek(length: number): Uint8Array {
    this.ensureAvailable(length, 'Peek');
    return this.bytes.subarray(this.offset, this.offset + length);
  }

  read(length: number): Uint8Array {
    const bytes = this.peek(length);
    this.offset += length;
    return bytes;
  }

  skip(length: number): void {
    this.ensureAvailable(length, 'Skip');
    this.offset += length;
  }

  readInt32(): number {
    this.ensureAvailable(4, 'Read');
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4, 'Read');
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  /**
   * Read a fixed-width Latin-1 field, cut at the first NUL
   */
  readString(length: number): string {
    return decodeLatin1(toNullTerminated(this.read(length)));
  }

  private ensureAvailable(length: number, operation: string): void {
    if (!Number.isInteger(length) || length < 0) {
      throw createParseError('OutOfBounds', `${operation} of invalid length ${length}`, {
        offset: this.offset,
      });
    }
    if (this.offset + length > this.bytes.byteLength) {
      throw createParseError(
        'OutOfBounds',
        `${operation} beyond buffer: need ${length} bytes, have ${this.remaining()}`,
        { offset: this.offset }
      );
    }
  }
}

/**
 * Cut a byte field at its first NUL
 */
export function toNullTerminated(bytes: Uint8Array): Uint8Array {
  const end = bytes.indexOf(0);
  return end === -1 ? bytes : bytes.subarray(0, end);
}

/**
 * Decode ISO 8859-1 bytes (the CSA character set)
 */
export function decodeLatin1(bytes: Uint8Array): string {
  let str = '';
  for (let i = 0; i < bytes.length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

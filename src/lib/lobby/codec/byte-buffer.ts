/**
 * ByteReader / ByteWriter
 * Bounds-checked cursor over binary frames; endianness is chosen per field
 */

import { DecodeError } from '../errors';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

export class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private require(size: number, field: string): number {
    if (this.remaining < size) {
      throw new DecodeError(
        `Truncated frame: ${field} needs ${size} bytes at offset ${this.offset}, ${this.remaining} left`,
        this.bytes.byteLength
      );
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  u8(field = 'u8'): number {
    return this.view.getUint8(this.require(1, field));
  }

  u16(littleEndian: boolean, field = 'u16'): number {
    return this.view.getUint16(this.require(2, field), littleEndian);
  }

  u24le(field = 'u24'): number {
    const at = this.require(3, field);
    return this.view.getUint8(at) | (this.view.getUint8(at + 1) << 8) | (this.view.getUint8(at + 2) << 16);
  }

  u32(littleEndian: boolean, field = 'u32'): number {
    return this.view.getUint32(this.require(4, field), littleEndian);
  }

  u64(littleEndian: boolean, field = 'u64'): bigint {
    return this.view.getBigUint64(this.require(8, field), littleEndian);
  }

  bytesOf(length: number, field = 'bytes'): Uint8Array {
    const at = this.require(length, field);
    return this.bytes.subarray(at, at + length);
  }

  rest(): Uint8Array {
    return this.bytesOf(this.remaining, 'rest');
  }

  /** String prefixed with a u8 byte length */
  str8(field = 'str8'): string {
    return this.utf8(this.bytesOf(this.u8(`${field} length`), field), field);
  }

  /** String prefixed with a big-endian u16 byte length */
  str16(field = 'str16'): string {
    return this.utf8(this.bytesOf(this.u16(false, `${field} length`), field), field);
  }

  expectEnd(): void {
    if (this.remaining !== 0) {
      throw new DecodeError(`Unexpected ${this.remaining} trailing bytes`, this.bytes.byteLength);
    }
  }

  private utf8(raw: Uint8Array, field: string): string {
    try {
      return utf8Decoder.decode(raw);
    } catch (error) {
      throw new DecodeError(`Invalid UTF-8 in ${field}`, this.bytes.byteLength, { cause: error });
    }
  }
}

export class ByteWriter {
  private chunks: number[] = [];

  u8(value: number): this {
    this.chunks.push(value & 0xff);
    return this;
  }

  u16(value: number, littleEndian: boolean): this {
    const bytes = [value & 0xff, (value >>> 8) & 0xff];
    this.chunks.push(...(littleEndian ? bytes : bytes.reverse()));
    return this;
  }

  u24le(value: number): this {
    this.chunks.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff);
    return this;
  }

  u32(value: number, littleEndian: boolean): this {
    const bytes = [value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff];
    this.chunks.push(...(littleEndian ? bytes : bytes.reverse()));
    return this;
  }

  u64(value: bigint, littleEndian: boolean): this {
    const bytes: number[] = [];
    let rest = BigInt.asUintN(64, value);
    for (let i = 0; i < 8; i++) {
      bytes.push(Number(rest & 0xffn));
      rest >>= 8n;
    }
    this.chunks.push(...(littleEndian ? bytes : bytes.reverse()));
    return this;
  }

  bytes(value: Uint8Array): this {
    this.chunks.push(...value);
    return this;
  }

  str8(value: string): this {
    const encoded = utf8Encoder.encode(value);
    if (encoded.byteLength > 0xff) {
      throw new RangeError(`String of ${encoded.byteLength} bytes does not fit a u8 length prefix`);
    }
    return this.u8(encoded.byteLength).bytes(encoded);
  }

  str16(value: string): this {
    const encoded = utf8Encoder.encode(value);
    if (encoded.byteLength > 0xffff) {
      throw new RangeError(`String of ${encoded.byteLength} bytes does not fit a u16 length prefix`);
    }
    return this.u16(encoded.byteLength, false).bytes(encoded);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }
}

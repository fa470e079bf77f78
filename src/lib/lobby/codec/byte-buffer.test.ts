import { describe, it, expect } from 'vitest';
import { ByteReader, ByteWriter } from './byte-buffer';
import { DecodeError } from '../errors';

describe('ByteWriter', () => {
  it('writes each field in the requested byte order', () => {
    const bytes = new ByteWriter().u16(0x0102, false).u16(0x0102, true).u24le(0x030201).u32(0x01020304, true).toBytes();
    expect(Array.from(bytes)).toEqual([0x01, 0x02, 0x02, 0x01, 0x01, 0x02, 0x03, 0x04, 0x03, 0x02, 0x01]);
  });

  it('refuses strings longer than their length prefix', () => {
    expect(() => new ByteWriter().str8('x'.repeat(256))).toThrow(RangeError);
  });
});

describe('ByteReader', () => {
  it('reads fields back in order', () => {
    const bytes = new ByteWriter().u24le(0x123456).u32(0xdeadbeef, false).str8('héllo').toBytes();
    const reader = new ByteReader(bytes);

    expect(reader.u24le()).toBe(0x123456);
    expect(reader.u32(false)).toBe(0xdeadbeef);
    expect(reader.str8()).toBe('héllo');
    expect(reader.remaining).toBe(0);
  });

  it('respects the view offset of a subarray', () => {
    const reader = new ByteReader(Uint8Array.of(0xff, 0x00, 0x2a).subarray(1));
    expect(reader.u16(false)).toBe(0x2a);
  });

  it('reports truncation with the field name', () => {
    const reader = new ByteReader(Uint8Array.of(0x01));
    expect(() => reader.u16(false, 'lobby count')).toThrow(
      'Truncated frame: lobby count needs 2 bytes at offset 0, 1 left'
    );
  });

  it('rejects invalid UTF-8', () => {
    const reader = new ByteReader(Uint8Array.of(0x02, 0xc3, 0x28));
    expect(() => reader.str8('name')).toThrow(DecodeError);
  });
});

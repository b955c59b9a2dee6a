import { describe, it, expect } from 'vitest';
import { encodeVarint62, decodeVarint62, varint62Length, MAX_VARINT62 } from '../varint.js';

describe('varint62 encoding', () => {
  it('picks the encoded length by magnitude', () => {
    expect(varint62Length(0)).toBe(1);
    expect(varint62Length(63)).toBe(1);
    expect(varint62Length(64)).toBe(2);
    expect(varint62Length(16383)).toBe(2);
    expect(varint62Length(16384)).toBe(4);
    expect(varint62Length(0x3fffffff)).toBe(4);
    expect(varint62Length(0x40000000)).toBe(8);
    expect(varint62Length(MAX_VARINT62)).toBe(8);
  });

  it('encodes the RFC 9000 sample values', () => {
    expect(encodeVarint62(37)).toEqual(Buffer.from('25', 'hex'));
    expect(encodeVarint62(15293)).toEqual(Buffer.from('7bbd', 'hex'));
    expect(encodeVarint62(494878333)).toEqual(Buffer.from('9d7f3e7d', 'hex'));
    expect(encodeVarint62(151288809941952652n)).toEqual(Buffer.from('c2197c5eff14e88c', 'hex'));
  });

  it('encodes the largest value as eight 0xff bytes', () => {
    expect(encodeVarint62(MAX_VARINT62)).toEqual(Buffer.alloc(8, 0xff));
  });

  it('rejects values outside the 62-bit range', () => {
    expect(() => varint62Length(-1)).toThrow(RangeError);
    expect(() => encodeVarint62(MAX_VARINT62 + 1n)).toThrow(RangeError);
    expect(() => encodeVarint62(Number.MAX_SAFE_INTEGER + 2)).toThrow(RangeError);
  });
});

describe('varint62 decoding', () => {
  it('decodes the RFC 9000 sample values', () => {
    expect(decodeVarint62(Buffer.from('25', 'hex'))).toEqual({ value: 37n, bytesRead: 1 });
    expect(decodeVarint62(Buffer.from('7bbd', 'hex'))).toEqual({ value: 15293n, bytesRead: 2 });
    expect(decodeVarint62(Buffer.from('9d7f3e7d', 'hex'))).toEqual({ value: 494878333n, bytesRead: 4 });
    expect(decodeVarint62(Buffer.from('c2197c5eff14e88c', 'hex'))).toEqual({
      value: 151288809941952652n,
      bytesRead: 8,
    });
  });

  it('accepts a non-minimal encoding', () => {
    expect(decodeVarint62(Buffer.from('4025', 'hex'))).toEqual({ value: 37n, bytesRead: 2 });
  });

  it('decodes at an offset', () => {
    expect(decodeVarint62(Buffer.from('ff7bbd', 'hex'), 1)).toEqual({ value: 15293n, bytesRead: 2 });
  });

  it('returns null when the encoding is cut short', () => {
    expect(decodeVarint62(Buffer.alloc(0))).toBeNull();
    expect(decodeVarint62(Buffer.from('7b', 'hex'))).toBeNull();
    expect(decodeVarint62(Buffer.from('c2197c5e', 'hex'))).toBeNull();
  });

  it('round-trips boundary values', () => {
    for (const value of [0n, 63n, 64n, 16383n, 16384n, 0x3fffffffn, 0x40000000n, MAX_VARINT62]) {
      const encoded = encodeVarint62(value);
      expect(decodeVarint62(encoded)).toEqual({ value, bytesRead: encoded.length });
    }
  });
});

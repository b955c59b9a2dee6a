// --- QUIC variable-length integer encoding/decoding (RFC 9000 §16) ---
// The two most significant bits of the first byte select a 1/2/4/8-byte
// encoding; the remaining bits carry the value in network byte order.

export const MAX_VARINT62 = (1n << 62n) - 1n;

export type Varint62Length = 1 | 2 | 4 | 8;

// Indexed by the two-bit length prefix.
const ENCODED_LENGTHS: readonly Varint62Length[] = [1, 2, 4, 8];

function toBigInt(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Varint value ${value} is not a safe integer`);
  }
  return BigInt(value);
}

export function varint62Length(value: number | bigint): Varint62Length {
  const v = toBigInt(value);
  if (v < 0n || v > MAX_VARINT62) {
    throw new RangeError(`Value ${v} does not fit in a 62-bit varint`);
  }
  if (v <= 0x3fn) return 1;
  if (v <= 0x3fffn) return 2;
  if (v <= 0x3fffffffn) return 4;
  return 8;
}

/** Writes `value` at `offset` and returns the number of bytes written. */
export function writeVarint62(buf: Buffer, offset: number, value: number | bigint): number {
  const v = toBigInt(value);
  const length = varint62Length(v);
  switch (length) {
    case 1:
      buf.writeUInt8(Number(v), offset);
      break;
    case 2:
      buf.writeUInt16BE(Number(v) + 0x4000, offset);
      break;
    case 4:
      buf.writeUInt32BE(Number(v) + 0x80000000, offset);
      break;
    case 8:
      buf.writeBigUInt64BE(v | (0xc0n << 56n), offset);
      break;
  }
  return length;
}

export function encodeVarint62(value: number | bigint): Buffer {
  const buf = Buffer.alloc(varint62Length(value));
  writeVarint62(buf, 0, value);
  return buf;
}

/** Returns null when `buf` ends before the full encoding. */
export function decodeVarint62(
  buf: Buffer,
  offset = 0,
): { value: bigint; bytesRead: Varint62Length } | null {
  if (offset >= buf.length) return null;

  const bytesRead = ENCODED_LENGTHS[buf[offset] >> 6];
  if (offset + bytesRead > buf.length) return null;

  switch (bytesRead) {
    case 1:
      return { value: BigInt(buf[offset] & 0x3f), bytesRead };
    case 2:
      return { value: BigInt(buf.readUInt16BE(offset) & 0x3fff), bytesRead };
    case 4:
      return { value: BigInt(buf.readUInt32BE(offset) & 0x3fffffff), bytesRead };
    case 8:
      return { value: buf.readBigUInt64BE(offset) & MAX_VARINT62, bytesRead };
  }
}

import { decodeVarint62 } from './varint.js';

/**
 * Read cursor bounded to a single byte range. Reads never look past the end
 * of the range they were given, so a reader over one capsule payload cannot
 * consume bytes belonging to the next capsule.
 *
 * Every read returns null when too few bytes remain and leaves the cursor
 * where it was. Byte results are views into the underlying buffer.
 */
export class DataReader {
  private pos = 0;

  constructor(private readonly data: Buffer) {}

  /** Bytes consumed so far. */
  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  isDone(): boolean {
    return this.pos >= this.data.length;
  }

  readUInt8(): number | null {
    if (this.remaining < 1) return null;
    return this.data[this.pos++];
  }

  readUInt32(): number | null {
    if (this.remaining < 4) return null;
    const value = this.data.readUInt32BE(this.pos);
    this.pos += 4;
    return value;
  }

  readVarint62(): bigint | null {
    const decoded = decodeVarint62(this.data, this.pos);
    if (!decoded) return null;
    this.pos += decoded.bytesRead;
    return decoded.value;
  }

  readBytes(length: number): Buffer | null {
    if (length > this.remaining) return null;
    const bytes = this.data.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /** Varint length followed by that many bytes. */
  readLengthPrefixed(): Buffer | null {
    const start = this.pos;
    const length = this.readVarint62();
    if (length === null) return null;
    if (length > BigInt(this.remaining)) {
      this.pos = start;
      return null;
    }
    return this.readBytes(Number(length));
  }

  readRemaining(): Buffer {
    const bytes = this.data.subarray(this.pos);
    this.pos = this.data.length;
    return bytes;
  }
}

import { varint62Length, writeVarint62 } from './varint.js';

/**
 * Write cursor over a buffer allocated once at a fixed capacity.
 * A write that does not fit returns false and writes nothing.
 */
export class DataWriter {
  readonly buffer: Buffer;
  private pos = 0;

  constructor(capacity: number) {
    this.buffer = Buffer.alloc(capacity);
  }

  /** Bytes written so far. */
  get length(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.buffer.length - this.pos;
  }

  writeUInt8(value: number): boolean {
    if (this.remaining < 1) return false;
    this.buffer.writeUInt8(value, this.pos);
    this.pos += 1;
    return true;
  }

  writeUInt32(value: number): boolean {
    if (this.remaining < 4) return false;
    this.buffer.writeUInt32BE(value, this.pos);
    this.pos += 4;
    return true;
  }

  writeVarint62(value: number | bigint): boolean {
    if (this.remaining < varint62Length(value)) return false;
    this.pos += writeVarint62(this.buffer, this.pos, value);
    return true;
  }

  writeBytes(bytes: Uint8Array): boolean {
    if (this.remaining < bytes.length) return false;
    this.buffer.set(bytes, this.pos);
    this.pos += bytes.length;
    return true;
  }
}

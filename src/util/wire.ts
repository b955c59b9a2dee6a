/**
 * Wire field descriptors. Each field knows its exact encoded length and how to
 * write itself, so a message can be sized before anything is written and the
 * output buffer allocated exactly once.
 */

import { DataWriter } from './data-writer.js';
import { varint62Length } from './varint.js';

export interface WireField {
  lengthOnWire(): number;
  /** Returns false when the writer lacks capacity. */
  writeTo(writer: DataWriter): boolean;
}

export function wireUint8(value: number): WireField {
  return {
    lengthOnWire: () => 1,
    writeTo: (writer) => writer.writeUInt8(value),
  };
}

export function wireUint32(value: number): WireField {
  return {
    lengthOnWire: () => 4,
    writeTo: (writer) => writer.writeUInt32(value),
  };
}

export function wireVarint62(value: number | bigint): WireField {
  return {
    lengthOnWire: () => varint62Length(value),
    writeTo: (writer) => writer.writeVarint62(value),
  };
}

/** Raw bytes with no length prefix (e.g. the rest of a capsule payload). */
export function wireBytes(bytes: Uint8Array): WireField {
  return {
    lengthOnWire: () => bytes.length,
    writeTo: (writer) => writer.writeBytes(bytes),
  };
}

export function wireLengthPrefixedBytes(bytes: Uint8Array): WireField {
  return {
    lengthOnWire: () => varint62Length(bytes.length) + bytes.length,
    writeTo: (writer) => writer.writeVarint62(bytes.length) && writer.writeBytes(bytes),
  };
}

/**
 * A sequence of structured records written back to back, with no count and no
 * per-record length. The reader relies on the enclosing length to stop.
 */
export function wireSpan<T>(records: readonly T[], toFields: (record: T) => WireField[]): WireField {
  return {
    lengthOnWire: () =>
      records.reduce((total, record) => total + computeLengthOnWire(...toFields(record)), 0),
    writeTo: (writer) =>
      records.every((record) => toFields(record).every((field) => field.writeTo(writer))),
  };
}

export function computeLengthOnWire(...fields: WireField[]): number {
  return fields.reduce((total, field) => total + field.lengthOnWire(), 0);
}

export type SerializeResult =
  | { ok: true; buffer: Buffer }
  | { ok: false; error: string };

export function serializeIntoBuffer(...fields: WireField[]): SerializeResult {
  const length = computeLengthOnWire(...fields);
  const writer = new DataWriter(length);

  for (let i = 0; i < fields.length; i++) {
    if (!fields[i].writeTo(writer)) {
      return { ok: false, error: `Failed to serialize field #${i}` };
    }
  }

  if (writer.remaining !== 0) {
    return {
      ok: false,
      error: `Excess ${writer.remaining} bytes allocated while serializing (wrote ${writer.length} of ${length})`,
    };
  }

  return { ok: true, buffer: writer.buffer };
}

/**
 * Incremental capsule parser.
 * Accepts arbitrarily fragmented input, buffers until a whole capsule is
 * available, decodes it and hands it to the visitor. Any structural error is
 * terminal: the buffer is dropped and the parser refuses further input.
 */

import { reportBug } from '../bug.js';
import { isDebugEnabled, loadParserLimits, validateMaxBufferSize } from '../config.js';
import { DataReader } from '../util/data-reader.js';
import { IpAddress, IpPrefix, type IpFamily } from '../util/ip-address.js';
import {
  addressAssignCapsule,
  addressRequestCapsule,
  closeWebTransportSessionCapsule,
  datagramCapsule,
  legacyDatagramCapsule,
  legacyDatagramWithoutContextCapsule,
  routeAdvertisementCapsule,
  unknownCapsule,
} from './capsule.js';
import {
  CapsuleType,
  capsuleTypeToString,
  knownCapsuleType,
  type Capsule,
  type IpAddressRange,
  type PrefixWithId,
} from './types.js';

export interface CapsuleParserVisitor {
  /**
   * Called for each decoded capsule, in stream order. The capsule's byte
   * payloads are only valid during the call; clone it to keep it.
   * Returning false fails the parser; so does throwing, and the error
   * propagates out of ingestCapsuleFragment.
   */
  onCapsule(capsule: Capsule): boolean;
  /** Called at most once per parser. */
  onCapsuleParseFailure(errorMessage: string): void;
}

export interface CapsuleParserOptions {
  /** Defaults to CAPSULE_CODEC_MAX_BUFFER_SIZE or 1 MiB. */
  maxBufferSize?: number;
  /** Log partial reads and failures to stderr. Defaults to CAPSULE_CODEC_DEBUG. */
  debug?: boolean;
}

class CapsuleDecodeError extends Error {}

// --- Payload decoders (operate within one capsule's payload scope) ---

function readAddressFamily(reader: DataReader, name: string): IpFamily {
  const family = reader.readUInt8();
  if (family === null) throw new CapsuleDecodeError(`Unable to parse capsule ${name} family`);
  if (family !== 4 && family !== 6) throw new CapsuleDecodeError(`Bad ${name} family`);
  return family;
}

function readAddress(reader: DataReader, family: IpFamily, name: string, label: string): IpAddress {
  const bytes = reader.readBytes(IpAddress.sizeOf(family));
  if (!bytes) throw new CapsuleDecodeError(`Unable to read capsule ${name} ${label}`);
  const address = IpAddress.fromPacked(bytes);
  if (!address) throw new CapsuleDecodeError(`Unable to parse capsule ${name} ${label}`);
  return address;
}

function decodePrefixesWithId(reader: DataReader, name: string): PrefixWithId[] {
  const records: PrefixWithId[] = [];
  // No record count on the wire: the payload scope ends the list.
  while (!reader.isDone()) {
    const requestId = reader.readVarint62();
    if (requestId === null) throw new CapsuleDecodeError(`Unable to parse capsule ${name} request ID`);
    const family = readAddressFamily(reader, name);
    const address = readAddress(reader, family, name, 'address');
    const prefixLength = reader.readUInt8();
    if (prefixLength === null) {
      throw new CapsuleDecodeError(`Unable to parse capsule ${name} IP prefix length`);
    }
    if (prefixLength > address.bitLength) throw new CapsuleDecodeError('Invalid IP prefix length');
    records.push({ requestId, prefix: new IpPrefix(address, prefixLength) });
  }
  return records;
}

function decodeIpAddressRanges(reader: DataReader, name: string): IpAddressRange[] {
  const ranges: IpAddressRange[] = [];
  while (!reader.isDone()) {
    const family = readAddressFamily(reader, name);
    const start = readAddress(reader, family, name, 'start address');
    const end = readAddress(reader, family, name, 'end address');
    const ipProtocol = reader.readUInt8();
    if (ipProtocol === null) throw new CapsuleDecodeError(`Unable to parse capsule ${name} IP protocol`);
    ranges.push({ start, end, ipProtocol });
  }
  return ranges;
}

function decodeCapsulePayload(wireType: bigint, reader: DataReader): Capsule {
  const type = knownCapsuleType(wireType);
  const name = capsuleTypeToString(wireType);
  switch (type) {
    case CapsuleType.Datagram:
      return datagramCapsule(reader.readRemaining());
    case CapsuleType.LegacyDatagram:
      return legacyDatagramCapsule(reader.readRemaining());
    case CapsuleType.LegacyDatagramWithoutContext:
      return legacyDatagramWithoutContextCapsule(reader.readRemaining());
    case CapsuleType.CloseWebTransportSession: {
      const errorCode = reader.readUInt32();
      if (errorCode === null) throw new CapsuleDecodeError(`Unable to parse capsule ${name} error code`);
      return closeWebTransportSessionCapsule(errorCode, reader.readRemaining());
    }
    case CapsuleType.AddressRequest:
      return addressRequestCapsule(decodePrefixesWithId(reader, name));
    case CapsuleType.AddressAssign:
      return addressAssignCapsule(decodePrefixesWithId(reader, name));
    case CapsuleType.RouteAdvertisement:
      return routeAdvertisementCapsule(decodeIpAddressRanges(reader, name));
    default:
      return unknownCapsule(wireType, reader.readRemaining());
  }
}

const MIN_STORAGE_SIZE = 256;

export class CapsuleParser {
  // Undecoded bytes live in storage[start, end). Decoding advances start;
  // appending grows storage geometrically so fragmented input stays linear.
  private storage: Buffer = Buffer.alloc(0);
  private start = 0;
  private end = 0;
  private parsingErrorOccurred = false;
  private readonly maxBufferSize: number;
  private readonly debug: boolean;

  constructor(
    private readonly visitor: CapsuleParserVisitor,
    options: CapsuleParserOptions = {},
  ) {
    this.maxBufferSize =
      options.maxBufferSize === undefined
        ? loadParserLimits().maxBufferSize
        : validateMaxBufferSize(options.maxBufferSize, 'maxBufferSize');
    this.debug = options.debug ?? isDebugEnabled();
  }

  get hasFailed(): boolean {
    return this.parsingErrorOccurred;
  }

  /** Bytes received but not yet decoded. */
  get bufferedLength(): number {
    return this.end - this.start;
  }

  /**
   * Appends a fragment and delivers every capsule it completes.
   * Returns false once the parser has failed.
   */
  ingestCapsuleFragment(fragment: Uint8Array): boolean {
    if (this.parsingErrorOccurred) return false;

    this.append(fragment);
    for (;;) {
      const bytesRead = this.attemptParseCapsule();
      if (this.parsingErrorOccurred) {
        this.clearBuffer();
        return false;
      }
      if (bytesRead === 0) break;
      this.start += bytesRead;
    }
    if (this.start === this.end) this.start = this.end = 0;

    if (this.bufferedLength > this.maxBufferSize) {
      this.clearBuffer();
      this.reportParseFailure('Refusing to buffer too much capsule data');
      return false;
    }
    return true;
  }

  /** Call at end of stream: leftover bytes mean a truncated capsule. */
  errorIfThereIsRemainingBufferedData(): void {
    if (this.parsingErrorOccurred) return;
    if (this.bufferedLength > 0) {
      this.reportParseFailure('Incomplete capsule left at the end of the stream');
    }
  }

  /** Returns the bytes consumed by one capsule, or 0 if it is incomplete or failed. */
  private attemptParseCapsule(): number {
    if (this.bufferedLength === 0) return 0;

    const reader = new DataReader(this.storage.subarray(this.start, this.end));
    const wireType = reader.readVarint62();
    if (wireType === null) {
      this.log('Partial read: not enough data to read capsule type');
      return 0;
    }
    const payload = reader.readLengthPrefixed();
    if (payload === null) {
      this.log('Partial read: not enough data to read capsule length or full capsule data');
      return 0;
    }

    let capsule: Capsule;
    try {
      capsule = decodeCapsulePayload(wireType, new DataReader(payload));
    } catch (e) {
      if (!(e instanceof CapsuleDecodeError)) throw e;
      this.reportParseFailure(e.message);
      return 0;
    }

    let accepted: boolean;
    try {
      accepted = this.visitor.onCapsule(capsule);
    } catch (e) {
      this.clearBuffer();
      this.reportParseFailure('Visitor failed to process capsule');
      throw e;
    }
    if (!accepted) {
      this.reportParseFailure('Visitor failed to process capsule');
      return 0;
    }
    return reader.offset;
  }

  private append(fragment: Uint8Array): void {
    if (this.end + fragment.length > this.storage.length) {
      const pending = this.bufferedLength;
      const needed = pending + fragment.length;
      if (needed <= this.storage.length / 2) {
        this.storage.copy(this.storage, 0, this.start, this.end);
      } else {
        const grown = Buffer.alloc(Math.max(needed * 2, MIN_STORAGE_SIZE));
        this.storage.copy(grown, 0, this.start, this.end);
        this.storage = grown;
      }
      this.start = 0;
      this.end = pending;
    }
    this.storage.set(fragment, this.end);
    this.end += fragment.length;
  }

  private clearBuffer(): void {
    this.storage = Buffer.alloc(0);
    this.start = this.end = 0;
  }

  private reportParseFailure(errorMessage: string): void {
    if (this.parsingErrorOccurred) {
      reportBug('capsule_parser_multiple_failures', `Experienced multiple parse failures: ${errorMessage}`);
      return;
    }
    this.parsingErrorOccurred = true;
    this.log(`parse failure: ${errorMessage}`);
    this.visitor.onCapsuleParseFailure(errorMessage);
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[CapsuleParser] ${msg}`);
  }
}

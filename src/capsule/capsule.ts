import { IpAddress, IpPrefix } from '../util/ip-address.js';
import {
  CapsuleType,
  capsuleTypeToString,
  type AddressAssignCapsule,
  type AddressRequestCapsule,
  type Capsule,
  type CloseWebTransportSessionCapsule,
  type DatagramCapsule,
  type IpAddressRange,
  type LegacyDatagramCapsule,
  type LegacyDatagramWithoutContextCapsule,
  type PrefixWithId,
  type RouteAdvertisementCapsule,
  type UnknownCapsule,
} from './types.js';

type Bytes = Uint8Array | string;

function toBuffer(value: Bytes): Buffer {
  if (typeof value === 'string') return Buffer.from(value, 'utf-8');
  return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

// --- Factories ---

export function datagramCapsule(payload: Bytes): DatagramCapsule {
  return { type: CapsuleType.Datagram, payload: toBuffer(payload) };
}

export function legacyDatagramCapsule(payload: Bytes): LegacyDatagramCapsule {
  return { type: CapsuleType.LegacyDatagram, payload: toBuffer(payload) };
}

export function legacyDatagramWithoutContextCapsule(payload: Bytes): LegacyDatagramWithoutContextCapsule {
  return { type: CapsuleType.LegacyDatagramWithoutContext, payload: toBuffer(payload) };
}

export function closeWebTransportSessionCapsule(
  errorCode: number,
  errorMessage: Bytes = '',
): CloseWebTransportSessionCapsule {
  return {
    type: CapsuleType.CloseWebTransportSession,
    errorCode,
    errorMessage: toBuffer(errorMessage),
  };
}

export function addressRequestCapsule(requestedAddresses: readonly PrefixWithId[] = []): AddressRequestCapsule {
  return { type: CapsuleType.AddressRequest, requestedAddresses };
}

export function addressAssignCapsule(assignedAddresses: readonly PrefixWithId[] = []): AddressAssignCapsule {
  return { type: CapsuleType.AddressAssign, assignedAddresses };
}

export function routeAdvertisementCapsule(ranges: readonly IpAddressRange[] = []): RouteAdvertisementCapsule {
  return { type: CapsuleType.RouteAdvertisement, ranges };
}

export function unknownCapsule(rawType: bigint | number, data: Bytes = ''): UnknownCapsule {
  return { type: CapsuleType.Unknown, rawType: BigInt(rawType), data: toBuffer(data) };
}

/** Wire type value of a capsule. */
export function capsuleTypeOf(capsule: Capsule): bigint {
  return capsule.type === CapsuleType.Unknown ? capsule.rawType : BigInt(capsule.type);
}

// --- Copy ---

function clonePrefixWithId(record: PrefixWithId): PrefixWithId {
  return { requestId: record.requestId, prefix: clonePrefix(record.prefix) };
}

function clonePrefix(prefix: IpPrefix): IpPrefix {
  return new IpPrefix(cloneAddress(prefix.address), prefix.prefixLength);
}

function cloneAddress(address: IpAddress): IpAddress {
  const copy = IpAddress.fromPacked(address.toPacked());
  if (!copy) throw new Error(`Cannot copy IP address ${address}`);
  return copy;
}

function cloneRange(range: IpAddressRange): IpAddressRange {
  return { start: cloneAddress(range.start), end: cloneAddress(range.end), ipProtocol: range.ipProtocol };
}

/**
 * Deep copy. Decoded capsules borrow the parser's buffer; copy one before
 * keeping it past the visitor callback.
 */
export function cloneCapsule(capsule: Capsule): Capsule {
  switch (capsule.type) {
    case CapsuleType.Datagram:
      return datagramCapsule(Buffer.from(capsule.payload));
    case CapsuleType.LegacyDatagram:
      return legacyDatagramCapsule(Buffer.from(capsule.payload));
    case CapsuleType.LegacyDatagramWithoutContext:
      return legacyDatagramWithoutContextCapsule(Buffer.from(capsule.payload));
    case CapsuleType.CloseWebTransportSession:
      return closeWebTransportSessionCapsule(capsule.errorCode, Buffer.from(capsule.errorMessage));
    case CapsuleType.AddressRequest:
      return addressRequestCapsule(capsule.requestedAddresses.map(clonePrefixWithId));
    case CapsuleType.AddressAssign:
      return addressAssignCapsule(capsule.assignedAddresses.map(clonePrefixWithId));
    case CapsuleType.RouteAdvertisement:
      return routeAdvertisementCapsule(capsule.ranges.map(cloneRange));
    case CapsuleType.Unknown:
      return unknownCapsule(capsule.rawType, Buffer.from(capsule.data));
  }
}

// --- Equality ---

function listsEqual<T>(a: readonly T[], b: readonly T[], equal: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((item, i) => equal(item, b[i]));
}

function prefixesWithIdEqual(a: PrefixWithId, b: PrefixWithId): boolean {
  return a.requestId === b.requestId && a.prefix.equals(b.prefix);
}

function rangesEqual(a: IpAddressRange, b: IpAddressRange): boolean {
  return a.start.equals(b.start) && a.end.equals(b.end) && a.ipProtocol === b.ipProtocol;
}

export function capsulesEqual(a: Capsule, b: Capsule): boolean {
  switch (a.type) {
    case CapsuleType.Datagram:
      return b.type === CapsuleType.Datagram && a.payload.equals(b.payload);
    case CapsuleType.LegacyDatagram:
      return b.type === CapsuleType.LegacyDatagram && a.payload.equals(b.payload);
    case CapsuleType.LegacyDatagramWithoutContext:
      return b.type === CapsuleType.LegacyDatagramWithoutContext && a.payload.equals(b.payload);
    case CapsuleType.CloseWebTransportSession:
      return (
        b.type === CapsuleType.CloseWebTransportSession &&
        a.errorCode === b.errorCode &&
        a.errorMessage.equals(b.errorMessage)
      );
    case CapsuleType.AddressRequest:
      return (
        b.type === CapsuleType.AddressRequest &&
        listsEqual(a.requestedAddresses, b.requestedAddresses, prefixesWithIdEqual)
      );
    case CapsuleType.AddressAssign:
      return (
        b.type === CapsuleType.AddressAssign &&
        listsEqual(a.assignedAddresses, b.assignedAddresses, prefixesWithIdEqual)
      );
    case CapsuleType.RouteAdvertisement:
      return b.type === CapsuleType.RouteAdvertisement && listsEqual(a.ranges, b.ranges, rangesEqual);
    case CapsuleType.Unknown:
      return b.type === CapsuleType.Unknown && a.rawType === b.rawType && a.data.equals(b.data);
  }
}

// --- Rendering (diagnostics only) ---

function prefixesToString(records: readonly PrefixWithId[]): string {
  return records.map((record) => `(${record.requestId}-${record.prefix})`).join('');
}

export function capsuleToString(capsule: Capsule): string {
  const name = capsuleTypeToString(capsuleTypeOf(capsule));
  switch (capsule.type) {
    case CapsuleType.Datagram:
    case CapsuleType.LegacyDatagram:
    case CapsuleType.LegacyDatagramWithoutContext:
      return `${name}[${capsule.payload.toString('hex')}]`;
    case CapsuleType.CloseWebTransportSession:
      return `${name}(error_code=${capsule.errorCode},error_message="${capsule.errorMessage.toString('utf-8')}")`;
    case CapsuleType.AddressRequest:
      return `${name}[${prefixesToString(capsule.requestedAddresses)}]`;
    case CapsuleType.AddressAssign:
      return `${name}[${prefixesToString(capsule.assignedAddresses)}]`;
    case CapsuleType.RouteAdvertisement:
      return `${name}[${capsule.ranges.map((range) => `(${range.start}-${range.end}-${range.ipProtocol})`).join('')}]`;
    case CapsuleType.Unknown:
      return `${name}[${capsule.data.toString('hex')}]`;
  }
}

import type { IpAddress, IpPrefix } from '../util/ip-address.js';

/**
 * Capsule type registry values (RFC 9297 HTTP datagrams, WebTransport,
 * RFC 9484 CONNECT-IP). `Unknown` never appears on the wire: it tags capsules
 * whose type is outside this set, which carry their raw type separately.
 */
export enum CapsuleType {
  Unknown = -1,
  Datagram = 0x00,
  LegacyDatagram = 0xff37a0,
  LegacyDatagramWithoutContext = 0xff37a5,
  CloseWebTransportSession = 0x2843,
  AddressAssign = 0x1eca6a00,
  AddressRequest = 0x1eca6a01,
  RouteAdvertisement = 0x1eca6a02,
}

export type KnownCapsuleType = Exclude<CapsuleType, CapsuleType.Unknown>;

const CAPSULE_TYPE_NAMES: Record<KnownCapsuleType, string> = {
  [CapsuleType.Datagram]: 'DATAGRAM',
  [CapsuleType.LegacyDatagram]: 'LEGACY_DATAGRAM',
  [CapsuleType.LegacyDatagramWithoutContext]: 'LEGACY_DATAGRAM_WITHOUT_CONTEXT',
  [CapsuleType.CloseWebTransportSession]: 'CLOSE_WEBTRANSPORT_SESSION',
  [CapsuleType.AddressAssign]: 'ADDRESS_ASSIGN',
  [CapsuleType.AddressRequest]: 'ADDRESS_REQUEST',
  [CapsuleType.RouteAdvertisement]: 'ROUTE_ADVERTISEMENT',
};

const KNOWN_CAPSULE_TYPES: readonly KnownCapsuleType[] = [
  CapsuleType.Datagram,
  CapsuleType.LegacyDatagram,
  CapsuleType.LegacyDatagramWithoutContext,
  CapsuleType.CloseWebTransportSession,
  CapsuleType.AddressAssign,
  CapsuleType.AddressRequest,
  CapsuleType.RouteAdvertisement,
];

const BY_WIRE_VALUE = new Map<bigint, KnownCapsuleType>(
  KNOWN_CAPSULE_TYPES.map((type): [bigint, KnownCapsuleType] => [BigInt(type), type]),
);

/** Maps a wire type value to its registry entry, or undefined if not interpreted. */
export function knownCapsuleType(wireType: bigint): KnownCapsuleType | undefined {
  return BY_WIRE_VALUE.get(wireType);
}

export function capsuleTypeToString(wireType: bigint | number): string {
  const known = knownCapsuleType(BigInt(wireType));
  return known === undefined ? `Unknown(${wireType})` : CAPSULE_TYPE_NAMES[known];
}

// --- Record types ---

export interface PrefixWithId {
  readonly requestId: bigint;
  readonly prefix: IpPrefix;
}

export interface IpAddressRange {
  readonly start: IpAddress;
  readonly end: IpAddress;
  readonly ipProtocol: number;
}

// --- Capsule variants ---

export interface DatagramCapsule {
  readonly type: CapsuleType.Datagram;
  readonly payload: Buffer;
}

export interface LegacyDatagramCapsule {
  readonly type: CapsuleType.LegacyDatagram;
  readonly payload: Buffer;
}

export interface LegacyDatagramWithoutContextCapsule {
  readonly type: CapsuleType.LegacyDatagramWithoutContext;
  readonly payload: Buffer;
}

export interface CloseWebTransportSessionCapsule {
  readonly type: CapsuleType.CloseWebTransportSession;
  readonly errorCode: number;
  readonly errorMessage: Buffer;
}

export interface AddressRequestCapsule {
  readonly type: CapsuleType.AddressRequest;
  readonly requestedAddresses: readonly PrefixWithId[];
}

export interface AddressAssignCapsule {
  readonly type: CapsuleType.AddressAssign;
  readonly assignedAddresses: readonly PrefixWithId[];
}

export interface RouteAdvertisementCapsule {
  readonly type: CapsuleType.RouteAdvertisement;
  readonly ranges: readonly IpAddressRange[];
}

export interface UnknownCapsule {
  readonly type: CapsuleType.Unknown;
  /** Wire type value, kept verbatim. */
  readonly rawType: bigint;
  readonly data: Buffer;
}

export type Capsule =
  | DatagramCapsule
  | LegacyDatagramCapsule
  | LegacyDatagramWithoutContextCapsule
  | CloseWebTransportSessionCapsule
  | AddressRequestCapsule
  | AddressAssignCapsule
  | RouteAdvertisementCapsule
  | UnknownCapsule;

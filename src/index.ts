export {
  CapsuleType,
  capsuleTypeToString,
  knownCapsuleType,
} from './capsule/types.js';
export type {
  Capsule,
  KnownCapsuleType,
  DatagramCapsule,
  LegacyDatagramCapsule,
  LegacyDatagramWithoutContextCapsule,
  CloseWebTransportSessionCapsule,
  AddressRequestCapsule,
  AddressAssignCapsule,
  RouteAdvertisementCapsule,
  UnknownCapsule,
  PrefixWithId,
  IpAddressRange,
} from './capsule/types.js';
export {
  datagramCapsule,
  legacyDatagramCapsule,
  legacyDatagramWithoutContextCapsule,
  closeWebTransportSessionCapsule,
  addressRequestCapsule,
  addressAssignCapsule,
  routeAdvertisementCapsule,
  unknownCapsule,
  capsuleTypeOf,
  cloneCapsule,
  capsulesEqual,
  capsuleToString,
} from './capsule/capsule.js';
export { serializeCapsule, serializeCapsuleWithStatus } from './capsule/serializer.js';
export { CapsuleParser } from './capsule/parser.js';
export type { CapsuleParserVisitor, CapsuleParserOptions } from './capsule/parser.js';
export { IpAddress, IpPrefix } from './util/ip-address.js';
export type { IpFamily } from './util/ip-address.js';
export { DataReader } from './util/data-reader.js';
export { DataWriter } from './util/data-writer.js';
export { encodeVarint62, decodeVarint62, varint62Length, MAX_VARINT62 } from './util/varint.js';
export type { WireField, SerializeResult } from './util/wire.js';
export { CodecBugError, setBugHandler } from './bug.js';
export type { BugHandler } from './bug.js';
export { loadParserLimits, DEFAULT_MAX_BUFFER_SIZE } from './config.js';
export type { ParserLimits } from './config.js';

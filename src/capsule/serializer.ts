import { reportBug } from '../bug.js';
import { CapsuleType, type Capsule, type IpAddressRange, type PrefixWithId } from './types.js';
import { capsuleToString, capsuleTypeOf } from './capsule.js';
import {
  computeLengthOnWire,
  serializeIntoBuffer,
  wireBytes,
  wireSpan,
  wireUint32,
  wireUint8,
  wireVarint62,
  type SerializeResult,
  type WireField,
} from '../util/wire.js';

// prefix_record := varint(request_id) uint8(family) bytes[4|16] uint8(prefix_len)
function prefixWithIdFields(record: PrefixWithId): WireField[] {
  const { address, prefixLength } = record.prefix;
  return [
    wireVarint62(record.requestId),
    wireUint8(address.family),
    wireBytes(address.toPacked()),
    wireUint8(prefixLength),
  ];
}

// range_record := uint8(family) bytes[4|16](start) bytes[4|16](end) uint8(protocol)
function ipAddressRangeFields(range: IpAddressRange): WireField[] {
  return [
    wireUint8(range.start.family),
    wireBytes(range.start.toPacked()),
    wireBytes(range.end.toPacked()),
    wireUint8(range.ipProtocol),
  ];
}

function payloadFields(capsule: Capsule): WireField[] {
  switch (capsule.type) {
    case CapsuleType.Datagram:
    case CapsuleType.LegacyDatagram:
    case CapsuleType.LegacyDatagramWithoutContext:
      return [wireBytes(capsule.payload)];
    case CapsuleType.CloseWebTransportSession:
      return [wireUint32(capsule.errorCode), wireBytes(capsule.errorMessage)];
    case CapsuleType.AddressRequest:
      return [wireSpan(capsule.requestedAddresses, prefixWithIdFields)];
    case CapsuleType.AddressAssign:
      return [wireSpan(capsule.assignedAddresses, prefixWithIdFields)];
    case CapsuleType.RouteAdvertisement:
      return [wireSpan(capsule.ranges, ipAddressRangeFields)];
    case CapsuleType.Unknown:
      return [wireBytes(capsule.data)];
  }
}

/**
 * Serializes a capsule as `varint(type) varint(length) payload`, returning the
 * failure as a value instead of reporting it.
 */
export function serializeCapsuleWithStatus(capsule: Capsule): SerializeResult {
  const fields = payloadFields(capsule);
  const payloadLength = computeLengthOnWire(...fields);
  return serializeIntoBuffer(wireVarint62(capsuleTypeOf(capsule)), wireVarint62(payloadLength), ...fields);
}

/**
 * Serializes a capsule into a buffer sized exactly once.
 * A failure here means the computed length and the bytes written disagree,
 * which is a codec defect: it is reported as a bug and thrown.
 */
export function serializeCapsule(capsule: Capsule): Buffer {
  const result = serializeCapsuleWithStatus(capsule);
  if (!result.ok) {
    throw reportBug(
      'capsule_serialization_failed',
      `Failed to serialize the following capsule:\n${capsuleToString(capsule)}\nSerialization error: ${result.error}`,
    );
  }
  return result.buffer;
}

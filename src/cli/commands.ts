import {
  closeWebTransportSessionCapsule,
  capsuleToString,
  datagramCapsule,
  unknownCapsule,
} from '../capsule/capsule.js';
import { CapsuleParser } from '../capsule/parser.js';
import { serializeCapsule } from '../capsule/serializer.js';
import type { Capsule } from '../capsule/types.js';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

function parseHex(text: string): Buffer {
  const clean = text.replace(/\s+/g, '');
  if (!HEX_PATTERN.test(clean)) throw new Error('Input is not valid hex');
  return Buffer.from(clean, 'hex');
}

export interface DecodeResult {
  lines: string[];
  error?: string;
}

/** Decodes a whole capsule stream given as hex, one rendered line per capsule. */
export function decodeHexStream(hex: string): DecodeResult {
  const result: DecodeResult = { lines: [] };
  let bytes: Buffer;
  try {
    bytes = parseHex(hex);
  } catch (e) {
    return { lines: [], error: e instanceof Error ? e.message : String(e) };
  }

  const parser = new CapsuleParser({
    onCapsule(capsule) {
      result.lines.push(capsuleToString(capsule));
      return true;
    },
    onCapsuleParseFailure(errorMessage) {
      result.error = errorMessage;
    },
  });
  parser.ingestCapsuleFragment(bytes);
  parser.errorIfThereIsRemainingBufferedData();
  return result;
}

function parseInteger(text: string | undefined, what: string): bigint {
  if (text === undefined || !/^(?:0x[0-9a-fA-F]+|\d+)$/.test(text)) {
    throw new Error(`Invalid ${what}: ${text ?? '(missing)'}`);
  }
  return BigInt(text);
}

/**
 * Builds a capsule from CLI arguments and returns its wire form as hex.
 *   datagram <hex>
 *   close <error_code> [message...]
 *   unknown <type> [hex]
 */
export function encodeCommand(args: string[]): string {
  const [kind, ...rest] = args;
  let capsule: Capsule;
  switch (kind) {
    case 'datagram':
      capsule = datagramCapsule(parseHex(rest[0] ?? ''));
      break;
    case 'close': {
      const errorCode = parseInteger(rest[0], 'error code');
      if (errorCode > 0xffffffffn) throw new Error(`Invalid error code: ${rest[0]}`);
      capsule = closeWebTransportSessionCapsule(Number(errorCode), rest.slice(1).join(' '));
      break;
    }
    case 'unknown':
      capsule = unknownCapsule(parseInteger(rest[0], 'capsule type'), parseHex(rest[1] ?? ''));
      break;
    default:
      throw new Error(`Unknown capsule kind: ${kind ?? '(missing)'}`);
  }
  return serializeCapsule(capsule).toString('hex');
}

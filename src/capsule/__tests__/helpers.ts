import { IpAddress, IpPrefix } from '../../util/ip-address.js';
import { CapsuleParser, type CapsuleParserOptions } from '../parser.js';
import { cloneCapsule } from '../capsule.js';
import type { Capsule, IpAddressRange, PrefixWithId } from '../types.js';

export function ip(text: string): IpAddress {
  const address = IpAddress.parse(text);
  if (!address) throw new Error(`bad test address ${text}`);
  return address;
}

export function prefixWithId(requestId: bigint, prefix: string): PrefixWithId {
  const parsed = IpPrefix.parse(prefix);
  if (!parsed) throw new Error(`bad test prefix ${prefix}`);
  return { requestId, prefix: parsed };
}

export function range(start: string, end: string, ipProtocol: number): IpAddressRange {
  return { start: ip(start), end: ip(end), ipProtocol };
}

/** Parser wired to a recording visitor that clones every capsule it sees. */
export function recordingParser(options: CapsuleParserOptions = {}, accept = true) {
  const capsules: Capsule[] = [];
  const failures: string[] = [];
  const parser = new CapsuleParser(
    {
      onCapsule(capsule) {
        capsules.push(cloneCapsule(capsule));
        return accept;
      },
      onCapsuleParseFailure(errorMessage) {
        failures.push(errorMessage);
      },
    },
    options,
  );
  return { parser, capsules, failures };
}

import { isIPv4, isIPv6 } from 'node:net';

export type IpFamily = 4 | 6;

const IPV4_SIZE = 4;
const IPV6_SIZE = 16;

function parseIPv4(text: string): number[] {
  return text.split('.').map((octet) => parseInt(octet, 10));
}

function parseIPv6(text: string): Buffer {
  const gap = text.indexOf('::');
  const head = gap === -1 ? text : text.slice(0, gap);
  const tail = gap === -1 ? '' : text.slice(gap + 2);

  const toGroups = (part: string): number[] => {
    if (part === '') return [];
    const groups: number[] = [];
    for (const piece of part.split(':')) {
      if (piece.includes('.')) {
        // Trailing dotted quad, e.g. ::ffff:192.0.2.1
        const [a, b, c, d] = parseIPv4(piece);
        groups.push((a << 8) | b, (c << 8) | d);
      } else {
        groups.push(parseInt(piece, 16));
      }
    }
    return groups;
  };

  const headGroups = toGroups(head);
  const tailGroups = toGroups(tail);
  const zeroCount = gap === -1 ? 0 : 8 - headGroups.length - tailGroups.length;
  const groups = [...headGroups, ...new Array<number>(zeroCount).fill(0), ...tailGroups];

  const buf = Buffer.alloc(IPV6_SIZE);
  groups.forEach((group, i) => buf.writeUInt16BE(group, i * 2));
  return buf;
}

const IPV4_MAPPED_PREFIX = Buffer.from('00000000000000000000ffff', 'hex');

/**
 * RFC 5952 text form: lowercase, longest zero run (two or more groups)
 * collapsed, IPv4-mapped addresses ending in a dotted quad.
 */
function formatIPv6(bytes: Buffer): string {
  if (bytes.subarray(0, 12).equals(IPV4_MAPPED_PREFIX)) {
    return `::ffff:${Array.from(bytes.subarray(12)).join('.')}`;
  }
  const groups = Array.from({ length: 8 }, (_, i) => bytes.readUInt16BE(i * 2));

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let end = i;
    while (end < groups.length && groups[end] === 0) end++;
    if (end - i > bestLength) {
      bestStart = i;
      bestLength = end - i;
    }
    i = end;
  }

  const hex = (group: number) => group.toString(16);
  if (bestLength < 2) return groups.map(hex).join(':');

  const head = groups.slice(0, bestStart).map(hex).join(':');
  const tail = groups.slice(bestStart + bestLength).map(hex).join(':');
  return `${head}::${tail}`;
}

export class IpAddress {
  private constructor(
    readonly family: IpFamily,
    private readonly bytes: Buffer,
  ) {}

  /** Builds an address from its 4- or 16-byte network-order form. */
  static fromPacked(bytes: Uint8Array): IpAddress | null {
    if (bytes.length === IPV4_SIZE) return new IpAddress(4, Buffer.from(bytes));
    if (bytes.length === IPV6_SIZE) return new IpAddress(6, Buffer.from(bytes));
    return null;
  }

  static parse(text: string): IpAddress | null {
    if (isIPv4(text)) return new IpAddress(4, Buffer.from(parseIPv4(text)));
    const zoneless = text.split('%')[0];
    if (isIPv6(zoneless)) return new IpAddress(6, parseIPv6(zoneless));
    return null;
  }

  /** Packed size in bytes for a family tag. */
  static sizeOf(family: IpFamily): number {
    return family === 4 ? IPV4_SIZE : IPV6_SIZE;
  }

  get bitLength(): number {
    return this.bytes.length * 8;
  }

  toPacked(): Buffer {
    return Buffer.from(this.bytes);
  }

  equals(other: IpAddress): boolean {
    return this.family === other.family && this.bytes.equals(other.bytes);
  }

  toString(): string {
    return this.family === 4 ? Array.from(this.bytes).join('.') : formatIPv6(this.bytes);
  }
}

/** An address plus the number of leading bits that form the network. */
export class IpPrefix {
  readonly prefixLength: number;

  constructor(
    readonly address: IpAddress,
    prefixLength?: number,
  ) {
    this.prefixLength = prefixLength ?? address.bitLength;
  }

  static parse(text: string): IpPrefix | null {
    const slash = text.lastIndexOf('/');
    const address = IpAddress.parse(slash === -1 ? text : text.slice(0, slash));
    if (!address) return null;
    if (slash === -1) return new IpPrefix(address);

    const lengthText = text.slice(slash + 1);
    if (!/^\d{1,3}$/.test(lengthText)) return null;
    const prefixLength = Number(lengthText);
    if (prefixLength > address.bitLength) return null;
    return new IpPrefix(address, prefixLength);
  }

  equals(other: IpPrefix): boolean {
    return this.prefixLength === other.prefixLength && this.address.equals(other.address);
  }

  toString(): string {
    return `${this.address}/${this.prefixLength}`;
  }
}

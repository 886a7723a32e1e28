import { Buffer } from 'buffer';
import { domainToASCII } from 'url';
import type { WireReader, WireWriter } from './buffer';
import { toBuffer } from './buffer';
import {
  MAX_COMPRESSION_POINTERS,
  MAX_DOMAIN_NAME_WIRE_OCTETS,
  MAX_LABEL_SIZE,
  RECURSION_LIMIT,
} from './constants';
import {
  BadLabelError,
  BufferTooSmallError,
  LabelTooLongError,
  NameTooLongError,
  TooMuchRecursionError,
} from './errors';
import type { DecodedName, LabelNormalizer } from './types';
import { escapeLabel } from './utils';

// leaves labels untouched
export const identityLabel: LabelNormalizer = label => label;

// IDNA to-ASCII for labels that carry non-ASCII characters
export const idnaLabel: LabelNormalizer = label => {
  // eslint-disable-next-line no-control-regex
  if (/^[\x00-\x7f]*$/.test(label)) return label;
  const ascii = domainToASCII(label);
  if (!ascii) {
    throw new BadLabelError(`could not convert label to ASCII: ${label}`);
  }
  return ascii;
};

// split presentation text on unescaped dots, empty segments are dropped
function splitSegments(text: string): string[] {
  const segments: string[] = [];
  let current = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      current += ch + text[i + 1];
      i++;
    } else if (ch === '.') {
      if (current) segments.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) segments.push(current);
  return segments;
}

// presentation label (\. and \DDD escapes) to wire bytes
function unescapeLabel(label: string): Buffer {
  const parts: Buffer[] = [];
  let run = '';
  for (let i = 0; i < label.length; i++) {
    const ch = label[i];
    if (ch !== '\\' || i + 1 >= label.length) {
      run += ch;
      continue;
    }
    const ddd = label.slice(i + 1, i + 4);
    if (/^\d{3}$/.test(ddd) && Number(ddd) <= 0xff) {
      parts.push(Buffer.from(run, 'utf8'), Buffer.from([Number(ddd)]));
      run = '';
      i += 3;
    } else {
      run += label[i + 1];
      i += 1;
    }
  }
  parts.push(Buffer.from(run, 'utf8'));
  return Buffer.concat(parts);
}

// turn presentation text into wire labels, enforcing label and name limits
export function encodeLabels(text: string, normalize: LabelNormalizer = identityLabel): Buffer[] {
  const labels: Buffer[] = [];
  let size = 1; // terminating zero
  for (const segment of splitSegments(text)) {
    let normalized: string;
    try {
      normalized = normalize(segment);
    } catch (error) {
      console.warn(`Could not encode label ${JSON.stringify(segment)}: ${String(error)}`);
      throw error;
    }
    const label = unescapeLabel(normalized);
    if (label.length > MAX_LABEL_SIZE) {
      throw new LabelTooLongError(segment);
    }
    size += label.length + 1;
    labels.push(label);
  }
  if (size > MAX_DOMAIN_NAME_WIRE_OCTETS) {
    throw new NameTooLongError(
      `domain name exceeded ${MAX_DOMAIN_NAME_WIRE_OCTETS} wire-format octets: ${size}`
    );
  }
  return labels;
}

// number of octets the uncompressed name takes on the wire
export function domainWireLength(text: string, normalize: LabelNormalizer = identityLabel): number {
  return encodeLabels(text, normalize).reduce((size, label) => size + label.length + 1, 1);
}

/**
 * Write a domain name, uncompressed.
 *
 * Each label is written as its length byte followed by its bytes, and the
 * whole thing ends with a zero-length label, so `dns.lookup.dog` becomes
 * `3 dns 6 lookup 3 dog 0`.
 */
export function packName(
  writer: WireWriter,
  text: string,
  normalize: LabelNormalizer = identityLabel
): void {
  for (const label of encodeLabels(text, normalize)) {
    writer.writeU8(label.length);
    writer.writeBytes(label);
  }
  writer.writeU8(0);
}

/**
 * Walk a possibly compressed name starting at `offset`, calling `onLabel`
 * with the position and length of every literal label in order.
 *
 * Returns the offset just past the name in the original stream: after the
 * terminating zero when no pointer was followed, otherwise after the first
 * pointer. Fails on truncated input, on names over 255 octets, on reserved
 * length prefixes, on a pointer to an offset already visited and once the
 * pointer chain gets deeper than {@link RECURSION_LIMIT}.
 */
function walkName(
  buf: Buffer,
  offset: number,
  onLabel?: (start: number, length: number) => void
): number {
  let off = offset;
  let resume = 0;
  let budget = MAX_DOMAIN_NAME_WIRE_OCTETS;
  let pointers = 0;
  const visited: number[] = [];

  for (;;) {
    if (off >= buf.length) {
      throw new BufferTooSmallError();
    }
    const c = buf[off++];

    if (c === 0) break;

    switch (c & 0xc0) {
      case 0x00: {
        // literal label
        if (off + c > buf.length) {
          throw new BufferTooSmallError();
        }
        budget -= c + 1;
        if (budget < 0) {
          throw new NameTooLongError(
            `domain name exceeded ${MAX_DOMAIN_NAME_WIRE_OCTETS} wire-format octets`
          );
        }
        onLabel?.(off, c);
        off += c;
        break;
      }
      case 0xc0: {
        // pointer to the rest of the name somewhere else in the message
        if (off >= buf.length) {
          throw new BufferTooSmallError();
        }
        const target = ((c & 0x3f) << 8) | buf[off++];
        if (pointers === 0) {
          resume = off;
        }
        pointers++;
        if (pointers > MAX_COMPRESSION_POINTERS) {
          throw new TooMuchRecursionError('too many compression pointers');
        }
        if (visited.includes(target)) {
          throw new TooMuchRecursionError(`hit previous offset (${target}) decoding name`);
        }
        visited.push(target);
        if (visited.length >= RECURSION_LIMIT) {
          throw new TooMuchRecursionError(`hit recursion limit (${RECURSION_LIMIT}) decoding name`);
        }
        off = target;
        break;
      }
      default:
        // 0x40 and 0x80 are reserved
        throw new BadLabelError(`bad label length byte 0x${c.toString(16)} at offset ${off - 1}`);
    }
  }

  return pointers === 0 ? off : resume;
}

// decode a name into presentation text, '.' for the root
export function unpackName(data: Uint8Array, offset: number): DecodedName {
  const buf = toBuffer(data);
  let name = '';
  const next = walkName(buf, offset, (start, length) => {
    name += `${escapeLabel(buf.subarray(start, start + length))}.`;
  });
  return { name: name || '.', offset: next };
}

// offset just past the name, without building it
export function skipName(data: Uint8Array, offset: number): number {
  return walkName(toBuffer(data), offset);
}

// read a name at the reader's cursor and advance past it
export function readName(reader: WireReader): string {
  const { name, offset } = unpackName(reader.buf, reader.offset);
  reader.seek(offset);
  return name;
}

// advance the reader past a name
export function skipNameAt(reader: WireReader): void {
  reader.seek(skipName(reader.buf, reader.offset));
}

// an immutable sequence of wire labels
export class DomainName {
  private readonly segments: readonly Buffer[];

  private constructor(segments: readonly Buffer[]) {
    this.segments = segments;
  }

  // the root of the DNS, a name with no labels
  static root(): DomainName {
    return new DomainName([]);
  }

  static fromText(text: string, normalize: LabelNormalizer = identityLabel): DomainName {
    return new DomainName(encodeLabels(text, normalize));
  }

  static fromLabels(labels: readonly Uint8Array[]): DomainName {
    const copies = labels.map(label => Buffer.from(label));
    for (const label of copies) {
      if (label.length > MAX_LABEL_SIZE) {
        throw new LabelTooLongError(escapeLabel(label));
      }
    }
    return DomainName.withinLimit(copies);
  }

  // every name is capped at 255 wire octets
  private static withinLimit(segments: readonly Buffer[]): DomainName {
    const name = new DomainName(segments);
    if (name.wireLength() > MAX_DOMAIN_NAME_WIRE_OCTETS) {
      throw new NameTooLongError(
        `domain name exceeded ${MAX_DOMAIN_NAME_WIRE_OCTETS} wire-format octets: ${name.wireLength()}`
      );
    }
    return name;
  }

  // decode a possibly compressed name from a message
  static unpack(data: Uint8Array, offset: number): { name: DomainName; offset: number } {
    const buf = toBuffer(data);
    const segments: Buffer[] = [];
    const next = walkName(buf, offset, (start, length) => {
      segments.push(Buffer.from(buf.subarray(start, start + length)));
    });
    return { name: new DomainName(segments), offset: next };
  }

  // true if every non-empty segment fits in a label
  static verify(text: string): boolean {
    return text
      .split('.')
      .filter(label => label.length > 0)
      .every(label => Buffer.byteLength(label) <= MAX_LABEL_SIZE);
  }

  get length(): number {
    return this.segments.length;
  }

  // copies, writing to them leaves the name as it is
  get labels(): Buffer[] {
    return this.segments.map(label => Buffer.from(label));
  }

  wireLength(): number {
    return this.segments.reduce((size, label) => size + label.length + 1, 1);
  }

  equals(other: DomainName): boolean {
    return (
      this.segments.length === other.segments.length &&
      this.segments.every((label, i) => label.equals(other.segments[i]))
    );
  }

  // a new name with other's labels appended after ours
  extend(other: DomainName): DomainName {
    return DomainName.withinLimit([...this.segments, ...other.segments]);
  }

  pack(writer: WireWriter): void {
    for (const label of this.segments) {
      writer.writeU8(label.length);
      writer.writeBytes(label);
    }
    writer.writeU8(0);
  }

  toString(): string {
    if (this.segments.length === 0) return '.';
    return this.segments.map(label => `${escapeLabel(label)}.`).join('');
  }
}

import { Buffer } from 'buffer';
import type { WireReader, WireWriter } from './buffer';
import {
  DEFAULT_EDNS_UDP_SIZE,
  ECS_FAMILY_IPV4,
  ECS_FAMILY_IPV6,
  ECS_FAMILY_UNSPECIFIED,
  EDNS_EXTENDED_RCODE_MASK,
  EDNS_FLAG_DO,
  EDNS_OPTIONS,
  EDNS_VERSION_MASK,
  EDNS_Z_MASK,
  OPT_RECORD,
  TYPE_OPT,
} from './constants';
import { BufferTooSmallError, InvalidSubnetError, UnpackOverflowError } from './errors';
import type {
  EdnsClientSubnet,
  EdnsLocal,
  EdnsNsid,
  EdnsOption,
  OptRecord,
  RecordHeader,
} from './types';
import {
  bytesToIpv4,
  bytesToIpv6,
  fromHex,
  ipv4FromMapped,
  ipv4ToBytes,
  ipv6ToBytes,
  isValidIpv4,
  isValidIpv6,
  toHex,
  truncateToPrefix,
} from './utils';

// advertised UDP payload size, carried in the class field
export function optUdpSize(record: OptRecord): number {
  return record.header.class;
}

export function optVersion(record: OptRecord): number {
  return (record.header.ttl & EDNS_VERSION_MASK) >>> 16;
}

// DNSSEC OK bit
export function isDnssecOk(record: OptRecord): boolean {
  return (record.header.ttl & EDNS_FLAG_DO) !== 0;
}

// the high 8 bits of the response code, already shifted into place
export function optExtendedRcode(record: OptRecord): number {
  return ((record.header.ttl & EDNS_EXTENDED_RCODE_MASK) >>> 24) << 4;
}

// reserved Z bits, must be zero but are kept as received
export function optZ(record: OptRecord): number {
  return record.header.ttl & EDNS_Z_MASK;
}

// a copy of the OPT header carrying rcode's high bits in the ttl
export function withExtendedRcode(header: RecordHeader, rcode: number): RecordHeader {
  return {
    ...header,
    ttl: ((header.ttl & ~EDNS_EXTENDED_RCODE_MASK) | ((rcode >>> 4) << 24)) >>> 0,
  };
}

export function setDnssecOk(record: OptRecord, dnssecOk = true): OptRecord {
  const ttl = dnssecOk ? record.header.ttl | EDNS_FLAG_DO : record.header.ttl & ~EDNS_FLAG_DO;
  return { ...record, header: { ...record.header, ttl: ttl >>> 0 } };
}

export function setUdpSize(record: OptRecord, size: number): OptRecord {
  return { ...record, header: { ...record.header, class: size } };
}

export interface OptRecordOptions {
  udpPayloadSize?: number;
  dnssecOk?: boolean;
  version?: number;
  options?: EdnsOption[];
}

// build an OPT pseudo-record for the additional section
export function createOptRecord(opts: OptRecordOptions = {}): OptRecord {
  const options = opts.options ?? [];
  let ttl = ((opts.version ?? 0) & 0xff) << 16;
  if (opts.dnssecOk) ttl |= EDNS_FLAG_DO;
  return {
    kind: OPT_RECORD,
    header: {
      name: '.',
      type: TYPE_OPT,
      class: opts.udpPayloadSize ?? DEFAULT_EDNS_UDP_SIZE,
      ttl,
      rdLength: options.reduce((size, option) => size + 4 + encodeEdnsOption(option).length, 0),
    },
    options,
  };
}

export function createNsid(nsid = ''): EdnsNsid {
  return { type: 'NSID', code: EDNS_OPTIONS.NSID, nsid };
}

export function createLocalOption(code: number, data: Uint8Array): EdnsLocal {
  return { type: 'LOCAL', code, data: Buffer.from(data) };
}

/**
 * Client subnet option for an address and prefix.
 *
 * The family follows the address, and the address is truncated to the
 * source prefix so the option compares equal to what a decoder reads back.
 */
export function createClientSubnet(
  ip: string,
  sourcePrefixLength: number,
  scopePrefixLength = 0
): EdnsClientSubnet {
  const v4 = isValidIpv4(ip);
  if (!v4 && !isValidIpv6(ip)) {
    throw new InvalidSubnetError(`bad address: ${ip}`);
  }
  const family = v4 ? ECS_FAMILY_IPV4 : ECS_FAMILY_IPV6;
  const max = v4 ? 32 : 128;
  if (sourcePrefixLength > max) {
    throw new InvalidSubnetError(`bad netmask: ${sourcePrefixLength}`);
  }
  const bytes = truncateToPrefix(v4 ? ipv4ToBytes(ip) : ipv6ToBytes(ip), sourcePrefixLength);
  return {
    type: 'CLIENT_SUBNET',
    code: EDNS_OPTIONS.CLIENT_SUBNET,
    family,
    sourcePrefixLength,
    scopePrefixLength,
    ip: v4 ? bytesToIpv4(bytes) : bytesToIpv6(bytes),
  };
}

// network bytes for the subnet's family, truncated to the source prefix
function subnetAddress(subnet: EdnsClientSubnet): Uint8Array {
  const { family, sourcePrefixLength, ip } = subnet;
  switch (family) {
    case ECS_FAMILY_UNSPECIFIED:
      if (sourcePrefixLength !== 0) {
        throw new InvalidSubnetError('bad address family');
      }
      return new Uint8Array(0);
    case ECS_FAMILY_IPV4: {
      if (sourcePrefixLength > 32) {
        throw new InvalidSubnetError(`bad netmask: ${sourcePrefixLength}`);
      }
      let bytes: Uint8Array | null = null;
      if (isValidIpv4(ip)) bytes = ipv4ToBytes(ip);
      else if (isValidIpv6(ip)) bytes = ipv4FromMapped(ipv6ToBytes(ip));
      if (!bytes) {
        throw new InvalidSubnetError(`bad address: ${ip}`);
      }
      return truncateToPrefix(bytes, sourcePrefixLength);
    }
    case ECS_FAMILY_IPV6: {
      if (sourcePrefixLength > 128) {
        throw new InvalidSubnetError(`bad netmask: ${sourcePrefixLength}`);
      }
      if (!isValidIpv4(ip) && !isValidIpv6(ip)) {
        throw new InvalidSubnetError(`bad address: ${ip}`);
      }
      return truncateToPrefix(ipv6ToBytes(ip), sourcePrefixLength);
    }
    default:
      throw new InvalidSubnetError('bad address family');
  }
}

// option payload without the code/length prefix
export function encodeEdnsOption(option: EdnsOption): Buffer {
  switch (option.type) {
    case 'NSID':
      return fromHex(option.nsid);
    case 'CLIENT_SUBNET': {
      // RFC 7871: only the octets covered by the source prefix are sent
      const address = subnetAddress(option).subarray(0, Math.ceil(option.sourcePrefixLength / 8));
      const data = Buffer.alloc(4 + address.length);
      data.writeUInt16BE(option.family, 0);
      data.writeUInt8(option.sourcePrefixLength, 2);
      data.writeUInt8(option.scopePrefixLength, 3);
      data.set(address, 4);
      return data;
    }
    case 'LOCAL':
      return option.data;
  }
}

function decodeClientSubnet(data: Buffer): EdnsClientSubnet {
  if (data.length < 4) {
    throw new BufferTooSmallError('client subnet option shorter than 4 bytes');
  }
  const family = data.readUInt16BE(0);
  const sourcePrefixLength = data.readUInt8(2);
  const scopePrefixLength = data.readUInt8(3);
  const address = data.subarray(4);

  let ip: string;
  switch (family) {
    case ECS_FAMILY_UNSPECIFIED:
      if (sourcePrefixLength !== 0) {
        throw new InvalidSubnetError('bad address family');
      }
      ip = '0.0.0.0';
      break;
    case ECS_FAMILY_IPV4:
    case ECS_FAMILY_IPV6: {
      const size = family === ECS_FAMILY_IPV4 ? 4 : 16;
      if (sourcePrefixLength > size * 8 || scopePrefixLength > size * 8) {
        throw new InvalidSubnetError(
          `bad netmask: source ${sourcePrefixLength}, scope ${scopePrefixLength}`
        );
      }
      if (address.length > size) {
        throw new InvalidSubnetError(`bad address length: ${address.length}`);
      }
      // short addresses are zero-padded back to full width
      const full = new Uint8Array(size);
      full.set(address);
      ip = size === 4 ? bytesToIpv4(full) : bytesToIpv6(full);
      break;
    }
    default:
      throw new InvalidSubnetError(`bad address family: ${family}`);
  }

  return {
    type: 'CLIENT_SUBNET',
    code: EDNS_OPTIONS.CLIENT_SUBNET,
    family,
    sourcePrefixLength,
    scopePrefixLength,
    ip,
  };
}

// decode one option payload, unknown codes are kept as LOCAL
export function decodeEdnsOption(code: number, data: Buffer): EdnsOption {
  switch (code) {
    case EDNS_OPTIONS.NSID:
      return createNsid(toHex(data));
    case EDNS_OPTIONS.CLIENT_SUBNET:
      return decodeClientSubnet(data);
    default:
      return createLocalOption(code, data);
  }
}

// write one (code, length, data) triple
export function packEdnsOption(writer: WireWriter, option: EdnsOption): void {
  writer.writeU16(option.code);
  const at = writer.reserveLength();
  writer.writeBytes(encodeEdnsOption(option));
  writer.patchLength(at);
}

export function unpackEdnsOption(reader: WireReader, end: number): EdnsOption {
  if (reader.offset + 4 > end) {
    throw new UnpackOverflowError(`option header overflows rdata at offset ${reader.offset}`);
  }
  const code = reader.readU16();
  const length = reader.readU16();
  if (reader.offset + length > end) {
    throw new UnpackOverflowError(
      `option ${code} length ${length} overflows rdata at offset ${reader.offset}`
    );
  }
  return decodeEdnsOption(code, reader.readBytes(length));
}

export function packOptions(writer: WireWriter, options: EdnsOption[]): void {
  for (const option of options) {
    packEdnsOption(writer, option);
  }
}

// read options until the rdata region that ends at `end` is used up
export function unpackOptions(reader: WireReader, end: number): EdnsOption[] {
  const options: EdnsOption[] = [];
  while (reader.offset < end) {
    options.push(unpackEdnsOption(reader, end));
  }
  return options;
}

function formatEdnsOption(option: EdnsOption): string {
  switch (option.type) {
    case 'NSID': {
      const text = fromHex(option.nsid).toString('latin1');
      return `; NSID: ${option.nsid} ("${text}")`;
    }
    case 'CLIENT_SUBNET':
      return `; CLIENT-SUBNET: ${option.ip}/${option.sourcePrefixLength}/${option.scopePrefixLength}`;
    case 'LOCAL':
      return `; LOCAL OPT: ${option.code}:${toHex(option.data)}`;
  }
}

// dig-style OPT pseudosection
export function formatOpt(record: OptRecord): string {
  const z = optZ(record);
  let out = ';; OPT PSEUDOSECTION:\n';
  out += `; EDNS: version: ${optVersion(record)}, flags:${isDnssecOk(record) ? ' do' : ''}; `;
  if (z !== 0) {
    out += `MBZ: 0x${z.toString(16).padStart(4, '0')}, `;
  }
  out += `udp: ${optUdpSize(record)}`;
  for (const option of record.options) {
    out += `\n${formatEdnsOption(option)}`;
  }
  return out;
}

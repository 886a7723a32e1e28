import type { WireReader, WireWriter } from './buffer';
import {
  A_RECORD,
  AAAA_RECORD,
  CLASS_INET,
  CNAME_RECORD,
  DNS_RECORD_CLASSES,
  DNS_RECORD_CODES_IANA,
  OPT_RECORD,
  TYPE_A,
  TYPE_AAAA,
  TYPE_CNAME,
  TYPE_OPT,
  UNKNOWN_RECORD,
} from './constants';
import { formatOpt, packOptions, unpackOptions } from './edns';
import { DnsError, InvalidRdLengthError, UnpackOverflowError } from './errors';
import { domainWireLength, identityLabel, packName, readName } from './names';
import type {
  AaaaRecord,
  ARecord,
  CnameRecord,
  LabelNormalizer,
  RecordHeader,
  ResourceRecord,
  UnknownRecord,
} from './types';
import {
  bytesToIpv4,
  bytesToIpv6,
  fromHex,
  fullDomain,
  ipv4ToBytes,
  ipv6ToBytes,
  isValidIpv4,
  isValidIpv6,
  normalizeIp,
  toHex,
} from './utils';

function recordHeader(
  name: string,
  type: number,
  ttl: number,
  recordClass: number,
  rdLength: number
): RecordHeader {
  return { name: fullDomain(name), type, class: recordClass, ttl, rdLength };
}

export function createARecord(
  name: string,
  address: string,
  ttl = 0,
  recordClass: number = CLASS_INET
): ARecord {
  if (!isValidIpv4(address)) {
    throw new DnsError(`invalid IPv4 address: ${address}`);
  }
  return {
    kind: A_RECORD,
    header: recordHeader(name, TYPE_A, ttl, recordClass, 4),
    address: normalizeIp(address),
  };
}

export function createAaaaRecord(
  name: string,
  address: string,
  ttl = 0,
  recordClass: number = CLASS_INET
): AaaaRecord {
  if (!isValidIpv6(address)) {
    throw new DnsError(`invalid IPv6 address: ${address}`);
  }
  return {
    kind: AAAA_RECORD,
    header: recordHeader(name, TYPE_AAAA, ttl, recordClass, 16),
    address: normalizeIp(address),
  };
}

// A for IPv4 addresses, AAAA for everything else
export function createIpRecord(
  name: string,
  address: string,
  ttl = 0,
  recordClass: number = CLASS_INET
): ARecord | AaaaRecord {
  return isValidIpv4(address)
    ? createARecord(name, address, ttl, recordClass)
    : createAaaaRecord(name, address, ttl, recordClass);
}

// an empty target is written as zero-length rdata
export function createCnameRecord(
  name: string,
  target: string,
  ttl = 0,
  recordClass: number = CLASS_INET
): CnameRecord {
  const fqdn = target ? fullDomain(target) : '';
  return {
    kind: CNAME_RECORD,
    header: recordHeader(name, TYPE_CNAME, ttl, recordClass, fqdn ? domainWireLength(fqdn) : 0),
    target: fqdn,
  };
}

// RFC 3597 record with a hex payload
export function createUnknownRecord(
  name: string,
  type: number,
  data: string,
  ttl = 0,
  recordClass: number = CLASS_INET
): UnknownRecord {
  const hex = data.toLowerCase();
  return {
    kind: UNKNOWN_RECORD,
    header: recordHeader(name, type, ttl, recordClass, fromHex(hex).length),
    data: hex,
  };
}

function packRdata(writer: WireWriter, record: ResourceRecord, normalize: LabelNormalizer): void {
  switch (record.kind) {
    case A_RECORD:
      if (!isValidIpv4(record.address)) {
        throw new DnsError(`invalid IPv4 address: ${record.address}`);
      }
      writer.writeBytes(ipv4ToBytes(record.address));
      break;
    case AAAA_RECORD:
      if (!isValidIpv6(record.address) && !isValidIpv4(record.address)) {
        throw new DnsError(`invalid IPv6 address: ${record.address}`);
      }
      writer.writeBytes(ipv6ToBytes(record.address));
      break;
    case CNAME_RECORD:
      if (record.target) packName(writer, record.target, normalize);
      break;
    case OPT_RECORD:
      packOptions(writer, record.options);
      break;
    case UNKNOWN_RECORD:
      writer.writeBytes(fromHex(record.data));
      break;
  }
}

/**
 * Write a record: the shared header, then the payload.
 *
 * The rdata length is not known until the payload has been written, so a
 * placeholder goes out first and is patched afterwards.
 */
export function packRecord(
  writer: WireWriter,
  record: ResourceRecord,
  normalize: LabelNormalizer = identityLabel
): void {
  const { header } = record;
  packName(writer, header.name, normalize);
  writer.writeU16(header.type);
  writer.writeU16(header.class);
  writer.writeU32(header.ttl);
  const at = writer.reserveLength();
  packRdata(writer, record, normalize);
  writer.patchLength(at);
}

export function unpackRecordHeader(reader: WireReader): RecordHeader {
  return {
    name: readName(reader),
    type: reader.readU16(),
    class: reader.readU16(),
    ttl: reader.readU32(),
    rdLength: reader.readU16(),
  };
}

function unpackRdata(reader: WireReader, header: RecordHeader, end: number): ResourceRecord {
  const { rdLength } = header;
  switch (header.type) {
    case TYPE_A:
      if (rdLength !== 4) {
        throw new InvalidRdLengthError(`bad rdlength for A record: ${rdLength}`);
      }
      return { kind: A_RECORD, header, address: bytesToIpv4(reader.readBytes(4)) };
    case TYPE_AAAA:
      if (rdLength === 0) {
        return { kind: AAAA_RECORD, header, address: '::' };
      }
      if (rdLength !== 16) {
        throw new InvalidRdLengthError(`bad rdlength for AAAA record: ${rdLength}`);
      }
      return { kind: AAAA_RECORD, header, address: bytesToIpv6(reader.readBytes(16)) };
    case TYPE_CNAME:
      return { kind: CNAME_RECORD, header, target: rdLength === 0 ? '' : readName(reader) };
    case TYPE_OPT:
      return { kind: OPT_RECORD, header, options: unpackOptions(reader, end) };
    default:
      return { kind: UNKNOWN_RECORD, header, data: toHex(reader.readBytes(rdLength)) };
  }
}

/**
 * Read one record at the cursor and leave the cursor at the end of its
 * declared rdata region.
 *
 * Fails with UnpackOverflowError when the declared length runs past the
 * message, and with InvalidRdLengthError when the payload does not fit the
 * declared length.
 */
export function unpackRecord(reader: WireReader): ResourceRecord {
  const header = unpackRecordHeader(reader);
  const end = reader.offset + header.rdLength;
  if (end > reader.length) {
    throw new UnpackOverflowError('overflow header');
  }

  const record = unpackRdata(reader, header, end);
  if (reader.offset > end) {
    throw new InvalidRdLengthError();
  }
  reader.seek(end);
  return record;
}

// addresses carried by the A and AAAA records of a section
export function recordAddresses(records: ResourceRecord[]): string[] {
  const addresses: string[] = [];
  for (const record of records) {
    if (record.kind === A_RECORD || record.kind === AAAA_RECORD) {
      addresses.push(record.address);
    }
  }
  return addresses;
}

// code of a record type mnemonic, 'MX' or the RFC 3597 form 'TYPE15'
export function typeFromString(mnemonic: string): number {
  const upper = mnemonic.toUpperCase();
  const code = DNS_RECORD_CODES_IANA[upper];
  if (code !== undefined) return code;
  const generic = /^TYPE(\d{1,5})$/.exec(upper);
  if (generic && Number(generic[1]) <= 0xffff) return Number(generic[1]);
  throw new DnsError(`unknown record type: ${mnemonic}`);
}

// mnemonic of a record type, RFC 3597 TYPEnnn when unassigned
export function typeToString(type: number): string {
  const name = Object.keys(DNS_RECORD_CODES_IANA).find(key => DNS_RECORD_CODES_IANA[key] === type);
  return name ?? `TYPE${type}`;
}

export function classToString(recordClass: number): string {
  const classes: Readonly<Record<string, number>> = DNS_RECORD_CLASSES;
  const name = Object.keys(classes).find(key => classes[key] === recordClass);
  return name ?? `CLASS${recordClass}`;
}

// zone-file style line, OPT renders as its pseudosection
export function formatRecord(record: ResourceRecord): string {
  if (record.kind === OPT_RECORD) {
    return formatOpt(record);
  }
  const { header } = record;
  const prefix = `${header.name}\t${header.ttl}\t${classToString(header.class)}\t${typeToString(header.type)}\t`;
  switch (record.kind) {
    case A_RECORD:
    case AAAA_RECORD:
      return prefix + record.address;
    case CNAME_RECORD:
      return prefix + record.target;
    case UNKNOWN_RECORD:
      return `${prefix}\\# ${header.rdLength} ${record.data}`;
  }
}

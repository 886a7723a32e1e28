import type { Buffer } from 'buffer';
import {
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  OPT_RECORD,
  UNKNOWN_RECORD,
  EDNS_OPTIONS,
  RECORD_KINDS,
} from './constants';

// rewrites a single label before it is written, e.g. IDNA to-ASCII
export type LabelNormalizer = (label: string) => string;

// configuration options for the codec
// external API uses Partial<DnsCodecOptions>, internal uses full DnsCodecOptions
export interface DnsCodecOptions {
  idn: boolean; // pass labels through IDNA to-ASCII on encode (default: false)
  labelNormalizer?: LabelNormalizer; // custom label normalizer, wins over idn
  udpPayloadSize: number; // advertised UDP payload size for OPT records we build (default: 1232)
  edns: boolean; // attach an OPT record to queries built by DnsCodec.query (default: false)
  dnssecOk: boolean; // set the DO bit on that OPT record (default: false)
}

// the raw 12-byte header as it appears on the wire
export interface WireHeader {
  id: number;
  bits: number; // flag word: QR | opcode | AA TC RD RA Z AD CD | rcode
  questionCount: number;
  answerCount: number;
  authorityCount: number;
  additionalCount: number;
}

// the logical message header, counts are derived from the sections
export interface MessageHeader {
  id: number;
  response: boolean;
  opcode: number; // 4 bits
  authoritative: boolean;
  truncated: boolean;
  recursionDesired: boolean;
  recursionAvailable: boolean;
  zero: boolean;
  authenticatedData: boolean;
  checkingDisabled: boolean;
  rcode: number; // 12 bits, the high 8 travel in the OPT record
}

export interface Question {
  name: string;
  type: number;
  class: number;
}

// header shared by every resource record
// for OPT, class is the UDP payload size and ttl is the EDNS flags bitfield
export interface RecordHeader {
  name: string;
  type: number;
  class: number;
  ttl: number;
  rdLength: number; // derived on write, validated on read
}

export type RecordKind = (typeof RECORD_KINDS)[number];

interface BaseResourceRecord<K extends RecordKind> {
  kind: K;
  header: RecordHeader;
}

// RFC 1035
export interface ARecord extends BaseResourceRecord<typeof A_RECORD> {
  address: string;
}

// RFC 3596
export interface AaaaRecord extends BaseResourceRecord<typeof AAAA_RECORD> {
  address: string;
}

// RFC 1035, the target may be empty when a server sends zero-length rdata
export interface CnameRecord extends BaseResourceRecord<typeof CNAME_RECORD> {
  target: string;
}

// RFC 6891 pseudo-record
export interface OptRecord extends BaseResourceRecord<typeof OPT_RECORD> {
  options: EdnsOption[];
}

// RFC 3597 generic record, payload kept as lowercase hex
export interface UnknownRecord extends BaseResourceRecord<typeof UNKNOWN_RECORD> {
  data: string;
}

export type ResourceRecord = ARecord | AaaaRecord | CnameRecord | OptRecord | UnknownRecord;

// NSID (RFC 5001), identifier as hex
export interface EdnsNsid {
  type: 'NSID';
  code: typeof EDNS_OPTIONS.NSID;
  nsid: string;
}

// Client Subnet (RFC 7871)
export interface EdnsClientSubnet {
  type: 'CLIENT_SUBNET';
  code: typeof EDNS_OPTIONS.CLIENT_SUBNET;
  family: number; // 0 unspecified, 1 IPv4, 2 IPv6
  sourcePrefixLength: number;
  scopePrefixLength: number;
  ip: string; // network address, truncated to sourcePrefixLength on the wire
}

// any other option, kept raw so it re-encodes byte for byte
export interface EdnsLocal {
  type: 'LOCAL';
  code: number;
  data: Buffer;
}

export type EdnsOption = EdnsNsid | EdnsClientSubnet | EdnsLocal;

export interface Message {
  header: MessageHeader;
  questions: Question[];
  answers: ResourceRecord[];
  authorities: ResourceRecord[];
  additionals: ResourceRecord[];
}

// result of a name decode: the text form and where the record continues
export interface DecodedName {
  name: string;
  offset: number;
}

// options for the UDP lookup client
export interface UdpLookupOptions {
  port: number; // server port (default: 53)
  ipv4: boolean; // send an A query (default: true)
  ipv6: boolean; // send an AAAA query (default: false)
  bufferSize: number; // largest datagram accepted (default: 512)
  signal?: AbortSignal; // abort the exchange
}

// reads a hosts file, injected so tests need no filesystem
export type HostsFileReader = (path: string) => Promise<string>;

// options for the hosts-file cache
export interface HostsCacheOptions {
  path: string; // hosts file location (default: platform hosts file)
  maxAge: number; // ms before the table is read again (default: 5000)
  now: () => number; // clock in ms (default: Date.now)
  readFile: HostsFileReader; // loader (default: fs/promises readFile as utf8)
}

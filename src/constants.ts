import recordTypeCodes from './data/record-types.json';

// record kinds with a dedicated payload codec, everything else is UNKNOWN (RFC 3597)
export const A_RECORD = 'A';
export const AAAA_RECORD = 'AAAA';
export const CNAME_RECORD = 'CNAME';
export const OPT_RECORD = 'OPT';
export const UNKNOWN_RECORD = 'UNKNOWN';

export const RECORD_KINDS = [
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  OPT_RECORD,
  UNKNOWN_RECORD,
] as const;

// numeric type codes the codec dispatches on
export const TYPE_A = 1;
export const TYPE_CNAME = 5;
export const TYPE_AAAA = 28;
export const TYPE_OPT = 41;

// ALL known record types from IANA, mnemonic => code
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-4
export const DNS_RECORD_CODES_IANA: Readonly<Record<string, number>> = recordTypeCodes;

// DNS record classes
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-2
export const DNS_RECORD_CLASSES = {
  IN: 1, // Internet
  CS: 2, // CSNET (obsolete)
  CH: 3, // CHAOS
  HS: 4, // Hesiod
  NONE: 254, // NONE (RFC 2136)
  ANY: 255, // ANY (query class)
} as const;

export const CLASS_INET = DNS_RECORD_CLASSES.IN;

// DNS response/error codes, 12 bits once EDNS0 is in play
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-6
export const DNS_RESPONSE_CODES = {
  NOERROR: 0, // No Error	[RFC1035]
  FORMERR: 1, // Format Error	[RFC1035]
  SERVFAIL: 2, // Server Failure	[RFC1035]
  NXDOMAIN: 3, // Non-Existent Domain	[RFC1035]
  NOTIMP: 4, // Not Implemented	[RFC1035]
  REFUSED: 5, // Query Refused	[RFC1035]
  YXDOMAIN: 6, // Name Exists when it should not	[RFC2136][RFC6672]
  YXRRSET: 7, // RR Set Exists when it should not	[RFC2136]
  NXRRSET: 8, // RR Set that should exist does not	[RFC2136]
  NOTAUTH: 9, // Server Not Authoritative for zone	[RFC2136]
  NOTZONE: 10, // Name not contained in zone	[RFC2136]
  DSOTYPENI: 11, // DSO-TYPE Not Implemented	[RFC8490]
  BADVERS: 16, // Bad OPT Version	[RFC6891]
  BADKEY: 17, // Key not recognized	[RFC8945]
  BADTIME: 18, // Signature out of time window	[RFC8945]
  BADMODE: 19, // Bad TKEY Mode	[RFC2930]
  BADNAME: 20, // Duplicate key name	[RFC2930]
  BADALG: 21, // Algorithm not supported	[RFC2930]
  BADTRUNC: 22, // Bad Truncation	[RFC8945]
  BADCOOKIE: 23, // Bad/missing Server Cookie	[RFC7873]
} as const;

export const RCODE_SUCCESS = DNS_RESPONSE_CODES.NOERROR;

// DNS opcodes, there is no 3
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-5
export const DNS_OPCODES = {
  QUERY: 0,
  IQUERY: 1,
  STATUS: 2,
  NOTIFY: 4,
  UPDATE: 5,
  DSO: 6,
} as const;

export const OPCODE_QUERY = DNS_OPCODES.QUERY;

// dns packet header flag bits
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-12
export const DNS_FLAGS = {
  QR: 1 << 15, // query/response (response=1)
  AA: 1 << 10, // authoritative
  TC: 1 << 9, // truncated
  RD: 1 << 8, // recursion desired
  RA: 1 << 7, // recursion available
  Z: 1 << 6, // reserved
  AD: 1 << 5, // authenticated data
  CD: 1 << 4, // checking disabled
} as const;

export const OPCODE_SHIFT = 11;
export const OPCODE_MASK = 0xf;
export const RCODE_MASK = 0xf;

// EDNS Option Codes (IANA Registry)
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-11
export const EDNS_OPTIONS = {
  LLQ: 1, // Long-Lived Queries
  UL: 2, // Update Lease
  NSID: 3, // Name Server Identifier
  OWNER: 4, // Owner Option
  DAU: 5, // DNSSEC Algorithm Understood
  DHU: 6, // DS Hash Understood
  N3U: 7, // NSEC3 Hash Understood
  CLIENT_SUBNET: 8, // Client Subnet (ECS)
  EXPIRE: 9, // EDNS Expire
  COOKIE: 10, // DNS Cookies
  TCP_KEEPALIVE: 11, // TCP Keep-Alive
  PADDING: 12, // EDNS Padding
  CHAIN: 13, // EDNS Chain Query
  KEY_TAG: 14, // EDNS Key Tag
  EDE: 15, // Extended DNS Error
  CLIENT_TAG: 16, // Client Tag
  SERVER_TAG: 17, // Server Tag
} as const;

// OPT TTL bitfield: | extended rcode (8) | version (8) | DO (1) | Z (15) |
export const EDNS_FLAG_DO = 1 << 15;
export const EDNS_Z_MASK = 0x7fff;
export const EDNS_VERSION_MASK = 0x00ff0000;
export const EDNS_EXTENDED_RCODE_MASK = 0xff000000;

// client-subnet address families (RFC 7871)
export const ECS_FAMILY_UNSPECIFIED = 0;
export const ECS_FAMILY_IPV4 = 1;
export const ECS_FAMILY_IPV6 = 2;

// wire limits
export const MAX_LABEL_SIZE = 255;
export const MAX_DOMAIN_NAME_WIRE_OCTETS = 255; // RFC 1035 section 2.3.4
export const MAX_COMPRESSION_POINTERS = (MAX_DOMAIN_NAME_WIRE_OCTETS + 1) / 2 - 2;
export const RECURSION_LIMIT = 8;
export const MAX_RESPONSE_CODE = 0xfff;

// the smallest UDP payload every resolver must accept, and a safe EDNS default
export const MIN_UDP_SIZE = 512;
export const DEFAULT_EDNS_UDP_SIZE = 1232;

export const DNS_PORT = 53;

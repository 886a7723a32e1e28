import type { WireReader, WireWriter } from './buffer';
import {
  DNS_FLAGS,
  DNS_OPCODES,
  DNS_RESPONSE_CODES,
  OPCODE_MASK,
  OPCODE_QUERY,
  OPCODE_SHIFT,
  RCODE_MASK,
  RCODE_SUCCESS,
} from './constants';
import type { MessageHeader, WireHeader } from './types';

// section lengths that become the header counts on encode
export interface SectionCounts {
  questions: number;
  answers: number;
  authorities: number;
  additionals: number;
}

// a header with every flag cleared
export function createHeader(overrides: Partial<MessageHeader> = {}): MessageHeader {
  return {
    id: 0,
    response: false,
    opcode: OPCODE_QUERY,
    authoritative: false,
    truncated: false,
    recursionDesired: false,
    recursionAvailable: false,
    zero: false,
    authenticatedData: false,
    checkingDisabled: false,
    rcode: RCODE_SUCCESS,
    ...overrides,
  };
}

export function packHeader(writer: WireWriter, header: WireHeader): void {
  writer.writeU16(header.id);
  writer.writeU16(header.bits);
  writer.writeU16(header.questionCount);
  writer.writeU16(header.answerCount);
  writer.writeU16(header.authorityCount);
  writer.writeU16(header.additionalCount);
}

// truncated input fails with BufferTooSmallError from the reader
export function unpackHeader(reader: WireReader): WireHeader {
  return {
    id: reader.readU16(),
    bits: reader.readU16(),
    questionCount: reader.readU16(),
    answerCount: reader.readU16(),
    authorityCount: reader.readU16(),
    additionalCount: reader.readU16(),
  };
}

/**
 * Fold the logical header into the wire flag word and attach the counts.
 * Only the low nibble of the response code fits here, the rest is carried
 * by the OPT record.
 */
export function toWireHeader(header: MessageHeader, counts: SectionCounts): WireHeader {
  let bits = ((header.opcode & OPCODE_MASK) << OPCODE_SHIFT) | (header.rcode & RCODE_MASK);
  if (header.response) bits |= DNS_FLAGS.QR;
  if (header.authoritative) bits |= DNS_FLAGS.AA;
  if (header.truncated) bits |= DNS_FLAGS.TC;
  if (header.recursionDesired) bits |= DNS_FLAGS.RD;
  if (header.recursionAvailable) bits |= DNS_FLAGS.RA;
  if (header.zero) bits |= DNS_FLAGS.Z;
  if (header.authenticatedData) bits |= DNS_FLAGS.AD;
  if (header.checkingDisabled) bits |= DNS_FLAGS.CD;

  return {
    id: header.id,
    bits,
    questionCount: counts.questions,
    answerCount: counts.answers,
    authorityCount: counts.authorities,
    additionalCount: counts.additionals,
  };
}

export function fromWireHeader(wire: WireHeader): MessageHeader {
  const { bits } = wire;
  return {
    id: wire.id,
    response: (bits & DNS_FLAGS.QR) !== 0,
    opcode: (bits >> OPCODE_SHIFT) & OPCODE_MASK,
    authoritative: (bits & DNS_FLAGS.AA) !== 0,
    truncated: (bits & DNS_FLAGS.TC) !== 0,
    recursionDesired: (bits & DNS_FLAGS.RD) !== 0,
    recursionAvailable: (bits & DNS_FLAGS.RA) !== 0,
    zero: (bits & DNS_FLAGS.Z) !== 0,
    authenticatedData: (bits & DNS_FLAGS.AD) !== 0,
    checkingDisabled: (bits & DNS_FLAGS.CD) !== 0,
    rcode: bits & RCODE_MASK,
  };
}

function reverseLookup(table: Readonly<Record<string, number>>, code: number): string | undefined {
  return Object.keys(table).find(key => table[key] === code);
}

// mnemonic of a response code, e.g. 3 => 'NXDOMAIN'
export function rcodeToString(rcode: number): string {
  return reverseLookup(DNS_RESPONSE_CODES, rcode) ?? `RCODE${rcode}`;
}

export function opcodeToString(opcode: number): string {
  return reverseLookup(DNS_OPCODES, opcode) ?? `OPCODE${opcode}`;
}

// dig-style header lines, without the trailing section counts
export function formatHeader(header: MessageHeader): string {
  const flags = [
    header.response && 'qr',
    header.authoritative && 'aa',
    header.truncated && 'tc',
    header.recursionDesired && 'rd',
    header.recursionAvailable && 'ra',
    header.zero && 'z',
    header.authenticatedData && 'ad',
    header.checkingDisabled && 'cd',
  ].filter((flag): flag is string => typeof flag === 'string');

  return (
    `;; opcode: ${opcodeToString(header.opcode)}, status: ${rcodeToString(header.rcode)}, id: ${header.id}\n` +
    `;; flags:${flags.map(flag => ` ${flag}`).join('')}`
  );
}

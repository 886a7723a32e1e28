import type { Buffer } from 'buffer';
import { randomInt } from 'crypto';
import { WireReader, WireWriter } from './buffer';
import {
  CLASS_INET,
  MAX_RESPONSE_CODE,
  MIN_UDP_SIZE,
  OPCODE_QUERY,
  OPT_RECORD,
  RCODE_MASK,
  RCODE_SUCCESS,
  TYPE_AAAA,
} from './constants';
import { formatOpt, optExtendedRcode, withExtendedRcode } from './edns';
import { BadExtendedResponseCodeError, BadResponseCodeError } from './errors';
import { createHeader, formatHeader, fromWireHeader, packHeader, toWireHeader, unpackHeader } from './header';
import { identityLabel, packName, readName, skipNameAt } from './names';
import { classToString, formatRecord, packRecord, typeToString, unpackRecord } from './records';
import type {
  LabelNormalizer,
  Message,
  MessageHeader,
  OptRecord,
  Question,
  ResourceRecord,
  WireHeader,
} from './types';
import { fullDomain } from './utils';

// an empty message, header flags cleared
export function createMessage(header: Partial<MessageHeader> = {}): Message {
  return {
    header: createHeader(header),
    questions: [],
    answers: [],
    authorities: [],
    additionals: [],
  };
}

export function createQuestion(name: string, type: number, questionClass: number = CLASS_INET): Question {
  return { name: fullDomain(name), type, class: questionClass };
}

// the first OPT record of the additional section
export function findOpt(message: Message): OptRecord | undefined {
  for (const record of message.additionals) {
    if (record.kind === OPT_RECORD) return record;
  }
  return undefined;
}

export function hasIpv6Question(message: Message): boolean {
  return message.questions.some(question => question.type === TYPE_AAAA);
}

// true if name compression could shrink the message
export function isCompressible(message: Message): boolean {
  return (
    message.questions.length > 1 ||
    message.answers.length > 0 ||
    message.authorities.length > 0 ||
    message.additionals.length > 0
  );
}

export function packQuestion(
  writer: WireWriter,
  question: Question,
  normalize: LabelNormalizer = identityLabel
): void {
  packName(writer, question.name, normalize);
  writer.writeU16(question.type);
  writer.writeU16(question.class);
}

export function unpackQuestion(reader: WireReader): Question {
  return {
    name: readName(reader),
    type: reader.readU16(),
    class: reader.readU16(),
  };
}

/**
 * Serialize a message. Counts come from the section lengths and names are
 * always written uncompressed.
 *
 * A response code above 0xF needs an OPT record in the additional section:
 * its high bits are written into a copy of that record's header, the
 * caller's record is left as it is.
 */
export function packMessage(message: Message, normalize: LabelNormalizer = identityLabel): Buffer {
  const { rcode } = message.header;
  if (rcode > MAX_RESPONSE_CODE) {
    throw new BadResponseCodeError(`response code out of range: ${rcode}`);
  }
  if (rcode > RCODE_MASK && !findOpt(message)) {
    throw new BadExtendedResponseCodeError(
      `response code ${rcode} requires an OPT record to carry its high bits`
    );
  }

  const writer = new WireWriter(MIN_UDP_SIZE);
  packHeader(
    writer,
    toWireHeader(message.header, {
      questions: message.questions.length,
      answers: message.answers.length,
      authorities: message.authorities.length,
      additionals: message.additionals.length,
    })
  );

  for (const question of message.questions) {
    packQuestion(writer, question, normalize);
  }
  for (const record of message.answers) {
    packRecord(writer, record, normalize);
  }
  for (const record of message.authorities) {
    packRecord(writer, record, normalize);
  }
  for (const record of message.additionals) {
    const packed: ResourceRecord =
      record.kind === OPT_RECORD
        ? { ...record, header: withExtendedRcode(record.header, rcode) }
        : record;
    packRecord(writer, packed, normalize);
  }

  return writer.toBuffer();
}

function unpackRecords(reader: WireReader, count: number): ResourceRecord[] {
  const records: ResourceRecord[] = [];
  for (let i = 0; i < count; i++) {
    records.push(unpackRecord(reader));
  }
  return records;
}

/**
 * Decode a whole message. Any error aborts the decode, nothing partial is
 * returned. A buffer that ends right after the header is a header-only
 * message with empty sections.
 */
export function unpackMessage(data: Uint8Array): Message {
  const reader = new WireReader(data);
  const wire = unpackHeader(reader);
  const message: Message = {
    header: fromWireHeader(wire),
    questions: [],
    answers: [],
    authorities: [],
    additionals: [],
  };
  if (reader.atEnd()) {
    return message;
  }

  for (let i = 0; i < wire.questionCount; i++) {
    message.questions.push(unpackQuestion(reader));
  }
  message.answers = unpackRecords(reader, wire.answerCount);
  message.authorities = unpackRecords(reader, wire.authorityCount);
  message.additionals = unpackRecords(reader, wire.additionalCount);

  const opt = findOpt(message);
  if (opt) {
    message.header.rcode |= optExtendedRcode(opt);
  }
  return message;
}

// the question section only, null if it does not decode
export function unpackQuestions(data: Uint8Array): Question[] | null {
  try {
    const reader = new WireReader(data);
    const wire = unpackHeader(reader);
    const questions: Question[] = [];
    for (let i = 0; i < wire.questionCount; i++) {
      questions.push(unpackQuestion(reader));
    }
    return questions;
  } catch {
    return null;
  }
}

// header plus the offset of the first answer record, null if it does not decode
export function skipQuestions(data: Uint8Array): { header: WireHeader; offset: number } | null {
  try {
    const reader = new WireReader(data);
    const header = unpackHeader(reader);
    for (let i = 0; i < header.questionCount; i++) {
      skipNameAt(reader);
      reader.readU16();
      reader.readU16();
    }
    return { header, offset: reader.offset };
  } catch {
    return null;
  }
}

// the answer section only, without building the questions
export function unpackAnswer(data: Uint8Array): ResourceRecord[] | null {
  const skipped = skipQuestions(data);
  if (!skipped) return null;
  try {
    return unpackRecords(new WireReader(data, skipped.offset), skipped.header.answerCount);
  } catch {
    return null;
  }
}

// name of the first question, null if there is none
export function pickQuestion(data: Uint8Array): string | null {
  const questions = unpackQuestions(data);
  return questions && questions.length > 0 ? questions[0].name : null;
}

// a recursive query for one name and type, with a random id unless given
export function createQuery(name: string, type: number, id: number = randomInt(0, 0x10000)): Message {
  const message = createMessage({ id, recursionDesired: true });
  message.questions.push(createQuestion(name, type));
  return message;
}

// turn message into the reply to request, keeping its record sections
export function setReply(message: Message, request: Message): Message {
  const { header } = request;
  const reply: Message = {
    ...message,
    header: {
      ...message.header,
      id: header.id,
      response: true,
      opcode: header.opcode,
      rcode: RCODE_SUCCESS,
    },
  };
  if (header.opcode === OPCODE_QUERY) {
    reply.header.recursionDesired = header.recursionDesired;
    reply.header.checkingDisabled = header.checkingDisabled;
  }
  if (request.questions.length > 0) {
    reply.questions = [{ ...request.questions[0] }];
  }
  return reply;
}

// an empty reply to request, carrying only its first question
export function createReply(request: Message): Message {
  return setReply(createMessage(), request);
}

export function setResponseCode(message: Message, request: Message, rcode: number): Message {
  const reply = setReply(message, request);
  reply.header.rcode = rcode;
  return reply;
}

// flag a message as a successful response
export function asReply(message: Message): Message {
  return { ...message, header: { ...message.header, response: true, rcode: RCODE_SUCCESS } };
}

export function formatQuestion(question: Question): string {
  return `;${question.name}\t\t${classToString(question.class)}\t${typeToString(question.type)}`;
}

function formatSection(title: string, lines: string[]): string {
  return lines.length > 0 ? `\n;; ${title} SECTION:\n${lines.join('\n')}\n` : '';
}

// dig-style rendering of a whole message
export function formatMessage(message: Message): string {
  const opt = findOpt(message);
  const additionals = message.additionals.filter(record => record.kind !== OPT_RECORD);

  let out = formatHeader(message.header);
  out += `; QUERY: ${message.questions.length}, ANSWER: ${message.answers.length}, `;
  out += `AUTHORITY: ${message.authorities.length}, ADDITIONAL: ${message.additionals.length}\n`;
  if (opt) {
    out += `\n${formatOpt(opt)}\n`;
  }
  out += formatSection('QUESTION', message.questions.map(formatQuestion));
  out += formatSection('ANSWER', message.answers.map(formatRecord));
  out += formatSection('AUTHORITY', message.authorities.map(formatRecord));
  out += formatSection('ADDITIONAL', additionals.map(formatRecord));
  return out;
}

import type { Buffer } from 'buffer';
import { DEFAULT_EDNS_UDP_SIZE } from './constants';
import { createOptRecord } from './edns';
import {
  createQuery,
  formatMessage,
  packMessage,
  setResponseCode,
  createReply,
  unpackMessage,
} from './message';
import { identityLabel, idnaLabel } from './names';
import { typeFromString } from './records';
import type { DnsCodecOptions, LabelNormalizer, Message } from './types';

// default options for DnsCodec
export const DEFAULT_OPTIONS: DnsCodecOptions = {
  idn: false, // IDNA to-ASCII on encode
  udpPayloadSize: DEFAULT_EDNS_UDP_SIZE, // advertised in OPT records we build
  edns: false, // attach an OPT record to queries
  dnssecOk: false, // DO bit on that OPT record
};

export class DnsCodec {
  // the codec-level options
  options: DnsCodecOptions;

  constructor(opts?: Partial<DnsCodecOptions>) {
    this.options = this.getOptions(opts);
  }

  // process partial options into full DnsCodecOptions with all defaults
  protected getOptions(opts: Partial<DnsCodecOptions> = {}): DnsCodecOptions {
    return {
      ...(this.options ?? DEFAULT_OPTIONS),
      ...opts,
    };
  }

  // the label normalizer in effect, a custom one wins over idn
  protected getNormalizer(options: DnsCodecOptions): LabelNormalizer {
    return options.labelNormalizer ?? (options.idn ? idnaLabel : identityLabel);
  }

  // serialize a message to wire format
  public encode(message: Message, opts?: Partial<DnsCodecOptions>): Buffer {
    return packMessage(message, this.getNormalizer(this.getOptions(opts)));
  }

  // decode a message from wire format
  public decode(data: Uint8Array): Message {
    return unpackMessage(data);
  }

  // build a recursive query, type as a code or a mnemonic like 'AAAA'
  public query(name: string, type: number | string, opts?: Partial<DnsCodecOptions>): Message {
    const options = this.getOptions(opts);
    const message = createQuery(name, typeof type === 'string' ? typeFromString(type) : type);
    if (options.edns) {
      message.additionals.push(
        createOptRecord({
          udpPayloadSize: options.udpPayloadSize,
          dnssecOk: options.dnssecOk,
        })
      );
    }
    return message;
  }

  // an empty reply to a request, with the given response code
  public reply(request: Message, rcode = 0): Message {
    return setResponseCode(createReply(request), request, rcode);
  }

  // dig-style text rendering
  public format(message: Message): string {
    return formatMessage(message);
  }
}

export * from './buffer';
export * from './caches/hosts';
export * from './constants';
export * from './edns';
export * from './errors';
export * from './header';
export * from './message';
export * from './names';
export * from './records';
export * from './transports/udp';
export * from './utils';
export type * from './types';

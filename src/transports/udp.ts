import type { Buffer } from 'buffer';
import dgram from 'dgram';
import { DNS_PORT, MIN_UDP_SIZE, TYPE_A, TYPE_AAAA } from '../constants';
import { AbortError, ConnectionError, ParsingError } from '../errors';
import { createQuery, packMessage, unpackAnswer } from '../message';
import { recordAddresses } from '../records';
import type { UdpLookupOptions } from '../types';
import { isValidIpv6 } from '../utils';

// default options for the UDP lookup client
export const DEFAULT_UDP_OPTIONS: UdpLookupOptions = {
  port: DNS_PORT, // server port
  ipv4: true, // query A records
  ipv6: false, // query AAAA records
  bufferSize: MIN_UDP_SIZE, // datagrams are cut to this size, as a fixed receive buffer would
};

/**
 * Send one query datagram and wait for the matching response.
 *
 * There is no timeout and no retry: the caller bounds the wait with
 * `options.signal`. A datagram whose id does not match the query is ignored.
 */
export async function udpExchange(
  query: Uint8Array,
  server: string,
  opts: Partial<UdpLookupOptions> = {}
): Promise<Buffer> {
  const options: UdpLookupOptions = { ...DEFAULT_UDP_OPTIONS, ...opts };
  const { signal } = options;

  // check if external signal is already aborted
  if (signal?.aborted) {
    throw new AbortError('Query was aborted');
  }

  // use udp6 for IPv6 servers, udp4 otherwise
  const socket = dgram.createSocket(isValidIpv6(server) ? 'udp6' : 'udp4');
  const id = query.length >= 2 ? (query[0] << 8) | query[1] : -1;

  return await new Promise<Buffer>((resolve, reject) => {
    let isResolved = false;

    const cleanup = () => {
      signal?.removeEventListener('abort', onAbort);
      socket.removeAllListeners();
      socket.close();
    };

    // settle once, then release the socket
    const safeResolve = (response: Buffer) => {
      if (isResolved) return;
      isResolved = true;
      cleanup();
      resolve(response);
    };

    const safeReject = (error: Error) => {
      if (isResolved) return;
      isResolved = true;
      cleanup();
      reject(error);
    };

    const onAbort = () => safeReject(new AbortError('Query was aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });

    socket.on('message', (message: Buffer) => {
      if (message.length >= 2 && message.readUInt16BE(0) !== id) return;
      safeResolve(message.subarray(0, options.bufferSize));
    });

    socket.on('error', (error: Error) => {
      safeReject(new ConnectionError(error.message));
    });

    // send the query AFTER event listeners are attached
    socket.send(query, options.port, server, err => {
      if (err) {
        safeReject(new ConnectionError(`Failed to send UDP query: ${err.message}`));
      }
    });
  });
}

// resolve a name to its addresses: an A query, then an AAAA query, as enabled
export async function lookupHost(
  server: string,
  domain: string,
  opts: Partial<UdpLookupOptions> = {}
): Promise<string[]> {
  const options: UdpLookupOptions = { ...DEFAULT_UDP_OPTIONS, ...opts };
  const types = [...(options.ipv4 ? [TYPE_A] : []), ...(options.ipv6 ? [TYPE_AAAA] : [])];

  const addresses: string[] = [];
  for (const type of types) {
    const response = await udpExchange(packMessage(createQuery(domain, type)), server, options);
    const answers = unpackAnswer(response);
    if (!answers) {
      throw new ParsingError(`Failed to decode UDP response for '${domain}' from '${server}'`);
    }
    addresses.push(...recordAddresses(answers));
  }
  return addresses;
}

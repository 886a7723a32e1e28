import dgram from 'dgram';
import { TYPE_A, TYPE_AAAA } from '../src/constants';
import { AbortError, ParsingError } from '../src/errors';
import { createQuery, createReply, packMessage, unpackMessage } from '../src/message';
import { createAaaaRecord, createARecord } from '../src/records';
import { lookupHost, udpExchange } from '../src/transports/udp';

// answers A with 10.1.2.3 and AAAA with fd00::1
const answerFor = (query: Buffer): Buffer => {
  const request = unpackMessage(query);
  const [question] = request.questions;
  const reply = createReply(request);
  reply.header.recursionAvailable = true;
  reply.answers =
    question.type === TYPE_AAAA
      ? [createAaaaRecord(question.name, 'fd00::1', 60)]
      : [createARecord(question.name, '10.1.2.3', 60)];
  return packMessage(reply);
};

describe('UDP transport', () => {
  let server: dgram.Socket;
  let port: number;
  let respond: (query: Buffer) => Buffer[] = query => [answerFor(query)];

  beforeAll(done => {
    server = dgram.createSocket('udp4');
    server.on('message', (query, rinfo) => {
      for (const datagram of respond(query)) {
        server.send(datagram, rinfo.port, rinfo.address);
      }
    });
    server.bind(0, '127.0.0.1', () => {
      port = server.address().port;
      done();
    });
  });

  afterEach(() => {
    respond = query => [answerFor(query)];
  });

  afterAll(done => {
    server.close(() => done());
  });

  describe('lookupHost', () => {
    test('should resolve IPv4 addresses', async () => {
      expect(await lookupHost('127.0.0.1', 'host.test', { port })).toEqual(['10.1.2.3']);
    });

    test('should resolve IPv4 then IPv6 addresses', async () => {
      const addresses = await lookupHost('127.0.0.1', 'host.test', { port, ipv6: true });
      expect(addresses).toEqual(['10.1.2.3', 'fd00::1']);
    });

    test('should query only AAAA when IPv4 is off', async () => {
      const types: number[] = [];
      respond = query => {
        types.push(unpackMessage(query).questions[0].type);
        return [answerFor(query)];
      };
      const addresses = await lookupHost('127.0.0.1', 'host.test', {
        port,
        ipv4: false,
        ipv6: true,
      });
      expect(addresses).toEqual(['fd00::1']);
      expect(types).toEqual([TYPE_AAAA]);
    });

    test('should fail on a response that does not decode', async () => {
      respond = query => [Buffer.from([query[0], query[1], 0x81])];
      await expect(lookupHost('127.0.0.1', 'host.test', { port })).rejects.toThrow(ParsingError);
      await expect(lookupHost('127.0.0.1', 'host.test', { port })).rejects.toThrow(
        "Failed to decode UDP response for 'host.test' from '127.0.0.1'"
      );
    });
  });

  describe('udpExchange', () => {
    test('should ignore a datagram with another id', async () => {
      respond = query => {
        const stray = answerFor(query);
        stray.writeUInt16BE(query.readUInt16BE(0) ^ 0xffff, 0);
        return [stray, answerFor(query)];
      };
      const query = packMessage(createQuery('host.test', TYPE_A, 0x4242));
      const response = await udpExchange(query, '127.0.0.1', { port });
      expect(unpackMessage(response).header.id).toBe(0x4242);
    });

    test('should cut the response to the buffer size', async () => {
      const query = packMessage(createQuery('host.test', TYPE_A, 1));
      const response = await udpExchange(query, '127.0.0.1', { port, bufferSize: 20 });
      expect(response.length).toBe(20);
    });

    test('should reject when aborted while waiting', async () => {
      const controller = new AbortController();
      respond = () => {
        controller.abort();
        return [];
      };
      const query = packMessage(createQuery('host.test', TYPE_A, 2));
      await expect(
        udpExchange(query, '127.0.0.1', { port, signal: controller.signal })
      ).rejects.toThrow(AbortError);
    });

    test('should reject an already aborted signal without sending', async () => {
      const received: Buffer[] = [];
      respond = query => {
        received.push(query);
        return [];
      };
      const controller = new AbortController();
      controller.abort();
      const query = packMessage(createQuery('host.test', TYPE_A, 3));
      await expect(
        udpExchange(query, '127.0.0.1', { port, signal: controller.signal })
      ).rejects.toThrow('Query was aborted');
      expect(received).toEqual([]);
    });
  });
});

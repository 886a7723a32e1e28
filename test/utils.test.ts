import { WireReader, WireWriter } from '../src/buffer';
import { BufferTooSmallError, DnsError, HexDecodeError, InvalidRdLengthError } from '../src/errors';
import {
  clearFullDomain,
  escapeByte,
  escapeLabel,
  fromHex,
  fullDomain,
  ipv4FromMapped,
  ipv6ToBytes,
  isSpecialLabelByte,
  isValidIp,
  isValidIpv4,
  normalizeIp,
  toHex,
  truncateToPrefix,
} from '../src/utils';

describe('Wire buffers', () => {
  describe('WireReader', () => {
    test('should read big-endian integers and advance', () => {
      const reader = new WireReader(Buffer.from([0x01, 0x02, 0x03, 0x00, 0x00, 0x01, 0x00]));
      expect(reader.readU8()).toBe(1);
      expect(reader.readU16()).toBe(0x0203);
      expect(reader.readU32()).toBe(0x00000100);
      expect(reader.offset).toBe(7);
      expect(reader.atEnd()).toBe(true);
    });

    test('should fail on a read past the end', () => {
      const reader = new WireReader(Buffer.from([0x01]));
      expect(() => reader.readU16()).toThrow(BufferTooSmallError);
    });

    test('should return views for readBytes', () => {
      const reader = new WireReader(Uint8Array.from([9, 8, 7, 6]), 1);
      expect([...reader.readBytes(2)]).toEqual([8, 7]);
      expect(reader.remaining()).toBe(1);
    });
  });

  describe('WireWriter', () => {
    test('should grow past its initial size', () => {
      const writer = new WireWriter(2);
      writer.writeU32(0xdeadbeef);
      writer.writeU8(1);
      expect([...writer.toBuffer()]).toEqual([0xde, 0xad, 0xbe, 0xef, 1]);
    });

    test('should back-patch a reserved length', () => {
      const writer = new WireWriter();
      writer.writeU8(0xff);
      const at = writer.reserveLength();
      writer.writeBytes(Buffer.from([1, 2, 3]));
      expect(writer.patchLength(at)).toBe(3);
      expect([...writer.toBuffer()]).toEqual([0xff, 0, 3, 1, 2, 3]);
    });

    test('should reject values that do not fit the field', () => {
      const writer = new WireWriter();
      expect(() => writer.writeU16(0x10000)).toThrow(DnsError);
      expect(() => writer.writeU16(-1)).toThrow(DnsError);
      expect(() => writer.writeU8(256)).toThrow('value out of range for u8: 256');
      expect(writer.length).toBe(0);
    });

    test('should reject a length that does not fit in 16 bits', () => {
      const writer = new WireWriter();
      const at = writer.reserveLength();
      writer.writeBytes(new Uint8Array(0x10000));
      expect(() => writer.patchLength(at)).toThrow(InvalidRdLengthError);
    });
  });
});

describe('Utils', () => {
  describe('label escaping', () => {
    test('should flag special bytes', () => {
      expect(isSpecialLabelByte(0x2e)).toBe(true);
      expect(isSpecialLabelByte(0x61)).toBe(false);
    });

    test('should pad decimal escapes to three digits', () => {
      expect(escapeByte(7)).toBe('\\007');
      expect(escapeByte(200)).toBe('\\200');
    });

    test('should escape labels for display', () => {
      expect(escapeLabel(Buffer.from('a.b'))).toBe('a\\.b');
      expect(escapeLabel(Buffer.from('a b'))).toBe('a\\ b');
      expect(escapeLabel(Buffer.from([0x01, 0x41, 0xff]))).toBe('\\001A\\255');
    });
  });

  describe('hex', () => {
    test('should encode lowercase hex', () => {
      expect(toHex(Buffer.from([0xde, 0xad]))).toBe('dead');
    });

    test('should decode mixed case hex', () => {
      expect([...fromHex('DEad')]).toEqual([0xde, 0xad]);
    });

    test('should reject odd length and invalid characters', () => {
      expect(() => fromHex('abc')).toThrow(HexDecodeError);
      expect(() => fromHex('zz')).toThrow(HexDecodeError);
    });
  });

  describe('domains', () => {
    test('should add and remove the trailing dot', () => {
      expect(fullDomain('example.com')).toBe('example.com.');
      expect(fullDomain('example.com.')).toBe('example.com.');
      expect(clearFullDomain('example.com.')).toBe('example.com');
      expect(clearFullDomain('example.com')).toBe('example.com');
    });
  });

  describe('addresses', () => {
    test('should validate addresses', () => {
      expect(isValidIpv4('192.0.2.1')).toBe(true);
      expect(isValidIp('2001:db8::1')).toBe(true);
      expect(isValidIp('not-an-ip')).toBe(false);
    });

    test('should map IPv4 into IPv6 and back', () => {
      const mapped = ipv6ToBytes('1.2.3.4');
      expect([...mapped]).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff, 1, 2, 3, 4]);
      expect(ipv4FromMapped(mapped)).toEqual(Uint8Array.from([1, 2, 3, 4]));
      expect(ipv4FromMapped(ipv6ToBytes('2001:db8::1'))).toBeNull();
    });

    test('should normalize IPv6 text', () => {
      expect(normalizeIp('2001:db8:0:0:0:0:0:1')).toBe('2001:db8::1');
      expect(normalizeIp('::1')).toBe('::1');
    });

    test('should truncate to a prefix', () => {
      expect([...truncateToPrefix(Uint8Array.from([1, 2, 3, 4]), 24)]).toEqual([1, 2, 3, 0]);
      expect([...truncateToPrefix(Uint8Array.from([10, 255, 255, 255]), 12)]).toEqual([
        10, 240, 0, 0,
      ]);
      expect([...truncateToPrefix(Uint8Array.from([10, 255]), 0)]).toEqual([0, 0]);
    });
  });
});

import { WireWriter } from '../src/buffer';
import {
  BadLabelError,
  BufferTooSmallError,
  LabelTooLongError,
  NameTooLongError,
  TooMuchRecursionError,
} from '../src/errors';
import {
  DomainName,
  domainWireLength,
  idnaLabel,
  identityLabel,
  packName,
  skipName,
  unpackName,
} from '../src/names';
import type { LabelNormalizer } from '../src/types';

const pack = (text: string, normalize: LabelNormalizer = identityLabel): Buffer => {
  const writer = new WireWriter();
  packName(writer, text, normalize);
  return writer.toBuffer();
};

// "example.com." at 0, "www" + pointer to 0 at 13
const compressed = Buffer.from([
  7, 101, 120, 97, 109, 112, 108, 101, 3, 99, 111, 109, 0, 3, 119, 119, 119, 0xc0, 0x00,
]);

describe('Domain names', () => {
  describe('packName', () => {
    test('should write length-prefixed labels and a terminator', () => {
      expect([...pack('www.google.com')]).toEqual([
        3, 119, 119, 119, 6, 103, 111, 111, 103, 108, 101, 3, 99, 111, 109, 0,
      ]);
    });

    test('should drop empty segments and the trailing dot', () => {
      expect([...pack('a..b.')]).toEqual([1, 97, 1, 98, 0]);
    });

    test('should write the root as a single zero', () => {
      expect([...pack('.')]).toEqual([0]);
    });

    test('should unescape dots and decimal escapes', () => {
      expect([...pack('a\\.b')]).toEqual([3, 97, 46, 98, 0]);
      expect([...pack('\\065x')]).toEqual([2, 65, 120, 0]);
    });

    test('should reject a label over 255 bytes', () => {
      const label = 'a'.repeat(256);
      expect(() => pack(`${label}.com`)).toThrow(LabelTooLongError);
      try {
        pack(`${label}.com`);
      } catch (error) {
        expect(error).toBeInstanceOf(LabelTooLongError);
        expect(error instanceof LabelTooLongError && error.label).toBe(label);
      }
    });

    test('should reject a name over 255 wire octets', () => {
      const name = Array(5).fill('a'.repeat(60)).join('.');
      expect(() => pack(name)).toThrow(NameTooLongError);
    });

    test('should accept a name of exactly 255 wire octets', () => {
      const name = ['a'.repeat(63), 'b'.repeat(63), 'c'.repeat(63), 'd'.repeat(61)].join('.');
      expect(domainWireLength(name)).toBe(255);
      expect(pack(name).length).toBe(255);
    });

    test('should apply the IDNA normalizer', () => {
      expect(pack('bücher.example', idnaLabel).subarray(0, 14).toString('latin1')).toBe(
        '\x0dxn--bcher-kva'
      );
      // identity keeps the UTF-8 bytes, ü takes two
      expect(pack('bücher', identityLabel)[0]).toBe(7);
    });

    test('should warn and rethrow when the normalizer fails', () => {
      const consoleSpy = jest.spyOn(console, 'warn').mockImplementation();
      const failing: LabelNormalizer = () => {
        throw new Error('no');
      };
      expect(() => pack('a.b', failing)).toThrow('no');
      expect(consoleSpy).toHaveBeenCalledWith('Could not encode label "a": Error: no');
      consoleSpy.mockRestore();
    });
  });

  describe('unpackName', () => {
    test('should decode a literal name and return the next offset', () => {
      expect(unpackName(compressed, 0)).toEqual({ name: 'example.com.', offset: 13 });
    });

    test('should follow a compression pointer and resume after it', () => {
      expect(unpackName(compressed, 13)).toEqual({ name: 'www.example.com.', offset: 19 });
    });

    test('should decode the same text as the expanded name', () => {
      const expanded = pack('www.example.com');
      expect(unpackName(compressed, 13).name).toBe(unpackName(expanded, 0).name);
    });

    test('should decode the root', () => {
      expect(unpackName(Buffer.from([0]), 0)).toEqual({ name: '.', offset: 1 });
    });

    test('should escape special bytes in labels', () => {
      expect(unpackName(Buffer.from([3, 97, 46, 98, 0]), 0).name).toBe('a\\.b.');
    });

    test('should reject a pointer to itself', () => {
      expect(() => unpackName(Buffer.from([0xc0, 0x00]), 0)).toThrow(TooMuchRecursionError);
    });

    test('should reject a pointer cycle', () => {
      expect(() => unpackName(Buffer.from([0xc0, 0x02, 0xc0, 0x00]), 0)).toThrow(
        TooMuchRecursionError
      );
    });

    test('should reject a pointer chain at the recursion limit', () => {
      // ten pointers, each to the next one
      const chain = Buffer.concat([
        Buffer.from(Array.from({ length: 10 }, (_, i) => [0xc0, 2 * (i + 1)]).flat()),
        Buffer.from([0]),
      ]);
      expect(() => unpackName(chain, 0)).toThrow(TooMuchRecursionError);
    });

    test('should follow a chain below the recursion limit', () => {
      // seven pointers, then "a."
      const chain = Buffer.concat([
        Buffer.from(Array.from({ length: 7 }, (_, i) => [0xc0, 2 * (i + 1)]).flat()),
        Buffer.from([1, 97, 0]),
      ]);
      expect(unpackName(chain, 0)).toEqual({ name: 'a.', offset: 2 });
    });

    test('should reject reserved length prefixes', () => {
      expect(() => unpackName(Buffer.from([0x40, 0]), 0)).toThrow(BadLabelError);
      expect(() => unpackName(Buffer.from([0x80, 0]), 0)).toThrow(BadLabelError);
    });

    test('should reject truncated input', () => {
      expect(() => unpackName(Buffer.from([3, 97]), 0)).toThrow(BufferTooSmallError);
      expect(() => unpackName(Buffer.from([]), 0)).toThrow(BufferTooSmallError);
      expect(() => unpackName(Buffer.from([0xc0]), 0)).toThrow(BufferTooSmallError);
    });

    test('should reject a name over the 255 octet budget', () => {
      const label = Buffer.concat([Buffer.from([63]), Buffer.alloc(63, 0x61)]);
      const long = Buffer.concat([label, label, label, label, Buffer.from([0])]);
      expect(() => unpackName(long, 0)).toThrow(NameTooLongError);
    });
  });

  describe('skipName', () => {
    test('should return the same offset as unpackName', () => {
      expect(skipName(compressed, 0)).toBe(13);
      expect(skipName(compressed, 13)).toBe(19);
    });

    test('should apply the same loop defense', () => {
      expect(() => skipName(Buffer.from([0xc0, 0x00]), 0)).toThrow(TooMuchRecursionError);
    });
  });

  describe('DomainName', () => {
    test('should render text with a trailing dot', () => {
      expect(DomainName.fromText('www.example.com').toString()).toBe('www.example.com.');
      expect(DomainName.root().toString()).toBe('.');
    });

    test('should compare by labels', () => {
      expect(DomainName.fromText('example.com').equals(DomainName.fromText('example.com.'))).toBe(
        true
      );
      expect(DomainName.fromText('example.com').equals(DomainName.fromText('example.org'))).toBe(
        false
      );
    });

    test('should extend with another name', () => {
      const name = DomainName.fromText('www').extend(DomainName.fromText('example.com'));
      expect(name.equals(DomainName.fromText('www.example.com'))).toBe(true);
      expect(name.length).toBe(3);
      expect(name.wireLength()).toBe(17);
    });

    test('should not extend past 255 wire octets', () => {
      const half = DomainName.fromText(`${'a'.repeat(63)}.${'b'.repeat(60)}`);
      const twice = half.extend(half);
      expect(twice.wireLength()).toBe(251);
      expect(() => twice.extend(half)).toThrow(NameTooLongError);
    });

    test('should hand out copies of its labels', () => {
      const name = DomainName.fromText('abc.example');
      name.labels[0][0] = 0x7a;
      expect(name.toString()).toBe('abc.example.');
      expect(name.equals(DomainName.fromText('abc.example'))).toBe(true);
    });

    test('should pack the same bytes as packName', () => {
      const writer = new WireWriter();
      DomainName.fromText('www.example.com').pack(writer);
      expect(writer.toBuffer()).toEqual(pack('www.example.com'));
    });

    test('should unpack a compressed name', () => {
      const { name, offset } = DomainName.unpack(compressed, 13);
      expect(name.toString()).toBe('www.example.com.');
      expect(offset).toBe(19);
    });

    test('should build from raw labels', () => {
      const name = DomainName.fromLabels([Buffer.from('a.b'), Buffer.from('com')]);
      expect(name.toString()).toBe('a\\.b.com.');
      expect(() => DomainName.fromLabels([Buffer.alloc(256)])).toThrow(LabelTooLongError);
    });

    test('should verify label sizes', () => {
      expect(DomainName.verify('www.example.com')).toBe(true);
      expect(DomainName.verify(`${'a'.repeat(256)}.com`)).toBe(false);
    });
  });
});

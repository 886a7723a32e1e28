import { Buffer } from 'buffer';
import { BufferTooSmallError, DnsError, InvalidRdLengthError } from './errors';

// accept any byte view without copying
export function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

// big-endian cursor over a received message, every read is bounds-checked
export class WireReader {
  readonly buf: Buffer;
  offset: number;

  constructor(data: Uint8Array, offset = 0) {
    this.buf = toBuffer(data);
    this.offset = offset;
  }

  get length(): number {
    return this.buf.length;
  }

  remaining(): number {
    return this.buf.length - this.offset;
  }

  atEnd(): boolean {
    return this.offset >= this.buf.length;
  }

  seek(offset: number): void {
    this.offset = offset;
  }

  private ensure(size: number): void {
    if (this.offset + size > this.buf.length) {
      throw new BufferTooSmallError(
        `buffer size too small: need ${size} bytes at offset ${this.offset}, have ${Math.max(
          this.remaining(),
          0
        )}`
      );
    }
  }

  readU8(): number {
    this.ensure(1);
    return this.buf.readUInt8(this.offset++);
  }

  readU16(): number {
    this.ensure(2);
    const value = this.buf.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  readU32(): number {
    this.ensure(4);
    const value = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  // a view into the message, not a copy
  readBytes(size: number): Buffer {
    this.ensure(size);
    const bytes = this.buf.subarray(this.offset, this.offset + size);
    this.offset += size;
    return bytes;
  }
}

// growable big-endian writer for outgoing messages
export class WireWriter {
  private buf: Buffer;
  private pos = 0;

  constructor(size = 512) {
    this.buf = Buffer.alloc(size);
  }

  get length(): number {
    return this.pos;
  }

  private grow(size: number): void {
    if (this.pos + size <= this.buf.length) return;
    let next = this.buf.length * 2 || 64;
    while (next < this.pos + size) next *= 2;
    const grown = Buffer.alloc(next);
    this.buf.copy(grown, 0, 0, this.pos);
    this.buf = grown;
  }

  // out-of-range values fail as DnsError instead of Node's RangeError
  private checkRange(value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new DnsError(`value out of range for ${max === 0xff ? 'u8' : 'u16'}: ${value}`);
    }
  }

  writeU8(value: number): void {
    this.checkRange(value, 0xff);
    this.grow(1);
    this.buf.writeUInt8(value, this.pos);
    this.pos += 1;
  }

  writeU16(value: number): void {
    this.checkRange(value, 0xffff);
    this.grow(2);
    this.buf.writeUInt16BE(value, this.pos);
    this.pos += 2;
  }

  writeU32(value: number): void {
    this.grow(4);
    this.buf.writeUInt32BE(value >>> 0, this.pos);
    this.pos += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  // write a zero u16 placeholder and return where it sits
  reserveLength(): number {
    const at = this.pos;
    this.writeU16(0);
    return at;
  }

  // fill a placeholder with the number of bytes written after it
  patchLength(at: number): number {
    const size = this.pos - at - 2;
    if (size > 0xffff) {
      throw new InvalidRdLengthError(`length ${size} does not fit in 16 bits`);
    }
    this.setU16(at, size);
    return size;
  }

  setU16(at: number, value: number): void {
    this.checkRange(value, 0xffff);
    this.buf.writeUInt16BE(value, at);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.pos));
  }
}

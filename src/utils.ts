import { Buffer } from 'buffer';
import * as ip from '@leichtgewicht/ip-codec';
import { HexDecodeError } from './errors';

// label bytes that get a backslash in presentation form
const SPECIAL_LABEL_BYTES = new Set([
  0x2e, // .
  0x20, // space
  0x27, // '
  0x40, // @
  0x3b, // ;
  0x28, // (
  0x29, // )
  0x22, // "
  0x5c, // \
]);

// true if a label byte must be prefixed with an escaping backslash
export function isSpecialLabelByte(b: number): boolean {
  return SPECIAL_LABEL_BYTES.has(b);
}

// \DDD escaping of a byte outside printable ASCII
export function escapeByte(b: number): string {
  return `\\${String(b).padStart(3, '0')}`;
}

// presentation form of every possible label byte, indexed by value
export const LABEL_BYTE_ESCAPES: readonly string[] = Array.from({ length: 256 }, (_, b) => {
  if (isSpecialLabelByte(b)) return `\\${String.fromCharCode(b)}`;
  if (b < 0x20 || b > 0x7e) return escapeByte(b);
  return String.fromCharCode(b);
});

// render raw label bytes for display, escaping as dig does
export function escapeLabel(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    out += LABEL_BYTE_ESCAPES[b];
  }
  return out;
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

// strict hex decode, Buffer.from(s, 'hex') silently stops at the first bad pair
export function fromHex(hex: string): Buffer {
  if (hex.length % 2 !== 0) {
    throw new HexDecodeError(`odd length hex string: ${hex.length}`);
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new HexDecodeError(`invalid hex string: ${hex}`);
  }
  return Buffer.from(hex, 'hex');
}

// add the trailing dot of a fully qualified name
export function fullDomain(name: string): string {
  return name.endsWith('.') ? name : `${name}.`;
}

// strip the trailing dot of a fully qualified name
export function clearFullDomain(name: string): string {
  return name.endsWith('.') ? name.slice(0, -1) : name;
}

export function isValidIpv4(address: string): boolean {
  return ip.v4.isFormat(String(address).trim());
}

export function isValidIpv6(address: string): boolean {
  return ip.v6.isFormat(String(address).trim());
}

// query is an IPv4/IPv6 address
export function isValidIp(address: string): boolean {
  return isValidIpv4(address) || isValidIpv6(address);
}

// wire bytes of an IPv4 address
export function ipv4ToBytes(address: string): Uint8Array {
  return ip.v4.encode(address);
}

// wire bytes of an IPv6 address, IPv4 addresses become IPv4-mapped
export function ipv6ToBytes(address: string): Uint8Array {
  if (isValidIpv4(address)) {
    const mapped = new Uint8Array(16);
    mapped[10] = 0xff;
    mapped[11] = 0xff;
    mapped.set(ip.v4.encode(address), 12);
    return mapped;
  }
  return ip.v6.encode(address);
}

// the embedded IPv4 address of an IPv4-mapped IPv6 address, or null
export function ipv4FromMapped(bytes: Uint8Array): Uint8Array | null {
  if (bytes.length !== 16) return null;
  for (let i = 0; i < 10; i++) {
    if (bytes[i] !== 0) return null;
  }
  if (bytes[10] !== 0xff || bytes[11] !== 0xff) return null;
  return bytes.slice(12);
}

export function bytesToIpv4(bytes: Uint8Array, offset = 0): string {
  return ip.v4.decode(bytes, offset);
}

export function bytesToIpv6(bytes: Uint8Array, offset = 0): string {
  return ip.v6.decode(bytes, offset);
}

// canonical text form of an address, so records compare equal after a round trip
export function normalizeIp(address: string): string {
  if (isValidIpv4(address)) return bytesToIpv4(ipv4ToBytes(address));
  return bytesToIpv6(ipv6ToBytes(address));
}

// zero every bit past prefixLength
export function truncateToPrefix(bytes: Uint8Array, prefixLength: number): Uint8Array {
  const out = Uint8Array.from(bytes);
  for (let i = 0; i < out.length; i++) {
    const bitsLeft = prefixLength - i * 8;
    if (bitsLeft >= 8) continue;
    out[i] = bitsLeft <= 0 ? 0 : out[i] & (0xff << (8 - bitsLeft));
  }
  return out;
}

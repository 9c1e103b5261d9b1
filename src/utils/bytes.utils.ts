/**
 * @fileoverview Byte helpers shared by the frame codec and the command table.
 *
 * Key exports:
 * - readUInt() / writeUInt(): fixed-width unsigned integers in either byte order
 * - toBcd() / fromBcd(): packed binary-coded decimal for date and speed fields
 * - asciiToBytes() / bytesToAscii(): printable ASCII payloads
 * - toHex(): debug formatting
 */

import type { ByteOrder } from '../types/protocol';

/**
 * Read an unsigned integer of `width` bytes starting at `offset`
 */
export function readUInt(bytes: Uint8Array, offset: number, width: number, order: ByteOrder): number {
  let value = 0;
  for (let i = 0; i < width; i++) {
    const index = order === 'big' ? offset + i : offset + width - 1 - i;
    value = value * 256 + bytes[index];
  }
  return value;
}

/**
 * Write an unsigned integer of `width` bytes starting at `offset`
 */
export function writeUInt(target: Uint8Array, offset: number, width: number, order: ByteOrder, value: number): void {
  let remaining = value;
  for (let i = width - 1; i >= 0; i--) {
    const index = order === 'big' ? offset + i : offset + width - 1 - i;
    target[index] = remaining & 0xff;
    remaining = Math.floor(remaining / 256);
  }
}

/**
 * Pack a value 0..99 as one BCD byte (45 -> 0x45)
 */
export function toBcd(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 99) {
    throw new RangeError(`Value ${value} cannot be packed as BCD`);
  }
  return ((Math.floor(value / 10)) << 4) | (value % 10);
}

/**
 * Unpack one BCD byte; null when either nibble is not a decimal digit
 */
export function fromBcd(byte: number): number | null {
  const high = byte >> 4;
  const low = byte & 0x0f;
  if (high > 9 || low > 9) {
    return null;
  }
  return high * 10 + low;
}

/**
 * Whether every character is printable ASCII (0x20..0x7e)
 */
export function isPrintableAscii(text: string): boolean {
  return /^[\x20-\x7e]*$/.test(text);
}

export function asciiToBytes(text: string): Uint8Array {
  return Uint8Array.from(text, char => char.charCodeAt(0));
}

export function bytesToAscii(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Format bytes as space-separated hex pairs for logging
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, byte => byte.toString(16).padStart(2, '0')).join(' ');
}

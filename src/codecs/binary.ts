/**
 * Binary data reading utilities
 *
 * This module provides bounds-checked readers for little-endian integers
 * and ASCII strings, as well as hex formatting used in diagnostics.
 */

import { UnsupportedFormatError } from '../utils';

// ============================================================================
// Little-Endian Reading
// ============================================================================

/**
 * Read a 16-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint16 value
 */
export function readUInt16LE(buffer: Uint8Array, offset: number): number {
  if (offset + 2 > buffer.length) {
    throw new UnsupportedFormatError(`Insufficient data for reading uint16 at offset ${offset} from a buffer of size ${buffer.length}`);
  }
  return buffer[offset] | (buffer[offset + 1] << 8);
}

/**
 * Read a 16-bit signed integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The int16 value
 */
export function readInt16LE(buffer: Uint8Array, offset: number): number {
  const value = readUInt16LE(buffer, offset);
  return value >= 0x8000 ? value - 0x10000 : value;
}

/**
 * Read a 32-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint32 value
 */
export function readUInt32LE(buffer: Uint8Array, offset: number): number {
  if (offset + 4 > buffer.length) {
    throw new UnsupportedFormatError(`Insufficient data for reading uint32 at offset ${offset} from a buffer of size ${buffer.length}`);
  }
  // `>>> 0` keeps values with the top bit set positive
  return (buffer[offset] | (buffer[offset + 1] << 8) | (buffer[offset + 2] << 16) | (buffer[offset + 3] << 24)) >>> 0;
}

/**
 * Read a 64-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint64 value as bigint
 */
export function readUInt64LE(buffer: Uint8Array, offset: number): bigint {
  if (offset + 8 > buffer.length) {
    throw new UnsupportedFormatError(`Insufficient data for reading uint64 at offset ${offset} from a buffer of size ${buffer.length}`);
  }
  let value = 0n;
  for (let i = 7; i >= 0; i--) {
    value = (value << 8n) | BigInt(buffer[offset + i]);
  }
  return value;
}

// ============================================================================
// Strings
// ============================================================================

/**
 * Format bytes as space separated hexadecimal pairs, used in diagnostics
 * @example toHexString(new Uint8Array([1, 2, 0xab])) // "01 02 ab"
 */
export function toHexString(bytes: Uint8Array): string {
  return [...bytes].map((byte) => byte.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Read an ASCII string from a Uint8Array
 * @param u8 The Uint8Array to read from
 * @param offset The offset to start reading from
 * @param length The number of bytes to read, bytes beyond the end of the array are not read
 * @returns The ASCII string
 */
export function readAscii(u8: Uint8Array, offset = 0, length = u8.length - offset): string {
  const end = Math.min(u8.length, offset + length);
  let result = '';
  for (let i = offset; i < end; i++) {
    // eslint-disable-next-line unicorn/prefer-code-point
    result += String.fromCharCode(u8[i]);
  }
  return result;
}

/**
 * Check whether the bytes at the start of an array spell an ASCII marker
 * @param u8 The bytes to check
 * @param marker The ASCII marker, such as "OggS" or "OpusHead"
 * @returns true if the array is long enough and starts with the marker
 */
export function startsWithAscii(u8: Uint8Array, marker: string): boolean {
  return u8.length >= marker.length && readAscii(u8, 0, marker.length) === marker;
}

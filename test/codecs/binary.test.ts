import { describe, expect, it } from '@jest/globals';

import { readAscii, readInt16LE, readUInt16LE, readUInt32LE, readUInt64LE, startsWithAscii, toHexString } from '../../src/codecs/binary';
import { UnsupportedFormatError } from '../../src/utils';
import { bytes } from '../test-utils';

describe('binary', () => {
  it('should read little-endian unsigned integers', () => {
    const data = new Uint8Array([0x80, 0xbb, 0x00, 0x00, 0x38, 0x01]);
    expect(readUInt16LE(data, 4)).toBe(312);
    expect(readUInt32LE(data, 0)).toBe(48000);
  });

  it('should keep uint32 values with the top bit set positive', () => {
    expect(readUInt32LE(new Uint8Array([0xff, 0xff, 0xff, 0xff]), 0)).toBe(4294967295);
    expect(readUInt32LE(new Uint8Array([0x00, 0x00, 0x00, 0x80]), 0)).toBe(2147483648);
  });

  it('should read uint64 as bigint', () => {
    expect(readUInt64LE(new Uint8Array([0xc0, 0x03, 0, 0, 0, 0, 0, 0]), 0)).toBe(960n);
    expect(readUInt64LE(new Uint8Array(8).fill(0xff), 0)).toBe(0xffffffffffffffffn);
    expect(readUInt64LE(new Uint8Array([0, 0, 0, 0, 1, 0, 0, 0]), 0)).toBe(4294967296n);
  });

  it('should read signed int16', () => {
    expect(readInt16LE(new Uint8Array([0x00, 0xff]), 0)).toBe(-256);
    expect(readInt16LE(new Uint8Array([0x00, 0x01]), 0)).toBe(256);
  });

  it('should throw when there is not enough data', () => {
    expect(() => readUInt16LE(new Uint8Array([1]), 0)).toThrow(UnsupportedFormatError);
    expect(() => readUInt32LE(new Uint8Array([1, 2, 3, 4]), 1)).toThrow(
      'Insufficient data for reading uint32 at offset 1 from a buffer of size 4',
    );
    expect(() => readUInt64LE(new Uint8Array(7), 0)).toThrow(UnsupportedFormatError);
  });

  it('should read ASCII strings', () => {
    const data = bytes('OpusHead\u0001');
    expect(readAscii(data, 0, 8)).toBe('OpusHead');
    expect(readAscii(data, 4, 4)).toBe('Head');
    expect(readAscii(data, 6, 100)).toBe('ad\u0001');
  });

  it('should check ASCII markers', () => {
    expect(startsWithAscii(bytes('OggS....'), 'OggS')).toBe(true);
    expect(startsWithAscii(bytes('Ogg'), 'OggS')).toBe(false);
    expect(startsWithAscii(bytes('RIFF'), 'OggS')).toBe(false);
  });

  it('should format hex strings', () => {
    expect(toHexString(new Uint8Array([1, 2, 0xab]))).toBe('01 02 ab');
    expect(toHexString(new Uint8Array(0))).toBe('');
  });
});

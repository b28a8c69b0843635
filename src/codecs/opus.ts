/**
 * Opus header packets in Ogg (RFC 7845 section 5)
 */

import { MalformedHeaderError } from '../utils';
import { readAscii, readInt16LE, readUInt16LE, readUInt32LE, startsWithAscii } from './binary';

export const OPUS_HEAD_MAGIC = 'OpusHead';
export const OPUS_TAGS_MAGIC = 'OpusTags';

/**
 * Opus always decodes at 48 kHz, granule positions count samples at this rate
 */
export const OPUS_DECODING_SAMPLE_RATE = 48000;

/**
 * Offset of the input sample rate field in the OpusHead packet
 */
export const OPUS_HEAD_SAMPLE_RATE_OFFSET = 12;

const OPUS_HEAD_MIN_SIZE = 19;

export interface OpusChannelMapping {
  streamCount: number;
  coupledStreamCount: number;
  /** One entry per output channel */
  mapping: number[];
}

export interface OpusIdentificationHeader {
  version: number;
  channelCount: number;
  /** Samples (at 48 kHz) to discard from the decoder output at the start */
  preSkip: number;
  /** Sample rate of the original input, informational only */
  inputSampleRate: number;
  /** Q7.8 fixed point gain in dB */
  outputGain: number;
  outputGainDb: number;
  channelMappingFamily: number;
  /** Present when the channel mapping family is not 0 */
  channelMapping?: OpusChannelMapping;
}

export interface OpusCommentHeader {
  vendor: string;
  /** Comments as found in the packet, normally in KEY=value form */
  userComments: string[];
  /** Values of the KEY=value comments, keyed by the upper-cased key */
  tags: Record<string, string[]>;
}

/**
 * Parse the OpusHead identification header packet
 * @param packet The packet bytes, starting with "OpusHead"
 * @returns The decoded header fields
 * @throws MalformedHeaderError if the marker is missing or the packet is too short
 */
export function parseOpusIdentificationHeader(packet: Uint8Array): OpusIdentificationHeader {
  if (!startsWithAscii(packet, OPUS_HEAD_MAGIC)) {
    throw new MalformedHeaderError(`Not an Opus identification header: expected ${OPUS_HEAD_MAGIC} but found "${readAscii(packet, 0, 8)}"`);
  }
  if (packet.length < OPUS_HEAD_MIN_SIZE) {
    throw new MalformedHeaderError(`Opus identification header too short: ${packet.length} bytes, at least ${OPUS_HEAD_MIN_SIZE} required`);
  }

  const channelCount = packet[9];
  const outputGain = readInt16LE(packet, 16);
  const channelMappingFamily = packet[18];

  const header: OpusIdentificationHeader = {
    version: packet[8],
    channelCount,
    preSkip: readUInt16LE(packet, 10),
    inputSampleRate: readUInt32LE(packet, OPUS_HEAD_SAMPLE_RATE_OFFSET),
    outputGain,
    outputGainDb: outputGain / 256,
    channelMappingFamily,
  };

  if (channelMappingFamily !== 0) {
    const tableEnd = OPUS_HEAD_MIN_SIZE + 2 + channelCount;
    if (packet.length < tableEnd) {
      throw new MalformedHeaderError(
        `Opus identification header too short for the channel mapping table: ${packet.length} bytes, ${tableEnd} required`,
      );
    }
    header.channelMapping = {
      streamCount: packet[19],
      coupledStreamCount: packet[20],
      mapping: [...packet.subarray(21, tableEnd)],
    };
  }

  return header;
}

/**
 * Parse the OpusTags comment header packet
 * @param packet The complete packet, reassembled from all the pages it spans
 * @returns Vendor string and user comments
 * @throws MalformedHeaderError if the marker is missing or a length points past the end of the packet
 */
export function parseOpusCommentHeader(packet: Uint8Array): OpusCommentHeader {
  if (!startsWithAscii(packet, OPUS_TAGS_MAGIC)) {
    throw new MalformedHeaderError(`Not an Opus comment header: expected ${OPUS_TAGS_MAGIC} but found "${readAscii(packet, 0, 8)}"`);
  }

  const decoder = new TextDecoder('utf-8');
  let position = OPUS_TAGS_MAGIC.length;

  function readLength(field: string): number {
    if (position + 4 > packet.length) {
      throw new MalformedHeaderError(`Opus comment header ends before the ${field} at offset ${position}`);
    }
    const value = readUInt32LE(packet, position);
    position += 4;
    return value;
  }

  function readString(field: string): string {
    const length = readLength(`${field} length`);
    if (position + length > packet.length) {
      throw new MalformedHeaderError(`Opus comment header ${field} of ${length} bytes at offset ${position} exceeds the packet size ${packet.length}`);
    }
    const value = decoder.decode(packet.subarray(position, position + length));
    position += length;
    return value;
  }

  const vendor = readString('vendor string');
  const commentCount = readLength('user comment list length');

  const userComments: string[] = [];
  const tags: Record<string, string[]> = {};
  for (let i = 0; i < commentCount; i++) {
    const comment = readString(`user comment #${i}`);
    userComments.push(comment);

    const separator = comment.indexOf('=');
    if (separator > 0) {
      const key = comment.slice(0, separator).toUpperCase();
      if (!tags[key]) tags[key] = [];
      tags[key].push(comment.slice(separator + 1));
    }
  }

  return { vendor, userComments, tags };
}

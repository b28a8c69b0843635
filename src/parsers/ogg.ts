import { readUInt32LE, readUInt64LE, startsWithAscii, toHexString } from '../codecs/binary';
import { InvalidOggPageError, LoggingOptions, setupGlobalLogger, TruncatedOggPageError, UnsupportedFormatError } from '../utils';

/**
 * Ogg page layout (RFC 3533):
 *
 * Offset  Size  Field
 * 0       4     "OggS" capture pattern
 * 4       1     stream structure version (0)
 * 5       1     header type flags (0x01=continued, 0x02=first, 0x04=last)
 * 6       8     granule position
 * 14      4     bitstream serial number
 * 18      4     page sequence number
 * 22      4     CRC checksum
 * 26      1     number of segments
 * 27      N     segment table (lacing values)
 * 27+N    ...   body
 */
export const OGG_CAPTURE_PATTERN = 'OggS';
export const OGG_PAGE_HEADER_SIZE = 27;

export const OGG_HEADER_TYPE_CONTINUED = 0x01;
export const OGG_HEADER_TYPE_BEGINNING_OF_STREAM = 0x02;
export const OGG_HEADER_TYPE_END_OF_STREAM = 0x04;

/**
 * Granule position meaning that no packet finishes on the page
 */
export const OGG_NO_GRANULE_POSITION = 0xffffffffffffffffn;

/**
 * One Ogg page. Parsed once and never modified afterwards.
 */
export interface OggPage {
  readonly capturePattern: string;
  readonly version: number;
  /** Bit 0 continuation, bit 1 beginning of stream, bit 2 end of stream, the rest reserved */
  readonly headerType: number;
  readonly granulePosition: bigint;
  readonly serialNumber: number;
  readonly pageSequenceNumber: number;
  /** Stored as found, never verified */
  readonly crcChecksum: number;
  readonly segmentCount: number;
  /** Lacing values, one per segment */
  readonly segmentTable: Uint8Array;
  /** The page body, its length is the sum of the lacing values */
  readonly payload: Uint8Array;
  /** The complete page: header, segment table and body */
  readonly rawBytes: Uint8Array;
  /** Where the page started in the buffer it was parsed from */
  readonly offset: number;
  readonly pageSize: number;
}

export type SplitOggPagesOptions = LoggingOptions;

/**
 * Check whether the data starts with the Ogg capture pattern
 * @param data The data to check
 * @returns true if the first 4 bytes are "OggS"
 */
export function isOggFormat(data: Uint8Array): boolean {
  return startsWithAscii(data, OGG_CAPTURE_PATTERN);
}

/**
 * Parse one Ogg page.
 * The whole page is copied, so the page does not share memory with the input.
 * @param data The buffer containing the page
 * @param offset Where the page starts in the buffer
 * @returns The parsed page
 * @throws InvalidOggPageError if there is no capture pattern at the offset
 * @throws TruncatedOggPageError if the buffer ends before the header, segment table or body does
 */
export function parseOggPage(data: Uint8Array, offset: number): OggPage {
  const available = data.length - offset;
  if (offset < 0 || !isOggFormat(data.subarray(offset))) {
    throw new InvalidOggPageError(offset);
  }
  if (available < OGG_PAGE_HEADER_SIZE) {
    throw new TruncatedOggPageError(offset, OGG_PAGE_HEADER_SIZE, available);
  }

  const segmentCount = data[offset + 26];
  const headerSize = OGG_PAGE_HEADER_SIZE + segmentCount;
  if (available < headerSize) {
    throw new TruncatedOggPageError(offset, headerSize, available);
  }

  let bodySize = 0;
  for (let i = 0; i < segmentCount; i++) {
    bodySize += data[offset + OGG_PAGE_HEADER_SIZE + i];
  }
  const pageSize = headerSize + bodySize;
  if (available < pageSize) {
    throw new TruncatedOggPageError(offset, pageSize, available);
  }

  // Copied through the constructor, Buffer.slice() would return a view
  const rawBytes = new Uint8Array(data.subarray(offset, offset + pageSize));

  return {
    capturePattern: OGG_CAPTURE_PATTERN,
    version: rawBytes[4],
    headerType: rawBytes[5],
    granulePosition: readUInt64LE(rawBytes, 6),
    serialNumber: readUInt32LE(rawBytes, 14),
    pageSequenceNumber: readUInt32LE(rawBytes, 18),
    crcChecksum: readUInt32LE(rawBytes, 22),
    segmentCount,
    segmentTable: rawBytes.subarray(OGG_PAGE_HEADER_SIZE, headerSize),
    payload: rawBytes.subarray(headerSize, pageSize),
    rawBytes,
    offset,
    pageSize,
  };
}

/**
 * Split a buffer into Ogg pages.
 * Scanning starts at offset 0 and stops at the first position where no complete page can be parsed,
 * the pages found before that point are returned. An empty buffer gives an empty array.
 * @param data The complete Ogg data
 * @param options Optional logging options
 * @returns The pages sorted by page sequence number
 */
export function splitOggPages(data: Uint8Array, options?: SplitOggPagesOptions): OggPage[] {
  const logger = setupGlobalLogger(options);
  const pages: OggPage[] = [];

  let offset = 0;
  while (offset < data.length) {
    let page: OggPage;
    try {
      page = parseOggPage(data, offset);
    } catch (error) {
      if (!(error instanceof UnsupportedFormatError)) {
        throw error;
      }
      if (logger.isDebug) logger.debug(`Stopped scanning Ogg pages: ${error.message}, next bytes: ${toHexString(data.subarray(offset, offset + 8))}`);
      break;
    }
    pages.push(page);
    offset += page.pageSize;
  }

  if (logger.isDebug) logger.debug(`Found ${pages.length} Ogg pages in ${offset} of ${data.length} bytes`);
  return sortOggPages(pages);
}

/**
 * Sort pages by page sequence number.
 * The sort is stable, so pages sharing a sequence number keep their relative order.
 * @param pages The pages to sort, the array is not modified
 * @returns A new sorted array
 */
export function sortOggPages(pages: readonly OggPage[]): OggPage[] {
  return [...pages].sort((a, b) => a.pageSequenceNumber - b.pageSequenceNumber);
}

export function isContinuedPage(page: OggPage): boolean {
  return (page.headerType & OGG_HEADER_TYPE_CONTINUED) !== 0;
}

export function isBeginningOfStream(page: OggPage): boolean {
  return (page.headerType & OGG_HEADER_TYPE_BEGINNING_OF_STREAM) !== 0;
}

export function isEndOfStream(page: OggPage): boolean {
  return (page.headerType & OGG_HEADER_TYPE_END_OF_STREAM) !== 0;
}

/**
 * Reassemble the packet starting at the beginning of the first page's body.
 * Segments are collected across pages until a lacing value below 255 ends the packet.
 * @param pages The pages the packet is laced into, in order
 * @returns The packet bytes, or undefined if the pages end before the packet does
 */
export function assemblePacket(pages: readonly OggPage[]): Uint8Array | undefined {
  const chunks: Uint8Array[] = [];
  for (const page of pages) {
    let position = 0;
    for (const lacingValue of page.segmentTable) {
      chunks.push(page.payload.subarray(position, position + lacingValue));
      position += lacingValue;
      if (lacingValue < 255) {
        return concatChunks(chunks);
      }
    }
  }
  return undefined;
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0));
  let position = 0;
  for (const chunk of chunks) {
    result.set(chunk, position);
    position += chunk.length;
  }
  return result;
}

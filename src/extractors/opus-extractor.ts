import { readUInt32LE, startsWithAscii } from '../codecs/binary';
import { OPUS_DECODING_SAMPLE_RATE, OPUS_HEAD_MAGIC, OPUS_HEAD_SAMPLE_RATE_OFFSET } from '../codecs/opus';
import { isContinuedPage, isOggFormat, OGG_NO_GRANULE_POSITION, OggPage } from '../parsers/ogg';
import { GranulePositionError, MalformedHeaderError, MultipleLogicalStreamsError, NotOggError, NotOpusError } from '../utils';

/**
 * Sequence number of the page the comment header packet starts on,
 * the identification header occupies page 0 on its own
 */
export const COMMENT_HEADER_PAGE_SEQUENCE_NUMBER = 1;

/**
 * Make sure that the data is an Ogg stream
 * @param data The complete input
 * @throws NotOggError if the data does not start with "OggS"
 */
export function assertOggFormat(data: Uint8Array): void {
  if (!isOggFormat(data)) {
    throw new NotOggError();
  }
}

export function isOpusStream(pages: readonly OggPage[]): boolean {
  return pages.some((page) => startsWithAscii(page.payload, OPUS_HEAD_MAGIC));
}

/**
 * Make sure that the pages carry an Opus stream
 * @param pages Parsed pages
 * @throws NotOpusError if no page payload starts with "OpusHead"
 */
export function assertOpusStream(pages: readonly OggPage[]): void {
  if (!isOpusStream(pages)) {
    throw new NotOpusError();
  }
}

/**
 * Make sure that all the pages belong to the same logical bitstream
 * @param pages Parsed pages
 * @throws MultipleLogicalStreamsError if more than one serial number is found
 */
export function assertSingleLogicalStream(pages: readonly OggPage[]): void {
  const serialNumbers = [...new Set(pages.map((page) => page.serialNumber))];
  if (serialNumbers.length > 1) {
    throw new MultipleLogicalStreamsError(serialNumbers);
  }
}

/**
 * Find the page holding the OpusHead identification header
 * @param pages Pages sorted by sequence number
 * @returns The first page whose payload starts with "OpusHead", or undefined
 */
export function extractIdentificationHeaderPage(pages: readonly OggPage[]): OggPage | undefined {
  return pages.find((page) => startsWithAscii(page.payload, OPUS_HEAD_MAGIC));
}

export type CommentHeaderScanState =
  | { phase: 'searching' }
  | { phase: 'collecting'; pages: OggPage[] }
  | { phase: 'complete'; pages: OggPage[] };

/**
 * Feed one page to the comment header scan.
 *
 * While searching, the page with sequence number 1 starts the packet regardless of its content.
 * While collecting, every page is added, and a page without the continuation flag ends the packet.
 * @param state Current state, not modified
 * @param page The next page in sequence order
 * @returns The next state
 */
export function advanceCommentHeaderScan(state: CommentHeaderScanState, page: OggPage): CommentHeaderScanState {
  switch (state.phase) {
    case 'searching': {
      return page.pageSequenceNumber === COMMENT_HEADER_PAGE_SEQUENCE_NUMBER ? { phase: 'collecting', pages: [page] } : state;
    }
    case 'collecting': {
      const pages = [...state.pages, page];
      return isContinuedPage(page) ? { phase: 'collecting', pages } : { phase: 'complete', pages };
    }
    case 'complete': {
      return state;
    }
  }
}

/**
 * Find the pages holding the OpusTags comment header packet
 * @param pages Pages sorted by sequence number
 * @returns The pages of the packet in order, or undefined if it does not start or does not end within the pages
 */
export function extractCommentHeaderPages(pages: readonly OggPage[]): OggPage[] | undefined {
  let state: CommentHeaderScanState = { phase: 'searching' };
  for (const page of pages) {
    state = advanceCommentHeaderScan(state, page);
    if (state.phase === 'complete') {
      return state.pages;
    }
  }
  return undefined;
}

/**
 * Get the input sample rate recorded in the identification header
 * @param idHeaderPage The page holding the OpusHead packet
 * @returns The sample rate in Hz
 * @throws MalformedHeaderError if the payload is too short to hold the field
 */
export function getSampleRate(idHeaderPage: OggPage): number {
  const required = OPUS_HEAD_SAMPLE_RATE_OFFSET + 4;
  if (idHeaderPage.payload.length < required) {
    throw new MalformedHeaderError(
      `Identification header payload too short for the sample rate: ${idHeaderPage.payload.length} bytes, ${required} required`,
    );
  }
  return readUInt32LE(idHeaderPage.payload, OPUS_HEAD_SAMPLE_RATE_OFFSET);
}

/**
 * Calculate the duration covered by a page from its granule position and the one of the page before it
 * @param currentGranulePosition Granule position of the page
 * @param previousGranulePosition Granule position of the previous page, absent for the first page
 * @param sampleRate Rate the granule positions count at, 48000 for Opus
 * @returns Duration in seconds, 0 for the first page
 * @throws GranulePositionError if the granule position is lower than the previous one
 */
export function calculatePageDuration(
  currentGranulePosition: bigint,
  previousGranulePosition?: bigint | null,
  sampleRate = OPUS_DECODING_SAMPLE_RATE,
): number {
  if (!(sampleRate > 0)) {
    throw new Error(`Sample rate must be positive: ${sampleRate}`);
  }
  if (previousGranulePosition === undefined || previousGranulePosition === null) {
    return 0;
  }
  if (currentGranulePosition < previousGranulePosition) {
    throw new GranulePositionError(currentGranulePosition, previousGranulePosition);
  }
  return Number(currentGranulePosition - previousGranulePosition) / sampleRate;
}

/**
 * Calculate the duration of every page.
 * Pages on which no packet finishes (granule position -1) get 0 and do not advance the position.
 * @param pages Pages sorted by sequence number
 * @param sampleRate Rate the granule positions count at, 48000 for Opus
 * @returns Durations in seconds, one per page
 */
export function calculatePageDurations(pages: readonly OggPage[], sampleRate = OPUS_DECODING_SAMPLE_RATE): number[] {
  let previous: bigint | undefined;
  return pages.map((page) => {
    if (page.granulePosition === OGG_NO_GRANULE_POSITION) {
      return 0;
    }
    const duration = calculatePageDuration(page.granulePosition, previous, sampleRate);
    previous = page.granulePosition;
    return duration;
  });
}

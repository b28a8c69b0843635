import { startsWithAscii } from './codecs/binary';
import { OPUS_TAGS_MAGIC, OpusCommentHeader, OpusIdentificationHeader, parseOpusCommentHeader, parseOpusIdentificationHeader } from './codecs/opus';
import {
  assertOggFormat,
  assertOpusStream,
  assertSingleLogicalStream,
  extractCommentHeaderPages,
  extractIdentificationHeaderPage,
  getSampleRate,
} from './extractors/opus-extractor';
import { assemblePacket, OggPage, parseOggPage, splitOggPages } from './parsers/ogg';
import { LoggingOptions, MalformedHeaderError, setupGlobalLogger } from './utils';

export type GetOpusHeadersOptions = LoggingOptions;

export interface OpusIdentificationHeaderInfo {
  /** The page carrying the OpusHead packet */
  page: OggPage;
  /** Input sample rate recorded in the header */
  sampleRate: number;
  /** Decoded header fields, absent when the packet is too short for the full layout */
  details?: OpusIdentificationHeader;
}

export interface OpusCommentHeaderInfo {
  /** The pages the OpusTags packet spans, in order */
  pages: OggPage[];
  /** Decoded comments, absent when the packet found is not a well formed OpusTags packet */
  details?: OpusCommentHeader;
}

export interface OpusHeaders {
  /** All the pages of the stream, sorted by page sequence number */
  pages: OggPage[];
  identificationHeader?: OpusIdentificationHeaderInfo;
  commentHeader?: OpusCommentHeaderInfo;
}

/**
 * Get the Opus identification and comment headers from the content of an Ogg Opus file
 * @param data The complete file content
 * @param options Options for logging
 * @returns The pages and the headers found, headers that cannot be found are undefined
 * @throws NotOggError if the data is not an Ogg stream
 * @throws InvalidOggPageError or TruncatedOggPageError if the first page cannot be parsed
 * @throws MultipleLogicalStreamsError if the pages have different serial numbers
 * @throws NotOpusError if no page carries an OpusHead packet
 * @throws MalformedHeaderError if the identification header is too short to hold the sample rate
 */
export function getOpusHeaders(data: Uint8Array, options?: GetOpusHeadersOptions): OpusHeaders {
  const logger = setupGlobalLogger(options);

  assertOggFormat(data);
  // An empty page list would hide why the very first page is unusable
  parseOggPage(data, 0);

  const pages = splitOggPages(data, options);
  assertSingleLogicalStream(pages);
  assertOpusStream(pages);

  const result: OpusHeaders = { pages };

  const idHeaderPage = extractIdentificationHeaderPage(pages);
  if (idHeaderPage) {
    result.identificationHeader = {
      page: idHeaderPage,
      sampleRate: getSampleRate(idHeaderPage),
      details: decodeOptionalHeader(() => parseOpusIdentificationHeader(idHeaderPage.payload), logger),
    };
    if (logger.isDebug) logger.debug(`Found OpusHead on page ${idHeaderPage.pageSequenceNumber}`);
  }

  const commentHeaderPages = extractCommentHeaderPages(pages);
  if (commentHeaderPages) {
    const packet = assemblePacket(commentHeaderPages);
    result.commentHeader = {
      pages: commentHeaderPages,
      details: packet && startsWithAscii(packet, OPUS_TAGS_MAGIC) ? decodeOptionalHeader(() => parseOpusCommentHeader(packet), logger) : undefined,
    };
    if (logger.isDebug) logger.debug(`Found comment header on ${commentHeaderPages.length} page(s)`);
  } else if (logger.isDebug) {
    logger.debug('No complete comment header found');
  }

  return result;
}

/**
 * Run a header decoder, a MalformedHeaderError gives undefined
 */
function decodeOptionalHeader<T>(decode: () => T, logger: ReturnType<typeof setupGlobalLogger>): T | undefined {
  try {
    return decode();
  } catch (error) {
    if (!(error instanceof MalformedHeaderError)) {
      throw error;
    }
    if (logger.isDebug) logger.debug(`Header details left out: ${error.message}`);
    return undefined;
  }
}

/**
 * Get the Opus identification and comment headers from an Ogg Opus file.
 * This function works in Node.js environment but not in browser.
 * @param filePath The path to the file
 * @param options Options for logging
 * @returns The pages and the headers found
 */
export async function getOpusHeadersFromFile(filePath: string, options?: GetOpusHeadersOptions): Promise<OpusHeaders> {
  const { readFile } = await import('node:fs/promises');
  const content = await readFile(filePath);
  return getOpusHeaders(content, options);
}

export * from './codecs/opus';
export * from './extractors/opus-extractor';
export * from './get-opus-headers';
export * from './parsers/ogg';
export type { LoggingOptions, ParsingError } from './utils';
export {
  GranulePositionError,
  InvalidOggPageError,
  MalformedHeaderError,
  MultipleLogicalStreamsError,
  NotOggError,
  NotOpusError,
  TruncatedOggPageError,
  UnsupportedFormatError,
} from './utils';

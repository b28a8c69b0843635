import { LineLogger } from '@handy-common-utils/misc-utils';

export interface ParsingError {
  isUnsupportedFormatError?: boolean;
}

/**
 * Error thrown when the input is not in a format this library can handle, or contains invalid data.
 * All the more specific errors of this library extend it.
 */
export class UnsupportedFormatError extends Error implements ParsingError {
  readonly isUnsupportedFormatError = true;

  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * The input does not start with the Ogg capture pattern "OggS".
 */
export class NotOggError extends UnsupportedFormatError {
  constructor(message = 'Not an Ogg file: missing OggS capture pattern') {
    super(message);
    this.name = 'NotOggError';
  }
}

/**
 * The input is a valid Ogg container but none of its pages carries an OpusHead packet.
 */
export class NotOpusError extends UnsupportedFormatError {
  constructor(message = 'Not an Opus stream: no page carries an OpusHead packet') {
    super(message);
    this.name = 'NotOpusError';
  }
}

/**
 * No Ogg page starts at the given offset.
 */
export class InvalidOggPageError extends UnsupportedFormatError {
  constructor(readonly offset: number) {
    super(`Not a valid Ogg page at offset ${offset}`);
    this.name = 'InvalidOggPageError';
  }
}

/**
 * An Ogg page starts at the given offset but the buffer ends before the page does.
 */
export class TruncatedOggPageError extends UnsupportedFormatError {
  constructor(
    readonly offset: number,
    readonly expectedSize: number,
    readonly availableSize: number,
  ) {
    super(`Truncated Ogg page at offset ${offset}: expected at least ${expectedSize} bytes but only ${availableSize} available`);
    this.name = 'TruncatedOggPageError';
  }
}

/**
 * An Opus header packet (OpusHead or OpusTags) is shorter than its layout requires or has the wrong marker.
 */
export class MalformedHeaderError extends UnsupportedFormatError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedHeaderError';
  }
}

/**
 * The pages belong to more than one logical bitstream (several serial numbers).
 */
export class MultipleLogicalStreamsError extends UnsupportedFormatError {
  constructor(readonly serialNumbers: number[]) {
    super(`Multiplexed Ogg streams are not supported, found serial numbers: ${serialNumbers.join(', ')}`);
    this.name = 'MultipleLogicalStreamsError';
  }
}

/**
 * A granule position is lower than the one of the page before it.
 */
export class GranulePositionError extends UnsupportedFormatError {
  constructor(
    readonly current: bigint,
    readonly previous: bigint,
  ) {
    super(`Granule position went backwards from ${previous} to ${current}`);
    this.name = 'GranulePositionError';
  }
}

export interface LoggingOptions {
  /**
   * Whether to output debug messages.
   * Default value is false.
   */
  debug?: boolean;
  /**
   * Whether to suppress console output.
   * Default value is true.
   */
  quiet?: boolean;
}

/**
 * Create the console logger used by the functions of this library
 * @param options Logging flags, missing ones take the defaults
 * @returns A logger honouring the debug and quiet flags
 */
export function setupGlobalLogger(options?: LoggingOptions | null) {
  const flags = {
    debug: false,
    quiet: true,
    ...options,
  };
  return LineLogger.console(flags);
}

import { describe, expect, it } from '@jest/globals';

import { parseOpusCommentHeader, parseOpusIdentificationHeader } from '../../src/codecs/opus';
import { MalformedHeaderError } from '../../src/utils';
import { bytes, concatBytes, createOpusHead, createOpusTags } from '../test-utils';

describe('Opus identification header', () => {
  it('should decode a mapping family 0 header', () => {
    const head = createOpusHead({ channelCount: 2, preSkip: 312, inputSampleRate: 44100, outputGain: -256 });

    expect(parseOpusIdentificationHeader(head)).toEqual({
      version: 1,
      channelCount: 2,
      preSkip: 312,
      inputSampleRate: 44100,
      outputGain: -256,
      outputGainDb: -1,
      channelMappingFamily: 0,
    });
  });

  it('should decode the channel mapping table', () => {
    const head = createOpusHead({
      channelCount: 3,
      channelMappingFamily: 1,
      streamCount: 2,
      coupledStreamCount: 1,
      channelMapping: [0, 2, 1],
    });

    const header = parseOpusIdentificationHeader(head);
    expect(header.channelMappingFamily).toBe(1);
    expect(header.channelMapping).toEqual({ streamCount: 2, coupledStreamCount: 1, mapping: [0, 2, 1] });
  });

  it('should reject a header without the OpusHead marker', () => {
    expect(() => parseOpusIdentificationHeader(bytes('OpusTags01234567890'))).toThrow(
      'Not an Opus identification header: expected OpusHead but found "OpusTags"',
    );
  });

  it('should reject a header that is too short', () => {
    const head = createOpusHead().subarray(0, 18);
    expect(() => parseOpusIdentificationHeader(head)).toThrow(MalformedHeaderError);
    expect(() => parseOpusIdentificationHeader(head)).toThrow('Opus identification header too short: 18 bytes, at least 19 required');
  });

  it('should reject a channel mapping table that does not fit', () => {
    const head = createOpusHead({ channelCount: 6, channelMappingFamily: 1, channelMapping: [0, 1, 2, 3, 4, 5] }).subarray(0, 25);
    expect(() => parseOpusIdentificationHeader(head)).toThrow(
      'Opus identification header too short for the channel mapping table: 25 bytes, 27 required',
    );
  });
});

describe('Opus comment header', () => {
  it('should decode the vendor and the comments', () => {
    const tags = createOpusTags('test-encoder 1.0', ['TITLE=Test Song', 'artist=Someone', 'ARTIST=Another', 'no separator']);

    expect(parseOpusCommentHeader(tags)).toEqual({
      vendor: 'test-encoder 1.0',
      userComments: ['TITLE=Test Song', 'artist=Someone', 'ARTIST=Another', 'no separator'],
      tags: {
        TITLE: ['Test Song'],
        ARTIST: ['Someone', 'Another'],
      },
    });
  });

  it('should decode UTF-8 and keep "=" inside values', () => {
    const header = parseOpusCommentHeader(createOpusTags('vendor', ['TITLE=Café', 'COMMENT=a=b']));
    expect(header.tags).toEqual({ TITLE: ['Café'], COMMENT: ['a=b'] });
  });

  it('should decode a header without comments', () => {
    expect(parseOpusCommentHeader(createOpusTags(''))).toEqual({ vendor: '', userComments: [], tags: {} });
  });

  it('should ignore data after the comments', () => {
    const tags = concatBytes(createOpusTags('vendor', ['A=1']), new Uint8Array([0x01, 0x02, 0x03]));
    expect(parseOpusCommentHeader(tags).userComments).toEqual(['A=1']);
  });

  it('should reject a header without the OpusTags marker', () => {
    expect(() => parseOpusCommentHeader(bytes('OpusHead'))).toThrow(MalformedHeaderError);
  });

  it('should reject a vendor string longer than the packet', () => {
    const tags = concatBytes(bytes('OpusTags'), new Uint8Array([100, 0, 0, 0]), bytes('abc'));
    expect(() => parseOpusCommentHeader(tags)).toThrow('Opus comment header vendor string of 100 bytes at offset 12 exceeds the packet size 15');
  });

  it('should reject a packet ending before the comment count', () => {
    const tags = concatBytes(bytes('OpusTags'), new Uint8Array([0, 0, 0, 0]));
    expect(() => parseOpusCommentHeader(tags)).toThrow('Opus comment header ends before the user comment list length at offset 12');
  });

  it('should reject a packet with fewer comments than announced', () => {
    const tags = createOpusTags('vendor', ['A=1']);
    // announce two comments
    tags[18] = 2;
    expect(() => parseOpusCommentHeader(tags)).toThrow('Opus comment header ends before the user comment #1 length at offset 29');
  });
});

import { describe, it, expect } from 'vitest';
import { decodeMetadata, decodeMetadataValue, encodeMetadata, jsonMetadataCodec } from '../utils/metadataCodec.js';

describe('metadata codec', () => {
  describe('encodeMetadata', () => {
    it('passes scalars through and serializes mappings and arrays', () => {
      const encoded = encodeMetadata({
        count: 1,
        label: 'x',
        active: true,
        nested: { tags: [1, 2] },
        list: ['a']
      });
      expect(encoded).toEqual({
        count: 1,
        label: 'x',
        active: true,
        nested: '{"tags":[1,2]}',
        list: '["a"]'
      });
    });

    it('drops null and undefined values', () => {
      expect(encodeMetadata({ keep: 'yes', gone: null, missing: undefined })).toEqual({ keep: 'yes' });
    });

    it('stores non-finite numbers as strings', () => {
      expect(encodeMetadata({ big: Infinity, nan: NaN })).toEqual({ big: 'Infinity', nan: 'NaN' });
    });
  });

  describe('decodeMetadataValue', () => {
    it('parses object and array text', () => {
      expect(decodeMetadataValue('{"a":1}')).toEqual({ a: 1 });
      expect(decodeMetadataValue('  [1,"b"]  ')).toEqual([1, 'b']);
    });

    it('keeps strings that are not JSON structures', () => {
      expect(decodeMetadataValue('hello')).toBe('hello');
      expect(decodeMetadataValue('42')).toBe('42');
      expect(decodeMetadataValue('true')).toBe('true');
      expect(decodeMetadataValue('"quoted"')).toBe('"quoted"');
    });

    it('keeps the original string when parsing fails', () => {
      expect(decodeMetadataValue('{not json')).toBe('{not json');
      expect(decodeMetadataValue('[1,')).toBe('[1,');
    });
  });

  it('decodes every string field and leaves other scalars alone', () => {
    expect(decodeMetadata({ nested: '{"k":[1]}', name: 'plain', n: 3, flag: false })).toEqual({
      nested: { k: [1] },
      name: 'plain',
      n: 3,
      flag: false
    });
  });

  it('round-trips nested metadata', () => {
    const metadata = {
      source: 'chat',
      turn: 4,
      pinned: false,
      speaker: { name: 'Ada', roles: ['narrator', 'guide'] },
      scores: [0.5, 0.25]
    };
    expect(jsonMetadataCodec.decode(jsonMetadataCodec.encode(metadata))).toEqual(metadata);
  });

  it('promotes a plain string holding JSON object text on read', () => {
    const decoded = jsonMetadataCodec.decode(jsonMetadataCodec.encode({ raw: '{"a":1}' }));
    expect(decoded).toEqual({ raw: { a: 1 } });
  });
});

import { describe, it, expect } from 'vitest';
import { parseAxisPayload, parseDescriptorMap, parseImageProviderResponse } from '../parseResponse';
import { FetchError } from '../../errors';

const descriptor = { indices: [0, 3], min: [1, null], max: [2, null], count: [4, null], timestamp: [10, null] };

describe('parseDescriptorMap', () => {
  it('keeps well-formed descriptors in wire order', () => {
    const parsed = parseDescriptorMap({ b: descriptor, a: { ...descriptor, total_points: 4 } });
    expect(Object.keys(parsed)).toEqual(['b', 'a']);
    expect(parsed.a).toEqual({ ...descriptor, total_points: 4 });
  });

  it('drops malformed descriptors', () => {
    const parsed = parseDescriptorMap({
      ok: descriptor,
      missing: { indices: [0] },
      text: { ...descriptor, max: ['2', null] },
      scalar: 7,
    });
    expect(Object.keys(parsed)).toEqual(['ok']);
  });

  it('returns an empty map for a non-object', () => {
    expect(parseDescriptorMap(null)).toEqual({});
    expect(parseDescriptorMap([descriptor])).toEqual({});
  });
});

describe('parseAxisPayload', () => {
  it('accepts per-attribute layers', () => {
    expect(parseAxisPayload({ layers: { a: 'AAA', bad: 3 }, x_range: ['Mon, 01 Jan 2024 00:00:00 GMT', 5], y_range: [0, 1] })).toEqual({
      layers: { a: 'AAA' },
      x_range: ['Mon, 01 Jan 2024 00:00:00 GMT', 5],
      y_range: [0, 1],
    });
  });

  it('accepts a pre-composited image', () => {
    expect(parseAxisPayload({ image: 'IMG', x_range: [0, 1], y_range: [2, 3] })).toEqual({
      image: 'IMG',
      x_range: [0, 1],
      y_range: [2, 3],
    });
  });

  it('rejects payloads without an image or usable ranges', () => {
    expect(parseAxisPayload({ x_range: [0, 1], y_range: [0, 1] })).toBeNull();
    expect(parseAxisPayload({ image: 'IMG', x_range: [0], y_range: [0, 1] })).toBeNull();
    expect(parseAxisPayload({ image: 'IMG', x_range: [0, 1], y_range: [0, 'x'] })).toBeNull();
    expect(parseAxisPayload('IMG')).toBeNull();
  });
});

describe('parseImageProviderResponse', () => {
  it('parses both sections', () => {
    const parsed = parseImageProviderResponse({
      descs: { a: descriptor },
      images: { '0': { image: 'IMG', x_range: [0, 1], y_range: [0, 1] }, '1': { nope: true } },
    });
    expect(parsed).toEqual({
      descs: { a: descriptor },
      images: { '0': { image: 'IMG', x_range: [0, 1], y_range: [0, 1] } },
    });
  });

  it('treats missing sections as empty', () => {
    expect(parseImageProviderResponse({})).toEqual({ descs: {}, images: {} });
  });

  it('throws FetchError for a non-object body', () => {
    expect(() => parseImageProviderResponse('oops')).toThrow(FetchError);
  });
});

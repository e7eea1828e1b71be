import { describe, it, expect } from 'vitest';
import { createAttributeRasterCache } from '../AttributeRasterCache';
import type { RawAttributeImage } from '../AttributeRasterCache';
import { DecodeError } from '../../errors';
import { createFakeDecoder, createManualDecoder, maskRaster, pixelAt } from '../../__tests__/fakes';

const source = (encoded: string): RawAttributeImage => ({ encoded, xRange: { start: 0, end: 10 }, yRange: [0, 1] });

const table = {
  m1: maskRaster(2, 1, [[0, 0]]),
  m2: maskRaster(2, 1, [[1, 0]]),
};

describe('AttributeRasterCache', () => {
  it('decodes and tints a raw image', async () => {
    const { decoder } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    const result = await cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    expect(result.attribute).toBe('a');
    expect(pixelAt(result.raster, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(result.raster, 1, 0)).toEqual([0, 0, 0, 0]);
    expect(cache.get('a')).toBe(result);
    expect(cache.size).toBe(1);
  });

  it('gives pixel-identical rasters for the same image, colour and width', async () => {
    const { decoder, decode } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    const first = await cache.load('a', source('m1'), { color: '#377eb8', width: 2 });
    const second = await cache.load('a', source('m1'), { color: '#377eb8', width: 2 });
    expect(second.raster).toEqual(first.raster);
    expect(decode).toHaveBeenCalledTimes(1);
  });

  it('recolours from the decoded mask without decoding again', async () => {
    const { decoder, decode } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    await cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    const blue = await cache.load('a', source('m1'), { color: '#0000ff', width: 1 });
    expect(pixelAt(blue.raster, 0, 0)).toEqual([0, 0, 255, 255]);
    expect(decode).toHaveBeenCalledTimes(1);
  });

  it('decodes again when the raw image changes', async () => {
    const { decoder, decode } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    await cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    const next = await cache.load('a', source('m2'), { color: '#ff0000', width: 1 });
    expect(decode).toHaveBeenCalledTimes(2);
    expect(pixelAt(next.raster, 1, 0)).toEqual([255, 0, 0, 255]);
  });

  it('rejects with a DecodeError naming the attribute', async () => {
    const { decoder } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    const failure = cache.load('a', source('bad'), { color: '#ff0000', width: 1 });
    await expect(failure).rejects.toBeInstanceOf(DecodeError);
    await expect(failure).rejects.toMatchObject({ attribute: 'a', message: 'a: corrupt payload bad' });
    expect(cache.get('a')).toBeUndefined();
  });

  it('keeps the previous entry readable until a newer load finishes', async () => {
    const manual = createManualDecoder(table);
    const cache = createAttributeRasterCache(manual.decoder);

    const red = cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    manual.resolve('m1');
    const redResult = await red;

    const pending = cache.load('a', source('m2'), { color: '#ff0000', width: 1 });
    expect(cache.get('a')).toBe(redResult);
    manual.resolve('m2');
    const next = await pending;
    expect(cache.get('a')).toBe(next);
  });

  it('lets the latest load own the entry when loads overlap', async () => {
    const manual = createManualDecoder(table);
    const cache = createAttributeRasterCache(manual.decoder);

    const red = cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    const blue = cache.load('a', source('m1'), { color: '#0000ff', width: 1 });
    manual.resolve('m1');
    await Promise.all([red, blue]);
    expect(cache.get('a')?.color).toBe('#0000ff');
  });

  it('forgets an attribute on invalidate', async () => {
    const { decoder, decode } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);

    await cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    cache.invalidate('a');
    expect(cache.get('a')).toBeUndefined();
    await cache.load('a', source('m1'), { color: '#ff0000', width: 1 });
    expect(decode).toHaveBeenCalledTimes(2);
  });

  it('draws unparseable colours in black', async () => {
    const { decoder } = createFakeDecoder(table);
    const cache = createAttributeRasterCache(decoder);
    const result = await cache.load('a', source('m1'), { color: 'not-a-colour', width: 1 });
    expect(pixelAt(result.raster, 0, 0)).toEqual([0, 0, 0, 255]);
  });
});

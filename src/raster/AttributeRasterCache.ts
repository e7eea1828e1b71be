/**
 * Per-attribute raster cache.
 *
 * Keeps one decoded mask and one coloured raster per attribute. Recolouring
 * (colour/width change) reuses the decoded mask, so it never needs the image
 * provider. Entries are replaced wholesale; a read during a pending load sees
 * the previous entry until the new one is ready.
 *
 * @module AttributeRasterCache
 */

import type { TimeRange, ValueRange } from '../config/types';
import { DecodeError } from '../errors';
import { parseCssColor } from '../utils/colors';
import type { Rgba8 } from '../utils/colors';
import type { RasterDecoder } from './decodeRaster';
import { recolorMask } from './rasterOps';
import type { Raster } from './rasterOps';

/** Monochrome provider output for one attribute, plus the ranges it was rendered for. */
export interface RawAttributeImage {
  readonly encoded: string;
  readonly xRange: TimeRange;
  readonly yRange: ValueRange;
}

export interface ColoredAttributeRaster {
  readonly attribute: string;
  readonly source: RawAttributeImage;
  readonly color: string;
  readonly width: number;
  readonly raster: Raster;
}

export interface RasterStyle {
  readonly color: string;
  readonly width: number;
}

export interface AttributeRasterCache {
  load(attribute: string, source: RawAttributeImage, style: RasterStyle): Promise<ColoredAttributeRaster>;
  get(attribute: string): ColoredAttributeRaster | undefined;
  invalidate(attribute: string): void;
  clear(): void;
  readonly size: number;
}

type DecodedEntry = {
  readonly source: RawAttributeImage;
  readonly mask: Promise<Raster>;
};

// Unparseable colours draw in opaque black rather than failing the layer.
const FALLBACK_RGBA: Rgba8 = [0, 0, 0, 255];

const sameSource = (a: RawAttributeImage, b: RawAttributeImage): boolean =>
  a === b ||
  (a.encoded === b.encoded &&
    a.xRange.start === b.xRange.start &&
    a.xRange.end === b.xRange.end &&
    a.yRange[0] === b.yRange[0] &&
    a.yRange[1] === b.yRange[1]);

const toDecodeError = (attribute: string, err: unknown): DecodeError => {
  if (err instanceof DecodeError) {
    return err.attribute === attribute ? err : new DecodeError(`${attribute}: ${err.message}`, attribute, { cause: err });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new DecodeError(`${attribute}: ${reason}`, attribute, { cause: err });
};

export function createAttributeRasterCache(decoder: RasterDecoder): AttributeRasterCache {
  const decoded = new Map<string, DecodedEntry>();
  const colored = new Map<string, ColoredAttributeRaster>();
  const generations = new Map<string, number>();

  const bumpGeneration = (attribute: string): number => {
    const next = (generations.get(attribute) ?? 0) + 1;
    generations.set(attribute, next);
    return next;
  };

  const decodeMask = (attribute: string, source: RawAttributeImage): Promise<Raster> => {
    let pending: Promise<Raster>;
    try {
      pending = decoder(source.encoded);
    } catch (err) {
      pending = Promise.reject(err);
    }
    return pending.then(
      (mask) => mask,
      (err: unknown) => {
        throw toDecodeError(attribute, err);
      }
    );
  };

  const load: AttributeRasterCache['load'] = (attribute, source, style) => {
    const current = colored.get(attribute);
    if (
      current &&
      sameSource(current.source, source) &&
      current.color === style.color &&
      current.width === style.width
    ) {
      return Promise.resolve(current);
    }

    let entry = decoded.get(attribute);
    if (!entry || !sameSource(entry.source, source)) {
      entry = { source, mask: decodeMask(attribute, source) };
      decoded.set(attribute, entry);
    }

    const generation = bumpGeneration(attribute);
    const rgba = parseCssColor(style.color) ?? FALLBACK_RGBA;

    return entry.mask.then((mask) => {
      const result: ColoredAttributeRaster = {
        attribute,
        source,
        color: style.color,
        width: style.width,
        raster: recolorMask(mask, rgba, style.width),
      };
      // A newer load for the same attribute owns the slot.
      if (generations.get(attribute) === generation) colored.set(attribute, result);
      return result;
    });
  };

  const invalidate: AttributeRasterCache['invalidate'] = (attribute) => {
    decoded.delete(attribute);
    colored.delete(attribute);
    bumpGeneration(attribute);
  };

  const clear: AttributeRasterCache['clear'] = () => {
    for (const attribute of Array.from(generations.keys())) bumpGeneration(attribute);
    decoded.clear();
    colored.clear();
  };

  return {
    load,
    get: (attribute) => colored.get(attribute),
    invalidate,
    clear,
    get size() {
      return colored.size;
    },
  };
}

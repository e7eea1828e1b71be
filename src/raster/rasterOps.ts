/**
 * Pure pixel operations on straight-alpha RGBA rasters.
 *
 * A `Raster` is structurally compatible with `ImageData`, so decoded canvas pixels
 * can be used directly and results can be handed back to `putImageData`.
 *
 * @module rasterOps
 */

import type { Rgba8 } from '../utils/colors';

export interface Raster {
  readonly width: number;
  readonly height: number;
  /** Row-major RGBA, 4 bytes per pixel. */
  readonly data: Uint8ClampedArray;
}

export function createRaster(width: number, height: number): Raster {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  return { width: w, height: h, data: new Uint8ClampedArray(w * h * 4) };
}

/**
 * Pixel offsets used to thicken a line of `width` pixels.
 * width 1 → [0], 2 → [0, 1], 3 → [-1, 0, 1], 4 → [-1, 0, 1, 2].
 */
export function thickenOffsets(width: number): number[] {
  const w = Math.max(1, Math.floor(width));
  const lead = Math.floor((w - 1) / 2);
  const offsets: number[] = [];
  for (let i = 0; i < w; i++) offsets.push(i - lead);
  return offsets;
}

/**
 * Presence channel of a mask, thickened by taking the max alpha over all
 * (dx, dy) offsets of the mask.
 */
export function thickenAlpha(mask: Raster, width: number): Uint8ClampedArray {
  const { width: w, height: h, data } = mask;
  const out = new Uint8ClampedArray(w * h);
  const offsets = thickenOffsets(width);

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      let a = 0;
      for (const dy of offsets) {
        const sy = y - dy;
        if (sy < 0 || sy >= h) continue;
        for (const dx of offsets) {
          const sx = x - dx;
          if (sx < 0 || sx >= w) continue;
          const v = data[(sy * w + sx) * 4 + 3];
          if (v > a) a = v;
        }
      }
      out[y * w + x] = a;
    }
  }
  return out;
}

/**
 * Tints a monochrome mask: solid `color`, masked by the mask's alpha, thickened to `width`.
 * Always returns a new raster; the mask is not touched.
 */
export function recolorMask(mask: Raster, color: Rgba8, width: number): Raster {
  const out = createRaster(mask.width, mask.height);
  const alpha = thickenAlpha(mask, width);
  const [r, g, b, ca] = color;

  for (let i = 0; i < alpha.length; i++) {
    const a = alpha[i];
    if (a === 0) continue;
    const o = i * 4;
    out.data[o] = r;
    out.data[o + 1] = g;
    out.data[o + 2] = b;
    out.data[o + 3] = Math.round((a * ca) / 255);
  }
  return out;
}

/**
 * Paints `src` over `dst` in place (source-over, straight alpha), anchored at the origin.
 * Pixels of `src` outside `dst` are ignored.
 */
export function compositeOver(dst: Raster, src: Raster): void {
  const w = Math.min(dst.width, src.width);
  const h = Math.min(dst.height, src.height);
  const d = dst.data;
  const s = src.data;

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const si = (y * src.width + x) * 4;
      const sa = s[si + 3];
      if (sa === 0) continue;
      const di = (y * dst.width + x) * 4;

      if (sa === 255) {
        d[di] = s[si];
        d[di + 1] = s[si + 1];
        d[di + 2] = s[si + 2];
        d[di + 3] = 255;
        continue;
      }

      const sA = sa / 255;
      const dA = d[di + 3] / 255;
      const outA = sA + dA * (1 - sA);
      for (let c = 0; c < 3; c++) {
        d[di + c] = (s[si + c] * sA + d[di + c] * dA * (1 - sA)) / outA;
      }
      d[di + 3] = outA * 255;
    }
  }
}

/**
 * Stacks layers back-to-front: `layers[0]` at the bottom, the last layer on top.
 * The result takes the size of the largest layer; null when there are no layers.
 */
export function compositeLayers(layers: readonly Raster[]): Raster | null {
  if (layers.length === 0) return null;
  let width = 0;
  let height = 0;
  for (const l of layers) {
    if (l.width > width) width = l.width;
    if (l.height > height) height = l.height;
  }
  const out = createRaster(width, height);
  for (const l of layers) compositeOver(out, l);
  return out;
}

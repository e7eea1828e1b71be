/**
 * Resolves a pointer position to the closest attribute sample using the
 * per-column descriptors sent alongside the rasters.
 *
 * @module HoverInspector
 */

import type { AttributeDescriptor, AxisIndex, DeclaredAttribute, DescriptorMap, TimeRange, Timestamp } from '../config/types';
import type { CoordinateSystem } from '../core/CoordinateSystem';

/** Pixel frame the descriptors were computed for: their column 0..width spans `xRange`. */
export interface DescriptorFrame {
  readonly xRange: TimeRange;
  readonly width: number;
}

export type ValueSummary =
  | Readonly<{ kind: 'single'; value: number }>
  | Readonly<{ kind: 'aggregate'; min: number; max: number; count: number }>;

export type HoverMatch = Readonly<{
  attribute: string;
  axis: AxisIndex;
  color: string;
  /** Descriptor column (pixel column of the rendered image). */
  column: number;
  /** Plot-local pixel X of the column under the current transform. */
  x: number;
  /** Plot-local pixel Y of the band's max and min. */
  yMax: number;
  yMin: number;
  timestamp: Timestamp | null;
  summary: ValueSummary;
}>;

export interface HoverInspector {
  setAttributes(attributes: readonly DeclaredAttribute[]): void;
  setDescriptors(descriptors: DescriptorMap | null, frame?: DescriptorFrame | null): void;
  hasDescriptors(): boolean;
  locate(pixelX: number, pixelY: number): HoverMatch | null;
}

/**
 * Position of the last index not exceeding `query`; 0 when `query` precedes them all.
 * Returns -1 for an empty sequence. `indices` must be non-decreasing.
 */
export function findColumnAtOrBefore(indices: readonly number[], query: number): number {
  const n = indices.length;
  if (n === 0) return -1;
  if (!(query >= indices[0])) return 0;

  let lo = 0;
  let hi = n - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >>> 1;
    if (indices[mid] <= query) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/** Vertical distance from `y` to the band [top, bottom]; 0 inside it. */
export function bandDistance(y: number, a: number, b: number): number {
  const top = Math.min(a, b);
  const bottom = Math.max(a, b);
  if (y < top) return top - y;
  if (y > bottom) return y - bottom;
  return 0;
}

const numberAt = (column: readonly (number | null)[], i: number): number | null => {
  const v = column[i];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
};

const summarize = (desc: AttributeDescriptor, i: number): ValueSummary | null => {
  const max = numberAt(desc.max, i);
  const min = numberAt(desc.min, i) ?? max;
  const count = numberAt(desc.count, i) ?? 0;
  if (max === null || min === null) return null;
  if (count === 1) return { kind: 'single', value: max };
  return { kind: 'aggregate', min, max, count };
};

export function createHoverInspector(coords: CoordinateSystem): HoverInspector {
  let attributes: readonly DeclaredAttribute[] = [];
  let descriptors: DescriptorMap | null = null;
  let frame: DescriptorFrame | null = null;

  const toColumn = (pixelX: number): number => {
    if (frame === null) return Math.round(pixelX);
    const { start, end } = frame.xRange;
    const span = end - start;
    if (!(span > 0) || !(frame.width > 0)) return Math.round(pixelX);
    return Math.round(((coords.invertTime(pixelX) - start) / span) * frame.width);
  };

  const columnToPixel = (column: number): number => {
    if (frame === null) return column;
    const { start, end } = frame.xRange;
    if (!(frame.width > 0)) return column;
    return coords.mapTime(start + (column / frame.width) * (end - start));
  };

  const locate: HoverInspector['locate'] = (pixelX, pixelY) => {
    if (descriptors === null || attributes.length === 0) return null;
    if (!Number.isFinite(pixelX) || !Number.isFinite(pixelY)) return null;

    const query = toColumn(pixelX);
    let best: HoverMatch | null = null;
    let bestDistance = Infinity;

    // Declaration order; strict `<` keeps the earliest on ties.
    for (const { id, config } of attributes) {
      if (!config.visible) continue;
      const desc = descriptors[id];
      if (desc === undefined) continue;

      const i = findColumnAtOrBefore(desc.indices, query);
      if (i < 0) continue;
      const summary = summarize(desc, i);
      if (summary === null) continue;

      const hi = summary.kind === 'single' ? summary.value : summary.max;
      const lo = summary.kind === 'single' ? summary.value : summary.min;
      const yMax = coords.mapValue(config.axis, hi);
      const yMin = coords.mapValue(config.axis, lo);
      const distance = Number.isFinite(yMax) && Number.isFinite(yMin) ? bandDistance(pixelY, yMax, yMin) : Infinity;

      if (best === null || distance < bestDistance) {
        const column = desc.indices[i];
        best = {
          attribute: id,
          axis: config.axis,
          color: config.color,
          column,
          x: columnToPixel(column),
          yMax,
          yMin,
          timestamp: numberAt(desc.timestamp, i),
          summary,
        };
        bestDistance = distance;
      }
    }

    return best;
  };

  return {
    setAttributes(next) {
      attributes = next;
    },
    setDescriptors(next, nextFrame = null) {
      descriptors = next;
      frame = nextFrame;
    },
    hasDescriptors: () => descriptors !== null,
    locate,
  };
}

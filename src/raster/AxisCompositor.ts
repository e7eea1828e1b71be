/**
 * Composites the coloured rasters of every attribute on one Y-axis.
 *
 * Each cycle tracks its attributes in a tagged-state map
 * (`pending` | `ready` | `failed`); the combined raster is emitted only once no
 * entry is pending. Results of superseded cycles are ignored.
 *
 * @module AxisCompositor
 */

import type { AxisIndex, DeclaredAttribute, TimeRange, ValueRange } from '../config/types';
import { DecodeError } from '../errors';
import type { AttributeRasterCache, ColoredAttributeRaster, RawAttributeImage } from './AttributeRasterCache';
import { compositeLayers } from './rasterOps';
import type { Raster } from './rasterOps';

export type AttributeSlotState =
  | Readonly<{ status: 'pending' }>
  | Readonly<{ status: 'ready'; raster: ColoredAttributeRaster }>
  | Readonly<{ status: 'failed'; error: DecodeError }>;

/** Raw per-attribute images for one axis, with the ranges the provider rendered them for. */
export interface AxisImageData {
  readonly layers: Readonly<Record<string, RawAttributeImage>>;
  readonly xRange: TimeRange;
  readonly yRange: ValueRange;
}

export type EmptyReason = 'no-attributes' | 'no-data' | 'all-failed';

export type AxisCompositeResult =
  | Readonly<{
      kind: 'raster';
      axis: AxisIndex;
      cycle: number;
      raster: Raster;
      xRange: TimeRange;
      yRange: ValueRange;
      /** Attributes drawn, bottom to top. */
      attributes: readonly string[];
      failed: readonly string[];
    }>
  | Readonly<{
      kind: 'empty';
      axis: AxisIndex;
      cycle: number;
      reason: EmptyReason;
      failed: readonly string[];
    }>;

export type AxisCompositeCallback = (result: AxisCompositeResult) => void;

export interface AxisCompositorOptions {
  readonly onAttributeError?: (error: DecodeError) => void;
}

export interface AxisCompositor {
  readonly axis: AxisIndex;
  /** Accepts the full declared list; only entries on this axis are kept. */
  setAttributeConfigs(attributes: readonly DeclaredAttribute[]): void;
  setData(data: AxisImageData | null): void;
  /** Re-runs compositing from cached raw images (no fetch). No-op without data. */
  recomposite(): void;
  getStates(): ReadonlyMap<string, AttributeSlotState>;
  getAttributes(): readonly DeclaredAttribute[];
  hasData(): boolean;
  /** Whether the current data carries a raw image for `attribute`. */
  hasLayer(attribute: string): boolean;
  isSettled(): boolean;
  onComplete(callback: AxisCompositeCallback): () => void;
  dispose(): void;
}

const PENDING: AttributeSlotState = { status: 'pending' };

const sameDeclarations = (a: readonly DeclaredAttribute[], b: readonly DeclaredAttribute[]): boolean => {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (
      x.id !== y.id ||
      x.config.color !== y.config.color ||
      x.config.width !== y.config.width ||
      x.config.visible !== y.config.visible
    ) {
      return false;
    }
  }
  return true;
};

const asDecodeError = (attribute: string, err: unknown): DecodeError =>
  err instanceof DecodeError
    ? err
    : new DecodeError(`${attribute}: ${err instanceof Error ? err.message : String(err)}`, attribute, { cause: err });

export function createAxisCompositor(
  axis: AxisIndex,
  cache: AttributeRasterCache,
  options: AxisCompositorOptions = {}
): AxisCompositor {
  let disposed = false;
  let attributes: readonly DeclaredAttribute[] = [];
  let data: AxisImageData | null = null;
  let cycle = 0;
  let states = new Map<string, AttributeSlotState>();
  const listeners = new Set<AxisCompositeCallback>();

  const emit = (result: AxisCompositeResult): void => {
    const snapshot = Array.from(listeners);
    for (const cb of snapshot) cb(result);
  };

  const failedIds = (): string[] => {
    const out: string[] = [];
    for (const [id, s] of states) if (s.status === 'failed') out.push(id);
    return out;
  };

  const finish = (ownCycle: number, frame: AxisImageData): void => {
    const layers: Raster[] = [];
    const drawn: string[] = [];
    // Declaration order, back to front.
    for (const { id } of attributes) {
      const s = states.get(id);
      if (s?.status !== 'ready') continue;
      layers.push(s.raster.raster);
      drawn.push(id);
    }

    const raster = compositeLayers(layers);
    if (raster === null) {
      emit({ kind: 'empty', axis, cycle: ownCycle, reason: 'all-failed', failed: failedIds() });
      return;
    }
    emit({
      kind: 'raster',
      axis,
      cycle: ownCycle,
      raster,
      xRange: frame.xRange,
      yRange: frame.yRange,
      attributes: drawn,
      failed: failedIds(),
    });
  };

  const settle = (ownCycle: number, frame: AxisImageData, id: string, next: AttributeSlotState): void => {
    if (disposed || ownCycle !== cycle) return;
    states.set(id, next);
    for (const s of states.values()) if (s.status === 'pending') return;
    finish(ownCycle, frame);
  };

  const run = (): void => {
    if (disposed) return;
    const ownCycle = ++cycle;
    states = new Map();

    const visible = attributes.filter((a) => a.config.visible);
    if (visible.length === 0) {
      emit({ kind: 'empty', axis, cycle: ownCycle, reason: 'no-attributes', failed: [] });
      return;
    }

    const frame = data;
    if (frame === null) {
      emit({ kind: 'empty', axis, cycle: ownCycle, reason: 'no-data', failed: [] });
      return;
    }

    const work: Array<{ attr: DeclaredAttribute; source: RawAttributeImage }> = [];
    for (const attr of visible) {
      const source = frame.layers[attr.id];
      if (source === undefined) continue;
      states.set(attr.id, PENDING);
      work.push({ attr, source });
    }

    if (work.length === 0) {
      emit({ kind: 'empty', axis, cycle: ownCycle, reason: 'no-data', failed: [] });
      return;
    }

    for (const { attr, source } of work) {
      const { id, config } = attr;
      cache.load(id, source, { color: config.color, width: config.width }).then(
        (raster) => settle(ownCycle, frame, id, { status: 'ready', raster }),
        (err: unknown) => {
          const error = asDecodeError(id, err);
          if (!disposed && ownCycle === cycle) options.onAttributeError?.(error);
          settle(ownCycle, frame, id, { status: 'failed', error });
        }
      );
    }
  };

  const setAttributeConfigs: AxisCompositor['setAttributeConfigs'] = (all) => {
    if (disposed) return;
    const next = all.filter((a) => a.config.axis === axis);
    if (sameDeclarations(next, attributes)) return;
    attributes = next;
    if (data !== null || next.length === 0) run();
  };

  const setData: AxisCompositor['setData'] = (next) => {
    if (disposed) return;
    data = next;
    run();
  };

  const recomposite: AxisCompositor['recomposite'] = () => {
    if (disposed || data === null) return;
    run();
  };

  return {
    axis,
    setAttributeConfigs,
    setData,
    recomposite,
    getStates: () => new Map(states),
    getAttributes: () => attributes,
    hasData: () => data !== null,
    hasLayer: (attribute) => data !== null && data.layers[attribute] !== undefined,
    isSettled: () => {
      for (const s of states.values()) if (s.status === 'pending') return false;
      return true;
    },
    onComplete(callback) {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      listeners.clear();
      states = new Map();
      data = null;
    },
  };
}

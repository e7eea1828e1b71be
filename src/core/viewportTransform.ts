/**
 * Pan/zoom transform helpers.
 *
 * A viewport transform is a 1-D affine map applied on top of the baseline
 * time scale: `screenX = k * baseX + x`. Identity is `{ k: 1, x: 0 }`.
 *
 * @module viewportTransform
 */

export interface ViewportTransform {
  /** Zoom factor; > 1 means zoomed in. */
  readonly k: number;
  /** Horizontal offset in plot-local CSS pixels. */
  readonly x: number;
}

export type TransformDelta =
  | Readonly<{ kind: 'zoom'; factor: number; anchorX: number }>
  | Readonly<{ kind: 'pan'; dx: number }>;

export const IDENTITY_TRANSFORM: ViewportTransform = Object.freeze({ k: 1, x: 0 });

/** Zoom factors are kept inside this band so the inverse stays well conditioned. */
export const MIN_ZOOM = 1e-6;
export const MAX_ZOOM = 1e9;

export const applyTransform = (t: ViewportTransform, baseX: number): number => t.k * baseX + t.x;

export const invertTransform = (t: ViewportTransform, screenX: number): number => (screenX - t.x) / t.k;

/**
 * Zooms by `factor` keeping the point under `anchorX` fixed.
 *
 * @example
 * ```ts
 * zoomAt(IDENTITY_TRANSFORM, 2, 100); // { k: 2, x: -100 }
 * ```
 */
export function zoomAt(t: ViewportTransform, factor: number, anchorX: number): ViewportTransform {
  if (!Number.isFinite(factor) || factor <= 0 || !Number.isFinite(anchorX)) return t;
  const k = Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, t.k * factor));
  const applied = k / t.k;
  if (applied === 1) return t;
  return { k, x: anchorX - (anchorX - t.x) * applied };
}

/**
 * Shifts the view by `dx` screen pixels. Dragging right (positive dx) reveals earlier times.
 */
export function panBy(t: ViewportTransform, dx: number): ViewportTransform {
  if (!Number.isFinite(dx) || dx === 0) return t;
  return { k: t.k, x: t.x + dx };
}

export function applyDelta(t: ViewportTransform, delta: TransformDelta): ViewportTransform {
  switch (delta.kind) {
    case 'zoom':
      return zoomAt(t, delta.factor, delta.anchorX);
    case 'pan':
      return panBy(t, delta.dx);
  }
}

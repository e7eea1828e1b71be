import type { ResolvedGridConfig } from '../config/OptionResolver';

/** Plot area boundaries in container-local CSS pixels. */
export interface PlotArea {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

const finiteOr = (v: number, fallback: number): number => (Number.isFinite(v) ? v : fallback);

/** Carves the grid margins out of the container. Width and height never go negative. */
export function computePlotArea(containerWidth: number, containerHeight: number, grid: ResolvedGridConfig): PlotArea {
  const w = Math.max(0, finiteOr(containerWidth, 0));
  const h = Math.max(0, finiteOr(containerHeight, 0));
  return {
    left: grid.left,
    top: grid.top,
    width: Math.max(0, Math.floor(w - grid.left - grid.right)),
    height: Math.max(0, Math.floor(h - grid.top - grid.bottom)),
  };
}

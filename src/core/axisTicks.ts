/**
 * Tick generation for the time axis and both value axes.
 *
 * Positions are plot-local pixels from the coordinate system; labels use d3's
 * multi-scale time format and an exponent format for values.
 *
 * @module axisTicks
 */

import type { AxisIndex } from '../config/types';
import type { CoordinateSystem } from './CoordinateSystem';

export interface AxisTick {
  readonly value: number;
  /** Plot-local pixel position along the axis. */
  readonly position: number;
  readonly label: string;
}

export const VALUE_TICK_FORMAT = '.1e';

export function computeTimeTicks(coords: CoordinateSystem, count: number): AxisTick[] {
  const scale = coords.getVisibleTimeScale();
  const format = scale.tickFormat();
  return scale.ticks(Math.max(1, Math.floor(count))).map((d) => ({
    value: d.getTime(),
    position: scale(d),
    label: format(d),
  }));
}

export function computeValueTicks(coords: CoordinateSystem, axis: AxisIndex, count: number): AxisTick[] {
  const scale = coords.getValueScale(axis);
  const n = Math.max(1, Math.floor(count));
  const format = scale.tickFormat(n, VALUE_TICK_FORMAT);
  const ticks: AxisTick[] = [];
  for (const value of scale.ticks(n)) {
    const position = scale(value);
    if (!Number.isFinite(position)) continue;
    ticks.push({ value, position, label: format(value) });
  }
  return ticks;
}

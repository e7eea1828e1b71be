/**
 * Time (X) and dual value (Y) coordinate system for the plot area.
 *
 * Pixel space is plot-local CSS pixels: x grows right from the left edge of the
 * plot area, y grows down from its top. Time is always linear; each Y-axis is
 * linear or logarithmic independently.
 *
 * @module CoordinateSystem
 */

import { scaleLinear, scaleLog, scaleTime } from 'd3-scale';
import type { ScaleLinear, ScaleLogarithmic, ScaleTime } from 'd3-scale';
import { AXES } from '../config/types';
import type { AxisIndex, AxisScaleType, TimeRange, Timestamp, ValueRange } from '../config/types';
import { LOG_DOMAIN_FLOOR, initialAxisDomains } from '../config/defaults';
import { InvalidDomainError } from '../errors';
import { IDENTITY_TRANSFORM, applyDelta, applyTransform, invertTransform } from './viewportTransform';
import type { TransformDelta, ViewportTransform } from './viewportTransform';

export type ValueScale = ScaleLinear<number, number, never> | ScaleLogarithmic<number, number, never>;

export interface CoordinateSystemOptions {
  readonly width: number;
  readonly height: number;
  readonly timeRange: TimeRange;
  readonly logDomainFloor?: number;
  readonly onInvalidDomain?: (error: InvalidDomainError) => void;
}

export interface CoordinateSystem {
  mapTime(t: Timestamp): number;
  invertTime(pixelX: number): Timestamp;
  mapValue(axis: AxisIndex, v: number): number;
  invertValue(axis: AxisIndex, pixelY: number): number;

  /** Sets a fresh baseline and resets the pan/zoom transform to identity. */
  setTimeRange(range: TimeRange): void;
  /** Baseline range set by the host; ignores pan/zoom. */
  getTimeRange(): TimeRange;
  /** Time window currently spanning the plot width, pan/zoom included. */
  getVisibleTimeRange(): TimeRange;

  /** Returns the domain actually applied (log domains may be clamped). */
  setAxisDomain(axis: AxisIndex, domain: ValueRange): ValueRange;
  getAxisDomain(axis: AxisIndex): ValueRange;
  setAxisScaleType(axis: AxisIndex, type: AxisScaleType): void;
  getAxisScaleType(axis: AxisIndex): AxisScaleType;

  setSize(width: number, height: number): void;
  getSize(): { readonly width: number; readonly height: number };

  applyDelta(delta: TransformDelta): ViewportTransform;
  getTransform(): ViewportTransform;
  resetTransform(): void;

  /** d3 scale over the visible time window (for ticks). */
  getVisibleTimeScale(): ScaleTime<number, number, never>;
  getValueScale(axis: AxisIndex): ValueScale;
}

type AxisState = {
  type: AxisScaleType;
  domain: [number, number];
  scale: ValueScale;
};

export const assertAxis = (axis: number): AxisIndex => {
  if (axis === 0 || axis === 1) return axis;
  throw new Error(`CoordinateSystem: axis must be 0 or 1, got ${axis}.`);
};

const assertSize = (width: number, height: number): void => {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new Error(`CoordinateSystem: invalid plot size ${width}x${height}.`);
  }
};

/** Orders the bounds and widens a zero-width range by one unit. */
export const normalizeRange = (min: number, max: number): [number, number] => {
  if (min === max) return [min, max + 1];
  return min < max ? [min, max] : [max, min];
};

/**
 * Makes a domain usable by a log scale: a lower bound at or below zero becomes
 * `floor`; an upper bound that does not exceed the lower one is pushed a decade up.
 */
export const clampLogDomain = (domain: ValueRange, floor: number = LOG_DOMAIN_FLOOR): [number, number] => {
  let [min, max] = normalizeRange(domain[0], domain[1]);
  if (!(min > 0)) min = floor;
  if (!(max > min)) max = max > 0 ? min * 10 : Math.max(1, min * 10);
  return [min, max];
};

const createValueScale = (type: AxisScaleType, domain: ValueRange, height: number): ValueScale => {
  const range: [number, number] = [height, 0];
  return type === 'log'
    ? scaleLog().domain([domain[0], domain[1]]).range(range)
    : scaleLinear().domain([domain[0], domain[1]]).range(range);
};

export function createCoordinateSystem(options: CoordinateSystemOptions): CoordinateSystem {
  assertSize(options.width, options.height);

  let width = options.width;
  let height = options.height;
  const floor =
    typeof options.logDomainFloor === 'number' && options.logDomainFloor > 0 ? options.logDomainFloor : LOG_DOMAIN_FLOOR;

  let baseline: TimeRange = { start: options.timeRange.start, end: options.timeRange.end };
  // Numeric ms rather than Dates: Date truncates to whole milliseconds on invert.
  const timeScale = scaleLinear();
  let transform: ViewportTransform = IDENTITY_TRANSFORM;

  const applyTimeDomain = (): void => {
    const [s, e] = normalizeRange(baseline.start, baseline.end);
    timeScale.domain([s, e]).range([0, width]);
  };
  applyTimeDomain();

  const createAxisState = (): AxisState => {
    const domain: [number, number] = [initialAxisDomains.linear[0], initialAxisDomains.linear[1]];
    return { type: 'linear', domain, scale: createValueScale('linear', domain, height) };
  };

  const axes: Record<AxisIndex, AxisState> = { 0: createAxisState(), 1: createAxisState() };

  const rebuild = (state: AxisState): void => {
    state.scale = createValueScale(state.type, state.domain, height);
  };

  const mapTime: CoordinateSystem['mapTime'] = (t) => applyTransform(transform, timeScale(t));

  const invertTime: CoordinateSystem['invertTime'] = (px) => timeScale.invert(invertTransform(transform, px));

  const mapValue: CoordinateSystem['mapValue'] = (axis, v) => axes[assertAxis(axis)].scale(v);

  const invertValue: CoordinateSystem['invertValue'] = (axis, py) => axes[assertAxis(axis)].scale.invert(py);

  const setTimeRange: CoordinateSystem['setTimeRange'] = (range) => {
    if (!Number.isFinite(range.start) || !Number.isFinite(range.end)) {
      throw new Error(`CoordinateSystem: invalid time range [${range.start}, ${range.end}].`);
    }
    baseline = range.start <= range.end ? { start: range.start, end: range.end } : { start: range.end, end: range.start };
    applyTimeDomain();
    transform = IDENTITY_TRANSFORM;
  };

  const setAxisDomain: CoordinateSystem['setAxisDomain'] = (axis, domain) => {
    const state = axes[assertAxis(axis)];
    const [lo, hi] = domain;
    if (!Number.isFinite(lo) || !Number.isFinite(hi)) return getAxisDomain(axis);

    let applied: [number, number];
    if (state.type === 'log') {
      applied = clampLogDomain(domain, floor);
      const [rmin, rmax] = normalizeRange(lo, hi);
      if (applied[0] !== rmin || applied[1] !== rmax) {
        options.onInvalidDomain?.(new InvalidDomainError(axis, [lo, hi], applied));
      }
    } else {
      applied = normalizeRange(lo, hi);
    }
    state.domain = applied;
    rebuild(state);
    return [applied[0], applied[1]];
  };

  const getAxisDomain: CoordinateSystem['getAxisDomain'] = (axis) => {
    const [a, b] = axes[assertAxis(axis)].domain;
    return [a, b];
  };

  const setAxisScaleType: CoordinateSystem['setAxisScaleType'] = (axis, type) => {
    const state = axes[assertAxis(axis)];
    if (state.type === type) return;
    // Pixel range is kept; the old domain's shape is meaningless under the new type.
    state.type = type;
    state.domain = [initialAxisDomains[type][0], initialAxisDomains[type][1]];
    rebuild(state);
  };

  const setSize: CoordinateSystem['setSize'] = (w, h) => {
    assertSize(w, h);
    if (w === width && h === height) return;
    // Keep the visible window stable across a width change.
    const visible = getVisibleTimeRange();
    width = w;
    height = h;
    applyTimeDomain();
    const x0 = timeScale(visible.start);
    const x1 = timeScale(visible.end);
    transform = x1 > x0 ? { k: width / (x1 - x0), x: (-width * x0) / (x1 - x0) } : IDENTITY_TRANSFORM;
    for (const axis of AXES) rebuild(axes[axis]);
  };

  const getVisibleTimeRange: CoordinateSystem['getVisibleTimeRange'] = () => ({
    start: invertTime(0),
    end: invertTime(width),
  });

  return {
    mapTime,
    invertTime,
    mapValue,
    invertValue,
    setTimeRange,
    getTimeRange: () => baseline,
    getVisibleTimeRange,
    setAxisDomain,
    getAxisDomain,
    setAxisScaleType,
    getAxisScaleType: (axis) => axes[assertAxis(axis)].type,
    setSize,
    getSize: () => ({ width, height }),
    applyDelta(delta) {
      transform = applyDelta(transform, delta);
      return transform;
    },
    getTransform: () => transform,
    resetTransform() {
      transform = IDENTITY_TRANSFORM;
    },
    getVisibleTimeScale() {
      const visible = getVisibleTimeRange();
      return scaleTime()
        .domain([new Date(visible.start), new Date(visible.end)])
        .range([0, width]);
    },
    getValueScale: (axis) => axes[assertAxis(axis)].scale.copy(),
  };
}

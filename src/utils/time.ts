import type { TimeRange, Timestamp, WireTime } from '../config/types';

/** Converts a wire time (epoch ms or a date string) to epoch ms; NaN when unparseable. */
export const toEpochMs = (value: WireTime | Date): Timestamp => {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  return Date.parse(trimmed);
};

/** ISO 8601 with milliseconds, so sub-second windows keep distinct bounds. */
export const toIsoString = (t: Timestamp): string => new Date(t).toISOString();

/**
 * Builds a TimeRange, ordering the bounds. Throws for non-finite input.
 */
export function makeTimeRange(start: WireTime | Date, end: WireTime | Date): TimeRange {
  const s = toEpochMs(start);
  const e = toEpochMs(end);
  if (!Number.isFinite(s) || !Number.isFinite(e)) {
    throw new Error(`makeTimeRange: invalid bounds [${String(start)}, ${String(end)}].`);
  }
  return s <= e ? { start: s, end: e } : { start: e, end: s };
}

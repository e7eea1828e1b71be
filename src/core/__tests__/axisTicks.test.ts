import { describe, it, expect } from 'vitest';
import { computeTimeTicks, computeValueTicks } from '../axisTicks';
import { createCoordinateSystem } from '../CoordinateSystem';

describe('axisTicks', () => {
  it('places value ticks on the axis with exponent labels', () => {
    const coords = createCoordinateSystem({ width: 200, height: 100, timeRange: { start: 0, end: 1000 } });
    coords.setAxisDomain(0, [0, 10]);
    const ticks = computeValueTicks(coords, 0, 5);
    expect(ticks.map((t) => t.value)).toEqual([0, 2, 4, 6, 8, 10]);
    [100, 80, 60, 40, 20, 0].forEach((px, i) => expect(ticks[i].position).toBeCloseTo(px, 9));
    expect(ticks.map((t) => t.label)).toEqual(['0.0e+0', '2.0e+0', '4.0e+0', '6.0e+0', '8.0e+0', '1.0e+1']);
  });

  it('follows the visible time window', () => {
    const coords = createCoordinateSystem({ width: 600, height: 100, timeRange: { start: 0, end: 60_000 } });
    const ticks = computeTimeTicks(coords, 12);
    expect(ticks).toHaveLength(13);
    expect(ticks[2].value).toBe(10_000);
    expect(ticks[2].label).toBe(':10');
    for (const tick of ticks) expect(tick.position).toBeCloseTo(coords.mapTime(tick.value), 9);

    coords.applyDelta({ kind: 'zoom', factor: 2, anchorX: 0 });
    const zoomed = computeTimeTicks(coords, 12);
    expect(zoomed[zoomed.length - 1].value).toBeLessThanOrEqual(30_000);
    for (const tick of zoomed) expect(tick.position).toBeCloseTo(coords.mapTime(tick.value), 9);
  });
});

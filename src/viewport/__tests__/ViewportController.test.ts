import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCoordinateSystem } from '../../core/CoordinateSystem';
import type { CoordinateSystem } from '../../core/CoordinateSystem';
import { createViewportController } from '../ViewportController';
import type { RenderEvent, ViewportControllerOptions } from '../ViewportController';
import { createRaster } from '../../raster/rasterOps';
import { createFakeSurface, flushPromises } from '../../__tests__/fakes';
import type { ValueRange } from '../../config/types';

const container = {} as unknown as HTMLElement;
const xRange = { start: 0, end: 500 };

describe('ViewportController', () => {
  let coords: CoordinateSystem;

  beforeEach(() => {
    vi.useFakeTimers();
    coords = createCoordinateSystem({ width: 100, height: 50, timeRange: { start: 0, end: 1000 } });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const setup = (overrides: Partial<ViewportControllerOptions> = {}, manualDraw = false) => {
    const fake = createFakeSurface({ manualDraw });
    const renders: RenderEvent[] = [];
    const controller = createViewportController({
      coords,
      surface: fake.surface,
      swapSettleDelayMs: 100,
      viewportDebounceMs: 100,
      onRender: (e) => renders.push(e),
      ...overrides,
    });
    controller.attachToContainer(container);
    return { ...fake, controller, renders };
  };

  it('requires a container before data', () => {
    const controller = createViewportController({
      coords,
      surface: createFakeSurface().surface,
      swapSettleDelayMs: 0,
      viewportDebounceMs: 0,
    });
    expect(() => controller.onData(0, createRaster(10, 5), xRange, [0, 10])).toThrow(/attachToContainer/);
  });

  it('creates two slots per axis', () => {
    const { slots } = setup();
    expect(slots.map((s) => [s.axis, s.index])).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
  });

  it('draws into the hidden slot and swaps after the settle delay', async () => {
    const { controller, slots, visibleSlot, renders } = setup();
    const raster = createRaster(10, 5);

    const seq = controller.onData(0, raster, xRange, [0, 10]);
    expect(slots[1].drawn).toBe(raster);
    expect(controller.getState().axes[0].phase).toBe('loading');

    await flushPromises();
    await vi.advanceTimersByTimeAsync(99);
    expect(visibleSlot(0)).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(visibleSlot(0)).toBe(slots[1]);
    expect(renders).toEqual([{ axis: 0, state: 'displayed', sequence: seq }]);
    expect(controller.getState().axes[0]).toEqual({ phase: 'displayed', front: 1, sequence: seq });
    expect(coords.getAxisDomain(0)).toEqual([0, 10]);
  });

  it('places the raster over the time and value ranges it covers', async () => {
    const { controller, slots } = setup({ swapSettleDelayMs: 0 });
    controller.onData(0, createRaster(10, 5), xRange, [0, 10]);
    await flushPromises();

    // 0..500 ms spans 0..50 px; 0..10 fills the 50 px height.
    expect(slots[1].placement).toEqual({ translateX: 0, scaleX: 5, translateY: 0, scaleY: 10 });

    controller.onZoomPan({ kind: 'pan', dx: 20 });
    expect(slots[1].placement).toEqual({ translateX: 20, scaleX: 5, translateY: 0, scaleY: 10 });
  });

  const oddRanges: Array<{ name: string; yRange: ValueRange; applied: ValueRange }> = [
    { name: 'flat', yRange: [5, 5], applied: [5, 6] },
    { name: 'reversed', yRange: [10, 0], applied: [0, 10] },
  ];

  for (const { name, yRange, applied } of oddRanges) {
    it(`keeps a ${name} value range upright after a pan`, async () => {
      const { controller, slots } = setup({ swapSettleDelayMs: 0 });
      controller.onData(0, createRaster(10, 5), xRange, yRange);
      await flushPromises();
      expect(slots[1].placement).toEqual({ translateX: 0, scaleX: 5, translateY: 0, scaleY: 10 });

      controller.onZoomPan({ kind: 'pan', dx: 10 });
      expect(slots[1].placement).toEqual({ translateX: 10, scaleX: 5, translateY: 0, scaleY: 10 });
      expect(controller.getDisplayed(0)?.yRange).toEqual(applied);
    });
  }

  it('never lets an older raster replace a newer one', async () => {
    const { controller, slots, renders } = setup({}, true);
    const older = controller.onData(0, createRaster(10, 5), xRange, [0, 1]);
    const newer = controller.onData(0, createRaster(10, 5), xRange, [0, 2]);
    const [olderDraw, newerDraw] = slots[1].pendingDraws;

    newerDraw.resolve();
    await flushPromises();
    await vi.advanceTimersByTimeAsync(100);

    olderDraw.resolve();
    await flushPromises();
    await vi.advanceTimersByTimeAsync(500);

    expect(older).toBeLessThan(newer);
    expect(renders).toEqual([{ axis: 0, state: 'displayed', sequence: newer }]);
    expect(controller.getDisplayed(0)?.yRange).toEqual([0, 2]);
    expect(coords.getAxisDomain(0)).toEqual([0, 2]);
  });

  it('restarts the swap delay when a newer raster arrives', async () => {
    const { controller, renders } = setup();
    controller.onData(0, createRaster(10, 5), xRange, [0, 1]);
    await flushPromises();
    await vi.advanceTimersByTimeAsync(60);

    const newer = controller.onData(0, createRaster(10, 5), xRange, [0, 2]);
    await flushPromises();
    await vi.advanceTimersByTimeAsync(60);
    expect(renders).toEqual([]);

    await vi.advanceTimersByTimeAsync(40);
    expect(renders).toEqual([{ axis: 0, state: 'displayed', sequence: newer }]);
  });

  it('keeps the axes independent', async () => {
    const { controller, visibleSlot, slots } = setup({ swapSettleDelayMs: 0 });
    controller.onData(0, createRaster(10, 5), xRange, [0, 10]);
    controller.onData(1, createRaster(10, 5), xRange, [5, 6]);
    await flushPromises();

    expect(visibleSlot(0)).toBe(slots[1]);
    expect(visibleSlot(1)).toBe(slots[3]);
    expect(coords.getAxisDomain(0)).toEqual([0, 10]);
    expect(coords.getAxisDomain(1)).toEqual([5, 6]);
  });

  it('hides an axis on null data', async () => {
    const { controller, slots, renders } = setup({ swapSettleDelayMs: 0 });
    controller.onData(0, createRaster(10, 5), xRange, [0, 10]);
    await flushPromises();

    const seq = controller.onData(0, null);
    expect(slots.filter((s) => s.axis === 0).map((s) => [s.visible, s.drawn])).toEqual([
      [false, null],
      [false, null],
    ]);
    expect(renders[renders.length - 1]).toEqual({ axis: 0, state: 'hidden', sequence: seq });
    expect(controller.getDisplayed(0)).toBeNull();
    expect(controller.getState().axes[0].phase).toBe('idle');
  });

  it('reports a failed draw and keeps what was displayed', async () => {
    const onSlotError = vi.fn();
    const { controller, slots } = setup({ swapSettleDelayMs: 0, onSlotError }, true);
    const first = controller.onData(0, createRaster(10, 5), xRange, [0, 10]);
    slots[1].pendingDraws[0].resolve();
    await flushPromises();

    controller.onData(0, createRaster(10, 5), xRange, [0, 20]);
    slots[0].pendingDraws[0].reject(new Error('context lost'));
    await flushPromises();

    expect(onSlotError).toHaveBeenCalledTimes(1);
    expect(onSlotError.mock.calls[0][0].message).toBe('context lost');
    expect(controller.getState().axes[0]).toEqual({ phase: 'displayed', front: 1, sequence: first });
  });

  describe('settle notification', () => {
    it('fires once after the gestures go quiet with the visible window', async () => {
      const { controller } = setup();
      const settled = vi.fn();
      controller.onViewportSettled(settled);

      controller.setTimeRange({ start: 0, end: 1000 });
      controller.onZoomPan({ kind: 'zoom', factor: 2, anchorX: 0 });
      await vi.advanceTimersByTimeAsync(50);
      controller.onZoomPan({ kind: 'zoom', factor: 1, anchorX: 0 });
      controller.onZoomPan({ kind: 'pan', dx: 0 });
      await vi.advanceTimersByTimeAsync(99);
      expect(settled).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(settled).toHaveBeenCalledTimes(1);
      expect(settled).toHaveBeenCalledWith(0, 500, 100, 50);
    });

    it('does not fire for a time range reset', async () => {
      const { controller } = setup();
      const settled = vi.fn();
      controller.onViewportSettled(settled);

      controller.onZoomPan({ kind: 'pan', dx: 10 });
      controller.setTimeRange({ start: 2000, end: 3000 });
      await vi.advanceTimersByTimeAsync(500);

      expect(settled).not.toHaveBeenCalled();
      expect(controller.getState().transform).toEqual({ k: 1, x: 0 });
    });

    it('zooms from the new baseline after a time range reset', async () => {
      const { controller } = setup();
      const settled = vi.fn();
      controller.onViewportSettled(settled);

      controller.onZoomPan({ kind: 'zoom', factor: 2, anchorX: 0 });
      controller.setTimeRange({ start: 2000, end: 3000 });
      controller.onZoomPan({ kind: 'zoom', factor: 2, anchorX: 50 });
      expect(controller.getState().transform).toEqual({ k: 2, x: -50 });

      await vi.advanceTimersByTimeAsync(100);
      expect(settled).toHaveBeenCalledTimes(1);
      expect(settled).toHaveBeenCalledWith(2250, 2750, 100, 50);
    });

    it('stops notifying after unsubscribe', async () => {
      const { controller } = setup();
      const settled = vi.fn();
      const off = controller.onViewportSettled(settled);
      off();
      controller.requestSettle();
      await vi.advanceTimersByTimeAsync(100);
      expect(settled).not.toHaveBeenCalled();
    });
  });

  it('disposes slots and drops pending swaps', async () => {
    const { controller, slots, renders } = setup();
    controller.onData(0, createRaster(10, 5), xRange, [0, 10]);
    await flushPromises();
    controller.dispose();
    await vi.advanceTimersByTimeAsync(200);

    expect(renders).toEqual([]);
    expect(slots.every((s) => s.disposed)).toBe(true);
    expect(controller.getDisplayed(0)).toBeNull();
  });
});

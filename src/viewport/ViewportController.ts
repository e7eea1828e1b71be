/**
 * Owns the per-axis double buffer and the pan/zoom gesture feedback loop.
 *
 * Slot lifecycle per axis: idle → loading → displayed. New rasters are drawn
 * into the hidden slot and swapped in after the slot confirms and the settle
 * delay passes. Every `onData` gets a sequence number; only the latest one
 * issued for an axis may ever be swapped in.
 *
 * @module ViewportController
 */

import { AXES } from '../config/types';
import type { AxisIndex, TimeRange, ValueRange, ViewportChangeCallback } from '../config/types';
import type { CoordinateSystem } from '../core/CoordinateSystem';
import { assertAxis } from '../core/CoordinateSystem';
import type { TransformDelta, ViewportTransform } from '../core/viewportTransform';
import type { Raster } from '../raster/rasterOps';
import { createTimerSlot } from '../utils/timerSlot';
import type { TimerSlot } from '../utils/timerSlot';
import type { RasterSlot, RasterSurface, SlotPlacement } from './rasterSlots';

export type SlotPhase = 'idle' | 'loading' | 'displayed';

export type RenderEvent = Readonly<{
  axis: AxisIndex;
  state: 'displayed' | 'hidden';
  sequence: number;
}>;

export interface DisplayedRaster {
  readonly raster: Raster;
  readonly xRange: TimeRange;
  readonly yRange: ValueRange;
  readonly sequence: number;
}

export interface ViewportControllerOptions {
  readonly coords: CoordinateSystem;
  readonly surface: RasterSurface;
  readonly swapSettleDelayMs: number;
  readonly viewportDebounceMs: number;
  readonly onRender?: (event: RenderEvent) => void;
  /** Fires synchronously after every pan/zoom step and time-range reset. */
  readonly onTransform?: (transform: ViewportTransform) => void;
  readonly onSlotError?: (error: Error) => void;
}

export interface ViewportControllerState {
  readonly transform: ViewportTransform;
  readonly axes: Readonly<Record<AxisIndex, { readonly phase: SlotPhase; readonly front: 0 | 1; readonly sequence: number | null }>>;
  readonly settlePending: boolean;
}

export interface ViewportController {
  attachToContainer(element: HTMLElement): void;
  /** Installs a new axis raster (or hides the axis when `raster` is null). Returns its sequence number. */
  onData(axis: AxisIndex, raster: Raster | null, xRange?: TimeRange, yRange?: ValueRange): number;
  onZoomPan(delta: TransformDelta): void;
  setTimeRange(range: TimeRange): void;
  onViewportSettled(callback: ViewportChangeCallback): () => void;
  /** Re-places the displayed rasters after a scale or size change. */
  relayout(): void;
  /** Arms the debounced settle notification without changing the transform. */
  requestSettle(): void;
  getDisplayed(axis: AxisIndex): DisplayedRaster | null;
  getState(): ViewportControllerState;
  dispose(): void;
}

type AxisBuffer = {
  slots: [RasterSlot, RasterSlot] | null;
  front: 0 | 1;
  phase: SlotPhase;
  shown: DisplayedRaster | null;
  staged: DisplayedRaster | null;
  latestIssued: number;
  swapTimer: TimerSlot;
};

const createAxisBuffer = (): AxisBuffer => ({
  slots: null,
  front: 0,
  phase: 'idle',
  shown: null,
  staged: null,
  latestIssued: 0,
  swapTimer: createTimerSlot(),
});

export function createViewportController(options: ViewportControllerOptions): ViewportController {
  const { coords, surface } = options;
  let disposed = false;
  let sequence = 0;

  const buffers: Record<AxisIndex, AxisBuffer> = { 0: createAxisBuffer(), 1: createAxisBuffer() };
  const settleTimer = createTimerSlot();
  const settleListeners = new Set<ViewportChangeCallback>();

  const computePlacement = (axis: AxisIndex, content: DisplayedRaster): SlotPlacement => {
    const { raster, xRange, yRange } = content;
    const w = Math.max(1, raster.width);
    const h = Math.max(1, raster.height);

    const x0 = coords.mapTime(xRange.start);
    const x1 = coords.mapTime(xRange.end);

    const yTop = coords.mapValue(axis, yRange[1]);
    const yBottom = coords.mapValue(axis, yRange[0]);
    const { height } = coords.getSize();
    const yOk = Number.isFinite(yTop) && Number.isFinite(yBottom);

    return {
      translateX: Number.isFinite(x0) ? x0 : 0,
      scaleX: Number.isFinite(x1 - x0) ? (x1 - x0) / w : 1,
      translateY: yOk ? yTop : 0,
      scaleY: yOk ? (yBottom - yTop) / h : height / h,
    };
  };

  const placeFront = (axis: AxisIndex): void => {
    const buf = buffers[axis];
    if (!buf.slots || !buf.shown) return;
    buf.slots[buf.front].setPlacement(computePlacement(axis, buf.shown));
  };

  const relayout: ViewportController['relayout'] = () => {
    if (disposed) return;
    for (const axis of AXES) placeFront(axis);
  };

  const fireSettled = (): void => {
    if (disposed) return;
    const { start, end } = coords.getVisibleTimeRange();
    const { width, height } = coords.getSize();
    const snapshot = Array.from(settleListeners);
    for (const cb of snapshot) cb(start, end, width, height);
  };

  const requestSettle: ViewportController['requestSettle'] = () => {
    if (disposed) return;
    settleTimer.schedule(options.viewportDebounceMs, fireSettled);
  };

  const swap = (axis: AxisIndex, seq: number): void => {
    const buf = buffers[axis];
    if (disposed || !buf.slots || seq !== buf.latestIssued || !buf.staged || buf.staged.sequence !== seq) return;

    const back: 0 | 1 = buf.front === 0 ? 1 : 0;
    // Later relayouts place from the applied domain, not the provider's raw range.
    const content: DisplayedRaster = { ...buf.staged, yRange: coords.setAxisDomain(axis, buf.staged.yRange) };

    buf.front = back;
    buf.shown = content;
    buf.staged = null;
    buf.phase = 'displayed';

    const front = buf.slots[back];
    const hidden = buf.slots[back === 0 ? 1 : 0];
    front.setPlacement(computePlacement(axis, content));
    front.setVisible(true);
    hidden.setVisible(false);

    // The other axis keeps its own domain; only this one moved.
    options.onRender?.({ axis, state: 'displayed', sequence: seq });
  };

  const hideAxis = (axis: AxisIndex, seq: number): void => {
    const buf = buffers[axis];
    buf.swapTimer.cancel();
    buf.latestIssued = seq;
    buf.staged = null;
    buf.shown = null;
    buf.phase = 'idle';
    if (buf.slots) {
      for (const slot of buf.slots) {
        slot.setVisible(false);
        slot.clear();
      }
    }
    options.onRender?.({ axis, state: 'hidden', sequence: seq });
  };

  const onData: ViewportController['onData'] = (axisInput, raster, xRange, yRange) => {
    const axis = assertAxis(axisInput);
    if (disposed) return sequence;
    const buf = buffers[axis];
    if (!buf.slots) {
      throw new Error('ViewportController: attachToContainer() must be called before onData().');
    }

    const seq = ++sequence;
    if (raster === null) {
      hideAxis(axis, seq);
      return seq;
    }
    if (!xRange || !yRange) {
      throw new Error('ViewportController.onData: xRange and yRange are required with a raster.');
    }

    // A newer raster supersedes any swap still waiting for an older one.
    buf.swapTimer.cancel();
    buf.latestIssued = seq;
    buf.phase = 'loading';
    const staged: DisplayedRaster = { raster, xRange, yRange, sequence: seq };
    buf.staged = staged;

    const back = buf.slots[buf.front === 0 ? 1 : 0];
    back.setVisible(false);

    back.draw(raster).then(
      () => {
        if (disposed || buf.latestIssued !== seq) return;
        if (options.swapSettleDelayMs > 0) {
          buf.swapTimer.schedule(options.swapSettleDelayMs, () => swap(axis, seq));
        } else {
          swap(axis, seq);
        }
      },
      (err: unknown) => {
        if (disposed || buf.latestIssued !== seq) return;
        buf.staged = null;
        buf.phase = buf.shown ? 'displayed' : 'idle';
        options.onSlotError?.(err instanceof Error ? err : new Error(String(err)));
      }
    );

    return seq;
  };

  const onZoomPan: ViewportController['onZoomPan'] = (delta) => {
    if (disposed) return;
    const transform = coords.applyDelta(delta);
    relayout();
    options.onTransform?.(transform);
    requestSettle();
  };

  const setTimeRange: ViewportController['setTimeRange'] = (range) => {
    if (disposed) return;
    // A pending settle belongs to the old baseline; the host drives the next fetch.
    settleTimer.cancel();
    coords.setTimeRange(range);
    relayout();
    options.onTransform?.(coords.getTransform());
  };

  const attachToContainer: ViewportController['attachToContainer'] = (element) => {
    if (disposed) return;
    for (const axis of AXES) {
      const buf = buffers[axis];
      if (buf.slots) {
        for (const slot of buf.slots) slot.dispose();
      }
      buf.slots = [surface.createSlot(element, axis, 0), surface.createSlot(element, axis, 1)];
      buf.front = 0;
      buf.phase = 'idle';
      buf.shown = null;
      buf.staged = null;
      buf.swapTimer.cancel();
    }
  };

  const getDisplayed: ViewportController['getDisplayed'] = (axis) => buffers[assertAxis(axis)].shown;

  const getState: ViewportController['getState'] = () => {
    const describe = (axis: AxisIndex) => {
      const buf = buffers[axis];
      return { phase: buf.phase, front: buf.front, sequence: buf.shown ? buf.shown.sequence : null };
    };
    return {
      transform: coords.getTransform(),
      axes: { 0: describe(0), 1: describe(1) },
      settlePending: settleTimer.isScheduled(),
    };
  };

  const dispose: ViewportController['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    settleTimer.cancel();
    settleListeners.clear();
    for (const axis of AXES) {
      const buf = buffers[axis];
      buf.swapTimer.cancel();
      if (buf.slots) {
        for (const slot of buf.slots) slot.dispose();
      }
      buf.slots = null;
      buf.shown = null;
      buf.staged = null;
    }
  };

  return {
    attachToContainer,
    onData,
    onZoomPan,
    setTimeRange,
    onViewportSettled(callback) {
      settleListeners.add(callback);
      return () => {
        settleListeners.delete(callback);
      };
    },
    relayout,
    requestSettle,
    getDisplayed,
    getState,
    dispose,
  };
}


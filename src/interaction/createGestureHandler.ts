import type { TransformDelta } from '../core/viewportTransform';

export type GestureHandler = Readonly<{
  enable(): void;
  disable(): void;
  isEnabled(): boolean;
  dispose(): void;
}>;

export interface GestureHandlerOptions {
  /** Receives every pan/zoom step in element-local pixels. */
  readonly onGesture: (delta: TransformDelta) => void;
}

// WheelEvent.deltaMode values.
const DOM_DELTA_LINE = 1;
const DOM_DELTA_PAGE = 2;

const LINE_HEIGHT_PX = 16;
const MAX_WHEEL_DELTA_PX = 200;
const WHEEL_SENSITIVITY = 0.002;

const normalizeWheelDelta = (raw: number, deltaMode: number, basisCssPx: number): number => {
  if (!Number.isFinite(raw) || raw === 0) return 0;

  // Normalize to CSS pixels-ish so sensitivity is stable across deltaMode.
  switch (deltaMode) {
    case DOM_DELTA_LINE:
      return raw * LINE_HEIGHT_PX;
    case DOM_DELTA_PAGE:
      return raw * (Number.isFinite(basisCssPx) && basisCssPx > 0 ? basisCssPx : 800);
    default:
      return raw;
  }
};

/** Wheel delta to a zoom factor: negative (scroll up) zooms in, positive zooms out. */
export const wheelDeltaToZoomFactor = (deltaCssPx: number): number => {
  const abs = Math.abs(deltaCssPx);
  if (!Number.isFinite(abs) || abs === 0) return 1;

  // Cap extreme deltas (some devices can emit huge values).
  const f = Math.exp(Math.min(abs, MAX_WHEEL_DELTA_PX) * WHEEL_SENSITIVITY);
  return deltaCssPx < 0 ? f : 1 / f;
};

const isPanButton = (e: PointerEvent): boolean =>
  e.pointerType !== 'mouse' || e.button === 0 || e.button === 1;

/**
 * Pan/zoom gestures on the plot area element:
 * - vertical wheel zooms around the cursor, horizontal wheel pans
 * - left or middle mouse drag pans
 * - single-finger touch drag pans, two-finger pinch zooms around the midpoint
 */
export function createGestureHandler(element: HTMLElement, options: GestureHandlerOptions): GestureHandler {
  let disposed = false;
  let enabled = false;

  const activePointers = new Map<number, { x: number; y: number }>();
  let previousPinchDist = 0;
  let savedTouchAction = '';

  const emit = (delta: TransformDelta): void => {
    if (delta.kind === 'pan' && (!Number.isFinite(delta.dx) || delta.dx === 0)) return;
    if (delta.kind === 'zoom' && (!Number.isFinite(delta.factor) || delta.factor <= 0 || delta.factor === 1)) return;
    options.onGesture(delta);
  };

  const onWheel = (e: WheelEvent): void => {
    if (!enabled || disposed) return;
    const rect = element.getBoundingClientRect();
    if (!(rect.width > 0) || !(rect.height > 0)) return;

    const dy = normalizeWheelDelta(e.deltaY, e.deltaMode, rect.height);
    const dx = normalizeWheelDelta(e.deltaX, e.deltaMode, rect.width);

    if (Math.abs(dx) > Math.abs(dy)) {
      // Scrolling right shows later data, so content moves left.
      e.preventDefault();
      emit({ kind: 'pan', dx: -dx });
      return;
    }
    if (dy === 0) return;

    e.preventDefault();
    emit({ kind: 'zoom', factor: wheelDeltaToZoomFactor(dy), anchorX: e.clientX - rect.left });
  };

  const onPointerDown = (e: PointerEvent): void => {
    if (!enabled || disposed || !isPanButton(e)) return;
    if (e.pointerType === 'touch') e.preventDefault();

    activePointers.set(e.pointerId, { x: e.clientX, y: e.clientY });
    if (typeof element.setPointerCapture === 'function') element.setPointerCapture(e.pointerId);

    // Transition between pan and pinch starts a fresh pinch baseline.
    previousPinchDist = 0;
  };

  const onPointerMove = (e: PointerEvent): void => {
    if (!enabled || disposed) return;
    const prev = activePointers.get(e.pointerId);
    if (!prev) return;
    activePointers.set(e.pointerId, { x: e.clientX, y: e.clientY });

    if (activePointers.size === 1) {
      emit({ kind: 'pan', dx: e.clientX - prev.x });
      return;
    }
    if (activePointers.size !== 2) return;

    const [p1, p2] = Array.from(activePointers.values());
    const dist = Math.hypot(p1.x - p2.x, p1.y - p2.y);
    if (!Number.isFinite(dist) || dist === 0) return;

    if (previousPinchDist > 0) {
      const rect = element.getBoundingClientRect();
      const anchorX = (p1.x + p2.x) / 2 - rect.left;
      emit({ kind: 'zoom', factor: dist / previousPinchDist, anchorX });
    }
    previousPinchDist = dist;
  };

  const onPointerEnd = (e: PointerEvent): void => {
    if (!activePointers.delete(e.pointerId)) return;
    if (typeof element.releasePointerCapture === 'function') element.releasePointerCapture(e.pointerId);
    previousPinchDist = 0;
  };

  const enable: GestureHandler['enable'] = () => {
    if (disposed || enabled) return;
    enabled = true;
    savedTouchAction = element.style.touchAction;
    element.style.touchAction = 'none';
    element.addEventListener('wheel', onWheel, { passive: false });
    element.addEventListener('pointerdown', onPointerDown, { passive: false });
    element.addEventListener('pointermove', onPointerMove);
    element.addEventListener('pointerup', onPointerEnd);
    element.addEventListener('pointercancel', onPointerEnd);
  };

  const disable: GestureHandler['disable'] = () => {
    if (disposed || !enabled) return;
    enabled = false;
    element.style.touchAction = savedTouchAction;
    element.removeEventListener('wheel', onWheel);
    element.removeEventListener('pointerdown', onPointerDown);
    element.removeEventListener('pointermove', onPointerMove);
    element.removeEventListener('pointerup', onPointerEnd);
    element.removeEventListener('pointercancel', onPointerEnd);
    activePointers.clear();
    previousPinchDist = 0;
  };

  const dispose: GestureHandler['dispose'] = () => {
    if (disposed) return;
    disable();
    disposed = true;
  };

  return { enable, disable, isEnabled: () => enabled, dispose };
}

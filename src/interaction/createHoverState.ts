import { createTimerSlot } from '../utils/timerSlot';
import type { HoverMatch } from './HoverInspector';

export type HoverChangeCallback = (hovered: HoverMatch | null) => void;

export interface HoverState {
  setHovered(match: HoverMatch | null): void;
  clearHovered(): void;
  getHovered(): HoverMatch | null;
  onChange(callback: HoverChangeCallback): () => void;
  destroy(): void;
}

export interface HoverStateOptions {
  readonly debounceMs?: number;
}

const DEFAULT_DEBOUNCE_MS = 16;

const isSameTarget = (a: HoverMatch | null, b: HoverMatch | null): boolean => {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.attribute === b.attribute && a.column === b.column;
};

/**
 * Tracks the hovered attribute column and notifies listeners on changes.
 *
 * - Updates are debounced so rapid pointer movement does not flood listeners.
 * - Listeners fire only when the hovered attribute or column actually changes.
 */
export function createHoverState(options: HoverStateOptions = {}): HoverState {
  const debounceMs =
    typeof options.debounceMs === 'number' && Number.isFinite(options.debounceMs) && options.debounceMs >= 0
      ? options.debounceMs
      : DEFAULT_DEBOUNCE_MS;

  let hovered: HoverMatch | null = null;
  let lastEmitted: HoverMatch | null = null;
  const listeners = new Set<HoverChangeCallback>();
  const flushTimer = createTimerSlot();

  const flush = (): void => {
    if (isSameTarget(hovered, lastEmitted)) return;
    lastEmitted = hovered;

    // Emit to a snapshot so additions/removals during emit don't affect this flush.
    const snapshot = Array.from(listeners);
    for (const cb of snapshot) cb(lastEmitted);
  };

  const scheduleFlush = (): void => {
    flushTimer.cancel();
    if (isSameTarget(hovered, lastEmitted)) return;
    flushTimer.schedule(debounceMs, flush);
  };

  const setHovered: HoverState['setHovered'] = (match) => {
    if (isSameTarget(match, hovered)) return;
    hovered = match;
    scheduleFlush();
  };

  const clearHovered: HoverState['clearHovered'] = () => {
    if (hovered === null) return;
    hovered = null;
    scheduleFlush();
  };

  const onChange: HoverState['onChange'] = (callback) => {
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  };

  const destroy: HoverState['destroy'] = () => {
    flushTimer.cancel();
    listeners.clear();
    hovered = null;
    lastEmitted = null;
  };

  return { setHovered, clearHovered, getHovered: () => hovered, onChange, destroy };
}

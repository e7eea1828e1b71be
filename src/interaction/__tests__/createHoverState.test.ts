import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createHoverState } from '../createHoverState';
import type { HoverMatch } from '../HoverInspector';

const match = (attribute: string, column: number): HoverMatch => ({
  attribute,
  axis: 0,
  color: '#000000',
  column,
  x: column,
  yMax: 0,
  yMin: 0,
  timestamp: null,
  summary: { kind: 'single', value: 1 },
});

describe('createHoverState', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('notifies after the debounce delay', () => {
    const state = createHoverState();
    const cb = vi.fn();
    state.onChange(cb);

    const m = match('A', 3);
    state.setHovered(m);
    expect(state.getHovered()).toBe(m);
    vi.advanceTimersByTime(15);
    expect(cb).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(cb).toHaveBeenCalledTimes(1);
    expect(cb).toHaveBeenCalledWith(m);
  });

  it('only reports the last of several quick changes', () => {
    const state = createHoverState({ debounceMs: 10 });
    const cb = vi.fn();
    state.onChange(cb);

    state.setHovered(match('A', 1));
    state.setHovered(match('A', 2));
    const last = match('B', 2);
    state.setHovered(last);
    vi.advanceTimersByTime(10);

    expect(cb).toHaveBeenCalledTimes(1);
    expect(cb).toHaveBeenCalledWith(last);
  });

  it('treats the same attribute and column as unchanged', () => {
    const state = createHoverState({ debounceMs: 0 });
    const cb = vi.fn();
    state.onChange(cb);

    state.setHovered(match('A', 1));
    vi.advanceTimersByTime(0);
    state.setHovered({ ...match('A', 1), yMax: 42 });
    vi.advanceTimersByTime(0);

    expect(cb).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when the pointer returns to the reported target before the delay', () => {
    const state = createHoverState({ debounceMs: 10 });
    const cb = vi.fn();
    state.onChange(cb);

    state.setHovered(match('A', 1));
    state.clearHovered();
    vi.advanceTimersByTime(20);
    expect(cb).not.toHaveBeenCalled();
  });

  it('reports null when cleared', () => {
    const state = createHoverState({ debounceMs: 0 });
    const cb = vi.fn();
    state.onChange(cb);

    state.setHovered(match('A', 1));
    vi.advanceTimersByTime(0);
    state.clearHovered();
    vi.advanceTimersByTime(0);

    expect(cb).toHaveBeenLastCalledWith(null);
    expect(state.getHovered()).toBeNull();
  });

  it('drops pending notifications on destroy', () => {
    const state = createHoverState();
    const cb = vi.fn();
    state.onChange(cb);
    state.setHovered(match('A', 1));
    state.destroy();
    vi.advanceTimersByTime(100);
    expect(cb).not.toHaveBeenCalled();
  });

  it('holds a single pending timer however fast the target changes', () => {
    const state = createHoverState();
    state.setHovered(match('A', 1));
    state.setHovered(match('A', 2));
    state.setHovered(match('B', 2));
    expect(vi.getTimerCount()).toBe(1);

    state.destroy();
    expect(vi.getTimerCount()).toBe(0);
  });
});

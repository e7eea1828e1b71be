/**
 * A single owned timer with cancel-before-reschedule semantics.
 *
 * State is either `{ kind: 'none' }` or `{ kind: 'scheduled', handle }`; arming a
 * scheduled slot clears the previous handle first, so callbacks never compound.
 */
export type TimerSlotState =
  | Readonly<{ kind: 'none' }>
  | Readonly<{ kind: 'scheduled'; handle: ReturnType<typeof setTimeout>; dueInMs: number }>;

export interface TimerSlot {
  schedule(delayMs: number, callback: () => void): void;
  cancel(): boolean;
  isScheduled(): boolean;
  getState(): TimerSlotState;
}

const NONE: TimerSlotState = { kind: 'none' };

export function createTimerSlot(): TimerSlot {
  let state: TimerSlotState = NONE;

  const cancel: TimerSlot['cancel'] = () => {
    if (state.kind === 'none') return false;
    clearTimeout(state.handle);
    state = NONE;
    return true;
  };

  const schedule: TimerSlot['schedule'] = (delayMs, callback) => {
    cancel();
    const dueInMs = Number.isFinite(delayMs) && delayMs > 0 ? delayMs : 0;
    const handle = setTimeout(() => {
      // Only fire if this handle is still the armed one.
      if (state.kind !== 'scheduled' || state.handle !== handle) return;
      state = NONE;
      callback();
    }, dueInMs);
    state = { kind: 'scheduled', handle, dueInMs };
  };

  return {
    schedule,
    cancel,
    isScheduled: () => state.kind === 'scheduled',
    getState: () => state,
  };
}

import type { GridConfig } from './types';

export const defaultGrid = {
  top: 5,
  right: 50,
  bottom: 20,
  left: 50,
} as const satisfies Required<GridConfig>;

// ColorBrewer "Set1".
export const defaultPalette = [
  '#e41a1c',
  '#377eb8',
  '#4daf4a',
  '#984ea3',
  '#ff7f00',
  '#ffff33',
  '#a65628',
  '#f781bf',
  '#999999',
] as const;

export const defaultTiming = {
  swapSettleDelayMs: 100,
  viewportDebounceMs: 100,
  hoverDebounceMs: 16,
} as const;

export const defaultTicks = {
  timeTickCount: 7,
  valueTickCount: 5,
} as const;

export const defaultAttributeWidth = 1;

/** Lower bound substituted when a log-scale domain reaches zero or below. */
export const LOG_DOMAIN_FLOOR = Number.MIN_VALUE;

/** Domains a freshly switched axis starts from until data supplies a real one. */
export const initialAxisDomains = {
  linear: [-1, 1],
  log: [1, 10],
} as const;

import type { AxisIndex } from '../config/types';
import type { AxisTick } from '../core/axisTicks';
import type { PlotArea } from '../core/plotLayout';

export type LabelAnchor = 'start' | 'middle' | 'end';
export type LabelAxis = 'time' | `${AxisIndex}`;

export interface AxisLabelTicks {
  readonly time: readonly AxisTick[];
  /** `null` hides the labels of that axis (no attributes on it). */
  readonly values: Readonly<Record<AxisIndex, readonly AxisTick[] | null>>;
}

export interface AxisLabelsOptions {
  readonly fontSize?: number;
  readonly color?: string;
  /** Gap between the plot edge and value labels, in CSS pixels. */
  readonly gap?: number;
}

export interface AxisLabels {
  render(ticks: AxisLabelTicks, area: PlotArea): void;
  clear(): void;
  dispose(): void;
}

const getAnchorTranslate = (anchor: LabelAnchor): string => {
  switch (anchor) {
    case 'start':
      return '0%';
    case 'middle':
      return '-50%';
    case 'end':
      return '-100%';
  }
};

/**
 * DOM overlay with the time labels under the plot and the value labels of
 * axis 0 on the left, axis 1 on the right.
 */
export function createAxisLabels(container: HTMLElement, options: AxisLabelsOptions = {}): AxisLabels {
  const didSetRelative = getComputedStyle(container).position === 'static';
  const previousInlinePosition = didSetRelative ? container.style.position : null;
  if (didSetRelative) container.style.position = 'relative';

  const gap = options.gap ?? 4;

  const overlay = document.createElement('div');
  overlay.setAttribute('data-archive-plot-axis-labels', '');
  overlay.style.position = 'absolute';
  overlay.style.inset = '0';
  overlay.style.pointerEvents = 'none';
  overlay.style.overflow = 'visible';
  container.appendChild(overlay);

  let disposed = false;

  const addLabel = (axis: LabelAxis, text: string, x: number, y: number, anchor: LabelAnchor): void => {
    const span = document.createElement('span');
    span.setAttribute('data-axis', axis);
    span.textContent = text;
    span.style.position = 'absolute';
    span.style.left = `${x}px`;
    span.style.top = `${y}px`;
    span.style.userSelect = 'none';
    span.style.whiteSpace = 'nowrap';
    span.style.lineHeight = '1';
    if (options.fontSize != null) span.style.fontSize = `${options.fontSize}px`;
    if (options.color != null) span.style.color = options.color;
    span.style.transform = `translateX(${getAnchorTranslate(anchor)}) translateY(-50%)`;
    overlay.appendChild(span);
  };

  const clear: AxisLabels['clear'] = () => {
    if (disposed) return;
    overlay.replaceChildren();
  };

  const render: AxisLabels['render'] = (ticks, area) => {
    if (disposed) return;
    overlay.replaceChildren();

    const timeY = area.top + area.height + (options.fontSize ?? 10);
    for (const tick of ticks.time) {
      if (tick.position < 0 || tick.position > area.width) continue;
      addLabel('time', tick.label, area.left + tick.position, timeY, 'middle');
    }

    const left = ticks.values[0];
    if (left) {
      for (const tick of left) addLabel('0', tick.label, area.left - gap, area.top + tick.position, 'end');
    }
    const right = ticks.values[1];
    if (right) {
      for (const tick of right) addLabel('1', tick.label, area.left + area.width + gap, area.top + tick.position, 'start');
    }
  };

  const dispose: AxisLabels['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    try {
      overlay.remove();
    } finally {
      if (previousInlinePosition !== null) container.style.position = previousInlinePosition;
    }
  };

  return { render, clear, dispose };
}

import type { HoverMatch } from '../interaction/HoverInspector';

export interface HoverTooltip {
  /** Draws the crosshair, indicator and text box inside a plot of the given size. */
  show(match: HoverMatch, plotWidth: number, plotHeight: number): void;
  hide(): void;
  isVisible(): boolean;
  dispose(): void;
}

const VALUE_PRECISION = 5;
const BOX_OFFSET_PX = 20;
const DOT_RADIUS_PX = 5;

const formatValue = (v: number): string => v.toPrecision(VALUE_PRECISION);

/** Text lines under the attribute name. */
export function formatTooltipLines(match: HoverMatch): string[] {
  const { summary } = match;
  if (summary.kind === 'single') return [`Value: ${formatValue(summary.value)}`];
  return [`Points: ${summary.count}`, `Max: ${formatValue(summary.max)}`, `Min: ${formatValue(summary.min)}`];
}

/**
 * Hover feedback for the plot area: a vertical crosshair at the column, a dot
 * on single-sample columns and a text box beside the point. Boxes for axis 0
 * sit left of the point, boxes for axis 1 to its right.
 */
export function createHoverTooltip(plotElement: HTMLElement): HoverTooltip {
  const crosshair = document.createElement('div');
  crosshair.setAttribute('data-archive-plot-crosshair', '');
  crosshair.style.position = 'absolute';
  crosshair.style.top = '0';
  crosshair.style.bottom = '0';
  crosshair.style.width = '1px';
  crosshair.style.background = 'currentColor';
  crosshair.style.opacity = '0.5';
  crosshair.style.pointerEvents = 'none';
  crosshair.style.display = 'none';

  const dot = document.createElement('div');
  dot.setAttribute('data-archive-plot-indicator', '');
  dot.style.position = 'absolute';
  dot.style.width = `${DOT_RADIUS_PX * 2}px`;
  dot.style.height = `${DOT_RADIUS_PX * 2}px`;
  dot.style.borderRadius = '50%';
  dot.style.pointerEvents = 'none';
  dot.style.display = 'none';

  const box = document.createElement('div');
  box.setAttribute('data-archive-plot-tooltip', '');
  box.style.position = 'absolute';
  box.style.pointerEvents = 'none';
  box.style.whiteSpace = 'nowrap';
  box.style.display = 'none';

  plotElement.append(crosshair, dot, box);

  let disposed = false;
  let visible = false;

  const show: HoverTooltip['show'] = (match, plotWidth, plotHeight) => {
    if (disposed) return;
    visible = true;

    const x = Math.round(match.x);
    crosshair.style.left = `${x}px`;
    crosshair.style.display = 'block';

    if (match.summary.kind === 'single' && Number.isFinite(match.yMax)) {
      dot.style.left = `${x - DOT_RADIUS_PX}px`;
      dot.style.top = `${Math.round(match.yMax) - DOT_RADIUS_PX}px`;
      dot.style.background = match.color;
      dot.style.display = 'block';
    } else {
      dot.style.display = 'none';
    }

    const title = document.createElement('b');
    title.style.color = match.color;
    title.textContent = match.attribute;
    const nodes: Node[] = [title];
    for (const line of formatTooltipLines(match)) {
      nodes.push(document.createElement('br'), document.createTextNode(line));
    }
    box.replaceChildren(...nodes);

    const anchorY = Number.isFinite(match.yMax) ? match.yMax : plotHeight / 2;
    box.style.bottom = `${Math.round(plotHeight - anchorY) + 5}px`;
    if (match.axis === 0) {
      box.style.left = '';
      box.style.right = `${Math.max(0, plotWidth - x + BOX_OFFSET_PX)}px`;
    } else {
      box.style.right = '';
      box.style.left = `${Math.min(plotWidth, x + BOX_OFFSET_PX)}px`;
    }
    box.style.display = 'block';
  };

  const hide: HoverTooltip['hide'] = () => {
    if (disposed) return;
    visible = false;
    crosshair.style.display = 'none';
    dot.style.display = 'none';
    box.style.display = 'none';
  };

  const dispose: HoverTooltip['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    visible = false;
    crosshair.remove();
    dot.remove();
    box.remove();
  };

  return { show, hide, isVisible: () => visible, dispose };
}

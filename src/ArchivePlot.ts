import { resolveAttributeConfigs, resolveOptions } from './config/OptionResolver';
import { AXES } from './config/types';
import type {
  ArchivePlotOptions,
  AttributeConfigMap,
  AxisImagePayload,
  AxisIndex,
  AxisScaleType,
  DeclaredAttribute,
  DescriptorMap,
  ImageProviderResponse,
  TimeRange,
  ValueRange,
  ViewportChangeCallback,
  WireTime,
} from './config/types';
import { createAxisLabels } from './components/createAxisLabels';
import { createHoverTooltip } from './components/createHoverTooltip';
import { computeTimeTicks, computeValueTicks } from './core/axisTicks';
import { assertAxis, createCoordinateSystem } from './core/CoordinateSystem';
import { computePlotArea } from './core/plotLayout';
import type { PlotArea } from './core/plotLayout';
import type { ViewportTransform } from './core/viewportTransform';
import { DecodeError, FetchError } from './errors';
import { createGestureHandler } from './interaction/createGestureHandler';
import { createHoverState } from './interaction/createHoverState';
import { createHoverInspector } from './interaction/HoverInspector';
import type { DescriptorFrame, HoverMatch } from './interaction/HoverInspector';
import { buildImageRequest } from './provider/buildImageRequest';
import type { AxisRangeOverride, AxisRequestState } from './provider/buildImageRequest';
import { createRequestTracker } from './provider/createRequestTracker';
import type { RequestTicket } from './provider/createRequestTracker';
import { createAttributeRasterCache } from './raster/AttributeRasterCache';
import type { RawAttributeImage } from './raster/AttributeRasterCache';
import { createAxisCompositor } from './raster/AxisCompositor';
import type { AxisCompositeResult, AxisCompositor, AxisImageData } from './raster/AxisCompositor';
import { makeTimeRange } from './utils/time';
import { createViewportController } from './viewport/ViewportController';
import type { RenderEvent, SlotPhase } from './viewport/ViewportController';

export interface ArchivePlotEventMap {
  change: ViewportChangeCallback;
  fetcherror: (error: FetchError) => void;
  hover: (match: HoverMatch | null) => void;
  render: (event: RenderEvent) => void;
}

export type ArchivePlotEventName = keyof ArchivePlotEventMap;

type ListenerRegistry = { readonly [K in ArchivePlotEventName]: Set<ArchivePlotEventMap[K]> };

export type TimeRangeInput = TimeRange | readonly [WireTime | Date, WireTime | Date];

export interface ArchivePlotAxisState {
  readonly scale: AxisScaleType;
  readonly domain: ValueRange;
  readonly range: AxisRangeOverride | null;
  readonly phase: SlotPhase;
  readonly attributes: readonly string[];
}

export interface ArchivePlotState {
  readonly timeRange: TimeRange;
  readonly visibleTimeRange: TimeRange;
  readonly transform: ViewportTransform;
  readonly size: { readonly width: number; readonly height: number };
  readonly attributes: readonly DeclaredAttribute[];
  readonly axes: Readonly<Record<AxisIndex, ArchivePlotAxisState>>;
}

export interface ArchivePlotInstance {
  readonly disposed: boolean;
  setConfig(configs: AttributeConfigMap): void;
  /** Same as `setConfig`. */
  setAttributeConfig(configs: AttributeConfigMap): void;
  /** Applies a provider response. With a ticket, a response that is no longer the newest is dropped. */
  setData(response: ImageProviderResponse, ticket?: RequestTicket): void;
  setDescriptions(descs: DescriptorMap | null): void;
  setTimeRange(range: TimeRangeInput): void;
  setYAxisScale(axis: AxisIndex, type: AxisScaleType): void;
  /** Same as `setYAxisScale`. */
  setAxisScaleType(axis: AxisIndex, type: AxisScaleType): void;
  /** Manual bounds sent with the next provider request; `null` clears them. */
  setYAxisRange(axis: AxisIndex, range: AxisRangeOverride | null): void;
  /** Marks the start of a host-issued fetch for an image as wide as the plot is now. */
  beginFetch(): RequestTicket;
  /** Reports a failed host-issued fetch. Stale tickets are ignored. */
  failFetch(ticket: RequestTicket, error: unknown): void;
  /** Fires `change` for the current viewport now (and fetches when an image provider is set). */
  refresh(): void;
  resize(): void;
  getState(): ArchivePlotState;
  on<K extends ArchivePlotEventName>(eventName: K, callback: ArchivePlotEventMap[K]): void;
  off<K extends ArchivePlotEventName>(eventName: K, callback: ArchivePlotEventMap[K]): void;
  dispose(): void;
}

type AxisSource = 'layers' | 'image';

const toTimeRange = (input: TimeRangeInput): TimeRange =>
  'start' in input ? makeTimeRange(input.start, input.end) : makeTimeRange(input[0], input[1]);

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

const toFetchError = (err: unknown): FetchError =>
  err instanceof FetchError ? err : new FetchError(toError(err).message, null, { cause: err });

const notify = <A extends unknown[]>(set: ReadonlySet<(...args: A) => void>, ...args: A): void => {
  // Snapshot so listeners can unsubscribe while being notified.
  for (const cb of Array.from(set)) cb(...args);
};

function toAxisImageData(payload: AxisImagePayload, layers: Readonly<Record<string, string>>): AxisImageData {
  const xRange = makeTimeRange(payload.x_range[0], payload.x_range[1]);
  const yRange: ValueRange = [payload.y_range[0], payload.y_range[1]];
  const raw: Record<string, RawAttributeImage> = {};
  for (const [name, encoded] of Object.entries(layers)) raw[name] = { encoded, xRange, yRange };
  return { layers: raw, xRange, yRange };
}

/**
 * Creates a plot inside `container` showing `initialTimeRange`.
 *
 * The plot owns everything it appends to the container and removes it on
 * `dispose()`. Fetching stays with the host unless `options.imageProvider` is
 * set, in which case every settled viewport change issues a request.
 */
export function createArchivePlot(
  container: HTMLElement,
  initialTimeRange: TimeRangeInput,
  options: ArchivePlotOptions = {}
): ArchivePlotInstance {
  const resolved = resolveOptions(options);
  const { grid, imageProvider } = resolved;

  const plotElement = document.createElement('div');
  plotElement.setAttribute('data-archive-plot-area', '');
  plotElement.style.position = 'absolute';
  plotElement.style.overflow = 'hidden';

  // Labels first: the overlay sets `position: relative` on a static container.
  const labels = createAxisLabels(container);
  container.appendChild(plotElement);

  const measure = (): PlotArea => {
    const rect = container.getBoundingClientRect();
    return computePlotArea(rect.width, rect.height, grid);
  };

  const applyArea = (area: PlotArea): void => {
    plotElement.style.left = `${area.left}px`;
    plotElement.style.top = `${area.top}px`;
    plotElement.style.width = `${area.width}px`;
    plotElement.style.height = `${area.height}px`;
  };

  let area = measure();
  applyArea(area);

  let disposed = false;
  let declared: readonly DeclaredAttribute[] = [];
  let descriptorFrame: DescriptorFrame | null = null;
  // Image width of the newest issued request; descriptor columns are counted in it.
  let requestedWidth: number | null = null;
  const axisRequest: Record<AxisIndex, AxisRequestState> = {
    0: { scale: 'linear', range: null },
    1: { scale: 'linear', range: null },
  };
  const axisSource: Record<AxisIndex, AxisSource> = { 0: 'layers', 1: 'layers' };
  const imageGeneration: Record<AxisIndex, number> = { 0: 0, 1: 0 };

  const listeners: ListenerRegistry = {
    change: new Set<ArchivePlotEventMap['change']>(),
    fetcherror: new Set<ArchivePlotEventMap['fetcherror']>(),
    hover: new Set<ArchivePlotEventMap['hover']>(),
    render: new Set<ArchivePlotEventMap['render']>(),
  };

  const report = (error: Error): void => {
    if (disposed) return;
    resolved.onRecoverableError(error);
  };

  const coords = createCoordinateSystem({
    width: Math.max(1, area.width),
    height: Math.max(1, area.height),
    timeRange: toTimeRange(initialTimeRange),
    logDomainFloor: resolved.logDomainFloor,
    onInvalidDomain: report,
  });

  const cache = createAttributeRasterCache(resolved.decoder);
  const compositors: Record<AxisIndex, AxisCompositor> = {
    0: createAxisCompositor(0, cache, { onAttributeError: report }),
    1: createAxisCompositor(1, cache, { onAttributeError: report }),
  };
  const inspector = createHoverInspector(coords);
  const hoverState = createHoverState({ debounceMs: resolved.hoverDebounceMs });
  const tooltip = createHoverTooltip(plotElement);
  const tracker = createRequestTracker();

  const renderLabels = (): void => {
    if (disposed) return;
    const onAxis = (axis: AxisIndex): boolean => declared.some((a) => a.config.axis === axis && a.config.visible);
    labels.render(
      {
        time: computeTimeTicks(coords, resolved.timeTickCount),
        values: {
          0: onAxis(0) ? computeValueTicks(coords, 0, resolved.valueTickCount) : null,
          1: onAxis(1) ? computeValueTicks(coords, 1, resolved.valueTickCount) : null,
        },
      },
      area
    );
  };

  const clearHover = (): void => {
    tooltip.hide();
    hoverState.clearHovered();
  };

  const viewport = createViewportController({
    coords,
    surface: resolved.surface,
    swapSettleDelayMs: resolved.swapSettleDelayMs,
    viewportDebounceMs: resolved.viewportDebounceMs,
    onRender(event) {
      renderLabels();
      notify(listeners.render, event);
    },
    onTransform() {
      clearHover();
      renderLabels();
    },
    onSlotError: report,
  });
  viewport.attachToContainer(plotElement);

  const gestures = createGestureHandler(plotElement, {
    onGesture: (delta) => viewport.onZoomPan(delta),
  });
  gestures.enable();

  const onComposite = (result: AxisCompositeResult): void => {
    if (disposed || axisSource[result.axis] !== 'layers') return;
    if (result.kind === 'raster') {
      viewport.onData(result.axis, result.raster, result.xRange, result.yRange);
      return;
    }
    // Every layer failed to decode: keep whatever is on screen.
    if (result.reason === 'all-failed') return;
    viewport.onData(result.axis, null);
  };
  const unsubscribeComposite = AXES.map((axis) => compositors[axis].onComplete(onComposite));

  hoverState.onChange((match) => notify(listeners.hover, match));

  // --- Fetching ---

  const failFetch: ArchivePlotInstance['failFetch'] = (ticket, error) => {
    if (disposed || !tracker.isCurrent(ticket)) return;
    const fetchError = toFetchError(error);
    if (listeners.fetcherror.size === 0) {
      report(fetchError);
      return;
    }
    notify(listeners.fetcherror, fetchError);
  };

  const issueTicket = (width: number): RequestTicket => {
    requestedWidth = width;
    return tracker.issue();
  };

  const fetchFor = (range: TimeRange, width: number, height: number): void => {
    if (disposed || imageProvider === null) return;
    const ticket = issueTicket(width);
    const request = buildImageRequest({ attributes: declared, axes: axisRequest, timeRange: range, size: { width, height } });
    imageProvider(request)
      .then(
        (response) => setData(response, ticket),
        (err: unknown) => failFetch(ticket, err)
      )
      .catch((err: unknown) => report(toError(err)));
  };

  const handleSettled: ViewportChangeCallback = (start, end, width, height) => {
    if (disposed) return;
    notify(listeners.change, start, end, width, height);
    fetchFor({ start, end }, width, height);
  };
  const unsubscribeSettled = viewport.onViewportSettled(handleSettled);

  const missingLayers = (): boolean =>
    declared.some((a) => a.config.visible && axisSource[a.config.axis] === 'layers' && !compositors[a.config.axis].hasLayer(a.id));

  // --- Data ---

  const showPrecomposited = (axis: AxisIndex, payload: AxisImagePayload, encoded: string): void => {
    const generation = ++imageGeneration[axis];
    const xRange = makeTimeRange(payload.x_range[0], payload.x_range[1]);
    const yRange: ValueRange = [payload.y_range[0], payload.y_range[1]];
    resolved.decoder(encoded).then(
      (raster) => {
        if (disposed || axisSource[axis] !== 'image' || generation !== imageGeneration[axis]) return;
        viewport.onData(axis, raster, xRange, yRange);
      },
      (err: unknown) => {
        if (disposed || generation !== imageGeneration[axis]) return;
        report(err instanceof DecodeError ? err : new DecodeError(`axis ${axis}: ${toError(err).message}`, null, { cause: err }));
      }
    );
  };

  const routeAxis = (axis: AxisIndex, payload: AxisImagePayload | undefined): void => {
    const compositor = compositors[axis];
    if (payload !== undefined && payload.layers === undefined && payload.image !== undefined) {
      axisSource[axis] = 'image';
      // Drops any compositing still in flight for this axis.
      compositor.setData(null);
      showPrecomposited(axis, payload, payload.image);
      return;
    }
    axisSource[axis] = 'layers';
    imageGeneration[axis]++;
    compositor.setData(payload?.layers ? toAxisImageData(payload, payload.layers) : null);
  };

  const setDescriptions: ArchivePlotInstance['setDescriptions'] = (descs) => {
    if (disposed) return;
    inspector.setDescriptors(descs, descriptorFrame);
    clearHover();
  };

  const setData: ArchivePlotInstance['setData'] = (response, ticket) => {
    if (disposed) return;
    // Superseded responses are dropped without a trace.
    if (ticket !== undefined && !tracker.isCurrent(ticket)) return;

    const images = response.images ?? {};
    routeAxis(0, images['0']);
    routeAxis(1, images['1']);
    if (response.descs === undefined) return;

    const frameSource = images['0'] ?? images['1'];
    const width = ticket !== undefined && requestedWidth !== null ? requestedWidth : coords.getSize().width;
    descriptorFrame = frameSource
      ? { xRange: makeTimeRange(frameSource.x_range[0], frameSource.x_range[1]), width }
      : null;
    setDescriptions(response.descs);
  };

  // --- Configuration ---

  const refresh: ArchivePlotInstance['refresh'] = () => {
    if (disposed) return;
    const { start, end } = coords.getVisibleTimeRange();
    const { width, height } = coords.getSize();
    handleSettled(start, end, width, height);
  };

  const setConfig: ArchivePlotInstance['setConfig'] = (configs) => {
    if (disposed) return;
    declared = resolveAttributeConfigs(configs, resolved.palette, declared);
    inspector.setAttributes(declared);
    for (const axis of AXES) compositors[axis].setAttributeConfigs(declared);
    clearHover();
    renderLabels();
    if (imageProvider !== null && missingLayers()) refresh();
  };

  const setTimeRange: ArchivePlotInstance['setTimeRange'] = (range) => {
    if (disposed) return;
    viewport.setTimeRange(toTimeRange(range));
  };

  const setYAxisScale: ArchivePlotInstance['setYAxisScale'] = (axisInput, type) => {
    if (disposed) return;
    const axis = assertAxis(axisInput);
    if (coords.getAxisScaleType(axis) === type) return;
    coords.setAxisScaleType(axis, type);
    axisRequest[axis] = { ...axisRequest[axis], scale: type };
    viewport.relayout();
    clearHover();
    renderLabels();
    compositors[axis].recomposite();
  };

  const setYAxisRange: ArchivePlotInstance['setYAxisRange'] = (axisInput, range) => {
    if (disposed) return;
    const axis = assertAxis(axisInput);
    axisRequest[axis] = { ...axisRequest[axis], range: range === null ? null : { ...range } };
    if (imageProvider !== null) refresh();
  };

  const resize: ArchivePlotInstance['resize'] = () => {
    if (disposed) return;
    area = measure();
    applyArea(area);
    coords.setSize(Math.max(1, area.width), Math.max(1, area.height));
    viewport.relayout();
    clearHover();
    renderLabels();
    viewport.requestSettle();
  };

  // --- Pointer ---

  const onPointerMove = (e: PointerEvent): void => {
    if (disposed) return;
    if (e.buttons !== 0) {
      clearHover();
      return;
    }
    const rect = plotElement.getBoundingClientRect();
    const match = inspector.locate(e.clientX - rect.left, e.clientY - rect.top);
    if (match === null) {
      clearHover();
      return;
    }
    const { width, height } = coords.getSize();
    tooltip.show(match, width, height);
    hoverState.setHovered(match);
  };

  const onPointerLeave = (): void => {
    if (disposed) return;
    clearHover();
  };

  plotElement.addEventListener('pointermove', onPointerMove, { passive: true });
  plotElement.addEventListener('pointerleave', onPointerLeave, { passive: true });

  const getState: ArchivePlotInstance['getState'] = () => {
    const viewportState = viewport.getState();
    const describe = (axis: AxisIndex): ArchivePlotAxisState => ({
      scale: coords.getAxisScaleType(axis),
      domain: coords.getAxisDomain(axis),
      range: axisRequest[axis].range,
      phase: viewportState.axes[axis].phase,
      attributes: compositors[axis].getAttributes().map((a) => a.id),
    });
    return {
      timeRange: coords.getTimeRange(),
      visibleTimeRange: coords.getVisibleTimeRange(),
      transform: coords.getTransform(),
      size: coords.getSize(),
      attributes: declared,
      axes: { 0: describe(0), 1: describe(1) },
    };
  };

  const dispose: ArchivePlotInstance['dispose'] = () => {
    if (disposed) return;
    disposed = true;

    try {
      unsubscribeSettled();
      for (const off of unsubscribeComposite) off();
      gestures.dispose();
      viewport.dispose();
      for (const axis of AXES) compositors[axis].dispose();
      cache.clear();
      hoverState.destroy();
      tooltip.dispose();
    } finally {
      plotElement.removeEventListener('pointermove', onPointerMove);
      plotElement.removeEventListener('pointerleave', onPointerLeave);
      listeners.change.clear();
      listeners.fetcherror.clear();
      listeners.hover.clear();
      listeners.render.clear();
      labels.dispose();
      plotElement.remove();
    }
  };

  renderLabels();

  return {
    get disposed() {
      return disposed;
    },
    setConfig,
    setAttributeConfig: setConfig,
    setData,
    setDescriptions,
    setTimeRange,
    setYAxisScale,
    setAxisScaleType: setYAxisScale,
    setYAxisRange,
    beginFetch: () => issueTicket(coords.getSize().width),
    failFetch,
    refresh,
    resize,
    getState,
    on(eventName, callback) {
      if (disposed) return;
      listeners[eventName].add(callback);
    },
    off(eventName, callback) {
      listeners[eventName].delete(callback);
    },
    dispose,
  };
}

export const ArchivePlot = {
  create: createArchivePlot,
};

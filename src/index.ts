/**
 * archive-plot: raster-based time-series viewer core with two value axes.
 */

export const version = '0.1.0';

export { ArchivePlot, createArchivePlot } from './ArchivePlot';
export type {
  ArchivePlotAxisState,
  ArchivePlotEventMap,
  ArchivePlotEventName,
  ArchivePlotInstance,
  ArchivePlotState,
  TimeRangeInput,
} from './ArchivePlot';

export type {
  ArchivePlotOptions,
  AttributeConfig,
  AttributeConfigMap,
  AttributeDescriptor,
  AxisImagePayload,
  AxisIndex,
  AxisRequestConfig,
  AxisScaleType,
  DeclaredAttribute,
  DescriptorMap,
  GridConfig,
  ImageProvider,
  ImageProviderRequest,
  ImageProviderResponse,
  ResolvedAttributeConfig,
  TimeRange,
  Timestamp,
  ValueRange,
  ViewportChangeCallback,
  WireTime,
} from './config/types';

// Options defaults + resolution
export { defaultGrid, defaultPalette, defaultTiming, LOG_DOMAIN_FLOOR } from './config/defaults';
export { resolveAttributeConfigs, resolveOptions } from './config/OptionResolver';
export type { ResolvedArchivePlotOptions } from './config/OptionResolver';
export { pickLineColor } from './config/colorAssignment';

export { ArchivePlotError, DecodeError, FetchError, InvalidDomainError, StaleResponseError, isArchivePlotError } from './errors';

export { createCoordinateSystem, clampLogDomain } from './core/CoordinateSystem';
export type { CoordinateSystem, CoordinateSystemOptions } from './core/CoordinateSystem';
export { computeTimeTicks, computeValueTicks } from './core/axisTicks';
export type { AxisTick } from './core/axisTicks';
export type { TransformDelta, ViewportTransform } from './core/viewportTransform';

export { createAttributeRasterCache } from './raster/AttributeRasterCache';
export type { AttributeRasterCache, ColoredAttributeRaster, RawAttributeImage } from './raster/AttributeRasterCache';
export { createAxisCompositor } from './raster/AxisCompositor';
export type { AxisCompositeResult, AxisCompositor, AxisImageData } from './raster/AxisCompositor';
export { createBrowserRasterDecoder } from './raster/decodeRaster';
export type { RasterDecoder } from './raster/decodeRaster';
export { createRaster, recolorMask } from './raster/rasterOps';
export type { Raster } from './raster/rasterOps';

export { createViewportController } from './viewport/ViewportController';
export type { RenderEvent, ViewportController } from './viewport/ViewportController';
export { createCanvasRasterSurface } from './viewport/rasterSlots';
export type { RasterSlot, RasterSurface, SlotPlacement } from './viewport/rasterSlots';

export { createHoverInspector } from './interaction/HoverInspector';
export type { HoverInspector, HoverMatch, ValueSummary } from './interaction/HoverInspector';

export { buildImageRequest } from './provider/buildImageRequest';
export { createImageProviderClient } from './provider/createImageProviderClient';
export type { ImageProviderClientOptions } from './provider/createImageProviderClient';
export { createRequestTracker } from './provider/createRequestTracker';
export type { RequestTicket, RequestTracker } from './provider/createRequestTracker';

import type { RasterDecoder } from '../raster/decodeRaster';
import type { RasterSurface } from '../viewport/rasterSlots';

/** Y-axis index. A plot always has exactly two. */
export type AxisIndex = 0 | 1;

export const AXES: readonly AxisIndex[] = [0, 1];

export type AxisScaleType = 'linear' | 'log';

/** Epoch milliseconds. */
export type Timestamp = number;

/** Wire times may be epoch ms or anything `Date.parse` accepts. */
export type WireTime = number | string;

export interface TimeRange {
  readonly start: Timestamp;
  readonly end: Timestamp;
}

export type ValueRange = readonly [min: number, max: number];

/**
 * Host-side attribute configuration. `color` and `visible` may be omitted;
 * `resolveAttributeConfigs` fills them in.
 */
export interface AttributeConfig {
  readonly axis: AxisIndex;
  readonly color?: string;
  /** Line width in device pixels, positive integer. */
  readonly width?: number;
  readonly visible?: boolean;
}

export interface ResolvedAttributeConfig {
  readonly axis: AxisIndex;
  readonly color: string;
  readonly width: number;
  readonly visible: boolean;
}

/** Insertion order of the keys is the declaration order used for compositing and hover tie-breaks. */
export type AttributeConfigMap = Readonly<Record<string, AttributeConfig>>;

export interface DeclaredAttribute {
  readonly id: string;
  readonly config: ResolvedAttributeConfig;
}

/**
 * Per-pixel-column summary of one attribute, as sent by the image provider.
 * Parallel arrays indexed by position in `indices`; `null` marks a column without samples.
 */
export interface AttributeDescriptor {
  readonly indices: readonly number[];
  readonly min: readonly (number | null)[];
  readonly max: readonly (number | null)[];
  readonly count: readonly (number | null)[];
  readonly timestamp: readonly (number | null)[];
  readonly total_points?: number;
}

export type DescriptorMap = Readonly<Record<string, AttributeDescriptor>>;

export interface AxisRequestConfig {
  readonly scale: AxisScaleType;
  readonly min?: number;
  readonly max?: number;
}

export interface ImageProviderRequest {
  readonly attributes: readonly { readonly name: string; readonly y_axis: AxisIndex }[];
  readonly time_range: readonly [string, string];
  readonly size: readonly [number, number];
  readonly axes: Readonly<Record<'0' | '1', AxisRequestConfig>>;
}

export interface AxisImagePayload {
  /** Pre-composited axis image (base64 PNG). Used as-is when `layers` is absent. */
  readonly image?: string;
  /** Monochrome per-attribute masks (base64 PNG), recoloured and composited on the client. */
  readonly layers?: Readonly<Record<string, string>>;
  readonly x_range: readonly [WireTime, WireTime];
  readonly y_range: ValueRange;
}

export interface ImageProviderResponse {
  readonly descs?: DescriptorMap;
  readonly images?: Readonly<Partial<Record<'0' | '1', AxisImagePayload>>>;
}

export type ImageProvider = (request: ImageProviderRequest) => Promise<ImageProviderResponse>;

export interface GridConfig {
  readonly left?: number;
  readonly right?: number;
  readonly top?: number;
  readonly bottom?: number;
}

export interface ArchivePlotOptions {
  readonly grid?: GridConfig;
  /** Delay between a hidden slot being drawn and it becoming visible. 0 swaps as soon as the slot confirms. */
  readonly swapSettleDelayMs?: number;
  /** Quiet period after the last zoom/pan before `change` fires. */
  readonly viewportDebounceMs?: number;
  readonly hoverDebounceMs?: number;
  readonly palette?: readonly string[];
  readonly timeTickCount?: number;
  readonly valueTickCount?: number;
  /** Smallest lower bound a log-scale domain may take. */
  readonly logDomainFloor?: number;
  readonly decoder?: RasterDecoder;
  readonly surface?: RasterSurface;
  /** When set, the plot fetches new images itself whenever the viewport settles. */
  readonly imageProvider?: ImageProvider;
  readonly onRecoverableError?: (error: Error) => void;
}

export type ViewportChangeCallback = (start: Timestamp, end: Timestamp, widthPx: number, heightPx: number) => void;

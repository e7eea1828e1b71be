import type {
  AxisIndex,
  AxisRequestConfig,
  AxisScaleType,
  DeclaredAttribute,
  ImageProviderRequest,
  TimeRange,
} from '../config/types';
import { toIsoString } from '../utils/time';

/** Optional manual bounds for one axis; only sent to the provider. */
export interface AxisRangeOverride {
  readonly min?: number;
  readonly max?: number;
}

export interface AxisRequestState {
  readonly scale: AxisScaleType;
  readonly range: AxisRangeOverride | null;
}

export interface ImageRequestInput {
  readonly attributes: readonly DeclaredAttribute[];
  readonly axes: Readonly<Record<AxisIndex, AxisRequestState>>;
  readonly timeRange: TimeRange;
  readonly size: { readonly width: number; readonly height: number };
}

const toAxisConfig = ({ scale, range }: AxisRequestState): AxisRequestConfig => {
  const min = range?.min;
  const max = range?.max;
  return {
    scale,
    ...(typeof min === 'number' && Number.isFinite(min) ? { min } : {}),
    ...(typeof max === 'number' && Number.isFinite(max) ? { max } : {}),
  };
};

export function buildImageRequest(input: ImageRequestInput): ImageProviderRequest {
  return {
    attributes: input.attributes.map(({ id, config }) => ({ name: id, y_axis: config.axis })),
    time_range: [toIsoString(input.timeRange.start), toIsoString(input.timeRange.end)],
    size: [Math.max(0, Math.round(input.size.width)), Math.max(0, Math.round(input.size.height))],
    axes: { '0': toAxisConfig(input.axes[0]), '1': toAxisConfig(input.axes[1]) },
  };
}

import type { AttributeDescriptor, AxisImagePayload, DescriptorMap, ImageProviderResponse, WireTime } from '../config/types';
import { FetchError } from '../errors';

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

const isNullableNumber = (v: unknown): v is number | null => v === null || (typeof v === 'number' && Number.isFinite(v));

const nullableNumbers = (v: unknown): (number | null)[] | null =>
  Array.isArray(v) && v.every(isNullableNumber) ? v : null;

const numbers = (v: unknown): number[] | null =>
  Array.isArray(v) && v.every((x): x is number => typeof x === 'number' && Number.isFinite(x)) ? v : null;

const isWireTime = (v: unknown): v is WireTime => typeof v === 'string' || (typeof v === 'number' && Number.isFinite(v));

function parseDescriptor(v: unknown): AttributeDescriptor | null {
  if (!isRecord(v)) return null;
  const indices = numbers(v.indices);
  const min = nullableNumbers(v.min);
  const max = nullableNumbers(v.max);
  const count = nullableNumbers(v.count);
  const timestamp = nullableNumbers(v.timestamp);
  if (!indices || !min || !max || !count || !timestamp) return null;
  const total = v.total_points;
  return typeof total === 'number' ? { indices, min, max, count, timestamp, total_points: total } : { indices, min, max, count, timestamp };
}

/** Drops malformed entries; the rest keep their wire order. */
export function parseDescriptorMap(v: unknown): DescriptorMap {
  const out: Record<string, AttributeDescriptor> = {};
  if (!isRecord(v)) return out;
  for (const [name, raw] of Object.entries(v)) {
    const desc = parseDescriptor(raw);
    if (desc) out[name] = desc;
  }
  return out;
}

export function parseAxisPayload(v: unknown): AxisImagePayload | null {
  if (!isRecord(v)) return null;
  const { image, layers, x_range: xRange, y_range: yRange } = v;

  if (!Array.isArray(xRange) || xRange.length !== 2) return null;
  const [x0, x1] = xRange;
  if (!isWireTime(x0) || !isWireTime(x1)) return null;
  const y = numbers(yRange);
  if (!y || y.length !== 2) return null;

  let parsedLayers: Record<string, string> | undefined;
  if (isRecord(layers)) {
    parsedLayers = {};
    for (const [name, encoded] of Object.entries(layers)) {
      if (typeof encoded === 'string') parsedLayers[name] = encoded;
    }
  }
  const parsedImage = typeof image === 'string' ? image : undefined;
  if (parsedImage === undefined && parsedLayers === undefined) return null;

  return {
    ...(parsedImage !== undefined ? { image: parsedImage } : {}),
    ...(parsedLayers !== undefined ? { layers: parsedLayers } : {}),
    x_range: [x0, x1],
    y_range: [y[0], y[1]],
  };
}

export function parseImageProviderResponse(body: unknown): ImageProviderResponse {
  if (!isRecord(body)) throw new FetchError('Image provider returned a non-object body');
  const images: { '0'?: AxisImagePayload; '1'?: AxisImagePayload } = {};
  if (isRecord(body.images)) {
    const a0 = parseAxisPayload(body.images['0']);
    const a1 = parseAxisPayload(body.images['1']);
    if (a0) images['0'] = a0;
    if (a1) images['1'] = a1;
  }
  return { descs: parseDescriptorMap(body.descs), images };
}

import { describe, it, expect } from 'vitest';
import { buildImageRequest } from '../buildImageRequest';
import { resolveAttributeConfigs } from '../../config/OptionResolver';

const start = Date.UTC(2024, 0, 2, 3, 4, 5);
const end = Date.UTC(2024, 0, 2, 4, 4, 5);

describe('buildImageRequest', () => {
  it('builds the provider request body', () => {
    const request = buildImageRequest({
      attributes: resolveAttributeConfigs({ 'sys/dev/temp': { axis: 0 }, 'sys/dev/flow': { axis: 1 } }),
      axes: { 0: { scale: 'linear', range: null }, 1: { scale: 'log', range: null } },
      timeRange: { start, end },
      size: { width: 640.4, height: 299.6 },
    });

    expect(request).toEqual({
      attributes: [
        { name: 'sys/dev/temp', y_axis: 0 },
        { name: 'sys/dev/flow', y_axis: 1 },
      ],
      time_range: ['2024-01-02T03:04:05.000Z', '2024-01-02T04:04:05.000Z'],
      size: [640, 300],
      axes: { '0': { scale: 'linear' }, '1': { scale: 'log' } },
    });
  });

  it('keeps sub-second windows distinct', () => {
    const t = Date.UTC(2024, 0, 1, 10);
    const request = buildImageRequest({
      attributes: [],
      axes: { 0: { scale: 'linear', range: null }, 1: { scale: 'linear', range: null } },
      timeRange: { start: t + 200, end: t + 700 },
      size: { width: 10, height: 10 },
    });
    expect(request.time_range).toEqual(['2024-01-01T10:00:00.200Z', '2024-01-01T10:00:00.700Z']);
  });

  it('sends only finite manual bounds', () => {
    const request = buildImageRequest({
      attributes: [],
      axes: { 0: { scale: 'linear', range: { min: -5, max: Number.NaN } }, 1: { scale: 'linear', range: { max: 7 } } },
      timeRange: { start, end },
      size: { width: 10, height: 10 },
    });
    expect(request.axes).toEqual({ '0': { scale: 'linear', min: -5 }, '1': { scale: 'linear', max: 7 } });
  });

  it('never sends a negative size', () => {
    const request = buildImageRequest({
      attributes: [],
      axes: { 0: { scale: 'linear', range: null }, 1: { scale: 'linear', range: null } },
      timeRange: { start, end },
      size: { width: -3, height: 0 },
    });
    expect(request.size).toEqual([0, 0]);
  });
});

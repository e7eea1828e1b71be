import type {
  ArchivePlotOptions,
  AttributeConfigMap,
  DeclaredAttribute,
  GridConfig,
  ImageProvider,
  ResolvedAttributeConfig,
} from './types';
import { LOG_DOMAIN_FLOOR, defaultAttributeWidth, defaultGrid, defaultPalette, defaultTicks, defaultTiming } from './defaults';
import { pickLineColor } from './colorAssignment';
import { createBrowserRasterDecoder } from '../raster/decodeRaster';
import type { RasterDecoder } from '../raster/decodeRaster';
import { createCanvasRasterSurface } from '../viewport/rasterSlots';
import type { RasterSurface } from '../viewport/rasterSlots';

export type ResolvedGridConfig = Readonly<Required<GridConfig>>;

export interface ResolvedArchivePlotOptions {
  readonly grid: ResolvedGridConfig;
  readonly swapSettleDelayMs: number;
  readonly viewportDebounceMs: number;
  readonly hoverDebounceMs: number;
  readonly palette: ReadonlyArray<string>;
  readonly timeTickCount: number;
  readonly valueTickCount: number;
  readonly logDomainFloor: number;
  readonly decoder: RasterDecoder;
  readonly surface: RasterSurface;
  readonly imageProvider: ImageProvider | null;
  readonly onRecoverableError: (error: Error) => void;
}

const warnRecoverable = (error: Error): void => {
  console.warn(`ArchivePlot: ${error.message}`);
};

const nonNegativeOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;

const positiveIntOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 1 ? Math.floor(value) : fallback;

const sanitizePalette = (palette: unknown): string[] => {
  if (!Array.isArray(palette)) return [];
  return palette
    .filter((c): c is string => typeof c === 'string')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
};

const resolveGrid = (grid: GridConfig | undefined): ResolvedGridConfig => ({
  top: nonNegativeOr(grid?.top, defaultGrid.top),
  right: nonNegativeOr(grid?.right, defaultGrid.right),
  bottom: nonNegativeOr(grid?.bottom, defaultGrid.bottom),
  left: nonNegativeOr(grid?.left, defaultGrid.left),
});

export function resolveOptions(options: ArchivePlotOptions = {}): ResolvedArchivePlotOptions {
  const palette = sanitizePalette(options.palette);
  const floor = options.logDomainFloor;

  return {
    grid: resolveGrid(options.grid),
    swapSettleDelayMs: nonNegativeOr(options.swapSettleDelayMs, defaultTiming.swapSettleDelayMs),
    viewportDebounceMs: nonNegativeOr(options.viewportDebounceMs, defaultTiming.viewportDebounceMs),
    hoverDebounceMs: nonNegativeOr(options.hoverDebounceMs, defaultTiming.hoverDebounceMs),
    palette: palette.length > 0 ? palette : Array.from(defaultPalette),
    timeTickCount: positiveIntOr(options.timeTickCount, defaultTicks.timeTickCount),
    valueTickCount: positiveIntOr(options.valueTickCount, defaultTicks.valueTickCount),
    logDomainFloor: typeof floor === 'number' && Number.isFinite(floor) && floor > 0 ? floor : LOG_DOMAIN_FLOOR,
    decoder: options.decoder ?? createBrowserRasterDecoder(),
    surface: options.surface ?? createCanvasRasterSurface(),
    imageProvider: options.imageProvider ?? null,
    onRecoverableError: options.onRecoverableError ?? warnRecoverable,
  };
}

/**
 * Resolves host attribute configs into declaration-ordered, fully specified entries.
 *
 * An attribute without an explicit colour keeps the one it had in `previous`;
 * only attributes new to the plot get a fresh pick, made after the kept
 * colours are known, in declaration order.
 */
export function resolveAttributeConfigs(
  configs: AttributeConfigMap,
  palette: ReadonlyArray<string> = defaultPalette,
  previous: readonly DeclaredAttribute[] = []
): DeclaredAttribute[] {
  const previousColors = new Map(previous.map(({ id, config }): [string, string] => [id, config.color]));
  const assigned: Record<string, { color: string }> = {};
  const keptColors = new Map<string, string>();
  const ids = Object.keys(configs);

  for (const id of ids) {
    const input = configs[id];
    const explicitColor = typeof input.color === 'string' ? input.color.trim() : '';
    const kept = explicitColor.length > 0 ? explicitColor : previousColors.get(id);
    if (kept === undefined) continue;
    keptColors.set(id, kept);
    assigned[id] = { color: kept };
  }

  return ids.map((id): DeclaredAttribute => {
    const input = configs[id];
    let color = keptColors.get(id);
    if (color === undefined) {
      color = pickLineColor(assigned, palette, id);
      assigned[id] = { color };
    }
    const config: ResolvedAttributeConfig = {
      axis: input.axis === 1 ? 1 : 0,
      color,
      width: positiveIntOr(input.width, defaultAttributeWidth),
      visible: input.visible ?? true,
    };
    return { id, config };
  });
}

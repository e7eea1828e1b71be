/**
 * Rendering adapter for the viewport's double buffer.
 *
 * The controller only talks to `RasterSlot`s; the default surface backs each
 * slot with an absolutely positioned `<canvas>` moved by a CSS transform.
 */

import type { AxisIndex } from '../config/types';
import type { Raster } from '../raster/rasterOps';

/** Affine placement in plot-local CSS pixels: screen = translate + scale * rasterPixel. */
export interface SlotPlacement {
  readonly translateX: number;
  readonly translateY: number;
  readonly scaleX: number;
  readonly scaleY: number;
}

export interface RasterSlot {
  /** Resolves once the slot's content is ready to be shown. */
  draw(raster: Raster): Promise<void>;
  setPlacement(placement: SlotPlacement): void;
  setVisible(visible: boolean): void;
  clear(): void;
  dispose(): void;
}

export interface RasterSurface {
  createSlot(container: HTMLElement, axis: AxisIndex, index: 0 | 1): RasterSlot;
}

export const placementToCss = (p: SlotPlacement): string =>
  `matrix(${p.scaleX}, 0, 0, ${p.scaleY}, ${p.translateX}, ${p.translateY})`;

export function createCanvasRasterSurface(): RasterSurface {
  return {
    createSlot(container, axis, index) {
      const canvas = document.createElement('canvas');
      canvas.setAttribute('data-archive-plot-slot', `${axis}-${index}`);
      canvas.style.position = 'absolute';
      canvas.style.left = '0';
      canvas.style.top = '0';
      canvas.style.transformOrigin = '0 0';
      canvas.style.pointerEvents = 'none';
      canvas.style.display = 'none';
      container.appendChild(canvas);

      let disposed = false;

      return {
        draw(raster) {
          if (disposed) return Promise.resolve();
          canvas.width = raster.width;
          canvas.height = raster.height;
          const ctx = canvas.getContext('2d');
          if (!ctx) return Promise.reject(new Error('2d canvas context is not available'));
          if (raster.width === 0 || raster.height === 0) return Promise.resolve();
          const image = ctx.createImageData(raster.width, raster.height);
          image.data.set(raster.data);
          ctx.putImageData(image, 0, 0);
          return Promise.resolve();
        },
        setPlacement(placement) {
          canvas.style.transform = placementToCss(placement);
        },
        setVisible(visible) {
          canvas.style.display = visible ? 'block' : 'none';
        },
        clear() {
          canvas.width = 0;
          canvas.height = 0;
        },
        dispose() {
          if (disposed) return;
          disposed = true;
          canvas.remove();
        },
      };
    },
  };
}

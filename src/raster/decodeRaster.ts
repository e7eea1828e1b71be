import { DecodeError } from '../errors';
import type { Raster } from './rasterOps';

/**
 * Turns an encoded image payload (base64 PNG) into pixels.
 * Must reject with a `DecodeError` when the payload is unusable.
 */
export type RasterDecoder = (encoded: string) => Promise<Raster>;

export const PNG_DATA_URL_PREFIX = 'data:image/png;base64,';

export const toPngDataUrl = (encoded: string): string =>
  encoded.startsWith('data:') ? encoded : `${PNG_DATA_URL_PREFIX}${encoded}`;

const loadImage = (src: string): Promise<HTMLImageElement> => {
  const img = new Image();
  img.decoding = 'async';
  img.src = src;
  if (typeof img.decode === 'function') {
    return img.decode().then(() => img);
  }
  return new Promise((resolve, reject) => {
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error('image failed to load'));
  });
};

/**
 * Browser decoder: lets the engine decode the PNG, then reads the pixels back
 * through a scratch 2d canvas.
 */
export function createBrowserRasterDecoder(): RasterDecoder {
  let scratch: HTMLCanvasElement | null = null;

  return async (encoded) => {
    if (typeof encoded !== 'string' || encoded.length === 0) {
      throw new DecodeError('Empty image payload');
    }

    let img: HTMLImageElement;
    try {
      img = await loadImage(toPngDataUrl(encoded));
    } catch (err) {
      throw new DecodeError('Image payload could not be decoded', null, { cause: err });
    }

    const width = img.naturalWidth;
    const height = img.naturalHeight;
    if (!(width > 0) || !(height > 0)) {
      throw new DecodeError(`Decoded image has invalid size ${width}x${height}`);
    }

    scratch ??= document.createElement('canvas');
    scratch.width = width;
    scratch.height = height;
    const ctx = scratch.getContext('2d', { willReadFrequently: true });
    if (!ctx) throw new DecodeError('2d canvas context is not available');

    ctx.clearRect(0, 0, width, height);
    ctx.drawImage(img, 0, 0);
    const pixels = ctx.getImageData(0, 0, width, height);
    return { width, height, data: pixels.data };
  };
}

import { PNG } from 'pngjs';
import type { RGB } from '../types';
import { TileDecodeError } from '../utils/errors';

export interface Raster {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): RGB;
}

export interface RasterDecoder {
  decode(body: Buffer): Raster;
}

/**
 * Raster over pngjs output. pngjs always expands to 8-bit RGBA, so alpha is
 * simply skipped.
 */
class PngRaster implements Raster {
  constructor(private readonly png: PNG) {}

  get width(): number {
    return this.png.width;
  }

  get height(): number {
    return this.png.height;
  }

  getPixel(x: number, y: number): RGB {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new TileDecodeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} tile`);
    }
    const idx = (y * this.width + x) * 4;
    const { data } = this.png;
    return [data[idx], data[idx + 1], data[idx + 2]];
  }
}

export class PngRasterDecoder implements RasterDecoder {
  decode(body: Buffer): Raster {
    let png: PNG;
    try {
      png = PNG.sync.read(body);
    } catch (error) {
      throw new TileDecodeError(
        `Failed to decode PNG tile (${body.length} bytes): ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return new PngRaster(png);
  }
}

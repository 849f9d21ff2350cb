import { RGBAPixel } from './rgba-pixel';

/**
 * Mutable 2-D grid of pixels, row-major.
 * New rasters are filled with opaque white.
 */
export class RasterImage {
  readonly width: number;
  readonly height: number;
  private pixels: RGBAPixel[];

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid raster size ${width}x${height} (must be positive integers)`);
    }
    this.width = width;
    this.height = height;
    this.pixels = Array.from({ length: width * height }, () => new RGBAPixel());
  }

  /**
   * Returns the stored pixel itself; mutating it mutates the raster.
   */
  getPixel(x: number, y: number): RGBAPixel {
    return this.pixels[this.indexOf(x, y)];
  }

  setPixel(x: number, y: number, pixel: RGBAPixel): void {
    this.pixels[this.indexOf(x, y)] = pixel.clone();
  }

  equals(other: RasterImage): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    for (let i = 0; i < this.pixels.length; i++) {
      if (!this.pixels[i].equals(other.pixels[i])) return false;
    }
    return true;
  }

  private indexOf(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height} raster`);
    }
    return y * this.width + x;
  }
}

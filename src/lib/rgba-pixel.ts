/**
 * Four-channel color value: integer r/g/b in 0..255 and a continuous alpha in 0..1.
 */
import { clamp } from './compression-utils';

function toChannel(value: number): number {
  return clamp(Math.trunc(value), 0, 255);
}

export class RGBAPixel {
  r: number;
  g: number;
  b: number;
  a: number;

  constructor(r = 255, g = 255, b = 255, a = 1.0) {
    this.r = toChannel(r);
    this.g = toChannel(g);
    this.b = toChannel(b);
    this.a = clamp(a, 0, 1);
  }

  /**
   * Euclidean distance over the color channels, with alpha scaled up to
   * the 0..255 range so it weighs like the others.
   */
  distanceTo(other: RGBAPixel): number {
    const dr = this.r - other.r;
    const dg = this.g - other.g;
    const db = this.b - other.b;
    const da = (this.a - other.a) * 255;
    return Math.sqrt(dr * dr + dg * dg + db * db + da * da);
  }

  equals(other: RGBAPixel): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
  }

  clone(): RGBAPixel {
    return new RGBAPixel(this.r, this.g, this.b, this.a);
  }

  toString(): string {
    return `rgba(${this.r},${this.g},${this.b},${this.a})`;
  }
}

import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { decodeRaster, encodeRaster, formatFromPath, toRawBuffer } from './raster-io';
import { RasterImage } from './raster';
import { RGBAPixel } from './rgba-pixel';

function sample(): RasterImage {
  const img = new RasterImage(3, 2);
  img.setPixel(0, 0, new RGBAPixel(255, 0, 0, 1));
  img.setPixel(1, 0, new RGBAPixel(0, 128, 0, 0.2));
  img.setPixel(2, 0, new RGBAPixel(10, 20, 30, 1));
  img.setPixel(0, 1, new RGBAPixel(0, 0, 0, 1));
  img.setPixel(1, 1, new RGBAPixel(90, 90, 200, 0.6));
  return img;
}

describe('formatFromPath', () => {
  it('picks the encoder from the extension', () => {
    expect(formatFromPath('out/a.webp')).toBe('webp');
    expect(formatFromPath('out/a.AVIF')).toBe('avif');
    expect(formatFromPath('out/a.png')).toBe('png');
    expect(formatFromPath('out/noext')).toBe('png');
  });

  it('rejects jpeg outputs', () => {
    expect(() => formatFromPath('a.jpg')).toThrow(/JPEG is lossy/);
    expect(() => formatFromPath('a.JPEG')).toThrow(/JPEG is lossy/);
  });
});

describe('toRawBuffer', () => {
  it('interleaves RGBA bytes row by row', () => {
    const raw = toRawBuffer(sample());
    expect(raw.length).toBe(3 * 2 * 4);
    expect(Array.from(raw.subarray(0, 8))).toEqual([255, 0, 0, 255, 0, 128, 0, 51]);
    // untouched pixel stays opaque white
    expect(Array.from(raw.subarray(20, 24))).toEqual([255, 255, 255, 255]);
  });
});

describe('encodeRaster / decodeRaster', () => {
  it('round-trips a raster through PNG', async () => {
    const img = sample();
    const png = await encodeRaster(img, 'png');
    const meta = await sharp(png).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(3);
    expect(meta.height).toBe(2);

    const decoded = await decodeRaster(png);
    expect(decoded.equals(img)).toBe(true);
  });

  it('adds an opaque alpha channel to RGB input', async () => {
    const rgb = await sharp(Buffer.from([1, 2, 3, 4, 5, 6]), {
      raw: { width: 2, height: 1, channels: 3 },
    })
      .png()
      .toBuffer();

    const decoded = await decodeRaster(rgb);
    expect(decoded.getPixel(0, 0).toString()).toBe('rgba(1,2,3,1)');
    expect(decoded.getPixel(1, 0).toString()).toBe('rgba(4,5,6,1)');
  });
});

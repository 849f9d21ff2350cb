import sharp from 'sharp';
import path from 'path';
import { RasterImage } from './raster';
import { RGBAPixel } from './rgba-pixel';
import type { OutputFormat } from './types';

const CHANNELS = 4;

// Renders must survive a write/read round trip, so only lossless encoders are offered.
export function formatFromPath(outputPath: string): OutputFormat {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') {
    throw new Error(`Unsupported output format "${ext}": JPEG is lossy and has no alpha channel`);
  }
  if (ext === '.webp') return 'webp';
  if (ext === '.avif') return 'avif';
  return 'png';
}

export function applyOutputFormat(pipeline: sharp.Sharp, format: OutputFormat): sharp.Sharp {
  if (format === 'webp') return pipeline.webp({ lossless: true });
  if (format === 'avif') return pipeline.avif({ lossless: true });
  return pipeline.png();
}

export async function decodeRaster(input: Buffer | string): Promise<RasterImage> {
  const { data, info } = await sharp(input)
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== CHANNELS) {
    throw new Error(`Expected ${CHANNELS} channels after decoding, got ${info.channels}`);
  }

  const raster = new RasterImage(info.width, info.height);
  for (let y = 0; y < info.height; y++) {
    for (let x = 0; x < info.width; x++) {
      const i = (y * info.width + x) * CHANNELS;
      raster.setPixel(x, y, new RGBAPixel(data[i], data[i + 1], data[i + 2], data[i + 3] / 255));
    }
  }
  return raster;
}

export function readRaster(imagePath: string): Promise<RasterImage> {
  return decodeRaster(imagePath);
}

/**
 * Packs a raster into interleaved RGBA bytes (alpha rounded back to 0..255).
 */
export function toRawBuffer(raster: RasterImage): Buffer {
  const data = Buffer.alloc(raster.width * raster.height * CHANNELS);
  for (let y = 0; y < raster.height; y++) {
    for (let x = 0; x < raster.width; x++) {
      const px = raster.getPixel(x, y);
      const i = (y * raster.width + x) * CHANNELS;
      data[i] = px.r;
      data[i + 1] = px.g;
      data[i + 2] = px.b;
      data[i + 3] = Math.round(px.a * 255);
    }
  }
  return data;
}

export function rasterPipeline(raster: RasterImage): sharp.Sharp {
  return sharp(toRawBuffer(raster), {
    raw: { width: raster.width, height: raster.height, channels: CHANNELS },
  });
}

export function encodeRaster(raster: RasterImage, format: OutputFormat = 'png'): Promise<Buffer> {
  return applyOutputFormat(rasterPipeline(raster), format).toBuffer();
}

export async function writeRaster(raster: RasterImage, outputPath: string): Promise<void> {
  const pipeline = applyOutputFormat(rasterPipeline(raster), formatFromPath(outputPath));
  await pipeline.toFile(outputPath);
}

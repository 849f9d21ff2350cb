import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import { ZodError } from 'zod';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { QTreeCompressor, missingTolerances, parseCompressConfig } from './compressor';
import { RasterImage } from './raster';
import { RGBAPixel } from './rgba-pixel';
import { readRaster, writeRaster } from './raster-io';
import type { CompressionPayload } from './types';

const root = fs.mkdtempSync(path.join(os.tmpdir(), 'qtree-compress-'));

async function writeSource(name: string, img: RasterImage): Promise<string> {
  const imagePath = path.join(root, name);
  await writeRaster(img, imagePath);
  return imagePath;
}

function primaries(): RasterImage {
  const img = new RasterImage(2, 2);
  img.setPixel(0, 0, new RGBAPixel(255, 0, 0, 1));
  img.setPixel(1, 0, new RGBAPixel(0, 255, 0, 1));
  img.setPixel(0, 1, new RGBAPixel(0, 0, 255, 1));
  img.setPixel(1, 1, new RGBAPixel(255, 255, 0, 1));
  return img;
}

describe('parseCompressConfig', () => {
  it('fills defaults and derives the summary path', () => {
    const config = parseCompressConfig({ imagePath: 'in.png', outputDir: 'out', tolerances: [5] });
    expect(config.scale).toBe(1);
    expect(config.flip).toBe(false);
    expect(config.rotations).toBe(0);
    expect(config.outline).toBe(false);
    expect(config.concurrency).toBe(4);
    expect(config.summaryFile).toBe(path.join('out', 'summary.json'));
  });

  it('rejects out-of-range options', () => {
    const base = { imagePath: 'in.png', outputDir: 'out' };
    expect(() => parseCompressConfig({ ...base, tolerances: [] })).toThrow(ZodError);
    expect(() => parseCompressConfig({ ...base, tolerances: [-1] })).toThrow(ZodError);
    expect(() => parseCompressConfig({ ...base, tolerances: [1], scale: 0 })).toThrow(ZodError);
    expect(() => parseCompressConfig({ ...base, tolerances: [1], rotations: 4 })).toThrow(ZodError);
  });
});

describe('missingTolerances', () => {
  const variant = (tolerance: number) => ({
    tolerance,
    nodes: 1,
    leaves: 1,
    leaf_ratio: 1,
    width: 1,
    height: 1,
    output_path: `out-${tolerance}.png`,
    outline_path: null,
  });
  const payload = (tolerances: number[]): CompressionPayload => ({
    strategy: 'quadtree-prune',
    image_path: 'in.png',
    generated_at: '2024-01-01T00:00:00.000Z',
    scale: 1,
    flip: false,
    rotations: 0,
    source: { width: 1, height: 1, nodes: 1, leaves: 1, depth: 1 },
    variants: tolerances.map(variant),
  });

  it('is empty when every distinct tolerance was written', () => {
    expect(missingTolerances([0, 10, 10], payload([0, 10]))).toEqual([]);
  });

  it('lists each failed tolerance once', () => {
    expect(missingTolerances([0, 50, 10, 50], payload([10]))).toEqual([0, 50]);
  });
});

describe('QTreeCompressor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('renders one pruned variant per distinct tolerance', async () => {
    const imagePath = await writeSource('primaries.png', primaries());
    const outputDir = path.join(root, 'variants');

    const payload = await new QTreeCompressor({
      imagePath,
      outputDir,
      tolerances: [0, 300, 300],
      scale: 2,
      outline: true,
      concurrency: 2,
    }).run();

    expect(payload.strategy).toBe('quadtree-prune');
    expect(payload.source).toEqual({ width: 2, height: 2, nodes: 5, leaves: 4, depth: 2 });
    expect(payload.variants).toEqual([
      {
        tolerance: 0,
        nodes: 5,
        leaves: 4,
        leaf_ratio: 1,
        width: 4,
        height: 4,
        output_path: path.join(outputDir, 'primaries-tol0.png'),
        outline_path: path.join(outputDir, 'primaries-tol0.outline.png'),
      },
      {
        tolerance: 300,
        nodes: 1,
        leaves: 1,
        leaf_ratio: 0.25,
        width: 4,
        height: 4,
        output_path: path.join(outputDir, 'primaries-tol300.png'),
        outline_path: path.join(outputDir, 'primaries-tol300.outline.png'),
      },
    ]);

    const lossless = await readRaster(path.join(outputDir, 'primaries-tol0.png'));
    expect(lossless.getPixel(2, 0).toString()).toBe('rgba(0,255,0,1)');
    expect(lossless.getPixel(1, 3).toString()).toBe('rgba(0,0,255,1)');

    const collapsed = await readRaster(path.join(outputDir, 'primaries-tol300.png'));
    expect(collapsed.getPixel(0, 0).toString()).toBe('rgba(127,127,63,1)');
    expect(collapsed.getPixel(3, 3).toString()).toBe('rgba(127,127,63,1)');

    expect(fs.existsSync(path.join(outputDir, 'primaries-tol300.outline.png'))).toBe(true);

    const summary = JSON.parse(fs.readFileSync(path.join(outputDir, 'summary.json'), 'utf-8'));
    expect(summary.variants).toHaveLength(2);
    expect(summary.source.leaves).toBe(4);
  });

  it('flips then rotates, which transposes the image', async () => {
    const source = new RasterImage(3, 2);
    for (let y = 0; y < 2; y++) {
      for (let x = 0; x < 3; x++) {
        source.setPixel(x, y, new RGBAPixel(x * 50, y * 100, 7, 1));
      }
    }
    const imagePath = await writeSource('Wide Strip.png', source);
    const outputDir = path.join(root, 'transposed');
    const summaryFile = path.join(root, 'reports', 'transposed.json');

    const payload = await new QTreeCompressor({
      imagePath,
      outputDir,
      tolerances: [0],
      flip: true,
      rotations: 1,
      summaryFile,
    }).run();

    const variant = payload.variants[0];
    expect(variant.width).toBe(2);
    expect(variant.height).toBe(3);
    expect(variant.output_path).toBe(path.join(outputDir, 'wide-strip-tol0.png'));
    expect(variant.outline_path).toBeNull();

    const out = await readRaster(variant.output_path);
    for (let y = 0; y < 3; y++) {
      for (let x = 0; x < 2; x++) {
        expect(out.getPixel(x, y).equals(source.getPixel(y, x))).toBe(true);
      }
    }
    expect(fs.existsSync(summaryFile)).toBe(true);
  });

  it('keeps a variant whose outline cannot be written', async () => {
    const imagePath = await writeSource('outline-blocked.png', primaries());
    const outputDir = path.join(root, 'outline-blocked');
    // a directory in the way makes the overlay write fail
    fs.mkdirSync(path.join(outputDir, 'outline-blocked-tol0.outline.png'), { recursive: true });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const payload = await new QTreeCompressor({
      imagePath,
      outputDir,
      tolerances: [0],
      outline: true,
    }).run();

    expect(payload.variants).toEqual([
      {
        tolerance: 0,
        nodes: 5,
        leaves: 4,
        leaf_ratio: 1,
        width: 2,
        height: 2,
        output_path: path.join(outputDir, 'outline-blocked-tol0.png'),
        outline_path: null,
      },
    ]);
    expect(fs.existsSync(path.join(outputDir, 'outline-blocked-tol0.png'))).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0]).startsWith('   ⚠️ [tol=0] Writing outline failed. ')).toBe(true);
  });

  it('fails the run when the source cannot be read', async () => {
    const compressor = new QTreeCompressor({
      imagePath: path.join(root, 'missing.png'),
      outputDir: path.join(root, 'never'),
      tolerances: [1],
    });
    await expect(compressor.run()).rejects.toThrow();
    expect(fs.existsSync(path.join(root, 'never'))).toBe(false);
  });
});

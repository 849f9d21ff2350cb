import { z } from 'zod';
import fs from 'fs';
import path from 'path';

import { QTree } from './qtree';
import { RasterImage } from './raster';
import { readRaster, writeRaster } from './raster-io';
import { outlineLeaves } from './outline';
import {
  logErrorDetails,
  runWithConcurrency,
  sanitizeFilePart,
  toleranceLabel,
} from './compression-utils';
import type { CompressionPayload, VariantSummary } from './types';

// ==========================================
// CONFIG SCHEMA
// ==========================================

export const CompressConfigSchema = z.object({
  imagePath: z.string().min(1).describe('Source image (anything sharp can decode)'),
  outputDir: z.string().min(1).describe('Directory receiving rendered variants'),
  tolerances: z
    .array(z.number().finite().nonnegative())
    .min(1)
    .describe('One pruned variant is produced per tolerance'),
  scale: z.number().int().min(1).max(16).default(1),
  flip: z.boolean().default(false),
  rotations: z.number().int().min(0).max(3).default(0).describe('Counter-clockwise quarter turns'),
  outline: z.boolean().default(false),
  outlineColor: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).max(16).default(4),
  summaryFile: z.string().min(1).optional(),
  debug: z.boolean().default(false),
});

export type CompressOptions = z.input<typeof CompressConfigSchema>;
export type CompressConfig = z.output<typeof CompressConfigSchema> & { summaryFile: string };

export function parseCompressConfig(options: CompressOptions): CompressConfig {
  const parsed = CompressConfigSchema.parse(options);
  return {
    ...parsed,
    summaryFile: parsed.summaryFile ?? path.join(parsed.outputDir, 'summary.json'),
  };
}

/**
 * Distinct tolerances that produced no variant in the payload.
 */
export function missingTolerances(tolerances: number[], payload: CompressionPayload): number[] {
  const written = new Set(payload.variants.map((variant) => variant.tolerance));
  return [...new Set(tolerances)].filter((tolerance) => !written.has(tolerance));
}

// ==========================================
// CLASS
// ==========================================

export class QTreeCompressor {
  private config: CompressConfig;
  private source: RasterImage | null = null;

  constructor(options: CompressOptions) {
    this.config = parseCompressConfig(options);
  }

  async init() {
    this.log(`Reading ${this.config.imagePath}`);
    this.source = await readRaster(this.config.imagePath);
  }

  /**
   * Flip first, then the configured number of quarter turns.
   */
  applyTransforms(tree: QTree): QTree {
    if (this.config.flip) tree.flipHorizontal();
    for (let i = 0; i < this.config.rotations; i++) {
      tree.rotateCCW();
    }
    return tree;
  }

  /**
   * The render is already on disk by now, so a failed overlay only drops
   * the outline path from the variant.
   */
  private async writeOutline(tree: QTree, outputPath: string, logPrefix: string): Promise<string | null> {
    try {
      await outlineLeaves({
        tree,
        scale: this.config.scale,
        outputPath,
        color: this.config.outlineColor,
      });
      return outputPath;
    } catch (error) {
      logErrorDetails(`   ⚠️ ${logPrefix} Writing outline failed. `, error);
      return null;
    }
  }

  async processVariant(
    base: QTree,
    tolerance: number,
    stem: string,
    pixelCount: number
  ): Promise<VariantSummary | null> {
    const logPrefix = `[tol=${tolerance}]`;
    const tree = base.copy();
    tree.prune(tolerance);
    this.applyTransforms(tree);

    const nodes = tree.countNodes();
    const leaves = tree.countLeaves();
    this.log(`${logPrefix} ${nodes} nodes, ${leaves} leaves after pruning`);

    const label = toleranceLabel(tolerance);
    const outputPath = path.join(this.config.outputDir, `${stem}-tol${label}.png`);
    let outlinePath: string | null = null;

    try {
      const rendered = tree.render(this.config.scale);
      await writeRaster(rendered, outputPath);

      if (this.config.outline) {
        const target = path.join(this.config.outputDir, `${stem}-tol${label}.outline.png`);
        outlinePath = await this.writeOutline(tree, target, logPrefix);
      }

      console.log(`   ✅ ${logPrefix} ${leaves} leaves → ${outputPath}`);

      return {
        tolerance,
        nodes,
        leaves,
        leaf_ratio: Number((leaves / pixelCount).toFixed(4)),
        width: rendered.width,
        height: rendered.height,
        output_path: outputPath,
        outline_path: outlinePath,
      };
    } catch (error) {
      logErrorDetails(`   ⚠️ ${logPrefix} Writing variant failed. `, error);
      return null;
    }
  }

  async run(): Promise<CompressionPayload> {
    await this.init();
    if (!this.source) throw new Error('No image loaded');

    const { width, height } = this.source;
    console.log(`🚀 Building quadtree for ${width}x${height} image...`);

    const base = QTree.fromRaster(this.source);
    const baseNodes = base.countNodes();
    const baseLeaves = base.countLeaves();
    const baseDepth = base.depth();
    console.log(
      `   Nodes: ${baseNodes.toLocaleString()}, Leaves: ${baseLeaves.toLocaleString()}, Depth: ${baseDepth}`
    );

    if (!fs.existsSync(this.config.outputDir)) {
      fs.mkdirSync(this.config.outputDir, { recursive: true });
    }

    const stem = sanitizeFilePart(path.parse(this.config.imagePath).name) || 'image';
    const tolerances = Array.from(new Set(this.config.tolerances));

    console.log(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
    console.log(`OUTPUT: Pruning ${tolerances.length} variant(s) at ${this.config.scale}x`);
    console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);

    const results = await runWithConcurrency(tolerances, this.config.concurrency, (tolerance) =>
      this.processVariant(base, tolerance, stem, width * height)
    );
    const variants = results.filter((v): v is VariantSummary => v !== null);

    const payload: CompressionPayload = {
      strategy: 'quadtree-prune',
      image_path: this.config.imagePath,
      generated_at: new Date().toISOString(),
      scale: this.config.scale,
      flip: this.config.flip,
      rotations: this.config.rotations,
      source: { width, height, nodes: baseNodes, leaves: baseLeaves, depth: baseDepth },
      variants,
    };

    const summaryDir = path.dirname(this.config.summaryFile);
    if (!fs.existsSync(summaryDir)) {
      fs.mkdirSync(summaryDir, { recursive: true });
    }
    fs.writeFileSync(this.config.summaryFile, JSON.stringify(payload, null, 2));
    console.log(`\n📂 Summary written to ${this.config.summaryFile}`);

    return payload;
  }

  private log(message: string) {
    if (this.config.debug) {
      console.log(`[QTreeCompressor] ${message}`);
    }
  }
}

#!/usr/bin/env npx tsx
/**
 * CLI wrapper for quadtree compression
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { QTreeCompressor, missingTolerances, type CompressOptions } from '../src/lib/compressor';
import { formatError } from '../src/lib/compression-utils';

dotenv.config();

// Defaults from environment
const DEFAULT_TOLERANCES = parseToleranceList(process.env.QTREE_TOLERANCES || '0,10,50,100');
const DEFAULT_SCALE = Number(process.env.QTREE_SCALE || 1);
const DEFAULT_CONCURRENCY = Number(process.env.QTREE_CONCURRENCY || 4);
const DEFAULT_OUTPUT_DIR = process.env.QTREE_OUTPUT_DIR || 'output';

function parseToleranceList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

function printHelp() {
  console.log(`
Usage: npx tsx scripts/compress.ts -i <image> [options]

Builds a quadtree of the image, prunes one copy per tolerance and renders each.

Options:
  -i, --image <path>          Input image path
  -o, --output <dir>          Output directory (default: ${DEFAULT_OUTPUT_DIR})
  -t, --tolerance <n>         Prune tolerance; repeat for several variants
                              (default: ${DEFAULT_TOLERANCES.join(',')})
      --scale <n>             Integer upscale factor, 1-16 (default: ${DEFAULT_SCALE})
      --flip                  Mirror horizontally before rendering
      --rotate <n>            Counter-clockwise quarter turns, 0-3 (default: 0)
      --outline               Also write images with leaf borders drawn
      --outline-color <css>   Border color (default: #ff00ff)
      --concurrency <n>       Variants written in parallel (default: ${DEFAULT_CONCURRENCY})
      --summary <path>        Summary JSON path (default: <output>/summary.json)
      --force                 Overwrite an existing summary
      --debug                 Verbose logging
  -h, --help                  Show help
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

function requireInteger(args: string[], index: number, flag: string, min: number, max: number): number {
  const value = Number(requireValue(args, index, flag));
  if (!Number.isInteger(value) || value < min || value > max) {
    console.error(`❌ Invalid value for ${flag}: ${args[index + 1]} (must be ${min}-${max})`);
    process.exit(1);
  }
  return value;
}

type CLIConfig = CompressOptions & { force: boolean };

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    imagePath: '',
    outputDir: DEFAULT_OUTPUT_DIR,
    tolerances: [],
    scale: DEFAULT_SCALE,
    flip: false,
    rotations: 0,
    outline: false,
    concurrency: DEFAULT_CONCURRENCY,
    debug: false,
    force: false,
  };
  const tolerances: number[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output':
        config.outputDir = requireValue(args, i, arg);
        i++;
        break;
      case '-t':
      case '--tolerance': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isFinite(value) || value < 0) {
          console.error(`❌ Invalid value for ${arg}: ${args[i + 1]} (must be >= 0)`);
          process.exit(1);
        }
        tolerances.push(value);
        i++;
        break;
      }
      case '--scale':
        config.scale = requireInteger(args, i, arg, 1, 16);
        i++;
        break;
      case '--flip':
        config.flip = true;
        break;
      case '--rotate':
        config.rotations = requireInteger(args, i, arg, 0, 3);
        i++;
        break;
      case '--outline':
        config.outline = true;
        break;
      case '--outline-color':
        config.outlineColor = requireValue(args, i, arg);
        i++;
        break;
      case '--concurrency':
        config.concurrency = requireInteger(args, i, arg, 1, 16);
        i++;
        break;
      case '--summary':
        config.summaryFile = requireValue(args, i, arg);
        i++;
        break;
      case '--force':
        config.force = true;
        break;
      case '--debug':
        config.debug = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        if (arg.startsWith('-')) {
          console.warn(`⚠️ Unknown argument ignored: ${arg}`);
        } else if (!config.imagePath) {
          config.imagePath = arg;
        }
    }
  }

  config.tolerances = tolerances.length > 0 ? tolerances : DEFAULT_TOLERANCES;

  if (!config.imagePath) {
    console.error(`❌ No input specified.`);
    console.error(`   Usage: npx tsx scripts/compress.ts -i <image> [-t <tolerance>]...`);
    process.exit(1);
  }
  if (!fs.existsSync(config.imagePath)) {
    console.error(`❌ Image not found: ${config.imagePath}`);
    process.exit(1);
  }

  const summaryFile = config.summaryFile ?? path.join(config.outputDir, 'summary.json');
  if (fs.existsSync(summaryFile) && !config.force) {
    console.error(`❌ Summary already exists: ${summaryFile}`);
    console.error(`   Use --force to overwrite.`);
    process.exit(1);
  }

  return config;
}

async function main() {
  const cliConfig = parseArgs();
  const { force, ...options } = cliConfig;

  console.log(`🗜️  Compressing ${options.imagePath}`);
  console.log(`   Output: ${options.outputDir}/`);
  console.log(`   Tolerances: ${options.tolerances.join(', ')}, Scale: ${options.scale}x`);

  try {
    const compressor = new QTreeCompressor(options);
    const payload = await compressor.run();
    const missing = missingTolerances(options.tolerances, payload);
    if (missing.length > 0) {
      console.error(`❌ ${missing.length} variant(s) failed: tolerance ${missing.join(', ')}`);
      process.exit(1);
    }
    console.log(`\n🎉 Done!`);
  } catch (error) {
    console.error(`❌ ${formatError(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

void main();

import { QTree } from './qtree';
import { applyOutputFormat, formatFromPath, rasterPipeline } from './raster-io';
import { escapeSvgAttribute } from './compression-utils';
import type { LeafRegion } from './types';

const DEFAULT_OUTLINE_COLOR = '#ff00ff';

export function buildOutlineSvg(
  width: number,
  height: number,
  regions: LeafRegion[],
  scale: number,
  color: string = DEFAULT_OUTLINE_COLOR
) {
  // Thin lines at 1x would cover the pixels they outline
  const thickness = scale >= 4 ? Math.max(1, Math.round(scale / 4)) : 1;
  const stroke = escapeSvgAttribute(color);

  const elements = regions
    .map((region) => {
      const x = region.upLeft.x * scale;
      const y = region.upLeft.y * scale;
      const w = (region.lowRight.x - region.upLeft.x + 1) * scale;
      const h = (region.lowRight.y - region.upLeft.y + 1) * scale;
      return `  <rect x="${x}" y="${y}" width="${w}" height="${h}" fill="none" stroke="${stroke}" stroke-width="${thickness}" />`;
    })
    .join('\n');

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${elements}
</svg>
`.trim();
}

/**
 * Renders the tree and draws every leaf rectangle's border on top,
 * showing where pruning merged pixels into larger regions.
 */
export async function outlineLeaves(options: {
  tree: QTree;
  scale: number;
  outputPath: string;
  color?: string;
}) {
  const rendered = options.tree.render(options.scale);
  const svg = buildOutlineSvg(
    rendered.width,
    rendered.height,
    options.tree.leafRegions(),
    options.scale,
    options.color
  );

  const pipeline = applyOutputFormat(
    rasterPipeline(rendered).composite([{ input: Buffer.from(svg), top: 0, left: 0 }]),
    formatFromPath(options.outputPath)
  );

  await pipeline.toFile(options.outputPath);
}

import type { RGBAPixel } from './rgba-pixel';

export type Point = {
  x: number;
  y: number;
};

export type LeafRegion = {
  upLeft: Point;
  lowRight: Point;
  avg: RGBAPixel;
};

export type Quadrant = 'nw' | 'ne' | 'sw' | 'se';

/**
 * Detached copy of one tree node, handed to traversal callbacks.
 * `quadrants` lists the children present, in NW, NE, SW, SE order.
 */
export type NodeSnapshot = LeafRegion & {
  isLeaf: boolean;
  quadrants: Quadrant[];
};

export type OutputFormat = 'png' | 'webp' | 'avif';

export type VariantSummary = {
  tolerance: number;
  nodes: number;
  leaves: number;
  leaf_ratio: number; // leaves / source pixel count
  width: number;
  height: number;
  output_path: string;
  outline_path?: string | null;
};

export type CompressionPayload = {
  strategy: 'quadtree-prune';
  image_path: string;
  generated_at: string;

  // Transform config
  scale: number;
  flip: boolean;
  rotations: number;

  source: {
    width: number;
    height: number;
    nodes: number;
    leaves: number;
    depth: number;
  };

  variants: VariantSummary[];
};

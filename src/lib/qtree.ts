/**
 * QTree - quadtree decomposition of a raster image
 *
 * Features:
 * - Exact area-weighted color averages for every rectangle
 * - Lossy pruning of near-uniform subtrees
 * - In-place horizontal flip and 90° counter-clockwise rotation
 * - Nearest-neighbor rendering at any integer upscale
 */

import { RasterImage } from './raster';
import { RGBAPixel } from './rgba-pixel';
import type { LeafRegion, NodeSnapshot, Point, Quadrant } from './types';

// ==========================================
// ERRORS
// ==========================================

export class QTreeStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QTreeStateError';
  }
}

// ==========================================
// NODE
// ==========================================

export class QTreeNode {
  upLeft: Point;
  lowRight: Point;
  avg: RGBAPixel;
  nw: QTreeNode | null = null;
  ne: QTreeNode | null = null;
  sw: QTreeNode | null = null;
  se: QTreeNode | null = null;

  constructor(upLeft: Point, lowRight: Point, avg: RGBAPixel) {
    this.upLeft = { ...upLeft };
    this.lowRight = { ...lowRight };
    this.avg = avg;
  }

  get isLeaf(): boolean {
    return !this.nw && !this.ne && !this.sw && !this.se;
  }

  get area(): number {
    return (this.lowRight.x - this.upLeft.x + 1) * (this.lowRight.y - this.upLeft.y + 1);
  }

  children(): QTreeNode[] {
    const present: QTreeNode[] = [];
    if (this.nw) present.push(this.nw);
    if (this.ne) present.push(this.ne);
    if (this.sw) present.push(this.sw);
    if (this.se) present.push(this.se);
    return present;
  }
}

// ==========================================
// BUILD HELPERS
// ==========================================

function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Per-channel mean of the children's averages weighted by their areas.
 * Integer channels are truncated; alpha stays real-valued.
 */
function areaWeightedAverage(children: QTreeNode[], totalArea: number): RGBAPixel {
  let totalR = 0;
  let totalG = 0;
  let totalB = 0;
  let totalA = 0;

  for (const child of children) {
    const area = child.area;
    totalR += child.avg.r * area;
    totalG += child.avg.g * area;
    totalB += child.avg.b * area;
    totalA += child.avg.a * area;
  }

  return new RGBAPixel(
    Math.trunc(totalR / totalArea),
    Math.trunc(totalG / totalArea),
    Math.trunc(totalB / totalArea),
    totalA / totalArea
  );
}

/**
 * Splits [ul, lr] at the floor midpoint, so odd rows/columns land in the
 * upper/left half. A one-column rectangle only gets NW/SW; a one-row
 * rectangle only gets NW/NE.
 */
function buildNode(img: RasterImage, ul: Point, lr: Point): QTreeNode {
  if (pointsEqual(ul, lr)) {
    return new QTreeNode(ul, lr, img.getPixel(ul.x, ul.y).clone());
  }

  const midX = Math.floor((ul.x + lr.x) / 2);
  const midY = Math.floor((ul.y + lr.y) / 2);

  const nw = buildNode(img, ul, { x: midX, y: midY });
  let ne: QTreeNode | null = null;
  let sw: QTreeNode | null = null;
  let se: QTreeNode | null = null;

  if (ul.x === lr.x) {
    sw = buildNode(img, { x: ul.x, y: midY + 1 }, { x: midX, y: lr.y });
  } else {
    ne = buildNode(img, { x: midX + 1, y: ul.y }, { x: lr.x, y: midY });
    if (ul.y !== lr.y) {
      sw = buildNode(img, { x: ul.x, y: midY + 1 }, { x: midX, y: lr.y });
      se = buildNode(img, { x: midX + 1, y: midY + 1 }, lr);
    }
  }

  const node = new QTreeNode(ul, lr, new RGBAPixel());
  node.nw = nw;
  node.ne = ne;
  node.sw = sw;
  node.se = se;
  node.avg = areaWeightedAverage(node.children(), node.area);
  return node;
}

// ==========================================
// TRAVERSAL HELPERS
// ==========================================

function copyNode(node: QTreeNode | null): QTreeNode | null {
  if (!node) return null;

  const clone = new QTreeNode(node.upLeft, node.lowRight, node.avg.clone());
  clone.nw = copyNode(node.nw);
  clone.ne = copyNode(node.ne);
  clone.sw = copyNode(node.sw);
  clone.se = copyNode(node.se);
  return clone;
}

function releaseChildren(node: QTreeNode | null): void {
  if (!node) return;

  releaseChildren(node.nw);
  releaseChildren(node.ne);
  releaseChildren(node.sw);
  releaseChildren(node.se);

  node.nw = null;
  node.ne = null;
  node.sw = null;
  node.se = null;
}

function countNodes(node: QTreeNode | null): number {
  if (!node) return 0;
  return 1 + countNodes(node.nw) + countNodes(node.ne) + countNodes(node.sw) + countNodes(node.se);
}

function countLeaves(node: QTreeNode | null): number {
  if (!node) return 0;
  if (node.isLeaf) return 1;
  return countLeaves(node.nw) + countLeaves(node.ne) + countLeaves(node.sw) + countLeaves(node.se);
}

function collectLeaves(node: QTreeNode | null, out: LeafRegion[]): void {
  if (!node) return;
  if (node.isLeaf) {
    out.push({ upLeft: { ...node.upLeft }, lowRight: { ...node.lowRight }, avg: node.avg.clone() });
    return;
  }
  collectLeaves(node.nw, out);
  collectLeaves(node.ne, out);
  collectLeaves(node.sw, out);
  collectLeaves(node.se, out);
}

function snapshotNode(node: QTreeNode): NodeSnapshot {
  const quadrants: Quadrant[] = [];
  if (node.nw) quadrants.push('nw');
  if (node.ne) quadrants.push('ne');
  if (node.sw) quadrants.push('sw');
  if (node.se) quadrants.push('se');
  return {
    upLeft: { ...node.upLeft },
    lowRight: { ...node.lowRight },
    avg: node.avg.clone(),
    isLeaf: node.isLeaf,
    quadrants,
  };
}

function visitNode(
  node: QTreeNode | null,
  depth: number,
  visit: (node: QTreeNode, depth: number) => void
): void {
  if (!node) return;
  visit(node, depth);
  visitNode(node.nw, depth + 1, visit);
  visitNode(node.ne, depth + 1, visit);
  visitNode(node.sw, depth + 1, visit);
  visitNode(node.se, depth + 1, visit);
}

function fillBlock(
  img: RasterImage,
  startX: number,
  startY: number,
  blockW: number,
  blockH: number,
  color: RGBAPixel
): void {
  for (let y = startY; y < startY + blockH; y++) {
    for (let x = startX; x < startX + blockW; x++) {
      img.setPixel(x, y, color);
    }
  }
}

function renderNode(node: QTreeNode | null, img: RasterImage, scale: number): void {
  if (!node) return;

  if (node.isLeaf) {
    const blockW = (node.lowRight.x - node.upLeft.x + 1) * scale;
    const blockH = (node.lowRight.y - node.upLeft.y + 1) * scale;
    fillBlock(img, node.upLeft.x * scale, node.upLeft.y * scale, blockW, blockH, node.avg);
    return;
  }

  renderNode(node.nw, img, scale);
  renderNode(node.ne, img, scale);
  renderNode(node.sw, img, scale);
  renderNode(node.se, img, scale);
}

function leavesWithinTolerance(node: QTreeNode | null, avg: RGBAPixel, tolerance: number): boolean {
  if (!node) return true;
  if (node.isLeaf) return node.avg.distanceTo(avg) <= tolerance;

  return (
    leavesWithinTolerance(node.nw, avg, tolerance) &&
    leavesWithinTolerance(node.ne, avg, tolerance) &&
    leavesWithinTolerance(node.sw, avg, tolerance) &&
    leavesWithinTolerance(node.se, avg, tolerance)
  );
}

// Each node is tested once; children are only visited when their parent stays.
function pruneNode(node: QTreeNode | null, tolerance: number): void {
  if (!node || node.isLeaf) return;

  if (leavesWithinTolerance(node, node.avg, tolerance)) {
    releaseChildren(node);
    return;
  }

  pruneNode(node.nw, tolerance);
  pruneNode(node.ne, tolerance);
  pruneNode(node.sw, tolerance);
  pruneNode(node.se, tolerance);
}

function flipNode(node: QTreeNode | null, width: number): void {
  if (!node) return;

  [node.nw, node.ne] = [node.ne, node.nw];
  [node.sw, node.se] = [node.se, node.sw];

  let left = width - 1 - node.lowRight.x;
  let right = width - 1 - node.upLeft.x;
  if (left > right) [left, right] = [right, left];
  node.upLeft.x = left;
  node.lowRight.x = right;

  flipNode(node.nw, width);
  flipNode(node.ne, width);
  flipNode(node.sw, width);
  flipNode(node.se, width);
}

/**
 * `height` is the rotated image's height, i.e. the width before rotation.
 */
function rotateNode(node: QTreeNode | null, height: number): void {
  if (!node) return;

  const { nw, ne, sw, se } = node;
  node.nw = ne;
  node.sw = nw;
  node.se = sw;
  node.ne = se;

  const upLeft = { x: node.upLeft.y, y: height - node.lowRight.x - 1 };
  const lowRight = { x: node.lowRight.y, y: height - node.upLeft.x - 1 };
  node.upLeft = upLeft;
  node.lowRight = lowRight;

  rotateNode(node.nw, height);
  rotateNode(node.ne, height);
  rotateNode(node.se, height);
  rotateNode(node.sw, height);
}

// ==========================================
// TREE
// ==========================================

export class QTree {
  private root: QTreeNode | null;
  private _width: number;
  private _height: number;
  private pruned = false;

  private constructor(root: QTreeNode | null, width: number, height: number) {
    this.root = root;
    this._width = width;
    this._height = height;
  }

  /**
   * Builds a tree whose leaves are the individual pixels of `img`.
   */
  static fromRaster(img: RasterImage): QTree {
    const root = buildNode(img, { x: 0, y: 0 }, { x: img.width - 1, y: img.height - 1 });
    return new QTree(root, img.width, img.height);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get isEmpty(): boolean {
    return this.root === null;
  }

  /**
   * True once `prune` has run on this tree or on the tree it was copied from.
   */
  get isPruned(): boolean {
    return this.pruned;
  }

  get rootAverage(): RGBAPixel | null {
    return this.root ? this.root.avg.clone() : null;
  }

  countNodes(): number {
    return countNodes(this.root);
  }

  countLeaves(): number {
    return countLeaves(this.root);
  }

  /**
   * Number of levels; a single-leaf tree has depth 1, an empty tree 0.
   */
  depth(): number {
    let levels = 0;
    visitNode(this.root, 1, (_node, depth) => {
      levels = Math.max(levels, depth);
    });
    return levels;
  }

  /**
   * Visits every node top-down, each parent before its NW, NE, SW, SE children.
   * The visitor receives copies; writing to them leaves the tree untouched.
   */
  forEachNode(visit: (node: NodeSnapshot, depth: number) => void): void {
    visitNode(this.root, 0, (node, depth) => visit(snapshotNode(node), depth));
  }

  leafRegions(): LeafRegion[] {
    const regions: LeafRegion[] = [];
    collectLeaves(this.root, regions);
    return regions;
  }

  /**
   * Draws every leaf's rectangle in its average color, each source pixel
   * becoming a `scale` x `scale` block. No interpolation.
   */
  render(scale = 1): RasterImage {
    if (!Number.isInteger(scale) || scale < 1) {
      throw new RangeError(`Invalid render scale: ${scale} (must be a positive integer)`);
    }
    const root = this.requireRoot('render');

    const img = new RasterImage(this._width * scale, this._height * scale);
    renderNode(root, img, scale);
    return img;
  }

  /**
   * Collapses, as high in the tree as possible, every subtree whose leaves
   * are all within `tolerance` of the subtree root's average.
   * A tree can only be pruned once; copies inherit that restriction.
   */
  prune(tolerance: number): void {
    if (!Number.isFinite(tolerance) || tolerance < 0) {
      throw new RangeError(`Invalid prune tolerance: ${tolerance} (must be a non-negative number)`);
    }
    const root = this.requireRoot('prune');
    if (this.pruned) {
      throw new QTreeStateError('Tree has already been pruned; prune a fresh tree built from the source image');
    }

    pruneNode(root, tolerance);
    this.pruned = true;
  }

  /**
   * Mirrors the rendered image across a vertical axis. After flipping,
   * western children may be absent where eastern ones were before.
   */
  flipHorizontal(): void {
    const root = this.requireRoot('flipHorizontal');
    flipNode(root, this._width);
  }

  /**
   * Rotates the rendered image 90° counter-clockwise; width and height swap.
   */
  rotateCCW(): void {
    const root = this.requireRoot('rotateCCW');
    [this._width, this._height] = [this._height, this._width];
    rotateNode(root, this._height);
  }

  /**
   * Deep clone sharing no nodes with this tree.
   */
  copy(): QTree {
    const clone = new QTree(copyNode(this.root), this._width, this._height);
    clone.pruned = this.pruned;
    return clone;
  }

  /**
   * Replaces this tree's contents with a deep copy of `other`.
   */
  assign(other: QTree): this {
    if (other === this) return this;

    this.clear();
    this.root = copyNode(other.root);
    this._width = other._width;
    this._height = other._height;
    this.pruned = other.pruned;
    return this;
  }

  /**
   * Releases every node. The tree is empty afterwards.
   */
  clear(): void {
    releaseChildren(this.root);
    this.root = null;
    this._width = 0;
    this._height = 0;
    this.pruned = false;
  }

  private requireRoot(operation: string): QTreeNode {
    if (!this.root) {
      throw new QTreeStateError(`Cannot ${operation} an empty tree`);
    }
    return this.root;
  }
}

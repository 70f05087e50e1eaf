/**
 * Region quad-tree for per-frame neighbour queries
 *
 * The tree is rebuilt from scratch every frame: `clear()`, then `insert()` each
 * item. It holds references only; items keep moving after insertion and a
 * query tests their current positions against the range.
 */

import type { BoundingBox2D, Point2D, Region } from '@pulsefield/core/coords';
import {
  boundingBoxToRegion,
  boundingBoxesIntersect,
  pointInBoundingBox,
  regionToBoundingBox,
  splitBoundingBox,
} from '@pulsefield/core/coords';
import { DEFAULT_NODE_CAPACITY, DEFAULT_MAX_DEPTH } from '@pulsefield/shared';

// ============================================================================
// Node Types
// ============================================================================

/** Node holding items directly */
export interface QuadLeaf<T> {
  kind: 'leaf';
  bounds: BoundingBox2D;
  depth: number;
  items: T[];
}

/** Node delegating to four children, in NW, NE, SW, SE order */
export interface QuadInternal<T> {
  kind: 'internal';
  bounds: BoundingBox2D;
  depth: number;
  children: [QuadNode<T>, QuadNode<T>, QuadNode<T>, QuadNode<T>];
}

export type QuadNode<T> = QuadLeaf<T> | QuadInternal<T>;

export interface QuadTreeOptions {
  /** Items a leaf holds before subdividing (default 4) */
  capacity?: number;
  /** Leaves at this depth never subdivide and may exceed capacity (default 12) */
  maxDepth?: number;
}

function createLeaf<T>(bounds: BoundingBox2D, depth: number): QuadLeaf<T> {
  return { kind: 'leaf', bounds, depth, items: [] };
}

// ============================================================================
// QuadTree
// ============================================================================

export class QuadTree<T extends Point2D> {
  readonly region: Region;
  readonly capacity: number;
  readonly maxDepth: number;
  private _root: QuadNode<T>;
  private count = 0;

  constructor(region: Region, options: QuadTreeOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_NODE_CAPACITY;
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`QuadTree capacity must be a positive integer, got ${capacity}`);
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`QuadTree maxDepth must be a non-negative integer, got ${maxDepth}`);
    }
    if (!(region.w > 0 && region.h > 0) || !Number.isFinite(region.w) || !Number.isFinite(region.h)) {
      throw new RangeError(`QuadTree region must have a positive finite size, got ${region.w}x${region.h}`);
    }

    this.region = { ...region };
    this.capacity = capacity;
    this.maxDepth = maxDepth;
    this._root = createLeaf(regionToBoundingBox(region), 0);
  }

  /** Read-only view of the root node */
  get root(): QuadNode<T> {
    return this._root;
  }

  /** Number of items held */
  get size(): number {
    return this.count;
  }

  /** Deepest level reached (0 while the root is a leaf) */
  get depth(): number {
    let deepest = 0;
    this.visit((node) => {
      if (node.depth > deepest) deepest = node.depth;
    });
    return deepest;
  }

  /**
   * Insert an item. Returns false when its position lies outside the tree.
   */
  insert(item: T): boolean {
    if (!pointInBoundingBox(item, this._root.bounds)) {
      return false;
    }
    this._root = this.makeRoom(this._root);
    const accepted = this.insertInto(this._root, item);
    if (accepted) this.count++;
    return accepted;
  }

  /**
   * Insert several items, returning how many were rejected
   */
  insertAll(items: Iterable<T>): number {
    let rejected = 0;
    for (const item of items) {
      if (!this.insert(item)) rejected++;
    }
    return rejected;
  }

  /**
   * Items whose position lies inside `range`. Subtrees whose bounds do not
   * touch the range are skipped. Results come leaf by leaf in NW, NE, SW, SE
   * order, each leaf in insertion order.
   */
  query(range: Region): T[] {
    const found: T[] = [];
    this.queryInto(this._root, regionToBoundingBox(range), found);
    return found;
  }

  /** Drop every item and child, leaving an empty root leaf */
  clear(): void {
    this._root = createLeaf(this._root.bounds, 0);
    this.count = 0;
  }

  /** Every node's region in pre-order, for debug overlays */
  regions(): Region[] {
    const regions: Region[] = [];
    this.visit((node) => regions.push(boundingBoxToRegion(node.bounds)));
    return regions;
  }

  /** Pre-order walk over all nodes */
  visit(fn: (node: QuadNode<T>) => void): void {
    const stack: QuadNode<T>[] = [this._root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      fn(node);
      if (node.kind === 'internal') {
        // Pushed in reverse so NW is visited first
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Place an item that lies inside `node`, which must already have room */
  private insertInto(node: QuadNode<T>, item: T): boolean {
    if (node.kind === 'leaf') {
      node.items.push(item);
      return true;
    }

    const children = node.children;
    for (let i = 0; i < children.length; i++) {
      if (!pointInBoundingBox(item, children[i].bounds)) continue;
      children[i] = this.makeRoom(children[i]);
      return this.insertInto(children[i], item);
    }
    return false;
  }

  /** A full leaf shallower than maxDepth is replaced by its four children */
  private makeRoom(node: QuadNode<T>): QuadNode<T> {
    if (node.kind === 'leaf' && node.items.length >= this.capacity && node.depth < this.maxDepth) {
      return this.subdivide(node);
    }
    return node;
  }

  /**
   * Split a leaf into four children at its midpoint and push its items down.
   * The children partition the leaf exactly, so every held item finds a home.
   */
  private subdivide(leaf: QuadLeaf<T>): QuadInternal<T> {
    const [nw, ne, sw, se] = splitBoundingBox(leaf.bounds);
    const depth = leaf.depth + 1;
    const internal: QuadInternal<T> = {
      kind: 'internal',
      bounds: leaf.bounds,
      depth: leaf.depth,
      children: [createLeaf(nw, depth), createLeaf(ne, depth), createLeaf(sw, depth), createLeaf(se, depth)],
    };

    for (const item of leaf.items) {
      this.insertInto(internal, item);
    }
    return internal;
  }

  private queryInto(node: QuadNode<T>, range: BoundingBox2D, found: T[]): void {
    if (!boundingBoxesIntersect(node.bounds, range)) return;

    if (node.kind === 'leaf') {
      for (const item of node.items) {
        if (pointInBoundingBox(item, range)) found.push(item);
      }
      return;
    }

    for (const child of node.children) {
      this.queryInto(child, range, found);
    }
  }
}

/**
 * Unit tests for @pulsefield/geo spatial module
 * Tests the region quad-tree
 */

import { describe, it, expect } from 'vitest';
import { QuadTree, type QuadNode } from './index.js';
import { pointInRegion, type Point2D, type Region } from '@pulsefield/core/coords';
import { createSeededRandom } from '@pulsefield/shared';

interface TestItem extends Point2D {
  id: number;
}

const BOUNDS: Region = { x: 50, y: 50, w: 100, h: 100 };

function randomItems(count: number, seed: number): TestItem[] {
  const random = createSeededRandom(seed);
  return Array.from({ length: count }, (_, id) => ({ id, x: random() * 100, y: random() * 100 }));
}

function shuffled<T>(items: T[], seed: number): T[] {
  const random = createSeededRandom(seed);
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

function ids(items: TestItem[]): number[] {
  return items.map((item) => item.id).sort((a, b) => a - b);
}

function checkNodeInvariant(node: QuadNode<TestItem>, capacity: number): void {
  if (node.kind === 'leaf') {
    expect(node.items.length).toBeLessThanOrEqual(capacity);
    return;
  }
  expect(node.children).toHaveLength(4);
  for (const child of node.children) {
    expect(child.depth).toBe(node.depth + 1);
    checkNodeInvariant(child, capacity);
  }
}

// ============================================================================
// Construction
// ============================================================================

describe('QuadTree construction', () => {
  it('creates an empty leaf root', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    expect(tree.size).toBe(0);
    expect(tree.depth).toBe(0);
    expect(tree.root.kind).toBe('leaf');
    expect(tree.capacity).toBe(4);
    expect(tree.regions()).toEqual([BOUNDS]);
  });

  it('rejects a non-positive or fractional capacity', () => {
    expect(() => new QuadTree<TestItem>(BOUNDS, { capacity: 0 })).toThrow(RangeError);
    expect(() => new QuadTree<TestItem>(BOUNDS, { capacity: -4 })).toThrow(RangeError);
    expect(() => new QuadTree<TestItem>(BOUNDS, { capacity: 2.5 })).toThrow(RangeError);
  });

  it('rejects a negative depth limit', () => {
    expect(() => new QuadTree<TestItem>(BOUNDS, { maxDepth: -1 })).toThrow(RangeError);
  });

  it('rejects an empty region', () => {
    expect(() => new QuadTree<TestItem>({ x: 0, y: 0, w: 0, h: 10 })).toThrow(RangeError);
    expect(() => new QuadTree<TestItem>({ x: 0, y: 0, w: 10, h: NaN })).toThrow(RangeError);
  });
});

// ============================================================================
// Insertion
// ============================================================================

describe('QuadTree insert', () => {
  it('accepts points on the minimum edges', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    expect(tree.insert({ id: 0, x: 0, y: 0 })).toBe(true);
    expect(tree.insert({ id: 1, x: 0, y: 99.5 })).toBe(true);
    expect(tree.size).toBe(2);
  });

  it('rejects points on the maximum edges or outside', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    expect(tree.insert({ id: 0, x: 100, y: 50 })).toBe(false);
    expect(tree.insert({ id: 1, x: 50, y: 100 })).toBe(false);
    expect(tree.insert({ id: 2, x: -0.1, y: 50 })).toBe(false);
    expect(tree.insert({ id: 3, x: NaN, y: 50 })).toBe(false);
    expect(tree.size).toBe(0);
  });

  it('subdivides once a leaf exceeds capacity', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 2 });
    tree.insert({ id: 0, x: 10, y: 10 });
    tree.insert({ id: 1, x: 60, y: 10 });
    expect(tree.root.kind).toBe('leaf');

    tree.insert({ id: 2, x: 10, y: 60 });
    const root = tree.root;
    expect(root.kind).toBe('internal');
    if (root.kind !== 'internal') return;

    const [nw, ne, sw, se] = root.children;
    expect(nw.kind === 'leaf' && nw.items.map((i) => i.id)).toEqual([0]);
    expect(ne.kind === 'leaf' && ne.items.map((i) => i.id)).toEqual([1]);
    expect(sw.kind === 'leaf' && sw.items.map((i) => i.id)).toEqual([2]);
    expect(se.kind === 'leaf' && se.items).toEqual([]);
    expect(tree.depth).toBe(1);
    expect(tree.regions()).toEqual([
      BOUNDS,
      { x: 25, y: 25, w: 50, h: 50 },
      { x: 75, y: 25, w: 50, h: 50 },
      { x: 25, y: 75, w: 50, h: 50 },
      { x: 75, y: 75, w: 50, h: 50 },
    ]);
  });

  it('keeps every leaf within capacity', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 3 });
    expect(tree.insertAll(randomItems(400, 7))).toBe(0);
    expect(tree.size).toBe(400);
    checkNodeInvariant(tree.root, 3);
  });

  it('places a point on a split line in the lower-bound child', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 1 });
    tree.insert({ id: 0, x: 25, y: 25 });
    tree.insert({ id: 1, x: 50, y: 50 });
    const root = tree.root;
    if (root.kind !== 'internal') throw new Error('expected subdivision');
    const se = root.children[3];
    expect(se.kind === 'leaf' && se.items.map((i) => i.id)).toEqual([1]);
  });

  it('stops subdividing at the depth limit', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 2, maxDepth: 3 });
    const items = Array.from({ length: 10 }, (_, id) => ({ id, x: 30, y: 30 }));
    expect(tree.insertAll(items)).toBe(0);
    expect(tree.depth).toBe(3);
    expect(ids(tree.query(BOUNDS))).toEqual(ids(items));
  });

  it('insertAll reports rejected items', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    const rejected = tree.insertAll([
      { id: 0, x: 5, y: 5 },
      { id: 1, x: 500, y: 5 },
      { id: 2, x: 5, y: -5 },
    ]);
    expect(rejected).toBe(2);
    expect(tree.size).toBe(1);
  });
});

// ============================================================================
// Query
// ============================================================================

describe('QuadTree query', () => {
  const items = randomItems(250, 11);

  it('returns every inserted item for the full bounds, once each', () => {
    for (const seed of [1, 2, 3]) {
      const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 4 });
      tree.insertAll(shuffled(items, seed));
      const found = tree.query(BOUNDS);
      expect(found).toHaveLength(items.length);
      expect(new Set(found).size).toBe(items.length);
      expect(ids(found)).toEqual(ids(items));
    }
  });

  it('matches a brute-force scan for sub-ranges', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 4 });
    tree.insertAll(items);
    const ranges: Region[] = [
      { x: 25, y: 25, w: 50, h: 50 },
      { x: 50, y: 50, w: 12, h: 12 },
      { x: 90, y: 10, w: 30, h: 8 },
      { x: 0, y: 0, w: 40, h: 40 },
    ];
    for (const range of ranges) {
      const expected = items.filter((item) => pointInRegion(item, range));
      expect(ids(tree.query(range))).toEqual(ids(expected));
    }
  });

  it('applies the half-open rule on split lines', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 1 });
    tree.insert({ id: 0, x: 25, y: 25 });
    tree.insert({ id: 1, x: 50, y: 50 });
    expect(tree.query({ x: 25, y: 25, w: 50, h: 50 }).map((i) => i.id)).toEqual([0]);
    expect(tree.query({ x: 75, y: 75, w: 50, h: 50 }).map((i) => i.id)).toEqual([1]);
  });

  it('returns nothing for a range outside the tree', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    tree.insertAll(items);
    expect(tree.query({ x: 500, y: 500, w: 10, h: 10 })).toEqual([]);
  });

  it('gives the same order for the same insertion order', () => {
    const a = new QuadTree<TestItem>(BOUNDS, { capacity: 4 });
    const b = new QuadTree<TestItem>(BOUNDS, { capacity: 4 });
    a.insertAll(items);
    b.insertAll(items);
    const range = { x: 40, y: 60, w: 50, h: 30 };
    expect(a.query(range).map((i) => i.id)).toEqual(b.query(range).map((i) => i.id));
  });

  it('returns the same set for capacity + 1 items in any order', () => {
    const batch: TestItem[] = [
      { id: 0, x: 10, y: 10 },
      { id: 1, x: 80, y: 15 },
      { id: 2, x: 50, y: 50 },
      { id: 3, x: 20, y: 70 },
      { id: 4, x: 75, y: 90 },
    ];
    const ranges: Region[] = [BOUNDS, { x: 25, y: 25, w: 50, h: 50 }, { x: 60, y: 60, w: 40, h: 40 }];
    const orders = [
      [0, 1, 2, 3, 4],
      [4, 3, 2, 1, 0],
      [2, 0, 4, 1, 3],
      [1, 4, 0, 3, 2],
    ];
    const resultsPerOrder = orders.map((order) => {
      const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 4 });
      tree.insertAll(order.map((i) => batch[i]));
      expect(tree.root.kind).toBe('internal');
      return ranges.map((range) => ids(tree.query(range)));
    });
    for (const results of resultsPerOrder) {
      expect(results).toEqual(resultsPerOrder[0]);
    }
  });

  it('tests current positions of items that moved after insertion', () => {
    const tree = new QuadTree<TestItem>(BOUNDS);
    const item = { id: 0, x: 10, y: 10 };
    tree.insert(item);
    item.x = 12;
    expect(tree.query({ x: 12, y: 10, w: 2, h: 2 })).toEqual([item]);
    item.x = 90;
    expect(tree.query({ x: 10, y: 10, w: 4, h: 4 })).toEqual([]);
  });
});

// ============================================================================
// Clear
// ============================================================================

describe('QuadTree clear', () => {
  it('resets to an empty leaf and accepts new items', () => {
    const tree = new QuadTree<TestItem>(BOUNDS, { capacity: 2 });
    tree.insertAll(randomItems(50, 3));
    expect(tree.root.kind).toBe('internal');

    tree.clear();
    expect(tree.size).toBe(0);
    expect(tree.root.kind).toBe('leaf');
    expect(tree.query(BOUNDS)).toEqual([]);
    expect(tree.regions()).toEqual([BOUNDS]);

    expect(tree.insert({ id: 99, x: 1, y: 1 })).toBe(true);
    expect(tree.query(BOUNDS).map((i) => i.id)).toEqual([99]);
  });
});

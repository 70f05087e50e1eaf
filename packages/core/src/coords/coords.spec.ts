/**
 * Unit tests for @pulsefield/core coords module
 * Tests region conversions, half-open containment and midpoint splitting
 */

import { describe, it, expect } from 'vitest';
import {
  regionToBoundingBox,
  boundingBoxToRegion,
  regionFromSize,
  squareAround,
  pointInBoundingBox,
  pointInRegion,
  boundingBoxesIntersect,
  splitBoundingBox,
  type BoundingBox2D,
  type Point2D,
} from './index.js';

/** Edge, midpoint, near-edge and interior sample values along one axis */
function axisSamples(min: number, max: number): number[] {
  const mid = (min + max) / 2;
  const span = max - min;
  const tiny = span * 1e-9;
  const values = [min, max, mid, min - tiny, min + tiny, max - tiny, max + tiny, mid - tiny, mid + tiny];
  for (let i = 1; i < 16; i++) {
    values.push(min + (span * i) / 16);
  }
  return values;
}

function samplePoints(box: BoundingBox2D): Point2D[] {
  const points: Point2D[] = [];
  for (const x of axisSamples(box.minX, box.maxX)) {
    for (const y of axisSamples(box.minY, box.maxY)) {
      points.push({ x, y });
    }
  }
  return points;
}

// ============================================================================
// Conversion Tests
// ============================================================================

describe('Region conversions', () => {
  it('converts a region to edges', () => {
    expect(regionToBoundingBox({ x: 50, y: 30, w: 100, h: 60 })).toEqual({
      minX: 0,
      minY: 0,
      maxX: 100,
      maxY: 60,
    });
  });

  it('converts edges back to a region', () => {
    expect(boundingBoxToRegion({ minX: 10, minY: 20, maxX: 30, maxY: 60 })).toEqual({
      x: 20,
      y: 40,
      w: 20,
      h: 40,
    });
  });

  it('builds a screen-sized region anchored at the origin', () => {
    expect(regionFromSize(800, 600)).toEqual({ x: 400, y: 300, w: 800, h: 600 });
  });

  it('builds a square around a point', () => {
    expect(squareAround({ x: 5, y: 7 }, 12)).toEqual({ x: 5, y: 7, w: 12, h: 12 });
  });
});

// ============================================================================
// Containment Tests
// ============================================================================

describe('pointInBoundingBox', () => {
  const box: BoundingBox2D = { minX: 0, minY: 0, maxX: 10, maxY: 10 };

  it('includes the minimum edges', () => {
    expect(pointInBoundingBox({ x: 0, y: 0 }, box)).toBe(true);
    expect(pointInBoundingBox({ x: 0, y: 5 }, box)).toBe(true);
  });

  it('excludes the maximum edges', () => {
    expect(pointInBoundingBox({ x: 10, y: 5 }, box)).toBe(false);
    expect(pointInBoundingBox({ x: 5, y: 10 }, box)).toBe(false);
    expect(pointInBoundingBox({ x: 10, y: 10 }, box)).toBe(false);
  });

  it('excludes NaN coordinates', () => {
    expect(pointInBoundingBox({ x: NaN, y: 5 }, box)).toBe(false);
  });

  it('pointInRegion applies the same rule', () => {
    const region = { x: 5, y: 5, w: 10, h: 10 };
    expect(pointInRegion({ x: 0, y: 0 }, region)).toBe(true);
    expect(pointInRegion({ x: 10, y: 0 }, region)).toBe(false);
  });
});

describe('boundingBoxesIntersect', () => {
  const a: BoundingBox2D = { minX: 0, minY: 0, maxX: 10, maxY: 10 };

  it('detects overlap', () => {
    expect(boundingBoxesIntersect(a, { minX: 5, minY: 5, maxX: 15, maxY: 15 })).toBe(true);
  });

  it('treats touching edges as overlapping', () => {
    expect(boundingBoxesIntersect(a, { minX: 10, minY: 0, maxX: 20, maxY: 10 })).toBe(true);
  });

  it('rejects boxes separated on either axis', () => {
    expect(boundingBoxesIntersect(a, { minX: 11, minY: 0, maxX: 20, maxY: 10 })).toBe(false);
    expect(boundingBoxesIntersect(a, { minX: 0, minY: -20, maxX: 10, maxY: -1 })).toBe(false);
  });

  it('detects containment', () => {
    expect(boundingBoxesIntersect(a, { minX: 2, minY: 2, maxX: 3, maxY: 3 })).toBe(true);
  });
});

// ============================================================================
// Subdivision Tests
// ============================================================================

describe('splitBoundingBox', () => {
  it('splits into NW, NE, SW, SE around the midpoint', () => {
    const [nw, ne, sw, se] = splitBoundingBox({ minX: 0, minY: 0, maxX: 100, maxY: 60 });
    expect(nw).toEqual({ minX: 0, minY: 0, maxX: 50, maxY: 30 });
    expect(ne).toEqual({ minX: 50, minY: 0, maxX: 100, maxY: 30 });
    expect(sw).toEqual({ minX: 0, minY: 30, maxX: 50, maxY: 60 });
    expect(se).toEqual({ minX: 50, minY: 30, maxX: 100, maxY: 60 });
  });

  const parents: BoundingBox2D[] = [
    { minX: 0, minY: 0, maxX: 800, maxY: 600 },
    { minX: 0.1, minY: 0.3, maxX: 0.7, maxY: 0.9 },
    { minX: -13.37, minY: 2.2, maxX: 41.9, maxY: 7.77 },
  ];

  for (const parent of parents) {
    it(`children partition [${parent.minX}, ${parent.maxX}) x [${parent.minY}, ${parent.maxY})`, () => {
      const children = splitBoundingBox(parent);
      for (const point of samplePoints(parent)) {
        const owners = children.filter((child) => pointInBoundingBox(point, child)).length;
        expect(owners).toBe(pointInBoundingBox(point, parent) ? 1 : 0);
      }
    });
  }
});

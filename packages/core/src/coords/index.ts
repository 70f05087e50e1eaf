/**
 * Planar coordinate types and region geometry
 *
 * Screen-style axes: x grows to the right, y grows downward, so "north" is the
 * smaller-y half of a region.
 *
 * All containment tests are half-open: a point on a minimum edge is inside, a
 * point on a maximum edge is not. Quad-tree insertion and range queries both go
 * through `pointInBoundingBox`, so a point on a split line lands in exactly one
 * child and is found by exactly the queries that cover it.
 */

// ============================================================================
// Coordinate Types
// ============================================================================

/** 2D point in simulation units */
export interface Point2D {
  x: number;
  y: number;
}

/** Axis-aligned rectangle by center (x, y) and full size (w, h) */
export interface Region {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Axis-aligned rectangle by its edges */
export interface BoundingBox2D {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ============================================================================
// Conversions
// ============================================================================

/**
 * Edges of a center/size region
 */
export function regionToBoundingBox(region: Region): BoundingBox2D {
  const halfW = region.w / 2;
  const halfH = region.h / 2;
  return {
    minX: region.x - halfW,
    minY: region.y - halfH,
    maxX: region.x + halfW,
    maxY: region.y + halfH,
  };
}

/**
 * Center/size form of a bounding box
 */
export function boundingBoxToRegion(box: BoundingBox2D): Region {
  return {
    x: (box.minX + box.maxX) / 2,
    y: (box.minY + box.maxY) / 2,
    w: box.maxX - box.minX,
    h: box.maxY - box.minY,
  };
}

/**
 * Region of width x height with its top-left corner at the origin
 */
export function regionFromSize(width: number, height: number): Region {
  return { x: width / 2, y: height / 2, w: width, h: height };
}

/**
 * Square region centred on a point
 */
export function squareAround(center: Point2D, size: number): Region {
  return { x: center.x, y: center.y, w: size, h: size };
}

// ============================================================================
// Containment & Intersection
// ============================================================================

/**
 * Half-open containment: [minX, maxX) x [minY, maxY)
 */
export function pointInBoundingBox(point: Point2D, box: BoundingBox2D): boolean {
  return point.x >= box.minX && point.x < box.maxX && point.y >= box.minY && point.y < box.maxY;
}

/**
 * Half-open containment for a center/size region
 */
export function pointInRegion(point: Point2D, region: Region): boolean {
  return pointInBoundingBox(point, regionToBoundingBox(region));
}

/**
 * Separating-axis overlap test. Touching edges count as overlapping, which
 * can only keep a subtree in a query, never lose one.
 */
export function boundingBoxesIntersect(a: BoundingBox2D, b: BoundingBox2D): boolean {
  return !(a.minX > b.maxX || a.maxX < b.minX || a.minY > b.maxY || a.maxY < b.minY);
}

// ============================================================================
// Subdivision
// ============================================================================

/**
 * Split a box at its midpoint into [NW, NE, SW, SE]. Neighbouring children
 * share the same midpoint value, so together they cover the parent with no
 * gap or overlap.
 */
export function splitBoundingBox(
  box: BoundingBox2D
): [BoundingBox2D, BoundingBox2D, BoundingBox2D, BoundingBox2D] {
  const midX = (box.minX + box.maxX) / 2;
  const midY = (box.minY + box.maxY) / 2;
  return [
    { minX: box.minX, minY: box.minY, maxX: midX, maxY: midY },
    { minX: midX, minY: box.minY, maxX: box.maxX, maxY: midY },
    { minX: box.minX, minY: midY, maxX: midX, maxY: box.maxY },
    { minX: midX, minY: midY, maxX: box.maxX, maxY: box.maxY },
  ];
}

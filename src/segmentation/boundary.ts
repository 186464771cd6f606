import type { PixelPoint } from '../geometry/types.js';
import { boundsToPolygon, convexHull, getBounds, simplifyHull } from '../geometry/index.js';

export interface BoundaryOptions {
  /** Below this many edge pixels the bounding box is used instead of a hull */
  minHullPoints?: number;
  /** Fraction of hull vertices kept (1 keeps all) */
  simplify?: number;
}

/**
 * Pixels of the set that have at least one 4-neighbour outside the set.
 */
export function edgePixels(pixels: PixelPoint[]): PixelPoint[] {
  const key = (x: number, y: number) => `${x},${y}`;
  const owned = new Set(pixels.map((p) => key(p.x, p.y)));

  return pixels.filter(
    (p) =>
      !owned.has(key(p.x + 1, p.y)) ||
      !owned.has(key(p.x - 1, p.y)) ||
      !owned.has(key(p.x, p.y + 1)) ||
      !owned.has(key(p.x, p.y - 1))
  );
}

/**
 * Outline polygon for a pixel set: a simplified convex hull of its edge
 * pixels, or the axis-aligned bounding box when the set is sparse.
 */
export function regionBoundary(pixels: PixelPoint[], options: BoundaryOptions = {}): PixelPoint[] {
  const { minHullPoints = 20, simplify = 0.8 } = options;
  if (pixels.length === 0) return [];

  const edges = edgePixels(pixels);
  if (edges.length < minHullPoints) {
    return boundsToPolygon(getBounds(pixels));
  }

  const hull = convexHull(edges);
  if (hull.length < 3) {
    return boundsToPolygon(getBounds(pixels));
  }

  return simplifyHull(hull, simplify);
}

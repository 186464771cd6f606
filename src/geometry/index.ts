import type { Bounds, Point } from './types.js';

export * from './types.js';
export * from './transform.js';

// ============================================================================
// Geometry Utilities
// ============================================================================

export function getBounds(points: Point[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, minY, maxX, maxY };
}

export function calculatePolygonCenter(points: Point[]): Point {
  const x = points.reduce((sum, p) => sum + p.x, 0) / points.length;
  const y = points.reduce((sum, p) => sum + p.y, 0) / points.length;
  return { x, y };
}

/**
 * Test if a point is inside a polygon using ray casting (even-odd rule).
 */
export function isPointInPolygon(point: Point, polygon: Point[]): boolean {
  const { x, y } = point;
  let inside = false;

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].x, yi = polygon[i].y;
    const xj = polygon[j].x, yj = polygon[j].y;

    if (((yi > y) !== (yj > y)) && (x < (xj - xi) * (y - yi) / (yj - yi) + xi)) {
      inside = !inside;
    }
  }

  return inside;
}

function pointToSegmentDistance(point: Point, p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  const lengthSquared = dx * dx + dy * dy;

  if (lengthSquared === 0) {
    return Math.hypot(point.x - p1.x, point.y - p1.y);
  }

  let t = ((point.x - p1.x) * dx + (point.y - p1.y) * dy) / lengthSquared;
  t = Math.max(0, Math.min(1, t));

  return Math.hypot(point.x - (p1.x + t * dx), point.y - (p1.y + t * dy));
}

function pointToPolygonDistance(point: Point, polygon: Point[]): number {
  let minDist = Infinity;
  for (let i = 0; i < polygon.length; i++) {
    const dist = pointToSegmentDistance(point, polygon[i], polygon[(i + 1) % polygon.length]);
    minDist = Math.min(minDist, dist);
  }
  return minDist;
}

/**
 * Point inside the polygon furthest from any edge, found with a coarse grid
 * search followed by three rounds of local refinement.
 */
function findVisualCenter(points: Point[]): Point {
  const { minX, minY, maxX, maxY } = getBounds(points);
  const centroid = calculatePolygonCenter(points);

  let bestPoint = centroid;
  let bestDistance = isPointInPolygon(centroid, points)
    ? pointToPolygonDistance(centroid, points)
    : -Infinity;

  const gridSize = 10;
  const cellWidth = (maxX - minX) / gridSize;
  const cellHeight = (maxY - minY) / gridSize;

  for (let i = 0; i <= gridSize; i++) {
    for (let j = 0; j <= gridSize; j++) {
      const testPoint = { x: minX + i * cellWidth, y: minY + j * cellHeight };
      if (isPointInPolygon(testPoint, points)) {
        const dist = pointToPolygonDistance(testPoint, points);
        if (dist > bestDistance) {
          bestDistance = dist;
          bestPoint = testPoint;
        }
      }
    }
  }

  const refineRadius = Math.max(cellWidth, cellHeight);
  const refineSteps = 5;

  for (let iteration = 0; iteration < 3; iteration++) {
    const step = refineRadius / Math.pow(2, iteration) / refineSteps;

    for (let dx = -refineSteps; dx <= refineSteps; dx++) {
      for (let dy = -refineSteps; dy <= refineSteps; dy++) {
        const testPoint = { x: bestPoint.x + dx * step, y: bestPoint.y + dy * step };
        if (isPointInPolygon(testPoint, points)) {
          const dist = pointToPolygonDistance(testPoint, points);
          if (dist > bestDistance) {
            bestDistance = dist;
            bestPoint = testPoint;
          }
        }
      }
    }
  }

  return bestPoint;
}

/**
 * Best label anchor for a polygon: the centroid when it falls inside,
 * otherwise the visual center.
 */
export function getLabelPosition(points: Point[]): Point {
  const centroid = calculatePolygonCenter(points);
  if (isPointInPolygon(centroid, points)) {
    return centroid;
  }
  return findVisualCenter(points);
}

// ============================================================================
// Convex Hull
// ============================================================================

function cross(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * Andrew's monotone chain. Collinear points are dropped; the result is
 * counter-clockwise in a y-up frame and starts at the lowest-x point.
 */
export function convexHull(points: Point[]): Point[] {
  const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
  if (sorted.length < 3) return sorted;

  const lower: Point[] = [];
  for (const p of sorted) {
    while (lower.length >= 2 && cross(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) {
      lower.pop();
    }
    lower.push(p);
  }

  const upper: Point[] = [];
  for (let i = sorted.length - 1; i >= 0; i--) {
    const p = sorted[i];
    while (upper.length >= 2 && cross(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) {
      upper.pop();
    }
    upper.push(p);
  }

  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

/**
 * Keep every k-th hull vertex, k = max(1, floor(n * (1 - factor))).
 * Hulls of ten vertices or fewer, and factors >= 1, are returned unchanged.
 */
export function simplifyHull(hull: Point[], factor: number): Point[] {
  if (factor >= 1 || hull.length <= 10) return hull;
  const step = Math.max(1, Math.floor(hull.length * (1 - factor)));
  const simplified: Point[] = [];
  for (let i = 0; i < hull.length; i += step) {
    simplified.push(hull[i]);
  }
  return simplified;
}

export function boundsToPolygon(bounds: Bounds): Point[] {
  return [
    { x: bounds.minX, y: bounds.minY },
    { x: bounds.maxX, y: bounds.minY },
    { x: bounds.maxX, y: bounds.maxY },
    { x: bounds.minX, y: bounds.maxY },
  ];
}

import { describe, it, expect } from 'vitest';
import {
  centimetersToPixel,
  convexHull,
  getBounds,
  getLabelPosition,
  isInBounds,
  isPointInPolygon,
  pixelToWorld,
  scalePoint,
  simplifyHull,
  worldToPixel,
  type MapFrame,
  type Point,
} from './index.js';

const frame: MapFrame = { width: 4, height: 4, resolution: 0.05, origin: { x: 0, y: 0 } };

describe('Coordinate Transform', () => {
  it('should map the charger position to its pixel', () => {
    expect(worldToPixel({ x: 0.1, y: 0.1 }, frame)).toEqual({ x: 2, y: 2 });
  });

  it('should convert centimeters before mapping', () => {
    expect(centimetersToPixel({ x: 10, y: 10 }, frame)).toEqual({ x: 2, y: 2 });
  });

  it('should floor towards negative infinity', () => {
    const shifted: MapFrame = { width: 10, height: 10, resolution: 0.5, origin: { x: -2, y: -2 } };
    expect(worldToPixel({ x: -1.25, y: 0.75 }, shifted)).toEqual({ x: 1, y: 5 });
    expect(worldToPixel({ x: -2.25, y: -2 }, shifted)).toEqual({ x: -1, y: 0 });
  });

  it('should round trip within one resolution step', () => {
    const shifted: MapFrame = { width: 10, height: 10, resolution: 0.5, origin: { x: -2, y: -2 } };
    for (const p of [{ x: -1.9, y: 0.1 }, { x: 0.3, y: 2.74 }, { x: 2.99, y: -2 }]) {
      const back = pixelToWorld(worldToPixel(p, shifted), shifted);
      expect(Math.abs(back.x - p.x)).toBeLessThan(0.5);
      expect(Math.abs(back.y - p.y)).toBeLessThan(0.5);
    }
  });

  it('should check bounds on both axes', () => {
    expect(isInBounds({ x: 0, y: 0 }, 4, 4)).toBe(true);
    expect(isInBounds({ x: 3, y: 3 }, 4, 4)).toBe(true);
    expect(isInBounds({ x: 4, y: 0 }, 4, 4)).toBe(false);
    expect(isInBounds({ x: 0, y: -1 }, 4, 4)).toBe(false);
  });

  it('should scale grid pixels to canvas pixels', () => {
    expect(scalePoint({ x: 3, y: 5 }, 2)).toEqual({ x: 6, y: 10 });
  });
});

describe('Polygon Utilities', () => {
  const square: Point[] = [
    { x: 0, y: 0 },
    { x: 2, y: 0 },
    { x: 2, y: 2 },
    { x: 0, y: 2 },
  ];

  it('should calculate bounds', () => {
    expect(getBounds(square)).toEqual({ minX: 0, minY: 0, maxX: 2, maxY: 2 });
  });

  it('should test point containment', () => {
    expect(isPointInPolygon({ x: 1, y: 1 }, square)).toBe(true);
    expect(isPointInPolygon({ x: 3, y: 1 }, square)).toBe(false);
  });

  it('should place labels at the centroid of convex polygons', () => {
    expect(getLabelPosition(square)).toEqual({ x: 1, y: 1 });
  });

  it('should place labels inside concave polygons', () => {
    // U shape whose vertex average falls in the notch
    const u: Point[] = [
      { x: 0, y: 0 },
      { x: 30, y: 0 },
      { x: 30, y: 30 },
      { x: 20, y: 30 },
      { x: 20, y: 5 },
      { x: 10, y: 5 },
      { x: 10, y: 30 },
      { x: 0, y: 30 },
    ];
    expect(isPointInPolygon({ x: 15, y: 16.25 }, u)).toBe(false);

    const label = getLabelPosition(u);
    expect(isPointInPolygon(label, u)).toBe(true);
  });
});

describe('Convex Hull', () => {
  it('should drop interior and collinear points', () => {
    const points: Point[] = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 },
      { x: 1, y: 1 },
      { x: 0, y: 1 },
    ];

    expect(convexHull(points)).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 },
    ]);
  });

  it('should return fewer than three points unchanged', () => {
    expect(convexHull([{ x: 1, y: 1 }])).toEqual([{ x: 1, y: 1 }]);
  });

  it('should keep every k-th vertex when simplifying', () => {
    const hull = Array.from({ length: 12 }, (_, i) => ({ x: i, y: 0 }));
    // k = floor(12 * 0.5) = 6
    expect(simplifyHull(hull, 0.5)).toEqual([{ x: 0, y: 0 }, { x: 6, y: 0 }]);
  });

  it('should thin a long hull to evenly spaced vertices', () => {
    const hull = Array.from({ length: 24 }, (_, i) => ({ x: i, y: i * i }));
    // k = floor(24 * 0.25) = 6
    expect(simplifyHull(hull, 0.75).map((p) => p.x)).toEqual([0, 6, 12, 18]);
  });

  it('should leave small hulls alone', () => {
    const hull = Array.from({ length: 10 }, (_, i) => ({ x: i, y: i }));
    expect(simplifyHull(hull, 0.5)).toBe(hull);
  });

  it('should leave hulls alone at factor 1', () => {
    const hull = Array.from({ length: 12 }, (_, i) => ({ x: i, y: i }));
    expect(simplifyHull(hull, 1)).toBe(hull);
  });
});

import type { MapFrame, PixelPoint, Point, WorldPoint } from './types.js';

// ============================================================================
// Coordinate Transform
// ============================================================================

/** Area polygons are stored in centimeters, the charger pose in meters. */
export const CENTIMETERS_PER_METER = 100;

export function worldToPixel(point: WorldPoint, frame: MapFrame): PixelPoint {
  return {
    x: Math.floor((point.x - frame.origin.x) / frame.resolution),
    y: Math.floor((point.y - frame.origin.y) / frame.resolution),
  };
}

export function centimetersToPixel(point: Point, frame: MapFrame): PixelPoint {
  return worldToPixel(
    { x: point.x / CENTIMETERS_PER_METER, y: point.y / CENTIMETERS_PER_METER },
    frame
  );
}

/**
 * Inverse of worldToPixel. Returns the world position of the pixel's
 * lower-left corner, so the round trip lands within one resolution step.
 */
export function pixelToWorld(pixel: PixelPoint, frame: MapFrame): WorldPoint {
  return {
    x: frame.origin.x + pixel.x * frame.resolution,
    y: frame.origin.y + pixel.y * frame.resolution,
  };
}

export function isInBounds(pixel: PixelPoint, width: number, height: number): boolean {
  return pixel.x >= 0 && pixel.y >= 0 && pixel.x < width && pixel.y < height;
}

/** Grid pixel to canvas pixel, for canvases rendered at several pixels per cell. */
export function scalePoint(pixel: PixelPoint, cellSize: number): PixelPoint {
  return { x: pixel.x * cellSize, y: pixel.y * cellSize };
}

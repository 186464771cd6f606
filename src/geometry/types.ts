// ============================================================================
// Points
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

/** World frame coordinate in meters. */
export type WorldPoint = Point;

/** Integer raster coordinate. */
export type PixelPoint = Point;

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ============================================================================
// Map Frame
// ============================================================================

/**
 * Everything needed to move between the world frame and the grid's pixel frame.
 */
export interface MapFrame {
  width: number;
  height: number;
  /** Meters per pixel */
  resolution: number;
  /** World coordinate of pixel (0, 0) */
  origin: WorldPoint;
}

import type { Bounds, PixelPoint, Point } from '../geometry/types.js';
import { getBounds, isPointInPolygon } from '../geometry/index.js';
import { setPixel, type RGBA, type Raster } from './raster.js';

// Rasterizing primitives. Every write goes through setPixel, which drops
// coordinates off the canvas.

/** Square of side 2r+1 centred on (cx, cy). */
export function stampSquare(layer: Raster, cx: number, cy: number, radius: number, color: RGBA, clip?: Bounds): void {
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      const x = cx + dx;
      const y = cy + dy;
      if (clip && (x < clip.minX || x > clip.maxX || y < clip.minY || y > clip.maxY)) continue;
      setPixel(layer, x, y, color);
    }
  }
}

/**
 * Thick line by parametric sampling: max(|dx|, |dy|) * 3 samples including
 * both endpoints, each stamped as a square. A zero-length segment, or one
 * that stays off the canvas, draws nothing.
 */
export function drawLine(
  layer: Raster,
  from: PixelPoint,
  to: PixelPoint,
  radius: number,
  color: RGBA,
  clip?: Bounds
): void {
  const samples = Math.max(Math.abs(to.x - from.x), Math.abs(to.y - from.y)) * 3;
  if (samples === 0) return;
  if (
    Math.max(from.x, to.x) + radius < 0 ||
    Math.max(from.y, to.y) + radius < 0 ||
    Math.min(from.x, to.x) - radius >= layer.width ||
    Math.min(from.y, to.y) - radius >= layer.height
  ) {
    return;
  }

  for (let i = 0; i < samples; i++) {
    const t = samples === 1 ? 0 : i / (samples - 1);
    const x = Math.trunc(from.x + t * (to.x - from.x));
    const y = Math.trunc(from.y + t * (to.y - from.y));
    stampSquare(layer, x, y, radius, color, clip);
  }
}

/** Closed outline through all vertices. */
export function drawPolygonOutline(layer: Raster, points: PixelPoint[], radius: number, color: RGBA): void {
  for (let i = 0; i < points.length; i++) {
    drawLine(layer, points[i], points[(i + 1) % points.length], radius, color);
  }
}

/** Open polyline, used for the charger glyph. */
export function drawPolyline(layer: Raster, points: PixelPoint[], radius: number, color: RGBA): void {
  for (let i = 0; i + 1 < points.length; i++) {
    drawLine(layer, points[i], points[i + 1], radius, color);
  }
}

/**
 * Even-odd fill, sampling each pixel at its centre. Only the part of the
 * bounding box that overlaps the canvas is visited.
 */
export function fillPolygon(layer: Raster, points: Point[], color: RGBA): void {
  const bounds = getBounds(points);
  const minX = Math.max(0, Math.floor(bounds.minX));
  const minY = Math.max(0, Math.floor(bounds.minY));
  const maxX = Math.min(layer.width - 1, Math.ceil(bounds.maxX));
  const maxY = Math.min(layer.height - 1, Math.ceil(bounds.maxY));

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if (isPointInPolygon({ x: x + 0.5, y: y + 0.5 }, points)) {
        setPixel(layer, x, y, color);
      }
    }
  }
}

export function fillCircle(layer: Raster, center: PixelPoint, radius: number, color: RGBA): void {
  const r2 = radius * radius;
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (dx * dx + dy * dy <= r2) {
        setPixel(layer, center.x + dx, center.y + dy, color);
      }
    }
  }
}

/** Ring between radius - width and radius. */
export function strokeCircle(layer: Raster, center: PixelPoint, radius: number, width: number, color: RGBA): void {
  const outer = radius * radius;
  const innerRadius = Math.max(0, radius - width);
  const inner = innerRadius * innerRadius;
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      const d2 = dx * dx + dy * dy;
      if (d2 <= outer && d2 > inner) {
        setPixel(layer, center.x + dx, center.y + dy, color);
      }
    }
  }
}

/**
 * Diagonal hatch over a bounding box, clipped to it. `direction` 1 runs from
 * top-right to bottom-left, -1 from top-left to bottom-right. Only lines that
 * can reach the part of the box on the canvas are drawn.
 */
export function hatchBounds(
  layer: Raster,
  bounds: Bounds,
  spacing: number,
  direction: 1 | -1,
  radius: number,
  color: RGBA
): void {
  const visible = {
    minX: Math.max(0, bounds.minX),
    minY: Math.max(0, bounds.minY),
    maxX: Math.min(layer.width - 1, bounds.maxX),
    maxY: Math.min(layer.height - 1, bounds.maxY),
  };
  if (visible.minX > visible.maxX || visible.minY > visible.maxY) return;

  const height = bounds.maxY - bounds.minY;
  const step = Math.max(1, Math.trunc(spacing));
  // Samples are truncated per axis and stamped with the line radius
  const slack = 2 * radius + 2;

  // Line i covers x + y = i + minY (direction 1) or x - y = i - maxY (direction -1)
  const lo =
    direction === 1
      ? visible.minX + visible.minY - bounds.minY - slack
      : visible.minX - visible.maxY + bounds.maxY - slack;
  const hi =
    direction === 1
      ? visible.maxX + visible.maxY - bounds.minY + slack
      : visible.maxX - visible.minY + bounds.maxY + slack;

  const first = Math.trunc(bounds.minX);
  const skip = Math.max(0, Math.ceil((lo - first) / step));
  const end = Math.min(bounds.maxX + height, hi + 1);

  // Rows beyond the canvas are cut off each line, keeping the slope
  const fromY = Math.max(bounds.minY, Math.floor(visible.minY) - slack);
  const toY = Math.min(bounds.maxY, Math.ceil(visible.maxY) + slack);
  const xAt = (i: number, y: number) => (direction === 1 ? i - (y - bounds.minY) : i - (bounds.maxY - y));

  for (let i = first + skip * step; i < end; i += step) {
    const top = { x: xAt(i, fromY), y: fromY };
    const bottom = { x: xAt(i, toY), y: toY };
    drawLine(layer, top, bottom, radius, color, bounds);
  }
}

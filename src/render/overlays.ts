import type { PixelPoint, Point } from '../geometry/types.js';
import { centimetersToPixel, isInBounds, scalePoint, worldToPixel } from '../geometry/transform.js';
import { getBounds, getLabelPosition } from '../geometry/index.js';
import { CellState, type OccupancyGrid } from '../grid/types.js';
import type { Region } from '../segmentation/types.js';
import type { ChargerPose, ForbiddenZone, RoomArea } from '../metadata/types.js';
import { createRaster, parseColor, setPixel, withAlpha, type RGBA, type Raster } from './raster.js';
import {
  drawPolygonOutline,
  drawPolyline,
  fillCircle,
  fillPolygon,
  hatchBounds,
  strokeCircle,
} from './draw.js';
import { generateRoomColors } from './palette.js';
import type { RenderOptions } from './options.js';

/** A label to place once the canvas is in display orientation. */
export interface PendingLabel {
  text: string;
  /** Anchor in pre-orientation canvas pixels */
  anchor: Point;
}

function canvasPolygon(vertices: Point[], grid: OccupancyGrid, cellSize: number): PixelPoint[] {
  return vertices.map((v) => scalePoint(centimetersToPixel(v, grid), cellSize));
}

// ============================================================================
// Base Layer
// ============================================================================

export function drawBaseLayer(grid: OccupancyGrid, opts: Required<RenderOptions>): Raster {
  const { cellSize } = opts;
  const layer = createRaster(grid.width * cellSize, grid.height * cellSize);
  const colors: Record<CellState, RGBA> = {
    [CellState.Unknown]: parseColor(opts.unknownColor, 255),
    [CellState.Free]: parseColor(opts.freeColor, 255),
    [CellState.Obstacle]: parseColor(opts.obstacleColor, 255),
  };

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const state = grid.cells[y * grid.width + x];
      const color = state === CellState.Free || state === CellState.Obstacle ? colors[state] : colors[CellState.Unknown];
      for (let dy = 0; dy < cellSize; dy++) {
        for (let dx = 0; dx < cellSize; dx++) {
          setPixel(layer, x * cellSize + dx, y * cellSize + dy, color);
        }
      }
    }
  }

  return layer;
}

// ============================================================================
// Room Layer
// ============================================================================

export function drawRoomLayer(
  grid: OccupancyGrid,
  regions: Region[],
  areas: RoomArea[],
  opts: Required<RenderOptions>
): { layer: Raster; labels: PendingLabel[] } {
  const { cellSize } = opts;
  const layer = createRaster(grid.width * cellSize, grid.height * cellSize);
  const labels: PendingLabel[] = [];
  const colors = generateRoomColors(regions.length);

  regions.forEach((region, i) => {
    const fill = withAlpha(colors[i], opts.roomFillAlpha);
    const outline = withAlpha(colors[i], opts.roomOutlineAlpha);

    if (opts.showRoomFills) {
      for (const p of region.pixels) {
        for (let dy = 0; dy < cellSize; dy++) {
          for (let dx = 0; dx < cellSize; dx++) {
            setPixel(layer, p.x * cellSize + dx, p.y * cellSize + dy, fill);
          }
        }
      }
    }

    if (region.boundary.length >= 3) {
      const outlinePoints = region.boundary.map((p) => scalePoint(p, cellSize));
      drawPolygonOutline(layer, outlinePoints, opts.roomOutlineRadius, outline);
      labels.push({ text: `Room ${region.id}`, anchor: getLabelPosition(outlinePoints) });
    }
  });

  const areaColor = parseColor(opts.areaOutlineColor, opts.areaOutlineAlpha);
  for (const area of areas) {
    if (area.vertices.length < 3) continue;
    const points = canvasPolygon(area.vertices, grid, cellSize);
    drawPolygonOutline(layer, points, opts.roomOutlineRadius, areaColor);
    if (area.name) {
      labels.push({ text: area.name, anchor: getLabelPosition(points) });
    }
  }

  return { layer, labels };
}

// ============================================================================
// Forbidden Zone Layer
// ============================================================================

export function drawForbiddenLayer(
  grid: OccupancyGrid,
  zones: ForbiddenZone[],
  opts: Required<RenderOptions>
): Raster {
  const { cellSize } = opts;
  const layer = createRaster(grid.width * cellSize, grid.height * cellSize);

  for (const zone of zones) {
    if (zone.vertices.length < 3) continue;

    const points = canvasPolygon(zone.vertices, grid, cellSize);
    const base = parseColor(zone.type === 'no-mop' ? opts.noMopColor : opts.noGoColor);
    const bounds = getBounds(points);

    fillPolygon(layer, points, withAlpha(base, opts.forbiddenFillAlpha));

    const hatch = withAlpha(base, opts.hatchAlpha);
    hatchBounds(layer, bounds, opts.hatchSpacing, 1, opts.hatchRadius, hatch);
    if (zone.type === 'no-go') {
      hatchBounds(layer, bounds, opts.hatchSpacing, -1, opts.hatchRadius, hatch);
    }

    const borderRadius = zone.type === 'no-go' ? 2 : 1;
    drawPolygonOutline(layer, points, borderRadius, withAlpha(base, opts.borderAlpha));
  }

  return layer;
}

// ============================================================================
// Charger Layer
// ============================================================================

/** Zig-zag bolt through five points, scaled to the marker radius. */
export function chargerGlyph(center: PixelPoint, radius: number): PixelPoint[] {
  const s = radius / 15;
  const at = (dx: number, dy: number) => ({ x: center.x + Math.round(dx * s), y: center.y + Math.round(dy * s) });
  return [at(0, -10), at(-6, -2), at(0, 3), at(6, -2), at(0, 10)];
}

export function drawChargerLayer(
  grid: OccupancyGrid,
  charger: ChargerPose | undefined,
  opts: Required<RenderOptions>
): Raster {
  const { cellSize } = opts;
  const layer = createRaster(grid.width * cellSize, grid.height * cellSize);
  if (!charger || !opts.showCharger) return layer;

  const pixel = worldToPixel(charger.position, grid);
  if (!isInBounds(pixel, grid.width, grid.height)) return layer;

  const center = scalePoint(pixel, cellSize);
  const radius = opts.chargerRadius;

  fillCircle(layer, center, radius, parseColor(opts.chargerColor, 255));
  drawPolyline(layer, chargerGlyph(center, radius), 1, parseColor(opts.chargerGlyphColor, 255));
  strokeCircle(layer, center, radius + 3, 2, parseColor(opts.chargerRingColor, opts.chargerRingAlpha));

  return layer;
}

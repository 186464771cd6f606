import type { PixelPoint } from '../geometry/types.js';
import type { OccupancyGrid } from '../grid/types.js';
import { findFreeComponents } from './flood-fill.js';
import { regionBoundary, type BoundaryOptions } from './boundary.js';
import { decodeSegmentMap } from './segment-map.js';
import type { Region, SegmentationResult, SegmentMapLayout } from './types.js';

export * from './types.js';
export { floodFill, findFreeComponents } from './flood-fill.js';
export { regionBoundary, edgePixels, type BoundaryOptions } from './boundary.js';
export { decodeSegmentMap, toRowMajor, SEGMENT_MAP_LAYOUTS, type DecodedSegmentMap } from './segment-map.js';

// ============================================================================
// Segmentation Options
// ============================================================================

export interface SegmentationOptions {
  /** Smallest room kept, in cells */
  minRoomSize?: number;
  /** Segment labels must cover more than this many cells */
  minSegmentPixels?: number;
  /** Optional auxiliary segment channel */
  segmentMap?: Uint8Array;
  /** Fixed segment map layouts to try, in order */
  segmentMapLayouts?: readonly SegmentMapLayout[];
  boundary?: BoundaryOptions;
  debug?: boolean;
}

export const DEFAULT_MIN_ROOM_SIZE = 100;
export const DEFAULT_MIN_SEGMENT_PIXELS = 50;

// ============================================================================
// Segmenter
// ============================================================================

function regionsFromComponents(
  components: PixelPoint[][],
  minRoomSize: number,
  boundary: BoundaryOptions | undefined
): Region[] {
  // Array.prototype.sort is stable, so equal areas keep discovery order
  const kept = components
    .filter((pixels) => pixels.length >= minRoomSize)
    .sort((a, b) => b.length - a.length);

  return kept.map((pixels, i) => ({
    id: i + 1,
    pixels,
    boundary: regionBoundary(pixels, boundary),
    area: pixels.length,
    source: 'flood-fill' as const,
  }));
}

function regionsFromLabels(
  labels: Int32Array,
  counts: Map<number, number>,
  width: number,
  minRoomSize: number,
  boundary: BoundaryOptions | undefined
): Region[] {
  const pixelsByLabel = new Map<number, PixelPoint[]>();
  for (const [label, count] of counts) {
    if (count >= minRoomSize) pixelsByLabel.set(label, []);
  }

  for (let i = 0; i < labels.length; i++) {
    const bucket = pixelsByLabel.get(labels[i]);
    if (bucket) {
      const x = i % width;
      bucket.push({ x, y: (i - x) / width });
    }
  }

  return [...pixelsByLabel.entries()]
    .sort((a, b) => b[1].length - a[1].length || a[0] - b[0])
    .map(([label, pixels]) => ({
      id: label,
      pixels,
      boundary: regionBoundary(pixels, boundary),
      area: pixels.length,
      source: 'segment-map' as const,
    }));
}

/**
 * Split free space into rooms. A decodable segment channel wins; otherwise
 * rooms are the 4-connected free components. Either way only rooms of at
 * least `minRoomSize` cells are kept, largest first.
 */
export function segmentRooms(grid: OccupancyGrid, options: SegmentationOptions = {}): SegmentationResult {
  const {
    minRoomSize = DEFAULT_MIN_ROOM_SIZE,
    minSegmentPixels = DEFAULT_MIN_SEGMENT_PIXELS,
    segmentMap,
    segmentMapLayouts,
    boundary,
    debug = false,
  } = options;

  if (segmentMap) {
    const decoded = decodeSegmentMap(segmentMap, grid.width, grid.height, minSegmentPixels, debug, segmentMapLayouts);
    if (decoded) {
      return {
        regions: regionsFromLabels(decoded.labels, decoded.counts, grid.width, minRoomSize, boundary),
        source: 'segment-map',
        layout: decoded.layout,
      };
    }
  }

  const components = findFreeComponents(grid);
  const regions = regionsFromComponents(components, minRoomSize, boundary);

  if (debug) {
    console.log(`Flood fill: ${components.length} component(s), ${regions.length} room(s) >= ${minRoomSize} cells`);
  }

  return { regions, source: 'flood-fill' };
}

import type { PixelPoint } from '../geometry/types.js';
import type { ElementType } from '../format/probe.js';

export type RegionSource = 'flood-fill' | 'segment-map';

export interface Region {
  id: number;
  /** Grid pixels owned by the region */
  pixels: PixelPoint[];
  /** Simplified outline in grid pixels */
  boundary: PixelPoint[];
  /** Cell count */
  area: number;
  source: RegionSource;
}

export type ReshapeOrder = 'row-major' | 'column-major';

export interface SegmentMapLayout {
  headerSize: number;
  elementType: ElementType;
  order: ReshapeOrder;
}

export interface SegmentationResult {
  regions: Region[];
  source: RegionSource;
  /** Present when the regions came from a decoded segment channel */
  layout?: SegmentMapLayout;
}

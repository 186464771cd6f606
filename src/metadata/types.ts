import type { MapFrame, Point, WorldPoint } from '../geometry/types.js';

export type ForbiddenZoneType = 'no-go' | 'no-mop';

export interface ForbiddenZone {
  type: ForbiddenZoneType;
  /** World coordinates in centimeters */
  vertices: Point[];
}

export interface RoomArea {
  id?: number;
  name?: string;
  /** World coordinates in centimeters */
  vertices: Point[];
}

export interface ChargerPose {
  /** World coordinates in meters */
  position: WorldPoint;
  /** Radians */
  heading: number;
}

/**
 * Validated, normalized form of the three metadata documents.
 */
export interface MapMetadata {
  frame: MapFrame;
  charger: ChargerPose;
  forbiddenZones: ForbiddenZone[];
  roomAreas: RoomArea[];
}

/**
 * TypeBox schemas for the metadata documents that accompany a map dump.
 * Unknown properties are allowed: firmware versions add fields freely.
 */

import { Type, type Static } from '@sinclair/typebox';

export const Point2DSchema = Type.Tuple([Type.Number(), Type.Number()], {
  description: 'A 2D coordinate as [x, y]',
});

// =============================================================================
// map_record.json
// =============================================================================

export const MapRecordSchema = Type.Object(
  {
    width: Type.Integer({ exclusiveMinimum: 0, description: 'Grid width in cells' }),
    height: Type.Integer({ exclusiveMinimum: 0, description: 'Grid height in cells' }),
    resolution: Type.Number({ exclusiveMinimum: 0, description: 'Meters per cell' }),
    x_min: Type.Number({ description: 'World x of cell (0, 0), meters' }),
    y_min: Type.Number({ description: 'World y of cell (0, 0), meters' }),
  },
  { description: 'Grid dimensions and placement' }
);

export type MapRecord = Static<typeof MapRecordSchema>;

// =============================================================================
// charger_pose.json
// =============================================================================

export const ChargerPoseSchema = Type.Object(
  {
    charger_pose: Point2DSchema,
    charger_phi: Type.Optional(Type.Number({ description: 'Heading in radians' })),
  },
  { description: 'Charging dock position in meters' }
);

export type ChargerPoseDocument = Static<typeof ChargerPoseSchema>;

// =============================================================================
// area_info.json
// =============================================================================

export const ForbidAreaSchema = Type.Object(
  {
    vertexs: Type.Array(Point2DSchema, { description: 'Polygon vertices in centimeters' }),
    forbidType: Type.Optional(Type.String({ description: '"mop" for no-mop zones, anything else is no-go' })),
  },
  { description: 'Forbidden zone' }
);

export const RoomAreaSchema = Type.Object(
  {
    vertexs: Type.Array(Point2DSchema, { description: 'Polygon vertices in centimeters' }),
    name: Type.Optional(Type.String()),
    id: Type.Optional(Type.Number()),
  },
  { description: 'Room polygon' }
);

export const AreaInfoSchema = Type.Object(
  {
    forbidAreaValue: Type.Optional(Type.Array(ForbidAreaSchema)),
    areaValue: Type.Optional(Type.Array(RoomAreaSchema)),
  },
  { description: 'Forbidden zones and room polygons' }
);

export type AreaInfo = Static<typeof AreaInfoSchema>;

/**
 * Metadata validation using TypeBox.
 * Every violation is reported with its document and field path.
 */

import { Value } from '@sinclair/typebox/value';
import type { TSchema } from '@sinclair/typebox';
import { ErrorCodes, type ConversionError } from '../errors.js';
import {
  AreaInfoSchema,
  ChargerPoseSchema,
  MapRecordSchema,
  type AreaInfo,
  type ChargerPoseDocument,
  type MapRecord,
} from './schema.js';
import type { ForbiddenZone, MapMetadata, RoomArea } from './types.js';

export type MetadataDocument = 'map_record' | 'charger_pose' | 'area_info';

export interface RawMetadata {
  mapRecord: unknown;
  chargerPose: unknown;
  areaInfo: unknown;
}

export type MetadataResult =
  | { success: true; metadata: MapMetadata }
  | { success: false; errors: ConversionError[] };

/**
 * Format a TypeBox error path to be user-friendly.
 */
export function formatPath(path: string): string {
  return path.replace(/^\//, '').replace(/\/(\d+)\//g, '[$1].').replace(/\/(\d+)$/, '[$1]').replace(/\//g, '.');
}

function formatErrorMessage(message: string, value: unknown): string {
  if (value === undefined) {
    return 'missing required field';
  }
  if (message.includes('Expected number') || message.includes('Expected integer')) {
    if (message.includes('greater than')) {
      return 'must be greater than 0';
    }
    return message.includes('integer') ? 'must be an integer' : 'must be a number';
  }
  if (message.includes('Expected string')) {
    return 'must be a string';
  }
  if (message.includes('Expected array')) {
    return 'must be an array';
  }
  if (message.includes('Expected tuple')) {
    return 'must be an [x, y] pair';
  }
  if (message.includes('Expected object')) {
    return 'must be an object';
  }
  return message;
}

function checkDocument(document: MetadataDocument, schema: TSchema, data: unknown): ConversionError[] {
  const errors: ConversionError[] = [];
  const seen = new Set<string>();

  for (const error of Value.Errors(schema, data)) {
    const field = formatPath(error.path);
    // TypeBox can report one field several times (e.g. union branches)
    if (seen.has(field)) continue;
    seen.add(field);

    errors.push({
      phase: 'metadata',
      code: ErrorCodes.MALFORMED_METADATA,
      message: formatErrorMessage(error.message, error.value),
      document,
      field: field || undefined,
      details: { value: error.value },
    });
  }

  return errors;
}

function normalizeZones(areaInfo: AreaInfo): ForbiddenZone[] {
  return (areaInfo.forbidAreaValue ?? []).map((area): ForbiddenZone => ({
    type: area.forbidType === 'mop' ? 'no-mop' : 'no-go',
    vertices: area.vertexs.map(([x, y]) => ({ x, y })),
  }));
}

function normalizeRoomAreas(areaInfo: AreaInfo): RoomArea[] {
  return (areaInfo.areaValue ?? []).map((area): RoomArea => ({
    id: area.id,
    name: area.name,
    vertices: area.vertexs.map(([x, y]) => ({ x, y })),
  }));
}

/**
 * Validate all three documents before anything is decoded. Errors from every
 * document are collected, not just the first one.
 */
export function validateMetadata(raw: RawMetadata): MetadataResult {
  const { mapRecord, chargerPose, areaInfo } = raw;

  if (
    Value.Check(MapRecordSchema, mapRecord) &&
    Value.Check(ChargerPoseSchema, chargerPose) &&
    Value.Check(AreaInfoSchema, areaInfo)
  ) {
    return { success: true, metadata: normalizeMetadata(mapRecord, chargerPose, areaInfo) };
  }

  return {
    success: false,
    errors: [
      ...checkDocument('map_record', MapRecordSchema, mapRecord),
      ...checkDocument('charger_pose', ChargerPoseSchema, chargerPose),
      ...checkDocument('area_info', AreaInfoSchema, areaInfo),
    ],
  };
}

function normalizeMetadata(mapRecord: MapRecord, chargerPose: ChargerPoseDocument, areaInfo: AreaInfo): MapMetadata {
  return {
    frame: {
      width: mapRecord.width,
      height: mapRecord.height,
      resolution: mapRecord.resolution,
      origin: { x: mapRecord.x_min, y: mapRecord.y_min },
    },
    charger: {
      position: { x: chargerPose.charger_pose[0], y: chargerPose.charger_pose[1] },
      heading: chargerPose.charger_phi ?? 0,
    },
    forbiddenZones: normalizeZones(areaInfo),
    roomAreas: normalizeRoomAreas(areaInfo),
  };
}

/**
 * Parse a JSON document, reporting bad JSON as malformed metadata.
 */
export function parseMetadataJson(
  document: MetadataDocument,
  json: string
): { success: true; data: unknown } | { success: false; error: ConversionError } {
  try {
    return { success: true, data: JSON.parse(json) };
  } catch (e) {
    return {
      success: false,
      error: {
        phase: 'metadata',
        code: ErrorCodes.MALFORMED_METADATA,
        message: `invalid JSON: ${e instanceof Error ? e.message : String(e)}`,
        document,
      },
    };
  }
}

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { ErrorCodes, type ConversionError } from './errors.js';
import { parseMetadataJson, type MetadataDocument } from './metadata/validate.js';
import { encodeRaster, sidecarPath, type EncodeOptions } from './encode/index.js';
import type { ConvertSuccess, MapInputs } from './converter.js';

// ============================================================================
// Map Directory Layout
// ============================================================================

export const MapFiles = {
  grid: 'map_record.map',
  mapRecord: 'map_record.json',
  chargerPose: 'charger_pose.json',
  areaInfo: 'area_info.json',
  segmentMap: 'map.segmentmap',
} as const;

export type LoadResult =
  | { success: true; inputs: MapInputs }
  | { success: false; errors: ConversionError[] };

function readDocument(
  dir: string,
  file: string,
  document: MetadataDocument,
  errors: ConversionError[]
): unknown {
  const path = join(dir, file);
  if (!existsSync(path)) {
    errors.push({
      phase: 'metadata',
      code: ErrorCodes.MALFORMED_METADATA,
      message: `file not found: ${path}`,
      document,
    });
    return undefined;
  }

  const parsed = parseMetadataJson(document, readFileSync(path, 'utf-8'));
  if (!parsed.success) {
    errors.push(parsed.error);
    return undefined;
  }
  return parsed.data;
}

/**
 * Load the grid dump, the three metadata documents and, when present, the
 * segment channel from one map directory.
 */
export function loadMapDirectory(dir: string): LoadResult {
  const errors: ConversionError[] = [];

  const mapRecord = readDocument(dir, MapFiles.mapRecord, 'map_record', errors);
  const chargerPose = readDocument(dir, MapFiles.chargerPose, 'charger_pose', errors);
  const areaInfo = readDocument(dir, MapFiles.areaInfo, 'area_info', errors);

  const gridPath = join(dir, MapFiles.grid);
  if (!existsSync(gridPath)) {
    errors.push({
      phase: 'decode',
      code: ErrorCodes.INSUFFICIENT_DATA,
      message: `grid dump not found: ${gridPath}`,
      details: { required: MapFiles.grid },
    });
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }

  const segmentPath = join(dir, MapFiles.segmentMap);
  const inputs: MapInputs = {
    grid: new Uint8Array(readFileSync(gridPath)),
    mapRecord,
    chargerPose,
    areaInfo,
  };
  if (existsSync(segmentPath)) {
    inputs.segmentMap = new Uint8Array(readFileSync(segmentPath));
  }

  return { success: true, inputs };
}

// ============================================================================
// Output
// ============================================================================

export interface WrittenFiles {
  png: string;
  base64: string;
  /** Pre-orientation composite, only written for debug conversions */
  original?: string;
}

/** "out/map.png" -> "out/map_original.png" */
export function originalImagePath(outputPath: string): string {
  const ext = extname(outputPath);
  const name = basename(outputPath, ext);
  return join(dirname(outputPath), `${name}_original${ext || '.png'}`);
}

/**
 * Write the PNG and its base64 sidecar, creating the output directory if
 * needed. A conversion run with `debug` also gets its unannotated composite
 * written beside it.
 */
export async function writeConversionOutput(
  result: ConvertSuccess,
  outputPath: string,
  encodeOptions: EncodeOptions = {}
): Promise<WrittenFiles> {
  const written: WrittenFiles = { png: outputPath, base64: sidecarPath(outputPath) };

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(written.png, result.png);
  writeFileSync(written.base64, result.base64, 'utf-8');

  if (result.debugComposite) {
    const original = await encodeRaster(result.debugComposite, encodeOptions);
    written.original = originalImagePath(outputPath);
    writeFileSync(written.original, original.png);
  }

  return written;
}

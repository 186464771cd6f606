import { ErrorCodes, EncodeError, type ConversionError } from './errors.js';
import { DEFAULT_OFFSETS, probeFormat, type ElementType, type OffsetScan } from './format/probe.js';
import { decodeGrid, type GridLayout } from './grid/decoder.js';
import type { OccupancyGrid } from './grid/types.js';
import { validateMetadata, type RawMetadata } from './metadata/validate.js';
import type { MapMetadata } from './metadata/types.js';
import { segmentRooms, type SegmentationOptions } from './segmentation/index.js';
import type { RegionSource, SegmentMapLayout } from './segmentation/types.js';
import { composeLayers, drawSceneLabels, labelRequests, renderLayers, type MapScene } from './render/index.js';
import { orientRaster } from './render/orientation.js';
import type { Raster } from './render/raster.js';
import { resolveRenderOptions, type RenderOptions } from './render/options.js';
import { prepareTypesetter } from './render/text.js';
import { defaultEncodeOptions, encodeRaster, enhanceRaster, type EncodeOptions, type EncodedImage } from './encode/index.js';

// ============================================================================
// Convert Options
// ============================================================================

export interface GridFormatOptions {
  /** Fixed header offset, or 'auto' to probe */
  offset?: number | 'auto';
  /** Element types tried when probing */
  elementTypes?: ElementType[];
  /** Offsets tried when probing */
  offsets?: number[] | OffsetScan;
  /** What to do when probing finds nothing: assume offset 0 / uint8, or fail */
  onNotFound?: 'fallback' | 'fail';
}

export interface ConvertOptions {
  debug?: boolean;
  gridFormat?: GridFormatOptions;
  segmentation?: Omit<SegmentationOptions, 'segmentMap' | 'debug'>;
  render?: RenderOptions;
  encode?: EncodeOptions;
  /** Footer timestamp; defaults to the current local time */
  timestamp?: string;
}

export const defaultGridFormatOptions: Required<GridFormatOptions> = {
  offset: 'auto',
  elementTypes: ['uint8'],
  offsets: [...DEFAULT_OFFSETS],
  onNotFound: 'fallback',
};

// ============================================================================
// Convert Inputs & Result
// ============================================================================

export interface MapInputs extends RawMetadata {
  /** Raw occupancy grid dump */
  grid: Uint8Array;
  /** Optional auxiliary segment channel */
  segmentMap?: Uint8Array;
}

export interface RoomSummary {
  id: number;
  area: number;
  source: RegionSource;
}

export interface ConvertSuccess {
  success: true;
  errors: [];
  png: Buffer;
  base64: string;
  width: number;
  height: number;
  metadata: MapMetadata;
  grid: OccupancyGrid;
  gridFormat: GridLayout;
  rooms: RoomSummary[];
  segmentation: { source: RegionSource; layout?: SegmentMapLayout };
  /** Composite before orientation and labels, only with `debug` */
  debugComposite?: Raster;
}

export interface ConvertFailure {
  success: false;
  errors: ConversionError[];
}

export type ConvertResult = ConvertSuccess | ConvertFailure;

// ============================================================================
// Helpers
// ============================================================================

/** Local time as "YYYY-MM-DD HH:mm:ss". */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export type LayoutResult =
  | { success: true; layout: GridLayout; probed: boolean }
  | { success: false; error: ConversionError };

/**
 * Decide where the grid starts in the dump. A fixed offset is taken as is;
 * 'auto' probes and, when nothing matches, either falls back to offset 0 or
 * reports E201.
 */
export function resolveGridLayout(
  buffer: Uint8Array,
  frame: { width: number; height: number },
  options: GridFormatOptions = {},
  debug = false
): LayoutResult {
  const opts = { ...defaultGridFormatOptions, ...options };

  if (opts.offset !== 'auto') {
    return { success: true, layout: { offset: opts.offset, elementType: opts.elementTypes[0] ?? 'uint8' }, probed: false };
  }

  const probe = probeFormat(buffer, {
    width: frame.width,
    height: frame.height,
    elementTypes: opts.elementTypes,
    offsets: opts.offsets,
  });

  if (probe.found) {
    if (debug) {
      console.log(`Grid format: offset ${probe.offset}, ${probe.elementType}, ${probe.distinctValues} distinct value(s)`);
    }
    return { success: true, layout: { offset: probe.offset, elementType: probe.elementType }, probed: true };
  }

  if (opts.onNotFound === 'fail') {
    return {
      success: false,
      error: {
        phase: 'probe',
        code: ErrorCodes.FORMAT_NOT_FOUND,
        message: `no plausible grid layout among ${probe.candidatesTried} candidate(s) for ${frame.width}x${frame.height} map (${buffer.length} bytes)`,
        details: { candidatesTried: probe.candidatesTried, bufferLength: buffer.length },
      },
    };
  }

  if (debug) {
    console.log(`Grid format: nothing matched ${probe.candidatesTried} candidate(s), assuming offset 0 uint8`);
  }
  return { success: true, layout: { offset: 0, elementType: 'uint8' }, probed: false };
}

// ============================================================================
// Converter
// ============================================================================

/**
 * Full pipeline: validate metadata, locate and decode the grid, segment rooms,
 * render overlays, orient and encode.
 */
export async function convertMap(inputs: MapInputs, options: ConvertOptions = {}): Promise<ConvertResult> {
  const debug = options.debug ?? false;

  // Phase 1: Metadata
  const validated = validateMetadata(inputs);
  if (!validated.success) {
    return { success: false, errors: validated.errors };
  }
  const { metadata } = validated;
  const { frame } = metadata;

  if (debug) {
    console.log(`Map dimensions: ${frame.width}x${frame.height} cells`);
    console.log(`Resolution: ${frame.resolution} meters/cell`);
    console.log(`Origin: (${frame.origin.x}, ${frame.origin.y})`);
  }

  // Phase 2: Probe
  const layoutResult = resolveGridLayout(inputs.grid, frame, options.gridFormat, debug);
  if (!layoutResult.success) {
    return { success: false, errors: [layoutResult.error] };
  }

  // Phase 3: Decode
  const decoded = decodeGrid(inputs.grid, frame, layoutResult.layout);
  if (!decoded.success) {
    return { success: false, errors: [decoded.error] };
  }
  const { grid } = decoded;

  // Phase 4: Segment
  const segmentation = segmentRooms(grid, {
    ...options.segmentation,
    segmentMap: inputs.segmentMap,
    debug,
  });

  // Phase 5: Render
  const scene: MapScene = {
    grid,
    regions: segmentation.regions,
    roomAreas: metadata.roomAreas,
    forbiddenZones: metadata.forbiddenZones,
    charger: metadata.charger,
    timestamp: options.timestamp ?? formatTimestamp(new Date()),
  };

  const renderOptions = resolveRenderOptions(options.render);
  const layers = renderLayers(scene, renderOptions);
  const typeset = await prepareTypesetter(labelRequests(scene, layers, renderOptions), renderOptions.fonts, debug);
  const composite = composeLayers(layers);
  let image = orientRaster(composite);

  if (debug) {
    console.log(`Rendered ${image.width}x${image.height} canvas with ${segmentation.regions.length} room(s)`);
  }

  // Phase 6: Encode. Labels go on after enhancement and keep their exact colors.
  const enhance = options.encode?.enhance ?? defaultEncodeOptions.enhance;
  let encoded: EncodedImage;
  try {
    if (enhance) {
      image = await enhanceRaster(image);
    }
    drawSceneLabels(image, scene, layers, renderOptions, typeset);
    encoded = await encodeRaster(image, { ...options.encode, enhance: false });
  } catch (e) {
    if (e instanceof EncodeError) {
      return {
        success: false,
        errors: [{ phase: 'encode', code: ErrorCodes.ENCODE_FAILED, message: e.message }],
      };
    }
    throw e;
  }

  const result: ConvertSuccess = {
    success: true,
    errors: [],
    png: encoded.png,
    base64: encoded.base64,
    width: encoded.width,
    height: encoded.height,
    metadata,
    grid,
    gridFormat: layoutResult.layout,
    rooms: segmentation.regions.map((r) => ({ id: r.id, area: r.area, source: r.source })),
    segmentation: { source: segmentation.source, layout: segmentation.layout },
  };

  if (debug) {
    result.debugComposite = composite;
  }

  return result;
}

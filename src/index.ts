// ============================================================================
// Vacuum Map Renderer - occupancy map dumps to annotated PNGs
// ============================================================================

// Errors
export { ErrorCodes, EncodeError, formatConversionError, type ErrorCode, type ConversionError, type ConversionPhase } from './errors.js';

// Geometry
export * from './geometry/index.js';

// Format probing
export * from './format/index.js';

// Grid decoding
export * from './grid/index.js';

// Metadata
export * from './metadata/index.js';

// Segmentation
export * from './segmentation/index.js';

// Rendering
export * from './render/index.js';

// Encoding
export { encodeRaster, enhanceRaster, sidecarPath, defaultEncodeOptions, type EncodeOptions, type EncodedImage, type ResampleKernel } from './encode/index.js';

// Converter (full pipeline)
export {
  convertMap,
  resolveGridLayout,
  formatTimestamp,
  defaultGridFormatOptions,
  type ConvertOptions,
  type ConvertResult,
  type ConvertSuccess,
  type ConvertFailure,
  type GridFormatOptions,
  type LayoutResult,
  type MapInputs,
  type RoomSummary,
} from './converter.js';

// Files
export { loadMapDirectory, writeConversionOutput, originalImagePath, MapFiles, type LoadResult, type WrittenFiles } from './io.js';

import type { MapFrame } from '../geometry/types.js';
import { ELEMENT_SIZES, readElements, type ElementType } from '../format/probe.js';
import { ErrorCodes, type ConversionError } from '../errors.js';
import { CellState, RAW_FREE, RAW_UNKNOWN, type OccupancyGrid } from './types.js';

export interface GridLayout {
  offset: number;
  elementType: ElementType;
}

export type DecodeResult =
  | { success: true; grid: OccupancyGrid }
  | { success: false; error: ConversionError };

export function classifyValue(value: number): CellState {
  if (value === RAW_UNKNOWN) return CellState.Unknown;
  if (value === RAW_FREE) return CellState.Free;
  return CellState.Obstacle;
}

/**
 * Decode a raw grid buffer into cell states. The buffer length is checked
 * against the declared dimensions before any value is classified.
 */
export function decodeGrid(
  buffer: Uint8Array,
  frame: MapFrame,
  layout: GridLayout = { offset: 0, elementType: 'uint8' }
): DecodeResult {
  const count = frame.width * frame.height;
  const required = count * ELEMENT_SIZES[layout.elementType];
  const available = Math.max(0, buffer.length - layout.offset);

  const values = available >= required
    ? readElements(buffer, layout.offset, count, layout.elementType)
    : null;

  if (values === null) {
    return {
      success: false,
      error: {
        phase: 'decode',
        code: ErrorCodes.INSUFFICIENT_DATA,
        message: `map data too small (${available} bytes after offset ${layout.offset}) for ${frame.width}x${frame.height} ${layout.elementType} grid (${required} bytes)`,
        details: { required, available, offset: layout.offset, elementType: layout.elementType },
      },
    };
  }

  const cells = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    cells[i] = classifyValue(values[i]);
  }

  return {
    success: true,
    grid: {
      width: frame.width,
      height: frame.height,
      resolution: frame.resolution,
      origin: { ...frame.origin },
      cells,
    },
  };
}

// ============================================================================
// Element Types
// ============================================================================

export type ElementType = 'uint8' | 'int8' | 'uint16' | 'int16' | 'uint32' | 'int32' | 'float32';

export const ELEMENT_SIZES: Record<ElementType, number> = {
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
  uint32: 4,
  int32: 4,
  float32: 4,
};

export const DEFAULT_ELEMENT_TYPES: readonly ElementType[] = ['uint8', 'int16', 'uint16', 'int32', 'float32'];

export const DEFAULT_OFFSETS: readonly number[] = [0, 4, 8, 16, 32, 48, 64, 128];

/** Exhaustive offset scan, `to` inclusive. */
export interface OffsetScan {
  from: number;
  to: number;
  step: number;
}

/**
 * Read `count` little-endian elements starting at `offset`.
 * Returns null when the buffer does not hold them all.
 */
export function readElements(
  buffer: Uint8Array,
  offset: number,
  count: number,
  elementType: ElementType
): number[] | null {
  const size = ELEMENT_SIZES[elementType];
  if (offset < 0 || buffer.length - offset < count * size) {
    return null;
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset + offset, count * size);
  const values = new Array<number>(count);

  for (let i = 0; i < count; i++) {
    const at = i * size;
    switch (elementType) {
      case 'uint8': values[i] = view.getUint8(at); break;
      case 'int8': values[i] = view.getInt8(at); break;
      case 'uint16': values[i] = view.getUint16(at, true); break;
      case 'int16': values[i] = view.getInt16(at, true); break;
      case 'uint32': values[i] = view.getUint32(at, true); break;
      case 'int32': values[i] = view.getInt32(at, true); break;
      case 'float32': values[i] = view.getFloat32(at, true); break;
    }
  }

  return values;
}

// ============================================================================
// Probe Options & Result
// ============================================================================

export type ProbeMode = 'strict' | 'auto';

export interface ProbeOptions {
  width: number;
  height: number;
  elementTypes?: readonly ElementType[];
  offsets?: readonly number[] | OffsetScan;
  /** 'auto' additionally requires a plausible number of distinct values */
  mode?: ProbeMode;
  /** Upper bound (exclusive) on distinct values in 'auto' mode */
  maxDistinct?: number;
}

export interface ProbeMatch {
  found: true;
  offset: number;
  elementType: ElementType;
  values: number[];
  distinctValues: number;
}

export interface ProbeMiss {
  found: false;
  candidatesTried: number;
}

export type ProbeResult = ProbeMatch | ProbeMiss;

// ============================================================================
// Prober
// ============================================================================

function expandOffsets(offsets: readonly number[] | OffsetScan): number[] {
  if (!('step' in offsets)) return [...offsets];
  const list: number[] = [];
  const step = Math.max(1, offsets.step);
  for (let offset = offsets.from; offset <= offsets.to; offset += step) {
    list.push(offset);
  }
  return list;
}

function countDistinct(values: number[]): number {
  return new Set(values).size;
}

/**
 * Find the first (element type, offset) pair under which the buffer reads as
 * `width * height` non-degenerate values. Candidates are tried element-type
 * first, then offset, each in the order given.
 */
export function probeFormat(buffer: Uint8Array, options: ProbeOptions): ProbeResult {
  const {
    width,
    height,
    elementTypes = DEFAULT_ELEMENT_TYPES,
    offsets = DEFAULT_OFFSETS,
    mode = 'strict',
    maxDistinct = 20,
  } = options;

  const count = width * height;
  const offsetList = expandOffsets(offsets);
  let candidatesTried = 0;

  for (const elementType of elementTypes) {
    for (const offset of offsetList) {
      candidatesTried++;

      const values = readElements(buffer, offset, count, elementType);
      if (values === null || values.length !== count) continue;

      const distinctValues = countDistinct(values);
      if (distinctValues <= 1) continue;
      if (mode === 'auto' && distinctValues >= maxDistinct) continue;

      return { found: true, offset, elementType, values, distinctValues };
    }
  }

  return { found: false, candidatesTried };
}

import { probeFormat, readElements } from '../format/probe.js';
import type { SegmentMapLayout } from './types.js';

/**
 * Layouts seen across robot firmware, tried in order. A column-major entry
 * reads the same bytes as the row-major entry with its header, so in this
 * list it only matters when the row-major one is left out.
 */
export const SEGMENT_MAP_LAYOUTS: readonly SegmentMapLayout[] = [
  { headerSize: 16, elementType: 'uint8', order: 'row-major' },
  { headerSize: 20, elementType: 'uint8', order: 'row-major' },
  { headerSize: 32, elementType: 'uint8', order: 'row-major' },
  { headerSize: 16, elementType: 'uint8', order: 'column-major' },
  { headerSize: 20, elementType: 'uint8', order: 'column-major' },
  { headerSize: 0, elementType: 'uint8', order: 'row-major' },
  { headerSize: 0, elementType: 'uint8', order: 'column-major' },
];

/** Furthest offset visited by the fallback scan. */
const SCAN_LIMIT = 1000;
const SCAN_STEP = 4;

export interface DecodedSegmentMap {
  /** Row-major labels; 0 is background */
  labels: Int32Array;
  /** Pixel count per kept label */
  counts: Map<number, number>;
  layout: SegmentMapLayout;
}

export function toRowMajor(values: number[], width: number, height: number, order: SegmentMapLayout['order']): Int32Array {
  const labels = new Int32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const source = order === 'row-major' ? y * width + x : x * height + y;
      labels[y * width + x] = values[source];
    }
  }
  return labels;
}

function countLabels(labels: Int32Array): Map<number, number> {
  const counts = new Map<number, number>();
  for (const label of labels) {
    if (label <= 0) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

/** Zero out labels at or below the pixel threshold and return what is left. */
function keepLargeLabels(labels: Int32Array, minPixels: number): Map<number, number> {
  const counts = countLabels(labels);
  const kept = new Map<number, number>();
  for (const [label, count] of counts) {
    if (count > minPixels) kept.set(label, count);
  }
  for (let i = 0; i < labels.length; i++) {
    if (!kept.has(labels[i])) labels[i] = 0;
  }
  return kept;
}

/**
 * Try to read an auxiliary segment channel. The fixed layout list is tried
 * first; a layout is accepted once at least one label covers more than
 * `minPixels` cells. Failing that, uint8 offsets are scanned in 'auto' mode
 * and accepted only when every label clears the threshold. Returns null when
 * nothing qualifies. Firmware with a known layout can pass its own list.
 */
export function decodeSegmentMap(
  buffer: Uint8Array,
  width: number,
  height: number,
  minPixels: number,
  debug = false,
  layouts: readonly SegmentMapLayout[] = SEGMENT_MAP_LAYOUTS
): DecodedSegmentMap | null {
  const count = width * height;

  for (const layout of layouts) {
    const values = readElements(buffer, layout.headerSize, count, layout.elementType);
    if (values === null) continue;

    const labels = toRowMajor(values, width, height, layout.order);
    if (new Set(labels).size <= 1) continue;

    const counts = keepLargeLabels(labels, minPixels);
    if (counts.size > 0) {
      if (debug) {
        console.log(`Segment map: ${counts.size} room(s) (header ${layout.headerSize}, ${layout.order})`);
      }
      return { labels, counts, layout };
    }
  }

  const scanEnd = Math.min(SCAN_LIMIT, buffer.length - count);
  if (scanEnd < 0) return null;

  let from = 0;
  while (from <= scanEnd) {
    const probe = probeFormat(buffer, {
      width,
      height,
      elementTypes: ['uint8'],
      offsets: { from, to: scanEnd, step: SCAN_STEP },
      mode: 'auto',
    });
    if (!probe.found) break;

    const labels = Int32Array.from(probe.values);
    const counts = countLabels(labels);
    const plausible = counts.size > 0 && [...counts.values()].every((n) => n > minPixels);
    if (plausible) {
      const layout: SegmentMapLayout = { headerSize: probe.offset, elementType: 'uint8', order: 'row-major' };
      if (debug) {
        console.log(`Segment map: ${counts.size} room(s) found by scan at offset ${probe.offset}`);
      }
      return { labels, counts, layout };
    }

    from = probe.offset + SCAN_STEP;
  }

  if (debug) {
    console.log('Segment map: no usable layout, falling back to flood fill');
  }
  return null;
}

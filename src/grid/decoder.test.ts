import { describe, it, expect } from 'vitest';
import { classifyValue, decodeGrid } from './decoder.js';
import { CellState, getCell } from './types.js';
import type { MapFrame } from '../geometry/types.js';

const frame: MapFrame = { width: 4, height: 4, resolution: 0.05, origin: { x: 0, y: 0 } };

describe('classifyValue', () => {
  it('should map raw values to cell states', () => {
    expect(classifyValue(127)).toBe(CellState.Unknown);
    expect(classifyValue(0)).toBe(CellState.Free);
    expect(classifyValue(1)).toBe(CellState.Obstacle);
    expect(classifyValue(255)).toBe(CellState.Obstacle);
    expect(classifyValue(-1)).toBe(CellState.Obstacle);
  });
});

describe('decodeGrid', () => {
  it('should decode a 4x4 grid with one unknown and one obstacle cell', () => {
    const buffer = new Uint8Array(16);
    buffer[1 * 4 + 1] = 127;
    buffer[2 * 4 + 2] = 200;

    const result = decodeGrid(buffer, frame);

    expect(result.success).toBe(true);
    if (!result.success) return;

    const { grid } = result;
    expect(grid.width).toBe(4);
    expect(grid.height).toBe(4);
    expect(getCell(grid, 1, 1)).toBe(CellState.Unknown);
    expect(getCell(grid, 2, 2)).toBe(CellState.Obstacle);

    const nonFree = [...grid.cells].filter((c) => c !== CellState.Free);
    expect(nonFree).toHaveLength(2);
  });

  it('should fail with E101 when the buffer is one byte short', () => {
    const result = decodeGrid(new Uint8Array(15), frame);

    expect(result.success).toBe(false);
    if (result.success) return;

    expect(result.error.code).toBe('E101');
    expect(result.error.phase).toBe('decode');
    expect(result.error.details).toEqual({ required: 16, available: 15, offset: 0, elementType: 'uint8' });
  });

  it('should count only bytes after the offset', () => {
    const result = decodeGrid(new Uint8Array(16), frame, { offset: 20, elementType: 'uint8' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details).toMatchObject({ available: 0 });
  });

  it('should never fail when enough bytes follow the offset', () => {
    for (const extra of [0, 1, 7, 64]) {
      const result = decodeGrid(new Uint8Array(8 + 16 + extra), frame, { offset: 8, elementType: 'uint8' });
      expect(result.success).toBe(true);
    }
  });

  it('should require width * height elements of the layout type', () => {
    const result = decodeGrid(new Uint8Array(16), frame, { offset: 0, elementType: 'int16' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details).toMatchObject({ required: 32, available: 16 });
  });

  it('should classify int16 values', () => {
    const small: MapFrame = { ...frame, width: 2, height: 1 };
    // 127, -1
    const buffer = new Uint8Array([127, 0, 0xff, 0xff]);

    const result = decodeGrid(buffer, small, { offset: 0, elementType: 'int16' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect([...result.grid.cells]).toEqual([CellState.Unknown, CellState.Obstacle]);
  });

  it('should copy the frame into the grid', () => {
    const shifted: MapFrame = { ...frame, origin: { x: -1.5, y: 2 } };
    const result = decodeGrid(new Uint8Array(16), shifted);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.grid.origin).toEqual({ x: -1.5, y: 2 });
    expect(result.grid.resolution).toBe(0.05);
  });
});

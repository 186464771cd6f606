import type { MapFrame } from '../geometry/types.js';

// ============================================================================
// Cell State
// ============================================================================

export const CellState = {
  Unknown: 0,
  Free: 1,
  Obstacle: 2,
} as const;

export type CellState = (typeof CellState)[keyof typeof CellState];

/** Raw value marking an unexplored cell. */
export const RAW_UNKNOWN = 127;
/** Raw value marking a free cell. */
export const RAW_FREE = 0;

// ============================================================================
// Occupancy Grid
// ============================================================================

export interface OccupancyGrid extends MapFrame {
  /** Row-major cell states, length width * height */
  cells: Uint8Array;
}

export function cellIndex(grid: { width: number }, x: number, y: number): number {
  return y * grid.width + x;
}

export function getCell(grid: OccupancyGrid, x: number, y: number): CellState {
  const value = grid.cells[cellIndex(grid, x, y)];
  if (value === CellState.Free || value === CellState.Obstacle) return value;
  return CellState.Unknown;
}

import type { PixelPoint } from '../geometry/types.js';
import { CellState, type OccupancyGrid } from '../grid/types.js';

const NEIGHBORS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

/**
 * Breadth-first fill from a seed over cells in `state`, 4-connected.
 * Marks every collected cell in `visited` (one flag per cell, row-major) so
 * that repeated calls over one grid touch each cell at most once.
 */
export function floodFill(
  grid: OccupancyGrid,
  seedX: number,
  seedY: number,
  visited: Uint8Array,
  state: CellState = CellState.Free
): PixelPoint[] {
  const { width, height, cells } = grid;
  if (seedX < 0 || seedY < 0 || seedX >= width || seedY >= height) return [];

  const seed = seedY * width + seedX;
  if (visited[seed] || cells[seed] !== state) return [];

  const pixels: PixelPoint[] = [];
  const queue: number[] = [seed];
  let head = 0;
  visited[seed] = 1;

  while (head < queue.length) {
    const index = queue[head++];
    const x = index % width;
    const y = (index - x) / width;
    pixels.push({ x, y });

    for (const [dx, dy] of NEIGHBORS) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
      const next = ny * width + nx;
      if (!visited[next] && cells[next] === state) {
        visited[next] = 1;
        queue.push(next);
      }
    }
  }

  return pixels;
}

/**
 * All 4-connected components of free space, in seed discovery order
 * (row-major scan).
 */
export function findFreeComponents(grid: OccupancyGrid): PixelPoint[][] {
  const visited = new Uint8Array(grid.width * grid.height);
  const components: PixelPoint[][] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const index = y * grid.width + x;
      if (visited[index] || grid.cells[index] !== CellState.Free) continue;
      components.push(floodFill(grid, x, y, visited));
    }
  }

  return components;
}

import type { RGBA } from './raster.js';

/** Room colors used before falling back to generated hues. */
export const ROOM_COLORS: readonly RGBA[] = [
  [255, 195, 0, 255],
  [200, 80, 80, 255],
  [30, 144, 255, 255],
  [0, 230, 170, 255],
  [100, 210, 255, 255],
];

export function hsvToRgb(h: number, s: number, v: number): [number, number, number] {
  const i = Math.floor(h * 6);
  const f = h * 6 - i;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);

  let rgb: [number, number, number];
  switch (((i % 6) + 6) % 6) {
    case 0: rgb = [v, t, p]; break;
    case 1: rgb = [q, v, p]; break;
    case 2: rgb = [p, v, t]; break;
    case 3: rgb = [p, q, v]; break;
    case 4: rgb = [t, p, v]; break;
    default: rgb = [v, p, q]; break;
  }

  return [Math.trunc(rgb[0] * 255), Math.trunc(rgb[1] * 255), Math.trunc(rgb[2] * 255)];
}

/**
 * `count` visually distinct colors: the fixed palette first, then evenly
 * spaced hues at saturation 0.8, value 0.9.
 */
export function generateRoomColors(count: number): RGBA[] {
  if (count <= ROOM_COLORS.length) {
    return ROOM_COLORS.slice(0, count);
  }

  const colors = [...ROOM_COLORS];
  const extra = count - ROOM_COLORS.length;
  for (let i = 0; i < extra; i++) {
    const [r, g, b] = hsvToRgb(i / extra, 0.8, 0.9);
    colors.push([r, g, b, 255]);
  }
  return colors;
}

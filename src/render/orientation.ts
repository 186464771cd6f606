import type { PixelPoint } from '../geometry/types.js';
import type { Raster } from './raster.js';

// The robot stores its map upside down and mirrored relative to the app.
// Rotating by 180° and then mirroring horizontally cancels out to a vertical
// flip: (x, y) -> (x, height - 1 - y).

export function orientPoint(point: PixelPoint, height: number): PixelPoint {
  return { x: point.x, y: height - 1 - point.y };
}

/** Returns a new raster in display orientation. */
export function orientRaster(raster: Raster): Raster {
  const { width, height } = raster;
  const rowBytes = width * 4;
  const data = new Uint8ClampedArray(raster.data.length);

  for (let y = 0; y < height; y++) {
    const source = y * rowBytes;
    const target = (height - 1 - y) * rowBytes;
    data.set(raster.data.subarray(source, source + rowBytes), target);
  }

  return { width, height, data };
}

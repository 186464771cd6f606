// ============================================================================
// Raster
// ============================================================================

/** RGBA raster, straight (non-premultiplied) alpha, row-major. */
export interface Raster {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export type RGBA = readonly [number, number, number, number];

export function createRaster(width: number, height: number, fill: RGBA = [0, 0, 0, 0]): Raster {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill[0] || fill[1] || fill[2] || fill[3]) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
      data[i + 3] = fill[3];
    }
  }
  return { width, height, data };
}

export function cloneRaster(raster: Raster): Raster {
  return { width: raster.width, height: raster.height, data: new Uint8ClampedArray(raster.data) };
}

/** Writes (replaces) one pixel. Coordinates off the raster are ignored. */
export function setPixel(raster: Raster, x: number, y: number, color: RGBA): void {
  if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) return;
  const i = (y * raster.width + x) * 4;
  raster.data[i] = color[0];
  raster.data[i + 1] = color[1];
  raster.data[i + 2] = color[2];
  raster.data[i + 3] = color[3];
}

export function getPixel(raster: Raster, x: number, y: number): RGBA {
  const i = (y * raster.width + x) * 4;
  return [raster.data[i], raster.data[i + 1], raster.data[i + 2], raster.data[i + 3]];
}

// ============================================================================
// Colors
// ============================================================================

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa`. An explicit `alpha` overrides the
 * alpha in the string.
 */
export function parseColor(hex: string, alpha?: number): RGBA {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i.exec(hex.trim());
  if (!match) {
    throw new Error(`Invalid color "${hex}" (expected #rgb, #rrggbb or #rrggbbaa)`);
  }

  let digits = match[1];
  if (digits.length === 3) {
    digits = digits.split('').map((d) => d + d).join('');
  }

  const r = parseInt(digits.slice(0, 2), 16);
  const g = parseInt(digits.slice(2, 4), 16);
  const b = parseInt(digits.slice(4, 6), 16);
  const a = digits.length === 8 ? parseInt(digits.slice(6, 8), 16) : 255;

  return [r, g, b, alpha ?? a];
}

export function withAlpha(color: RGBA, alpha: number): RGBA {
  return [color[0], color[1], color[2], alpha];
}

// ============================================================================
// Compositing
// ============================================================================

/**
 * Porter-Duff "over": draws `layer` on top of `base` in place. Both rasters
 * must have the same size. Fully transparent layer pixels leave the base
 * untouched.
 */
export function compositeOver(base: Raster, layer: Raster): void {
  if (base.width !== layer.width || base.height !== layer.height) {
    throw new Error(
      `Cannot composite ${layer.width}x${layer.height} layer onto ${base.width}x${base.height} raster`
    );
  }

  const dst = base.data;
  const src = layer.data;

  for (let i = 0; i < src.length; i += 4) {
    const sa = src[i + 3];
    if (sa === 0) continue;

    if (sa === 255) {
      dst[i] = src[i];
      dst[i + 1] = src[i + 1];
      dst[i + 2] = src[i + 2];
      dst[i + 3] = 255;
      continue;
    }

    const a = sa / 255;
    const da = dst[i + 3] / 255;
    const outA = a + da * (1 - a);

    for (let c = 0; c < 3; c++) {
      dst[i + c] = Math.round((src[i + c] * a + dst[i + c] * da * (1 - a)) / outA);
    }
    dst[i + 3] = Math.round(outA * 255);
  }
}

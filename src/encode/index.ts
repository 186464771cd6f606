import sharp from 'sharp';
import { EncodeError } from '../errors.js';
import type { Raster } from '../render/raster.js';

// ============================================================================
// Encode Options
// ============================================================================

export type ResampleKernel = 'nearest' | 'linear' | 'cubic' | 'mitchell' | 'lanczos2' | 'lanczos3';

export interface EncodeOptions {
  /** Integer upscale factor */
  upscale?: number;
  kernel?: ResampleKernel;
  /** Contrast x1.1 and saturation x1.2 */
  enhance?: boolean;
  compressionLevel?: number;
}

export const defaultEncodeOptions: Required<EncodeOptions> = {
  upscale: 2,
  kernel: 'lanczos3',
  enhance: true,
  compressionLevel: 6,
};

export interface EncodedImage {
  png: Buffer;
  base64: string;
  width: number;
  height: number;
}

const CONTRAST = 1.1;
const SATURATION = 1.2;

// ============================================================================
// Encoder
// ============================================================================

function rawInput(raster: Raster): sharp.Sharp {
  return sharp(Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength), {
    raw: { width: raster.width, height: raster.height, channels: 4 },
  });
}

/**
 * The encoder's contrast and saturation boost as a separate pass, for
 * callers that draw on the image afterwards.
 */
export async function enhanceRaster(raster: Raster): Promise<Raster> {
  try {
    const { data, info } = await rawInput(raster)
      .linear(CONTRAST, -(CONTRAST - 1) * 128)
      .modulate({ saturation: SATURATION })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    };
  } catch (e) {
    throw new EncodeError(`Enhancement failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

/**
 * Upscale the raster and encode it as PNG, plus a base64 copy of the same
 * bytes.
 */
export async function encodeRaster(raster: Raster, options: EncodeOptions = {}): Promise<EncodedImage> {
  const opts = { ...defaultEncodeOptions, ...options };
  const factor = Math.max(1, Math.trunc(opts.upscale));
  const width = raster.width * factor;
  const height = raster.height * factor;

  let png: Buffer;
  try {
    let pipeline = rawInput(raster);

    if (factor > 1) {
      pipeline = pipeline.resize(width, height, { kernel: opts.kernel, fit: 'fill' });
    }

    if (opts.enhance) {
      // Contrast around mid-gray: out = 1.1 * in - 0.1 * 128
      pipeline = pipeline
        .linear(CONTRAST, -(CONTRAST - 1) * 128)
        .modulate({ saturation: SATURATION });
    }

    png = await pipeline.png({ compressionLevel: opts.compressionLevel }).toBuffer();
  } catch (e) {
    throw new EncodeError(`PNG encoding failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }

  return { png, base64: png.toString('base64'), width, height };
}

/**
 * Sidecar name for the base64 copy: a trailing ".png" becomes ".base64.txt",
 * any other name gets ".base64.txt" appended.
 */
export function sidecarPath(outputPath: string): string {
  if (/\.png$/i.test(outputPath)) {
    return outputPath.replace(/\.png$/i, '.base64.txt');
  }
  return `${outputPath}.base64.txt`;
}

import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { EncodeError } from '../errors.js';
import { createRaster } from '../render/raster.js';
import { encodeRaster, enhanceRaster, sidecarPath } from './index.js';

describe('encodeRaster', () => {
  it('should upscale by the configured factor', async () => {
    const encoded = await encodeRaster(createRaster(3, 2, [255, 255, 255, 255]));

    expect(encoded.width).toBe(6);
    expect(encoded.height).toBe(4);

    const meta = await sharp(encoded.png).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(6);
    expect(meta.height).toBe(4);
  });

  it('should carry the same bytes in the base64 copy', async () => {
    const encoded = await encodeRaster(createRaster(2, 2, [0, 0, 255, 255]));
    expect(Buffer.from(encoded.base64, 'base64').equals(encoded.png)).toBe(true);
  });

  it('should keep pixel values when enhancement and upscaling are off', async () => {
    const encoded = await encodeRaster(createRaster(2, 1, [255, 0, 0, 255]), { upscale: 1, enhance: false });

    const { data, info } = await sharp(encoded.png).raw().toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(2);
    expect(info.channels).toBe(4);
    expect([...data.subarray(0, 4)]).toEqual([255, 0, 0, 255]);
  });

  it('should raise EncodeError when sharp rejects the raster', async () => {
    const empty = { width: 0, height: 0, data: new Uint8ClampedArray(0) };
    await expect(encodeRaster(empty)).rejects.toBeInstanceOf(EncodeError);
  });
});

describe('enhanceRaster', () => {
  it('should keep the size and alpha of the raster', async () => {
    const raster = createRaster(3, 2, [200, 120, 40, 255]);
    raster.data[3] = 128;

    const enhanced = await enhanceRaster(raster);

    expect(enhanced.width).toBe(3);
    expect(enhanced.height).toBe(2);
    expect(enhanced.data).toHaveLength(24);
    expect(enhanced.data[3]).toBe(128);
    expect(enhanced.data[7]).toBe(255);
  });

  it('should darken tones below mid-gray', async () => {
    const enhanced = await enhanceRaster(createRaster(1, 1, [20, 20, 20, 255]));
    expect(enhanced.data[0]).toBeLessThan(20);
  });
});

describe('sidecarPath', () => {
  it('should replace a .png suffix', () => {
    expect(sidecarPath('out/map.png')).toBe('out/map.base64.txt');
    expect(sidecarPath('out/MAP.PNG')).toBe('out/MAP.base64.txt');
  });

  it('should append to other names', () => {
    expect(sidecarPath('out/map')).toBe('out/map.base64.txt');
    expect(sidecarPath('out/map.png.bak')).toBe('out/map.png.bak.base64.txt');
  });
});

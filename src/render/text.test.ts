import { describe, it, expect } from 'vitest';
import { createRaster, getPixel } from './raster.js';
import {
  drawLabel,
  drawTextBitmap,
  loadBuiltinFont,
  prepareTypesetter,
  typesetBuiltin,
  type TextBitmap,
} from './text.js';

describe('Built-in Glyphs', () => {
  it('should load the printable ASCII range', () => {
    const font = loadBuiltinFont();
    expect(font.glyphWidth).toBe(5);
    expect(font.glyphHeight).toBe(7);
    expect(Object.keys(font.glyphs)).toHaveLength(95);
  });

  it('should size text by glyph count, spacing and scale', () => {
    expect(typesetBuiltin('A')).toMatchObject({ width: 5, height: 7 });
    expect(typesetBuiltin('AB')).toMatchObject({ width: 11, height: 7 });
    expect(typesetBuiltin('AB', 2)).toMatchObject({ width: 22, height: 14 });
    expect(typesetBuiltin('')).toMatchObject({ width: 0, height: 7 });
  });

  it('should rasterize glyph rows', () => {
    const { mask, width } = typesetBuiltin('A', 2);
    // Top row of "A" is .###.
    expect([...mask.slice(0, width)]).toEqual([0, 0, 255, 255, 255, 255, 255, 255, 0, 0]);
  });

  it('should leave spaces blank', () => {
    expect(typesetBuiltin(' ').mask.every((v) => v === 0)).toBe(true);
  });

  it('should draw unknown characters with the fallback glyph', () => {
    expect(typesetBuiltin('é').mask).toEqual(typesetBuiltin('?').mask);
  });
});

describe('Drawing Text', () => {
  const solid = (width: number, height: number): TextBitmap => ({
    width,
    height,
    mask: new Uint8Array(width * height).fill(255),
  });

  it('should scale alpha by coverage', () => {
    const layer = createRaster(1, 1);
    drawTextBitmap(layer, { width: 1, height: 1, mask: new Uint8Array([128]) }, 0, 0, [0, 0, 0, 255]);
    expect(getPixel(layer, 0, 0)).toEqual([0, 0, 0, 128]);
  });

  it('should center labels and draw the outline underneath', () => {
    const layer = createRaster(10, 10);
    const style = { color: [0, 0, 0, 255] as const, outlineColor: [255, 255, 255, 230] as const, outlineOffset: 1 };

    drawLabel(layer, solid(2, 2), { x: 5, y: 5 }, style);

    // Text covers (4..5, 4..5)
    expect(getPixel(layer, 4, 4)).toEqual([0, 0, 0, 255]);
    expect(getPixel(layer, 5, 5)).toEqual([0, 0, 0, 255]);
    expect(getPixel(layer, 3, 4)).toEqual([255, 255, 255, 230]);
    expect(getPixel(layer, 6, 5)).toEqual([255, 255, 255, 230]);
    expect(getPixel(layer, 3, 3)).toEqual([0, 0, 0, 0]);
  });
});

describe('prepareTypesetter', () => {
  it('should fall back to the built-in glyphs when no font file exists', async () => {
    const typeset = await prepareTypesetter(
      [{ text: 'Room 1', size: 18, scale: 2 }],
      [{ file: '/nonexistent/fonts/Sans.ttf', family: 'Sans' }]
    );

    expect(typeset('Room 1')).toEqual(typesetBuiltin('Room 1', 2));
  });

  it('should typeset unrequested text at scale 1', async () => {
    const typeset = await prepareTypesetter([], []);
    expect(typeset('x')).toEqual(typesetBuiltin('x'));
  });
});

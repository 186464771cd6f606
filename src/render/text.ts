import { existsSync, readFileSync } from 'fs';
import sharp from 'sharp';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { PixelPoint } from '../geometry/types.js';
import { setPixel, type RGBA, type Raster } from './raster.js';

// ============================================================================
// Text Bitmaps
// ============================================================================

/** Coverage mask for one rendered string; 0 is empty, 255 is solid. */
export interface TextBitmap {
  width: number;
  height: number;
  mask: Uint8Array;
}

export type Typesetter = (text: string) => TextBitmap;

export interface FontCandidate {
  /** Absolute path to a TrueType/OpenType file */
  file: string;
  /** Family name inside the file, as Pango knows it */
  family: string;
}

// ============================================================================
// Built-in Glyph Set
// ============================================================================

const BuiltinFontSchema = Type.Object({
  name: Type.String(),
  glyphWidth: Type.Integer({ minimum: 1 }),
  glyphHeight: Type.Integer({ minimum: 1 }),
  spacing: Type.Integer({ minimum: 0 }),
  fallback: Type.String({ minLength: 1, maxLength: 1 }),
  glyphs: Type.Record(Type.String(), Type.Array(Type.String())),
});

export type BuiltinFont = Static<typeof BuiltinFontSchema>;

const BUILTIN_FONT_URL = new URL('../../data/builtin-font.json', import.meta.url);

let builtinFont: BuiltinFont | null = null;

export function loadBuiltinFont(): BuiltinFont {
  if (builtinFont) return builtinFont;

  const data: unknown = JSON.parse(readFileSync(BUILTIN_FONT_URL, 'utf-8'));
  if (!Value.Check(BuiltinFontSchema, data)) {
    throw new Error(`Built-in font at ${BUILTIN_FONT_URL.pathname} is malformed`);
  }

  builtinFont = data;
  return data;
}

/**
 * Render with the bitmap glyph set, each glyph pixel scaled to a
 * `scale` x `scale` block. Characters without a glyph use the fallback glyph.
 */
export function typesetBuiltin(text: string, scale = 1, font: BuiltinFont = loadBuiltinFont()): TextBitmap {
  const chars = [...text];
  const advance = font.glyphWidth + font.spacing;
  const columns = chars.length === 0 ? 0 : chars.length * advance - font.spacing;
  const width = columns * scale;
  const height = font.glyphHeight * scale;
  const mask = new Uint8Array(width * height);

  chars.forEach((char, index) => {
    const rows = font.glyphs[char] ?? font.glyphs[font.fallback] ?? [];
    rows.forEach((row, gy) => {
      for (let gx = 0; gx < row.length; gx++) {
        if (row[gx] !== '1') continue;
        const left = (index * advance + gx) * scale;
        const top = gy * scale;
        for (let sy = 0; sy < scale; sy++) {
          for (let sx = 0; sx < scale; sx++) {
            mask[(top + sy) * width + left + sx] = 255;
          }
        }
      }
    });
  });

  return { width, height, mask };
}

// ============================================================================
// Font Files
// ============================================================================

/**
 * Render a string with a font file through sharp (Pango). Coverage comes from
 * the alpha channel.
 */
export async function typesetWithFont(text: string, font: FontCandidate, size: number): Promise<TextBitmap> {
  const { data, info } = await sharp({
    text: {
      text: escapeMarkup(text),
      font: `${font.family} ${size}`,
      fontfile: font.file,
      dpi: 72,
      rgba: true,
    },
  })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const mask = new Uint8Array(info.width * info.height);
  for (let i = 0; i < mask.length; i++) {
    mask[i] = data[i * info.channels + info.channels - 1];
  }

  return { width: info.width, height: info.height, mask };
}

function escapeMarkup(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export interface TypesetRequest {
  text: string;
  /** Pixel size when a font file is used */
  size: number;
  /** Block scale when the built-in glyphs are used */
  scale: number;
}

/**
 * Render every request with the first font candidate that exists and renders
 * all of them; otherwise with the built-in glyph set. Returns a typesetter
 * keyed by the request text.
 */
export async function prepareTypesetter(
  requests: TypesetRequest[],
  candidates: readonly FontCandidate[],
  debug = false
): Promise<Typesetter> {
  const builtin = new Map(requests.map((r) => [r.text, typesetBuiltin(r.text, r.scale)]));

  for (const candidate of candidates) {
    if (!existsSync(candidate.file)) {
      if (debug) console.log(`Font not found: ${candidate.file}`);
      continue;
    }

    try {
      const rendered = new Map<string, TextBitmap>();
      for (const request of requests) {
        rendered.set(request.text, await typesetWithFont(request.text, candidate, request.size));
      }
      if (debug) console.log(`Using font ${candidate.family} (${candidate.file})`);
      return (text) => rendered.get(text) ?? builtin.get(text) ?? typesetBuiltin(text);
    } catch (e) {
      if (debug) {
        console.log(`Font ${candidate.file} failed to render: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  }

  if (debug) console.log('Using built-in glyph set');
  return (text) => builtin.get(text) ?? typesetBuiltin(text);
}

// ============================================================================
// Drawing Text
// ============================================================================

/** Draw a text bitmap with its top-left corner at (left, top). */
export function drawTextBitmap(layer: Raster, bitmap: TextBitmap, left: number, top: number, color: RGBA): void {
  for (let y = 0; y < bitmap.height; y++) {
    for (let x = 0; x < bitmap.width; x++) {
      const coverage = bitmap.mask[y * bitmap.width + x];
      if (coverage === 0) continue;
      const alpha = Math.round((color[3] * coverage) / 255);
      setPixel(layer, left + x, top + y, [color[0], color[1], color[2], alpha]);
    }
  }
}

export interface LabelStyle {
  color: RGBA;
  outlineColor: RGBA;
  /** Offset of the four outline copies, in pixels */
  outlineOffset: number;
}

/**
 * Outlined label: four light copies offset in the cardinal directions, then
 * the dark text on top. `anchor` is the centre of the text.
 */
export function drawLabel(layer: Raster, bitmap: TextBitmap, anchor: PixelPoint, style: LabelStyle): void {
  const left = Math.trunc(anchor.x - bitmap.width / 2);
  const top = Math.trunc(anchor.y - bitmap.height / 2);
  drawLabelAt(layer, bitmap, left, top, style);
}

/** Same as drawLabel, positioned by the top-left corner. */
export function drawLabelAt(layer: Raster, bitmap: TextBitmap, left: number, top: number, style: LabelStyle): void {
  const d = style.outlineOffset;
  for (const [dx, dy] of [[0, d], [d, 0], [0, -d], [-d, 0]] as const) {
    drawTextBitmap(layer, bitmap, left + dx, top + dy, style.outlineColor);
  }
  drawTextBitmap(layer, bitmap, left, top, style.color);
}

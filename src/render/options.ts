import type { FontCandidate } from './text.js';

// ============================================================================
// Render Options
// ============================================================================

export interface RenderOptions {
  /** Canvas pixels per grid cell */
  cellSize?: number;
  freeColor?: string;
  unknownColor?: string;
  obstacleColor?: string;

  showRoomFills?: boolean;
  roomFillAlpha?: number;
  roomOutlineAlpha?: number;
  roomOutlineRadius?: number;
  areaOutlineColor?: string;
  areaOutlineAlpha?: number;

  noGoColor?: string;
  noMopColor?: string;
  forbiddenFillAlpha?: number;
  hatchAlpha?: number;
  hatchSpacing?: number;
  hatchRadius?: number;
  borderAlpha?: number;

  showCharger?: boolean;
  chargerColor?: string;
  chargerGlyphColor?: string;
  chargerRingColor?: string;
  chargerRingAlpha?: number;
  chargerRadius?: number;

  showLabels?: boolean;
  labelColor?: string;
  labelOutlineColor?: string;
  labelOutlineAlpha?: number;
  labelOutlineOffset?: number;
  /** Block scale of the built-in glyphs for room names */
  labelScale?: number;
  /** Pixel size for room names when a font file is used */
  labelFontSize?: number;

  showFooter?: boolean;
  footerColor?: string;
  footerScale?: number;
  footerFontSize?: number;
  footerMargin?: number;

  /** Font files to try in order before the built-in glyph set */
  fonts?: FontCandidate[];
}

export const defaultRenderOptions: Required<RenderOptions> = {
  cellSize: 2,
  freeColor: '#ffffff',
  unknownColor: '#e6e6e6',
  obstacleColor: '#282828',

  showRoomFills: true,
  roomFillAlpha: 180,
  roomOutlineAlpha: 220,
  roomOutlineRadius: 1,
  areaOutlineColor: '#0000ff',
  areaOutlineAlpha: 220,

  noGoColor: '#ff0000',
  noMopColor: '#0000ff',
  forbiddenFillAlpha: 80,
  hatchAlpha: 180,
  hatchSpacing: 20,
  hatchRadius: 1,
  borderAlpha: 200,

  showCharger: true,
  chargerColor: '#ff0000',
  chargerGlyphColor: '#ffffff',
  chargerRingColor: '#ffff00',
  chargerRingAlpha: 200,
  chargerRadius: 15,

  showLabels: true,
  labelColor: '#000000',
  labelOutlineColor: '#ffffff',
  labelOutlineAlpha: 230,
  labelOutlineOffset: 2,
  labelScale: 2,
  labelFontSize: 18,

  showFooter: true,
  footerColor: '#646464',
  footerScale: 1,
  footerFontSize: 12,
  footerMargin: 6,

  fonts: [],
};

export function resolveRenderOptions(options: RenderOptions = {}): Required<RenderOptions> {
  return { ...defaultRenderOptions, ...options };
}

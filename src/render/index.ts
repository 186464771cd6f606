import type { OccupancyGrid } from '../grid/types.js';
import type { Region } from '../segmentation/types.js';
import type { ChargerPose, ForbiddenZone, RoomArea } from '../metadata/types.js';
import { cloneRaster, compositeOver, createRaster, parseColor, type Raster } from './raster.js';
import { drawBaseLayer, drawChargerLayer, drawForbiddenLayer, drawRoomLayer, type PendingLabel } from './overlays.js';
import { orientPoint, orientRaster } from './orientation.js';
import { drawLabel, drawLabelAt, typesetBuiltin, type LabelStyle, type Typesetter, type TypesetRequest } from './text.js';
import { resolveRenderOptions, type RenderOptions } from './options.js';

export * from './raster.js';
export * from './draw.js';
export * from './palette.js';
export * from './overlays.js';
export * from './orientation.js';
export * from './text.js';
export * from './options.js';

// ============================================================================
// Scene
// ============================================================================

export interface MapScene {
  grid: OccupancyGrid;
  regions: Region[];
  roomAreas: RoomArea[];
  forbiddenZones: ForbiddenZone[];
  charger?: ChargerPose;
  /** Shown in the footer as "Generated: <timestamp>" */
  timestamp?: string;
}

export interface SceneLayers {
  base: Raster;
  rooms: Raster;
  forbidden: Raster;
  charger: Raster;
  labels: PendingLabel[];
}

export interface RenderedScene {
  /** Final image in display orientation */
  image: Raster;
  /** Composite before orientation and labels */
  composite: Raster;
}

export function footerText(timestamp: string): string {
  return `Generated: ${timestamp}`;
}

/**
 * Everything a scene needs typeset, so font files can be rendered up front.
 */
export function labelRequests(scene: MapScene, layers: SceneLayers, options: RenderOptions = {}): TypesetRequest[] {
  const opts = resolveRenderOptions(options);
  const requests: TypesetRequest[] = [];

  if (opts.showLabels) {
    for (const label of layers.labels) {
      requests.push({ text: label.text, size: opts.labelFontSize, scale: opts.labelScale });
    }
  }
  if (opts.showFooter && scene.timestamp) {
    requests.push({ text: footerText(scene.timestamp), size: opts.footerFontSize, scale: opts.footerScale });
  }

  return requests;
}

// ============================================================================
// Rendering
// ============================================================================

export function renderLayers(scene: MapScene, options: RenderOptions = {}): SceneLayers {
  const opts = resolveRenderOptions(options);
  const base = drawBaseLayer(scene.grid, opts);
  const { layer: rooms, labels } = drawRoomLayer(scene.grid, scene.regions, scene.roomAreas, opts);
  const forbidden = drawForbiddenLayer(scene.grid, scene.forbiddenZones, opts);
  const charger = drawChargerLayer(scene.grid, scene.charger, opts);
  return { base, rooms, forbidden, charger, labels };
}

/** Base, then room fills, forbidden zones and the charger, in that order. */
export function composeLayers(layers: SceneLayers): Raster {
  const composite = cloneRaster(layers.base);
  compositeOver(composite, layers.rooms);
  compositeOver(composite, layers.forbidden);
  compositeOver(composite, layers.charger);
  return composite;
}

/**
 * Draw room labels and the footer onto an image in display orientation.
 * `typeset` defaults to the built-in glyph set.
 */
export function drawSceneLabels(
  image: Raster,
  scene: MapScene,
  layers: SceneLayers,
  options: RenderOptions = {},
  typeset?: Typesetter
): void {
  const opts = resolveRenderOptions(options);
  const labelLayer = createRaster(image.width, image.height);
  const style: LabelStyle = {
    color: parseColor(opts.labelColor, 255),
    outlineColor: parseColor(opts.labelOutlineColor, opts.labelOutlineAlpha),
    outlineOffset: opts.labelOutlineOffset,
  };

  if (opts.showLabels) {
    for (const label of layers.labels) {
      const bitmap = typeset ? typeset(label.text) : typesetBuiltin(label.text, opts.labelScale);
      const anchor = orientPoint({ x: Math.round(label.anchor.x), y: Math.round(label.anchor.y) }, image.height);
      drawLabel(labelLayer, bitmap, anchor, style);
    }
  }

  if (opts.showFooter && scene.timestamp) {
    const text = footerText(scene.timestamp);
    const bitmap = typeset ? typeset(text) : typesetBuiltin(text, opts.footerScale);
    const footerStyle: LabelStyle = { ...style, color: parseColor(opts.footerColor, 255) };
    drawLabelAt(labelLayer, bitmap, opts.footerMargin, image.height - bitmap.height - opts.footerMargin, footerStyle);
  }

  compositeOver(image, labelLayer);
}

/**
 * Composite, orient, then draw labels in display orientation so text reads
 * the right way up.
 */
export function renderScene(
  scene: MapScene,
  options: RenderOptions = {},
  typeset?: Typesetter,
  layers: SceneLayers = renderLayers(scene, options)
): RenderedScene {
  const composite = composeLayers(layers);
  const image = orientRaster(composite);
  drawSceneLabels(image, scene, layers, options, typeset);
  return { image, composite };
}

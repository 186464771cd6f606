import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  convertMap,
  loadMapDirectory,
  MapFiles,
  originalImagePath,
  writeConversionOutput,
} from '../src/index.js';

function writeMapDirectory(dir: string, options: { segmentMap?: Uint8Array } = {}) {
  const grid = new Uint8Array(16);
  grid[5] = 127;
  writeFileSync(join(dir, MapFiles.grid), grid);
  writeFileSync(
    join(dir, MapFiles.mapRecord),
    JSON.stringify({ width: 4, height: 4, resolution: 0.05, x_min: 0, y_min: 0 })
  );
  writeFileSync(join(dir, MapFiles.chargerPose), JSON.stringify({ charger_pose: [0.1, 0.1] }));
  writeFileSync(
    join(dir, MapFiles.areaInfo),
    JSON.stringify({ forbidAreaValue: [{ vertexs: [[0, 0], [10, 0], [10, 10]], forbidType: 'mop' }] })
  );
  if (options.segmentMap) {
    writeFileSync(join(dir, MapFiles.segmentMap), options.segmentMap);
  }
}

describe('Map Directory I/O', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vacuum-map-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadMapDirectory', () => {
    it('should load the grid and all metadata documents', () => {
      writeMapDirectory(dir);

      const result = loadMapDirectory(dir);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.inputs.grid).toHaveLength(16);
      expect(result.inputs.grid[5]).toBe(127);
      expect(result.inputs.mapRecord).toEqual({ width: 4, height: 4, resolution: 0.05, x_min: 0, y_min: 0 });
      expect(result.inputs.chargerPose).toEqual({ charger_pose: [0.1, 0.1] });
      expect(result.inputs.segmentMap).toBeUndefined();
    });

    it('should pick up an optional segment map', () => {
      writeMapDirectory(dir, { segmentMap: new Uint8Array([1, 2, 3]) });

      const result = loadMapDirectory(dir);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect([...(result.inputs.segmentMap ?? [])]).toEqual([1, 2, 3]);
    });

    it('should report missing files', () => {
      const result = loadMapDirectory(dir);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors.map((e) => e.code)).toEqual(['E301', 'E301', 'E301', 'E101']);
      expect(result.errors.map((e) => e.document)).toEqual(['map_record', 'charger_pose', 'area_info', undefined]);
    });

    it('should report invalid JSON', () => {
      writeMapDirectory(dir);
      writeFileSync(join(dir, MapFiles.areaInfo), '{ not json');

      const result = loadMapDirectory(dir);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({ code: 'E301', document: 'area_info' });
    });
  });

  describe('writeConversionOutput', () => {
    it('should write the PNG and its base64 sidecar', async () => {
      writeMapDirectory(dir);
      const loaded = loadMapDirectory(dir);
      if (!loaded.success) throw new Error('map directory did not load');

      const result = await convertMap(loaded.inputs, { timestamp: '2024-01-02 03:04:05' });
      if (!result.success) throw new Error('conversion failed');

      const output = join(dir, 'map.png');
      const written = await writeConversionOutput(result, output);

      expect(written).toEqual({ png: output, base64: join(dir, 'map.base64.txt') });
      expect(readFileSync(output).equals(result.png)).toBe(true);
      expect(readFileSync(written.base64, 'utf-8')).toBe(result.base64);
      expect(existsSync(join(dir, 'map_original.png'))).toBe(false);
    });

    it('should create a missing output directory', async () => {
      writeMapDirectory(dir);
      const loaded = loadMapDirectory(dir);
      if (!loaded.success) throw new Error('map directory did not load');

      const result = await convertMap(loaded.inputs, { timestamp: '2024-01-02 03:04:05' });
      if (!result.success) throw new Error('conversion failed');

      const output = join(dir, 'out', 'nested', 'map.png');
      const written = await writeConversionOutput(result, output);

      expect(readFileSync(output).equals(result.png)).toBe(true);
      expect(readFileSync(written.base64, 'utf-8')).toBe(result.base64);
    });

    it('should also write the unannotated composite for debug conversions', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      writeMapDirectory(dir);
      const loaded = loadMapDirectory(dir);
      if (!loaded.success) throw new Error('map directory did not load');

      const result = await convertMap(loaded.inputs, { timestamp: '2024-01-02 03:04:05', debug: true });
      if (!result.success) throw new Error('conversion failed');

      const written = await writeConversionOutput(result, join(dir, 'map.png'));

      expect(written.original).toBe(join(dir, 'map_original.png'));
      expect(existsSync(join(dir, 'map_original.png'))).toBe(true);
    });
  });

  it('should name the debug image after the output', () => {
    expect(originalImagePath(join('out', 'map.png'))).toBe(join('out', 'map_original.png'));
    expect(originalImagePath(join('out', 'map'))).toBe(join('out', 'map_original.png'));
  });
});

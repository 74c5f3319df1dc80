/**
 * Map build, end to end from files on disk
 *
 * Reads a real CSV and province list through the default data source and
 * checks the finished document and page.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_CHALLENGE, DEFAULT_MAP_SETTINGS } from '../../../core/constants.js';
import { BoundaryLookupError, SchemaError } from '../../../core/errors.js';
import type { MapBuildConfig } from '../../../core/types.js';
import { renderHtml } from '../../../render/html-serializer.js';
import { assembleMap } from '../../../services/map-assembler.js';

const PROVINCES = fileURLToPath(new URL('../../fixtures/provinces.json', import.meta.url));

const HEADER = 'name,lat,lon,climbed,url,province,challenge';

describe('map build from files', () => {
  let dir: string;
  let config: MapBuildConfig;

  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  const writeDataset = (content: string): void => {
    writeFileSync(config.datasetPath, content);
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'peakmap-build-'));
    config = {
      datasetPath: join(dir, 'mountains_data.txt'),
      map: DEFAULT_MAP_SETTINGS,
      regions: [
        { name: 'Gipuzkoa', boundaryFile: PROVINCES, fill: 'blue', stroke: 'blue', show: true },
        { name: 'Navarra', boundaryFile: PROVINCES, fill: 'red', stroke: 'red', show: true },
      ],
      challenge: DEFAULT_CHALLENGE,
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should place a single climbed Gipuzkoa peak', () => {
    writeDataset(`${HEADER}\nErnio,43.18,-2.10,true,,Gipuzkoa,false\n`);

    const { document, summary } = assembleMap(config, { logger });
    const gipuzkoa = document.getLayer('Gipuzkoa');
    const navarra = document.getLayer('Navarra');
    const challenge = document.getLayer('Challenge (35)');

    expect(gipuzkoa?.pins).toHaveLength(1);
    expect(gipuzkoa?.labels).toHaveLength(1);
    expect(gipuzkoa?.pins[0]?.color).toBe('green');
    expect(gipuzkoa?.pins[0]?.position).toEqual({ lat: 43.18, lng: -2.1 });
    expect(gipuzkoa?.pins[0]?.popupHtml).toContain('href="#"');
    expect(navarra?.pins).toHaveLength(0);
    expect(challenge?.pins).toHaveLength(0);
    expect(challenge?.show).toBe(false);
    expect(summary.rendered).toBe(1);
  });

  it('should embed every layer in the page', () => {
    writeDataset(`${HEADER}\nErnio,43.18,-2.10,true,,Gipuzkoa,false\n`);

    const { document } = assembleMap(config, { logger });
    const html = renderHtml(document, {
      title: 'Peaks',
      assets: { script: '', stylesheet: '' },
    });

    expect(html).toContain('"name":"Gipuzkoa","show":true');
    expect(html).toContain('"name":"Challenge (35)","show":false');
  });

  it('should fail without a climbed column', () => {
    writeDataset('name,lat,lon,url,province,challenge\nErnio,43.18,-2.10,,Gipuzkoa,false\n');

    expect(() => assembleMap(config, { logger })).toThrow(SchemaError);
    expect(() => assembleMap(config, { logger })).toThrow('missing columns: climbed');
  });

  it('should fail when a region has no boundary', () => {
    writeDataset(`${HEADER}\n`);
    const withBizkaia: MapBuildConfig = {
      ...config,
      regions: [
        ...config.regions,
        { name: 'Bizkaia', boundaryFile: PROVINCES, fill: 'green', stroke: 'green', show: true },
      ],
    };

    expect(() => assembleMap(withBizkaia, { logger })).toThrow(BoundaryLookupError);
  });
});

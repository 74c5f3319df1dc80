/**
 * Map Assembler Tests
 *
 * Layer routing, challenge mirroring, skip/drop policy and the build summary,
 * against an in-memory data source.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Polygon } from 'geojson';
import { DEFAULT_CHALLENGE, DEFAULT_MAP_SETTINGS } from '../core/constants.js';
import { BoundaryLookupError } from '../core/errors.js';
import type { BoundaryShape, MapBuildConfig, RawMountainRow } from '../core/types.js';
import {
  assembleMap,
  isRecognisedFlag,
  parseCoordinate,
  parseFlag,
  resolveMarkerColor,
  toMountainRecord,
  type MapDataSource,
} from './map-assembler.js';

// ============================================================================
// Test fixtures
// ============================================================================

function square(x: number, y: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [x, y],
        [x + 1, y],
        [x + 1, y + 1],
        [x, y],
      ],
    ],
  };
}

const SHAPES: Record<string, Polygon> = {
  Gipuzkoa: square(-2.5, 42.9),
  Navarra: square(-2.5, 41.9),
  Japan: square(130, 31),
};

function row(
  name: string,
  lat: string,
  lon: string,
  climbed: string,
  province: string,
  challenge = 'false',
  url = ''
): RawMountainRow {
  return { name, lat, lon, climbed, url, province, challenge };
}

class InMemoryDataSource implements MapDataSource {
  readonly boundaryCalls: [string, readonly string[]][] = [];

  constructor(private readonly rows: readonly RawMountainRow[]) {}

  loadMountains(): readonly RawMountainRow[] {
    return this.rows;
  }

  loadBoundaries(path: string, names: readonly string[]): readonly BoundaryShape[] {
    this.boundaryCalls.push([path, names]);
    return names.map((name) => {
      const geometry = SHAPES[name];
      if (!geometry) {
        throw new BoundaryLookupError(name, 'prov_name', path);
      }
      return { name, geometry };
    });
  }
}

const CONFIG: MapBuildConfig = {
  datasetPath: 'peaks.csv',
  map: DEFAULT_MAP_SETTINGS,
  regions: [
    { name: 'Gipuzkoa', boundaryFile: 'provinces.json', fill: 'blue', stroke: 'blue', show: true },
    { name: 'Navarra', boundaryFile: 'provinces.json', fill: 'red', stroke: 'red', show: true },
    { name: 'Japan', boundaryFile: 'world.json', fill: 'red', stroke: 'red', show: true },
  ],
  challenge: DEFAULT_CHALLENGE,
};

const ROWS: readonly RawMountainRow[] = [
  row('Ernio', '43.18', '-2.10', 'true', 'Gipuzkoa'),
  row('Txindoki', '42.98', '-2.11', 'yes', 'Gipuzkoa', 'true', 'https://example.org/txindoki'),
  row('Mendaur', '43.12', '-1.75', 'false', 'Navarra'),
  row('Nameless', '', '', 'false', 'Gipuzkoa'),
  row('Gorbeia', '43.03', '-2.78', 'true', 'Bizkaia'),
];

function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function assemble(rows: readonly RawMountainRow[], config: MapBuildConfig = CONFIG) {
  const dataSource = new InMemoryDataSource(rows);
  const logger = silentLogger();
  const result = assembleMap(config, { dataSource, logger });
  return { ...result, dataSource, logger };
}

// ============================================================================
// Record coercion
// ============================================================================

describe('parseFlag()', () => {
  it.each(['true', 'TRUE', ' yes ', '1', 'x', 'sí', 'Si'])('should read %j as true', (value) => {
    expect(parseFlag(value)).toBe(true);
  });

  it.each(['false', '0', '', 'no', 'maybe'])('should read %j as false', (value) => {
    expect(parseFlag(value)).toBe(false);
  });

  it('should read an absent cell as false', () => {
    expect(parseFlag(undefined)).toBe(false);
  });
});

describe('isRecognisedFlag()', () => {
  it('should accept the known spellings and blank', () => {
    expect(isRecognisedFlag('N')).toBe(true);
    expect(isRecognisedFlag('')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isRecognisedFlag('climbed')).toBe(false);
  });
});

describe('parseCoordinate()', () => {
  it('should parse decimal degrees', () => {
    expect(parseCoordinate('43.18')).toBe(43.18);
    expect(parseCoordinate(' -2.10 ')).toBe(-2.1);
    expect(parseCoordinate('.5')).toBe(0.5);
    expect(parseCoordinate('1e2')).toBe(100);
  });

  it.each(['', '   ', 'NaN', 'Infinity', 'abc', '43,18', '0x10'])(
    'should give null for %j',
    (value) => {
      expect(parseCoordinate(value)).toBeNull();
    }
  );
});

describe('toMountainRecord()', () => {
  it('should type a complete row', () => {
    expect(
      toMountainRecord(row(' Ernio ', '43.18', '-2.10', 'true', ' Gipuzkoa ', 'false', ' '))
    ).toEqual({
      name: 'Ernio',
      latitude: 43.18,
      longitude: -2.1,
      climbed: true,
      url: null,
      province: 'Gipuzkoa',
      challenge: false,
    });
  });

  it('should return null without both coordinates', () => {
    expect(toMountainRecord(row('Ernio', '43.18', '', 'true', 'Gipuzkoa'))).toBeNull();
  });
});

describe('resolveMarkerColor()', () => {
  it('should map both climb states', () => {
    const colors = { climbed: 'green', notClimbed: 'red' };
    expect(resolveMarkerColor(true, colors)).toBe('green');
    expect(resolveMarkerColor(false, colors)).toBe('red');
  });
});

// ============================================================================
// Assembly
// ============================================================================

describe('assembleMap()', () => {
  it('should create region layers then the challenge layer', () => {
    const { document } = assemble(ROWS);

    expect(document.layers.map((layer) => [layer.name, layer.show])).toEqual([
      ['Gipuzkoa', true],
      ['Navarra', true],
      ['Japan', true],
      ['Challenge (35)', false],
    ]);
  });

  it('should read each boundary file once', () => {
    const { dataSource } = assemble(ROWS);

    expect(dataSource.boundaryCalls).toEqual([
      ['provinces.json', ['Gipuzkoa', 'Navarra']],
      ['world.json', ['Japan']],
    ]);
  });

  it('should give each layer one outline, the challenge layer reusing its region', () => {
    const { document } = assemble(ROWS);
    const challenge = document.getLayer('Challenge (35)');

    expect(document.layers.map((layer) => layer.polygons.length)).toEqual([1, 1, 1, 1]);
    expect(challenge?.polygons[0]?.geometry).toBe(SHAPES.Gipuzkoa);
    expect(challenge?.polygons[0]?.style.fillColor).toBe('purple');
    expect(document.getLayer('Navarra')?.polygons[0]?.style.color).toBe('red');
  });

  it('should route peaks to their province layer with climb colors', () => {
    const { document } = assemble(ROWS);

    expect(document.getLayer('Gipuzkoa')?.pins.map((pin) => pin.color)).toEqual([
      'green',
      'green',
    ]);
    expect(document.getLayer('Navarra')?.pins.map((pin) => pin.color)).toEqual(['red']);
    expect(document.getLayer('Japan')?.pins).toHaveLength(0);
  });

  it('should add exactly one label per pin', () => {
    const { document } = assemble(ROWS);
    for (const layer of document.layers) {
      expect(layer.labels).toHaveLength(layer.pins.length);
    }
  });

  it('should mirror challenge peaks of the challenge region', () => {
    const { document } = assemble(ROWS);
    const [mirrored] = document.getLayer('Challenge (35)')?.pins ?? [];
    const [, original] = document.getLayer('Gipuzkoa')?.pins ?? [];

    expect(mirrored).toEqual(original);
    expect(mirrored?.popupHtml).toContain('href="https://example.org/txindoki"');
  });

  it('should not mirror challenge peaks of other regions', () => {
    const { document } = assemble([row('Mendaur', '43.12', '-1.75', 'true', 'Navarra', 'true')]);

    expect(document.getLayer('Navarra')?.pins).toHaveLength(1);
    expect(document.getLayer('Challenge (35)')?.pins).toHaveLength(0);
  });

  it('should match the trimmed province exactly', () => {
    const { document, summary } = assemble([
      row('Ernio', '43.18', '-2.10', 'true', ' Gipuzkoa '),
      row('Ernio', '43.18', '-2.10', 'true', 'gipuzkoa'),
    ]);

    expect(document.getLayer('Gipuzkoa')?.pins).toHaveLength(1);
    expect(summary.droppedUnmapped).toBe(1);
  });

  it('should log skipped and dropped rows at debug', () => {
    const { logger } = assemble(ROWS);

    expect(logger.debug).toHaveBeenCalledWith('Skipping row without coordinates', {
      row: 4,
      name: 'Nameless',
    });
    expect(logger.debug).toHaveBeenCalledWith('Dropping row outside configured regions', {
      row: 5,
      province: 'Bizkaia',
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should summarise the run', () => {
    const { summary } = assemble(ROWS);

    expect(summary).toEqual({
      rowsRead: 5,
      rendered: 3,
      skippedNoCoordinates: 1,
      droppedUnmapped: 1,
      layers: [
        { name: 'Gipuzkoa', show: true, markers: 2, climbed: 2 },
        { name: 'Navarra', show: true, markers: 1, climbed: 0 },
        { name: 'Japan', show: true, markers: 0, climbed: 0 },
        { name: 'Challenge (35)', show: false, markers: 1, climbed: 1 },
      ],
    });
  });

  it('should attach an expanded layer control', () => {
    const { document } = assemble(ROWS);
    expect(document.layerControl).toEqual({ collapsed: false });
  });

  it('should omit the challenge layer when none is configured', () => {
    const { document } = assemble(ROWS, { ...CONFIG, challenge: null });
    expect(document.layers.map((layer) => layer.name)).toEqual(['Gipuzkoa', 'Navarra', 'Japan']);
  });

  it('should propagate a missing boundary', () => {
    const config: MapBuildConfig = {
      ...CONFIG,
      regions: [
        { name: 'Bizkaia', boundaryFile: 'provinces.json', fill: 'green', stroke: 'green', show: true },
      ],
      challenge: null,
    };

    expect(() => assemble(ROWS, config)).toThrow(BoundaryLookupError);
  });
});

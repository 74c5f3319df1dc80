/**
 * Map Assembler
 *
 * Builds the complete map document for one run:
 *
 * 1. Base view with one tile source
 * 2. Region outlines loaded per boundary file
 * 3. One layer per region plus the challenge layer
 * 4. Region polygons; the challenge layer reuses its region's outline in its
 *    own color
 * 5. One pass over the dataset in file order, rendering each peak into its
 *    region layer and, for challenge peaks of the challenge region, into the
 *    challenge layer as well
 * 6. Expanded layer control
 *
 * Rows without usable coordinates are skipped and rows from unconfigured
 * provinces are dropped, both silently apart from a debug entry. Loader and
 * parse errors propagate.
 *
 * @module services/map-assembler
 */

import { FALSE_TOKENS, TRUE_TOKENS } from '../core/constants.js';
import type {
  BoundaryShape,
  LayerSummary,
  MapBuildConfig,
  MapBuildSummary,
  MarkerColors,
  MountainRecord,
  RawMountainRow,
  RegionSettings,
} from '../core/types.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import { loadBoundaries } from '../data/loaders/boundary-loader.js';
import { loadMountains } from '../data/loaders/mountain-loader.js';
import { MapDocument, type MapLayer } from '../render/map-document.js';
import { addMarkerAndLabel } from '../render/marker-renderer.js';
import { addPolygon } from '../render/polygon-renderer.js';

// ============================================================================
// Data source
// ============================================================================

/**
 * Where the assembler reads its inputs from
 */
export interface MapDataSource {
  loadMountains(path: string): readonly RawMountainRow[];
  loadBoundaries(path: string, names: readonly string[]): readonly BoundaryShape[];
}

/**
 * Reads the dataset and boundary documents from disk
 */
export class FileMapDataSource implements MapDataSource {
  loadMountains(path: string): readonly RawMountainRow[] {
    return loadMountains(path);
  }

  loadBoundaries(path: string, names: readonly string[]): readonly BoundaryShape[] {
    return loadBoundaries(path, names);
  }
}

export interface AssembleMapOptions {
  readonly dataSource?: MapDataSource;
  readonly logger?: LogSink;
}

export interface AssembledMap {
  readonly document: MapDocument;
  readonly summary: MapBuildSummary;
}

// ============================================================================
// Record coercion
// ============================================================================

/**
 * Read a climbed/challenge cell as a boolean (unknown values are false)
 */
export function parseFlag(value: string | undefined): boolean {
  return TRUE_TOKENS.has((value ?? '').trim().toLowerCase());
}

/**
 * Whether a flag cell is one of the recognised true/false spellings
 */
export function isRecognisedFlag(value: string | undefined): boolean {
  const token = (value ?? '').trim().toLowerCase();
  return TRUE_TOKENS.has(token) || FALSE_TOKENS.has(token);
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a coordinate cell; blank or non-numeric cells give null
 */
export function parseCoordinate(value: string | undefined): number | null {
  const text = (value ?? '').trim();
  if (!NUMBER_PATTERN.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function optionalText(value: string | undefined): string | null {
  const text = (value ?? '').trim();
  return text.length > 0 ? text : null;
}

/**
 * Type a raw dataset row, or null when it has no usable coordinates
 */
export function toMountainRecord(row: RawMountainRow): MountainRecord | null {
  const latitude = parseCoordinate(row.lat);
  const longitude = parseCoordinate(row.lon);
  if (latitude === null || longitude === null) {
    return null;
  }

  return {
    name: optionalText(row.name),
    latitude,
    longitude,
    climbed: parseFlag(row.climbed),
    url: optionalText(row.url),
    province: (row.province ?? '').trim(),
    challenge: parseFlag(row.challenge),
  };
}

/**
 * Pin color for a climb status
 */
export function resolveMarkerColor(climbed: boolean, colors: MarkerColors): string {
  const byStatus: Record<'true' | 'false', string> = {
    true: colors.climbed,
    false: colors.notClimbed,
  };
  return byStatus[climbed ? 'true' : 'false'];
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Load every region's outline, reading each boundary file once
 */
function loadRegionShapes(
  regions: readonly RegionSettings[],
  dataSource: MapDataSource
): Map<string, BoundaryShape> {
  const namesByFile = new Map<string, string[]>();
  for (const region of regions) {
    const names = namesByFile.get(region.boundaryFile) ?? [];
    names.push(region.name);
    namesByFile.set(region.boundaryFile, names);
  }

  const shapes = new Map<string, BoundaryShape>();
  for (const [file, names] of namesByFile) {
    for (const shape of dataSource.loadBoundaries(file, names)) {
      shapes.set(shape.name, shape);
    }
  }
  return shapes;
}

interface LayerTally {
  markers: number;
  climbed: number;
}

/**
 * Build the map document and its row summary
 *
 * @throws SchemaError if the dataset lacks required columns
 * @throws BoundaryLookupError if a region has no outline
 */
export function assembleMap(
  config: MapBuildConfig,
  options: AssembleMapOptions = {}
): AssembledMap {
  const dataSource = options.dataSource ?? new FileMapDataSource();
  const log = options.logger ?? createLogger({ module: 'map-assembler' });
  const { map: settings, regions, challenge } = config;

  const document = new MapDocument({
    center: settings.center,
    zoom: settings.zoom,
    tiles: settings.tiles,
  });

  const shapes = loadRegionShapes(regions, dataSource);

  const regionLayers = new Map<string, MapLayer>();
  for (const region of regions) {
    regionLayers.set(region.name, document.addLayer(region.name, { show: region.show }));
  }
  const challengeLayer = challenge
    ? document.addLayer(challenge.name, { show: challenge.show })
    : null;

  for (const region of regions) {
    const layer = regionLayers.get(region.name);
    const shape = shapes.get(region.name);
    if (layer && shape) {
      addPolygon(layer, shape.geometry, region);
    }
  }
  if (challenge && challengeLayer) {
    const shape = shapes.get(challenge.region);
    if (shape) {
      addPolygon(challengeLayer, shape.geometry, challenge);
    }
  }

  const rows = dataSource.loadMountains(config.datasetPath);
  const tallies = new Map<MapLayer, LayerTally>();
  const tally = (layer: MapLayer, climbed: boolean): void => {
    const current = tallies.get(layer) ?? { markers: 0, climbed: 0 };
    current.markers += 1;
    current.climbed += climbed ? 1 : 0;
    tallies.set(layer, current);
  };

  let rendered = 0;
  let skippedNoCoordinates = 0;
  let droppedUnmapped = 0;

  rows.forEach((row, index) => {
    const record = toMountainRecord(row);
    if (!record) {
      skippedNoCoordinates++;
      log.debug('Skipping row without coordinates', { row: index + 1, name: row.name ?? null });
      return;
    }

    const layer = regionLayers.get(record.province);
    if (!layer) {
      droppedUnmapped++;
      log.debug('Dropping row outside configured regions', {
        row: index + 1,
        province: record.province,
      });
      return;
    }

    const marker = {
      latitude: record.latitude,
      longitude: record.longitude,
      name: record.name,
      url: record.url,
      color: resolveMarkerColor(record.climbed, settings.markerColors),
    };

    addMarkerAndLabel(layer, marker);
    tally(layer, record.climbed);
    rendered++;

    if (challenge && challengeLayer && record.challenge && record.province === challenge.region) {
      addMarkerAndLabel(challengeLayer, marker);
      tally(challengeLayer, record.climbed);
    }
  });

  document.addLayerControl({ collapsed: settings.collapsedControl });

  const layers: LayerSummary[] = document.layers.map((layer) => {
    const counts = tallies.get(layer) ?? { markers: 0, climbed: 0 };
    return { name: layer.name, show: layer.show, markers: counts.markers, climbed: counts.climbed };
  });

  return {
    document,
    summary: {
      rowsRead: rows.length,
      rendered,
      skippedNoCoordinates,
      droppedUnmapped,
      layers,
    },
  };
}

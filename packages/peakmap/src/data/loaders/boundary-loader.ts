/**
 * Boundary Loader
 *
 * Extracts named region outlines from a boundary document. Two layouts are
 * recognised:
 *
 * - Province list: an array of records with `prov_name` and a nested
 *   `geo_shape` (a bare geometry or a Feature wrapping one), as exported by
 *   the Spanish georef province dataset.
 * - FeatureCollection: standard GeoJSON, matched on `properties.NAME`, as in
 *   common world-country files.
 *
 * Names match exactly and case-sensitively. Geometries are passed through
 * unchanged.
 *
 * @module data/loaders/boundary-loader
 */

import { readFileSync } from 'node:fs';
import type { Feature, FeatureCollection, Geometry } from 'geojson';
import { BoundaryFormatError, BoundaryLookupError } from '../../core/errors.js';
import type { BoundaryShape } from '../../core/types.js';

/**
 * Boundary document layouts
 */
export type BoundaryDocumentFormat = 'province-list' | 'feature-collection';

/**
 * Name key each layout is matched on
 */
export const BOUNDARY_NAME_KEYS: Readonly<Record<BoundaryDocumentFormat, string>> = {
  'province-list': 'prov_name',
  'feature-collection': 'properties.NAME',
};

const GEOMETRY_TYPES: ReadonlySet<string> = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGeometry(value: unknown): value is Geometry {
  return isRecord(value) && typeof value.type === 'string' && GEOMETRY_TYPES.has(value.type);
}

function isFeature(value: unknown): value is Feature {
  return isRecord(value) && value.type === 'Feature';
}

function isFeatureCollection(value: unknown): value is FeatureCollection {
  return isRecord(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);
}

/**
 * Work out which layout a parsed document uses
 *
 * @throws BoundaryFormatError if it is neither layout
 */
export function detectBoundaryFormat(
  document: unknown,
  source: string | null = null
): BoundaryDocumentFormat {
  if (Array.isArray(document)) {
    return 'province-list';
  }
  if (isFeatureCollection(document)) {
    return 'feature-collection';
  }
  throw new BoundaryFormatError(
    'Boundary document must be a province list or a GeoJSON FeatureCollection',
    source
  );
}

/**
 * Geometry of the first province-list record named `name`
 */
function findInProvinceList(
  records: readonly unknown[],
  name: string,
  source: string | null
): Geometry | null {
  for (const record of records) {
    if (!isRecord(record) || record.prov_name !== name) {
      continue;
    }
    const shape = record.geo_shape;
    if (isFeature(shape) && shape.geometry) {
      return shape.geometry;
    }
    if (isGeometry(shape)) {
      return shape;
    }
    throw new BoundaryFormatError(`Province "${name}" has no usable geo_shape`, source);
  }
  return null;
}

/**
 * Geometry of the first feature whose `properties.NAME` is `name`
 */
function findInFeatureCollection(
  collection: FeatureCollection,
  name: string,
  source: string | null
): Geometry | null {
  for (const feature of collection.features) {
    if (feature.properties?.NAME !== name) {
      continue;
    }
    if (!feature.geometry) {
      throw new BoundaryFormatError(`Feature "${name}" has no geometry`, source);
    }
    return feature.geometry;
  }
  return null;
}

/**
 * Pick the requested shapes out of an already-parsed boundary document
 *
 * @param document - Parsed JSON
 * @param names - Region names to find, returned in this order
 * @param source - File path used in error messages
 * @throws BoundaryLookupError if any name has no match
 * @throws BoundaryFormatError if the document layout is not recognised
 */
export function extractBoundaries(
  document: unknown,
  names: readonly string[],
  source: string | null = null
): BoundaryShape[] {
  const format = detectBoundaryFormat(document, source);

  return names.map((name) => {
    let geometry: Geometry | null = null;
    if (Array.isArray(document)) {
      geometry = findInProvinceList(document, name, source);
    } else if (isFeatureCollection(document)) {
      geometry = findInFeatureCollection(document, name, source);
    }

    if (!geometry) {
      throw new BoundaryLookupError(name, BOUNDARY_NAME_KEYS[format], source);
    }
    return { name, geometry };
  });
}

/**
 * Parse boundary document text (a UTF-8 BOM is tolerated)
 */
export function parseBoundaryDocument(content: string, source: string | null = null): unknown {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new BoundaryFormatError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }
}

/**
 * Load named shapes from a boundary file
 *
 * @example
 * ```typescript
 * const [gipuzkoa, navarra] = loadBoundaries('data/georef-spain-provincia.json', [
 *   'Gipuzkoa',
 *   'Navarra',
 * ]);
 * ```
 */
export function loadBoundaries(path: string, names: readonly string[]): BoundaryShape[] {
  const document = parseBoundaryDocument(readFileSync(path, 'utf-8'), path);
  return extractBoundaries(document, names, path);
}

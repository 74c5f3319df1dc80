/**
 * peakmap
 *
 * Renders a climbed/not-climbed mountain dataset onto a layered web map:
 * one toggleable layer per region, plus a challenge layer, written as a
 * single self-contained HTML page.
 *
 * @example
 * ```typescript
 * import { assembleMap, renderHtml, loadConfig } from 'peakmap';
 *
 * const config = loadConfig();
 * const { document, summary } = assembleMap(config);
 * const html = renderHtml(document, { title: config.map.title });
 * ```
 */

export * from './core/types.js';
export * from './core/errors.js';
export {
  REQUIRED_COLUMNS,
  TRUE_TOKENS,
  FALSE_TOKENS,
  DEFAULT_MAP_SETTINGS,
  DEFAULT_REGIONS,
  DEFAULT_CHALLENGE,
  type RequiredColumn,
} from './core/constants.js';
export { atomicWriteFile } from './core/utils/atomic-write.js';
export { createLogger, Logger, type LogSink } from './core/utils/logger.js';

export { parseDelimitedText, type DelimitedTextOptions } from './data/loaders/delimited-text.js';
export {
  loadMountains,
  parseMountainTable,
  findMissingColumns,
  type MountainTable,
} from './data/loaders/mountain-loader.js';
export {
  loadBoundaries,
  extractBoundaries,
  parseBoundaryDocument,
  detectBoundaryFormat,
  type BoundaryDocumentFormat,
} from './data/loaders/boundary-loader.js';

export {
  MapDocument,
  MapLayer,
  type MapElement,
  type PinElement,
  type LabelElement,
  type PolygonElement,
  type PolygonStyle,
  type MapDocumentSnapshot,
} from './render/map-document.js';
export { addMarkerAndLabel, type PeakMarkerInput } from './render/marker-renderer.js';
export { addPolygon, polygonStyle } from './render/polygon-renderer.js';
export { renderHtml, type RenderHtmlOptions } from './render/html-serializer.js';
export { loadLeafletAssets, type LeafletAssets } from './render/leaflet-assets.js';

export {
  assembleMap,
  FileMapDataSource,
  type MapDataSource,
  type AssembleMapOptions,
  type AssembledMap,
} from './services/map-assembler.js';
export {
  validateDataset,
  type DatasetIssue,
  type DatasetIssueCode,
  type DatasetValidationResult,
} from './services/dataset-validator.js';

export { loadConfig, type CLIConfig, type LoadConfigOptions } from './cli/lib/config.js';

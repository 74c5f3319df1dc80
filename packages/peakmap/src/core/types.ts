/**
 * peakmap Core Types
 *
 * Data model shared by the loaders, renderers and the map assembler.
 *
 * @module core/types
 */

import type { Geometry } from 'geojson';

// ============================================================================
// Dataset
// ============================================================================

/**
 * One data line of the mountain dataset, keyed by header column.
 * Cells are kept as text; coercion happens in the consumer.
 */
export type RawMountainRow = Readonly<Record<string, string>>;

/**
 * A dataset row with typed fields, ready to render
 */
export interface MountainRecord {
  readonly name: string | null;
  readonly latitude: number;
  readonly longitude: number;
  readonly climbed: boolean;
  readonly url: string | null;
  readonly province: string;
  readonly challenge: boolean;
}

/**
 * Latitude/longitude pair in WGS84 degrees
 */
export interface Coordinates {
  readonly lat: number;
  readonly lng: number;
}

// ============================================================================
// Boundaries
// ============================================================================

/**
 * A named polygon/multipolygon, passed through to the renderer untouched
 */
export interface BoundaryShape {
  readonly name: string;
  readonly geometry: Geometry;
}

// ============================================================================
// Build configuration
// ============================================================================

/**
 * Fill and stroke colors for a polygon overlay
 */
export interface PolygonColors {
  readonly fill: string;
  readonly stroke: string;
}

/**
 * Base tile source
 */
export interface TileSource {
  /** Name shown in the layer control */
  readonly name: string;
  /** URL template with {s}/{z}/{x}/{y} placeholders */
  readonly url: string;
  readonly attribution: string;
  readonly maxZoom: number;
}

/**
 * A region rendered as its own toggleable layer
 *
 * `name` is both the layer name and the exact key looked up in the
 * boundary document and compared against the dataset's province column.
 */
export interface RegionSettings extends PolygonColors {
  readonly name: string;
  readonly boundaryFile: string;
  readonly show: boolean;
}

/**
 * Cross-cutting layer holding the challenge subset of one region
 */
export interface ChallengeSettings extends PolygonColors {
  /** Layer name, e.g. "Challenge (35)" */
  readonly name: string;
  /** Region whose challenge-flagged peaks (and outline) the layer mirrors */
  readonly region: string;
  readonly show: boolean;
}

/**
 * Pin colors keyed by climb status
 */
export interface MarkerColors {
  readonly climbed: string;
  readonly notClimbed: string;
}

/**
 * Base map view
 */
export interface MapSettings {
  readonly title: string;
  readonly center: Coordinates;
  readonly zoom: number;
  readonly tiles: TileSource;
  readonly markerColors: MarkerColors;
  /** Whether the layer control starts collapsed */
  readonly collapsedControl: boolean;
}

/**
 * Everything the map assembler needs for one run
 */
export interface MapBuildConfig {
  readonly datasetPath: string;
  readonly map: MapSettings;
  readonly regions: readonly RegionSettings[];
  readonly challenge: ChallengeSettings | null;
}

// ============================================================================
// Build results
// ============================================================================

/**
 * Per-layer marker counts
 */
export interface LayerSummary {
  readonly name: string;
  readonly show: boolean;
  readonly markers: number;
  readonly climbed: number;
}

/**
 * What happened to the dataset rows during one build
 */
export interface MapBuildSummary {
  readonly rowsRead: number;
  readonly rendered: number;
  readonly skippedNoCoordinates: number;
  readonly droppedUnmapped: number;
  readonly layers: readonly LayerSummary[];
}

/**
 * peakmap Constants
 *
 * Fixed rendering parameters and the default map layout.
 *
 * @module core/constants
 */

import type {
  ChallengeSettings,
  MapSettings,
  RegionSettings,
} from './types.js';

/**
 * Columns the dataset header must contain, in reporting order
 */
export const REQUIRED_COLUMNS = [
  'name',
  'lat',
  'lon',
  'climbed',
  'url',
  'province',
  'challenge',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * Polygon style shared by every boundary overlay
 */
export const POLYGON_FILL_OPACITY = 0.3;
export const POLYGON_STROKE_WEIGHT = 3;
export const POLYGON_STROKE_OPACITY = 0.8;

/**
 * Pin popup width and label offset below the pin, in pixels
 */
export const POPUP_MAX_WIDTH = 250;
export const LABEL_OFFSET_PX = 25;

/**
 * Link target used when a peak has no URL
 */
export const PLACEHOLDER_URL = '#';

/**
 * Cell values read as `true` for the climbed/challenge columns
 * (compared trimmed and lower-cased)
 */
export const TRUE_TOKENS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'y', 'si', 'sí', 'x']);

/**
 * Cell values read as `false`; anything else is also false but flagged by
 * the dataset validator
 */
export const FALSE_TOKENS: ReadonlySet<string> = new Set(['false', '0', 'no', 'n', '']);

export const DEFAULT_DATASET_PATH = 'data/mountains_data.txt';
export const DEFAULT_OUTPUT_PATH = 'docs/index.html';
export const DEFAULT_PROVINCES_FILE = 'data/georef-spain-provincia.json';
export const DEFAULT_WORLD_FILE = 'data/world.json';

/**
 * Default view: centered on Ernio, Gipuzkoa
 */
export const DEFAULT_MAP_SETTINGS: MapSettings = {
  title: 'Mountains of Gipuzkoa and Navarra',
  center: { lat: 43.1733, lng: -2.1369 },
  zoom: 10,
  tiles: {
    name: 'Base map',
    url: 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png',
    attribution: '&copy; OpenStreetMap contributors',
    maxZoom: 19,
  },
  markerColors: {
    climbed: 'green',
    notClimbed: 'red',
  },
  collapsedControl: false,
};

export const DEFAULT_REGIONS: readonly RegionSettings[] = [
  { name: 'Gipuzkoa', boundaryFile: DEFAULT_PROVINCES_FILE, fill: 'blue', stroke: 'blue', show: true },
  { name: 'Navarra', boundaryFile: DEFAULT_PROVINCES_FILE, fill: 'red', stroke: 'red', show: true },
  { name: 'Japan', boundaryFile: DEFAULT_WORLD_FILE, fill: 'red', stroke: 'red', show: true },
];

export const DEFAULT_CHALLENGE: ChallengeSettings = {
  name: 'Challenge (35)',
  region: 'Gipuzkoa',
  fill: 'purple',
  stroke: 'purple',
  show: false,
};

/**
 * peakmap CLI Configuration Management
 *
 * Loads configuration from .peakmaprc (YAML or JSON) with environment
 * variable overrides and defaults matching the Gipuzkoa/Navarra map.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PEAKMAP_*)
 * 3. Config file (.peakmaprc or --config path)
 * 4. Default values
 *
 * Paths in a config file are relative to that file; paths from flags,
 * environment variables and defaults are relative to the working directory.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CHALLENGE,
  DEFAULT_DATASET_PATH,
  DEFAULT_MAP_SETTINGS,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_REGIONS,
} from '../../core/constants.js';
import { ConfigError } from '../../core/errors.js';
import type {
  ChallengeSettings,
  MapBuildConfig,
  MapSettings,
  RegionSettings,
} from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig extends MapBuildConfig {
  /** Where the rendered page is written */
  readonly outputPath: string;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Build without writing the page */
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

/**
 * CSS color keyword, hex or functional notation; no quotes or markup
 */
const colorSchema = z
  .string()
  .min(1)
  .regex(/^[#a-zA-Z0-9(),.%\s]+$/, 'Must be a CSS color');

const regionSchema = z.object({
  name: z.string().min(1, 'Region name cannot be empty'),
  boundary_file: z.string().min(1),
  fill: colorSchema,
  stroke: colorSchema.optional(),
  show: z.boolean().optional(),
});

const challengeSchema = z.object({
  name: z.string().min(1).optional(),
  region: z.string().min(1),
  fill: colorSchema.optional(),
  stroke: colorSchema.optional(),
  show: z.boolean().optional(),
});

const configFileSchema = z.object({
  paths: z
    .object({
      dataset: z.string().min(1).optional(),
      output: z.string().min(1).optional(),
    })
    .optional(),
  map: z
    .object({
      title: z.string().optional(),
      center: z
        .tuple([
          z.number().min(-90, 'Latitude must be >= -90').max(90, 'Latitude must be <= 90'),
          z.number().min(-180, 'Longitude must be >= -180').max(180, 'Longitude must be <= 180'),
        ])
        .optional(),
      zoom: z.number().int().min(0).max(22).optional(),
      collapsed_control: z.boolean().optional(),
      tiles: z
        .object({
          name: z.string().min(1).optional(),
          url: z.string().min(1).optional(),
          attribution: z.string().optional(),
          max_zoom: z.number().int().min(0).max(24).optional(),
        })
        .optional(),
      marker_colors: z
        .object({
          climbed: colorSchema.optional(),
          not_climbed: colorSchema.optional(),
        })
        .optional(),
    })
    .optional(),
  regions: z.array(regionSchema).min(1, 'At least one region is required').optional(),
  // null disables the challenge layer
  challenge: challengeSchema.nullable().optional(),
});

export type ConfigFileSchema = z.infer<typeof configFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.peakmaprc', '.peakmaprc.yaml', '.peakmaprc.yml', '.peakmaprc.json'];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfigFile(content: string, filePath: string): ConfigFileSchema {
  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers both
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file means "all defaults"
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`PEAKMAP_${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to resolve relative paths and search for config from */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dryRun?: boolean;
    dataset?: string;
    output?: string;
    title?: string;
  };
}

function buildMapSettings(file: ConfigFileSchema, title: string | undefined): MapSettings {
  const map = file.map;
  const defaults = DEFAULT_MAP_SETTINGS;
  const center = map?.center;

  return {
    title: title ?? map?.title ?? defaults.title,
    center: center ? { lat: center[0], lng: center[1] } : defaults.center,
    zoom: map?.zoom ?? defaults.zoom,
    collapsedControl: map?.collapsed_control ?? defaults.collapsedControl,
    tiles: {
      name: map?.tiles?.name ?? defaults.tiles.name,
      url: map?.tiles?.url ?? defaults.tiles.url,
      attribution: map?.tiles?.attribution ?? defaults.tiles.attribution,
      maxZoom: map?.tiles?.max_zoom ?? defaults.tiles.maxZoom,
    },
    markerColors: {
      climbed: map?.marker_colors?.climbed ?? defaults.markerColors.climbed,
      notClimbed: map?.marker_colors?.not_climbed ?? defaults.markerColors.notClimbed,
    },
  };
}

function buildRegions(file: ConfigFileSchema, fileDir: string, cwd: string): RegionSettings[] {
  if (!file.regions) {
    return DEFAULT_REGIONS.map((region) => ({
      ...region,
      boundaryFile: resolve(cwd, region.boundaryFile),
    }));
  }
  return file.regions.map((region) => ({
    name: region.name,
    boundaryFile: resolve(fileDir, region.boundary_file),
    fill: region.fill,
    stroke: region.stroke ?? region.fill,
    show: region.show ?? true,
  }));
}

function buildChallenge(file: ConfigFileSchema): ChallengeSettings | null {
  if (file.challenge === null) {
    return null;
  }
  const challenge = file.challenge;
  if (!challenge) {
    return DEFAULT_CHALLENGE;
  }
  const fill = challenge.fill ?? DEFAULT_CHALLENGE.fill;
  return {
    name: challenge.name ?? DEFAULT_CHALLENGE.name,
    region: challenge.region,
    fill,
    stroke: challenge.stroke ?? fill,
    show: challenge.show ?? DEFAULT_CHALLENGE.show,
  };
}

/**
 * Cross-field checks the schema cannot express
 *
 * @throws ConfigError on duplicate layer names or a challenge region that
 * is not configured
 */
function checkLayers(regions: readonly RegionSettings[], challenge: ChallengeSettings | null): void {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const region of regions) {
    if (seen.has(region.name)) {
      issues.push(`regions: duplicate region "${region.name}"`);
    }
    seen.add(region.name);
  }

  if (challenge) {
    if (!seen.has(challenge.region)) {
      issues.push(`challenge.region: "${challenge.region}" is not a configured region`);
    }
    if (seen.has(challenge.name)) {
      issues.push(`challenge.name: "${challenge.name}" clashes with a region layer`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid layer configuration', issues);
  }
}

/**
 * Load and merge configuration from all sources
 *
 * @param options - Configuration loading options
 * @returns Merged configuration
 * @throws ConfigError if the config file is missing, unparseable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const cwd = resolve(options.cwd ?? process.cwd());
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  const explicitPath = options.configPath ?? getEnvVar('CONFIG');

  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const fileConfig: ConfigFileSchema = configPath
    ? parseConfigFile(readFileSync(configPath, 'utf-8'), configPath)
    : {};
  const fileDir = configPath ? dirname(configPath) : cwd;

  const regions = buildRegions(fileConfig, fileDir, cwd);
  const challenge = buildChallenge(fileConfig);
  checkLayers(regions, challenge);

  const pathFrom = (
    flag: string | undefined,
    env: string | undefined,
    fromFile: string | undefined,
    fallback: string
  ): string => {
    if (flag) return resolve(cwd, flag);
    if (env) return resolve(cwd, env);
    if (fromFile) return resolve(fileDir, fromFile);
    return resolve(cwd, fallback);
  };

  return {
    datasetPath: pathFrom(
      overrides.dataset,
      getEnvVar('DATASET'),
      fileConfig.paths?.dataset,
      DEFAULT_DATASET_PATH
    ),
    outputPath: pathFrom(
      overrides.output,
      getEnvVar('OUTPUT'),
      fileConfig.paths?.output,
      DEFAULT_OUTPUT_PATH
    ),
    map: buildMapSettings(fileConfig, overrides.title ?? getEnvVar('TITLE')),
    regions,
    challenge,

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    dryRun: overrides.dryRun ?? getEnvBool('DRY_RUN') ?? false,
    configPath,
  };
}

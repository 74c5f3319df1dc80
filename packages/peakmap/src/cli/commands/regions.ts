/**
 * Regions Command
 *
 * List the layers a build will create, in order, with their boundary
 * sources and colors.
 *
 * Usage:
 *   peakmap regions
 *
 * @module cli/commands/regions
 */

import { relative } from 'node:path';
import type { CommandContext } from './context.js';

export interface RegionRow {
  readonly layer: string;
  readonly kind: 'region' | 'challenge';
  readonly boundary: string;
  readonly fill: string;
  readonly stroke: string;
  readonly visible: boolean;
}

/**
 * Describe configured layers without loading any data
 */
export function describeRegions(context: CommandContext, cwd: string = process.cwd()): RegionRow[] {
  const { regions, challenge } = context.config;

  const rows: RegionRow[] = regions.map((region) => ({
    layer: region.name,
    kind: 'region',
    boundary: `${relative(cwd, region.boundaryFile)}#${region.name}`,
    fill: region.fill,
    stroke: region.stroke,
    visible: region.show,
  }));

  if (challenge) {
    const parent = regions.find((region) => region.name === challenge.region);
    rows.push({
      layer: challenge.name,
      kind: 'challenge',
      boundary: parent ? `${relative(cwd, parent.boundaryFile)}#${parent.name}` : challenge.region,
      fill: challenge.fill,
      stroke: challenge.stroke,
      visible: challenge.show,
    });
  }

  return rows;
}

/**
 * Execute the regions command
 */
export function runRegions(context: CommandContext): RegionRow[] {
  const rows = describeRegions(context);
  context.logger.table(
    rows.map((row) => ({ ...row, visible: row.visible ? 'yes' : 'no' }))
  );
  return rows;
}

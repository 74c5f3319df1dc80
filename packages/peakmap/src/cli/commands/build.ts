/**
 * Build Command
 *
 * Render the mountain map and write it as one HTML page.
 *
 * Usage:
 *   peakmap build [options]
 *
 * Options:
 *   -o, --output <path>   Output HTML file (default: docs/index.html)
 *   -d, --dataset <path>  Mountain dataset (default: data/mountains_data.txt)
 *   --title <text>        Page title
 *   --dry-run             Build the page but do not write it
 *
 * Nothing is written unless the whole document was produced.
 *
 * @module cli/commands/build
 */

import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import type { MapBuildSummary } from '../../core/types.js';
import { renderHtml } from '../../render/html-serializer.js';
import type { LeafletAssets } from '../../render/leaflet-assets.js';
import { assembleMap, type MapDataSource } from '../../services/map-assembler.js';
import type { CommandContext } from './context.js';

/**
 * Injection points for tests
 */
export interface BuildCommandDeps {
  readonly dataSource?: MapDataSource;
  readonly assets?: LeafletAssets;
}

export interface BuildResult {
  readonly outputPath: string;
  readonly written: boolean;
  readonly bytes: number;
  readonly summary: MapBuildSummary;
}

/**
 * Execute the build command
 */
export async function runBuild(
  context: CommandContext,
  deps: BuildCommandDeps = {}
): Promise<BuildResult> {
  const { config, logger } = context;

  logger.commandStart('build', {
    config: config.configPath,
    dataset: config.datasetPath,
    output: config.outputPath,
    dryRun: config.dryRun,
  });

  const { document, summary } = assembleMap(config, {
    dataSource: deps.dataSource,
    logger: logger.child({ module: 'map-assembler' }),
  });

  const html = renderHtml(document, { title: config.map.title, assets: deps.assets });
  const bytes = Buffer.byteLength(html, 'utf-8');

  if (!config.dryRun) {
    await atomicWriteFile(config.outputPath, html);
  }

  logger.table(
    summary.layers.map((layer) => ({
      layer: layer.name,
      visible: layer.show ? 'yes' : 'no',
      markers: layer.markers,
      climbed: layer.climbed,
    }))
  );

  if (summary.skippedNoCoordinates > 0 || summary.droppedUnmapped > 0) {
    logger.info('Some rows were not rendered', {
      skippedNoCoordinates: summary.skippedNoCoordinates,
      droppedUnmapped: summary.droppedUnmapped,
    });
  }

  logger.commandEnd(true, {
    rows: summary.rowsRead,
    rendered: summary.rendered,
    bytes,
    written: !config.dryRun,
  });

  if (!config.dryRun && !logger.isJson) {
    console.log(`Map saved → ${config.outputPath}`);
  }

  return {
    outputPath: config.outputPath,
    written: !config.dryRun,
    bytes,
    summary,
  };
}

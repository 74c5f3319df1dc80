/**
 * Validate Command
 *
 * Strict pass over the mountain dataset: report rows the map build would
 * skip or drop, plus data-entry slips.
 *
 * Usage:
 *   peakmap validate [options]
 *
 * Options:
 *   -d, --dataset <path>  Mountain dataset (default: data/mountains_data.txt)
 *   --strict              Treat warnings as failures
 *
 * @module cli/commands/validate
 */

import { loadMountains } from '../../data/loaders/mountain-loader.js';
import type { RawMountainRow } from '../../core/types.js';
import {
  validateDataset,
  type DatasetValidationResult,
} from '../../services/dataset-validator.js';
import type { CommandContext } from './context.js';

export interface ValidateOptions {
  readonly strict?: boolean;
  /** Pre-loaded rows (tests); read from the configured dataset when omitted */
  readonly rows?: readonly RawMountainRow[];
}

export interface ValidateCommandResult extends DatasetValidationResult {
  /** False when errors exist, or warnings exist under --strict */
  readonly success: boolean;
}

/**
 * Execute the validate command
 */
export function runValidate(
  context: CommandContext,
  options: ValidateOptions = {}
): ValidateCommandResult {
  const { config, logger } = context;
  logger.commandStart('validate', {
    config: config.configPath,
    dataset: config.datasetPath,
    strict: options.strict ?? false,
  });

  const rows = options.rows ?? loadMountains(config.datasetPath);
  const result = validateDataset(
    rows,
    config.regions.map((region) => region.name)
  );

  for (const issue of result.issues) {
    const metadata = { row: issue.row, code: issue.code };
    if (issue.severity === 'error') {
      logger.error(issue.message, metadata);
    } else {
      logger.warn(issue.message, metadata);
    }
  }

  const success = result.errorCount === 0 && (!options.strict || result.warningCount === 0);

  logger.commandEnd(success, {
    rows: result.rowsChecked,
    errors: result.errorCount,
    warnings: result.warningCount,
  });

  return { ...result, success };
}

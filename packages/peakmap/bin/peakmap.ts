#!/usr/bin/env tsx
/**
 * peakmap CLI Entry Point
 *
 * Builds the interactive mountain map, validates the dataset and lists the
 * configured layers.
 *
 * @module peakmap-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { runBuild } from '../src/cli/commands/build.js';
import { runValidate } from '../src/cli/commands/validate.js';
import { runRegions } from '../src/cli/commands/regions.js';
import type { CommandContext } from '../src/cli/commands/context.js';
import { ConfigError, PeakmapError } from '../src/core/errors.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof PeakmapError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Global State
// ============================================================================

type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  dryRun?: boolean;
  config?: string;
};

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

function initializeContext(
  options: GlobalOptions,
  commandOptions: { dataset?: string; output?: string; title?: string }
): CommandContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
      dataset: commandOptions.dataset,
      output: commandOptions.output,
      title: commandOptions.title,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger };
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return String(parsed.version);
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('peakmap')
    .description('Render a climbed/not-climbed peak dataset onto a layered web map')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--dry-run', 'Build without writing the output file')
    .option('--config <path>', 'Path to config file (default: .peakmaprc)')
    .hook('preAction', (thisCommand, actionCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        initializeContext(options, actionCommand.opts());
      } catch (error) {
        const message =
          error instanceof ConfigError
            ? error.getSummary()
            : error instanceof Error
              ? error.message
              : String(error);
        console.error(`Configuration error: ${message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('build')
    .description('Build the map page')
    .option('-o, --output <path>', 'Output HTML file')
    .option('-d, --dataset <path>', 'Mountain dataset (CSV)')
    .option('--title <text>', 'Page title')
    .action(async () => {
      await runBuild(getGlobalContext());
    });

  program
    .command('validate')
    .description('Report dataset rows the map would skip or drop')
    .option('-d, --dataset <path>', 'Mountain dataset (CSV)')
    .option('--strict', 'Treat warnings as failures')
    .action((options: { strict?: boolean }) => {
      const result = runValidate(getGlobalContext(), { strict: options.strict });
      if (!result.success) {
        process.exitCode = result.errorCount > 0 ? EXIT_CODES.ERRORS : EXIT_CODES.WARNINGS;
      }
    });

  program
    .command('regions')
    .description('List configured layers and their boundary sources')
    .action(() => {
      runRegions(getGlobalContext());
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: message,
        code: error instanceof PeakmapError ? error.code : undefined,
      });
    } else {
      console.error(`Error: ${message}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});

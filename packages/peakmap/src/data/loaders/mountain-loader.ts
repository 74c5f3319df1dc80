/**
 * Mountain Dataset Loader
 *
 * Reads the peak dataset and checks its header before anything is rendered.
 * Rows come back as raw text cells; turning them into typed records is the
 * caller's job (see services/map-assembler).
 *
 * USAGE:
 * ```typescript
 * import { loadMountains } from './mountain-loader.js';
 *
 * const rows = loadMountains('data/mountains_data.txt');
 * rows[0]?.name; // 'Txindoki'
 * ```
 */

import { readFileSync } from 'node:fs';
import { REQUIRED_COLUMNS } from '../../core/constants.js';
import { SchemaError } from '../../core/errors.js';
import type { RawMountainRow } from '../../core/types.js';
import { parseDelimitedText, type DelimitedTextOptions } from './delimited-text.js';

/**
 * Parsed dataset with its header
 */
export interface MountainTable {
  readonly columns: readonly string[];
  readonly rows: readonly RawMountainRow[];
}

/**
 * Required columns absent from a header, in canonical order
 */
export function findMissingColumns(columns: readonly string[]): string[] {
  const present = new Set(columns);
  return REQUIRED_COLUMNS.filter((column) => !present.has(column));
}

/**
 * Parse dataset text into a validated table
 *
 * @param content - Dataset file contents
 * @param source - File path used in error messages
 * @throws SchemaError if any required column is missing
 * @throws MalformedTextError if a quoted cell is never closed
 */
export function parseMountainTable(
  content: string,
  source: string | null = null,
  options: DelimitedTextOptions = {}
): MountainTable {
  const [header = [], ...dataLines] = parseDelimitedText(content, { source, ...options });
  const columns = header.map((column) => column.trim());

  const missing = findMissingColumns(columns);
  if (missing.length > 0) {
    throw new SchemaError(missing, source);
  }

  const rows = dataLines.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Load the mountain dataset from disk
 *
 * @param path - Path to a CSV file (a `.txt` extension is fine)
 * @returns Rows in file order
 * @throws SchemaError if any required column is missing
 */
export function loadMountains(
  path: string,
  options: DelimitedTextOptions = {}
): readonly RawMountainRow[] {
  const content = readFileSync(path, 'utf-8');
  return parseMountainTable(content, path, options).rows;
}

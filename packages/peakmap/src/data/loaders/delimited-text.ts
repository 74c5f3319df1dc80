/**
 * Delimited Text Parser
 *
 * Minimal CSV reader for the hand-maintained mountain dataset: comma (or
 * another single-character) delimiter, double-quoted cells that may hold the
 * delimiter or line breaks, `""` as an escaped quote.
 *
 * A quote only opens a quoted cell as the cell's first character; anywhere
 * else it is kept as text.
 *
 * @module data/loaders/delimited-text
 */

import { MalformedTextError } from '../../core/errors.js';

export interface DelimitedTextOptions {
  /** Cell separator (default: ',') */
  readonly delimiter?: string;
  /** File path used in error messages */
  readonly source?: string | null;
}

/**
 * Split text into rows of cells
 *
 * A leading byte-order mark is dropped. Lines holding nothing at all are
 * skipped; a line of only delimiters is kept as a row of empty cells.
 * Cell text is returned as written, without trimming.
 *
 * @throws MalformedTextError if a quoted cell is never closed
 */
export function parseDelimitedText(
  content: string,
  options: DelimitedTextOptions = {}
): string[][] {
  const delimiter = options.delimiter ?? ',';
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new Error(`Unsupported delimiter: ${JSON.stringify(delimiter)}`);
  }

  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let cellStarted = false;
  let rowHasContent = false;
  let line = 1;
  let quoteLine = 0;

  const endCell = (): void => {
    row.push(cell);
    cell = '';
    cellStarted = false;
  };

  const endRow = (): void => {
    if (rowHasContent || cell.length > 0) {
      row.push(cell);
      rows.push(row);
    }
    row = [];
    cell = '';
    cellStarted = false;
    rowHasContent = false;
    line++;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') {
          line++;
        }
        cell += char;
      }
      continue;
    }

    if (char === '"' && !cellStarted) {
      inQuotes = true;
      cellStarted = true;
      quoteLine = line;
      rowHasContent = true;
    } else if (char === delimiter) {
      endCell();
      rowHasContent = true;
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i++;
      }
      endRow();
    } else {
      cell += char;
      cellStarted = true;
    }
  }

  if (inQuotes) {
    throw new MalformedTextError(quoteLine, options.source ?? null);
  }

  endRow();
  return rows;
}

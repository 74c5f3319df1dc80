/**
 * Dataset Validator
 *
 * Opt-in strict pass over the mountain dataset. The map build tolerates rows
 * without coordinates and rows from unconfigured provinces; this reports them
 * (and a few other data-entry slips) so they can be fixed at the source.
 *
 * @module services/dataset-validator
 */

import type { RawMountainRow } from '../core/types.js';
import { isRecognisedFlag, parseCoordinate } from './map-assembler.js';

export type DatasetIssueCode =
  | 'missing-coordinates'
  | 'invalid-coordinates'
  | 'unmapped-province'
  | 'missing-name'
  | 'unrecognised-flag';

export type DatasetIssueSeverity = 'error' | 'warning';

export interface DatasetIssue {
  /** 1-based data row (the header is not counted) */
  readonly row: number;
  readonly code: DatasetIssueCode;
  readonly severity: DatasetIssueSeverity;
  readonly message: string;
}

export interface DatasetValidationResult {
  readonly rowsChecked: number;
  readonly issues: readonly DatasetIssue[];
  readonly errorCount: number;
  readonly warningCount: number;
}

const SEVERITY: Record<DatasetIssueCode, DatasetIssueSeverity> = {
  'missing-coordinates': 'error',
  'invalid-coordinates': 'error',
  'unmapped-province': 'warning',
  'missing-name': 'warning',
  'unrecognised-flag': 'warning',
};

/**
 * Check every row against the configured region names
 */
export function validateDataset(
  rows: readonly RawMountainRow[],
  regionNames: readonly string[]
): DatasetValidationResult {
  const regions = new Set(regionNames);
  const issues: DatasetIssue[] = [];

  const report = (row: number, code: DatasetIssueCode, message: string): void => {
    issues.push({ row, code, severity: SEVERITY[code], message });
  };

  rows.forEach((cells, index) => {
    const row = index + 1;
    const label = (cells.name ?? '').trim();
    const subject = label ? `"${label}"` : `row ${row}`;

    const lat = parseCoordinate(cells.lat);
    const lon = parseCoordinate(cells.lon);
    if (lat === null || lon === null) {
      report(row, 'missing-coordinates', `${subject} has no usable lat/lon`);
    } else if (lat < -90 || lat > 90 || lon < -180 || lon > 180) {
      report(row, 'invalid-coordinates', `${subject} has out-of-range coordinates ${lat},${lon}`);
    }

    const province = (cells.province ?? '').trim();
    if (!regions.has(province)) {
      report(
        row,
        'unmapped-province',
        `${subject} has province "${province}", which is not a configured region`
      );
    }

    if (!label) {
      report(row, 'missing-name', `Row ${row} has no name`);
    }

    for (const column of ['climbed', 'challenge'] as const) {
      if (!isRecognisedFlag(cells[column])) {
        report(
          row,
          'unrecognised-flag',
          `${subject} has ${column}="${cells[column]}", read as false`
        );
      }
    }
  });

  return {
    rowsChecked: rows.length,
    issues,
    errorCount: issues.filter((issue) => issue.severity === 'error').length,
    warningCount: issues.filter((issue) => issue.severity === 'warning').length,
  };
}

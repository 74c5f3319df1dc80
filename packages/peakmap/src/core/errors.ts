/**
 * peakmap Error Types
 *
 * Custom error classes for dataset, boundary and configuration failures.
 * Every fatal condition of a map build surfaces as one of these, so the CLI
 * can map it to an exit code without string matching.
 */

/**
 * Machine-readable error codes
 */
export type PeakmapErrorCode =
  | 'SCHEMA_ERROR'
  | 'MALFORMED_TEXT'
  | 'BOUNDARY_LOOKUP_ERROR'
  | 'BOUNDARY_FORMAT_ERROR'
  | 'CONFIG_ERROR'
  | 'DUPLICATE_LAYER';

/**
 * Base class for all peakmap errors
 */
export class PeakmapError extends Error {
  constructor(
    message: string,
    public readonly code: PeakmapErrorCode
  ) {
    super(message);
    this.name = 'PeakmapError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown when the mountain dataset lacks required columns
 *
 * RECOVERY:
 * - Add the listed columns to the header row (values may be left blank)
 * - Check the delimiter: a semicolon-separated file reads as one column
 */
export class SchemaError extends PeakmapError {
  /**
   * @param missingColumns - Required columns absent from the header, in canonical order
   * @param source - Path of the offending file, when read from disk
   */
  constructor(
    public readonly missingColumns: readonly string[],
    public readonly source: string | null = null
  ) {
    super(
      `Dataset${source ? ` ${source}` : ''} missing columns: ${missingColumns.join(', ')}`,
      'SCHEMA_ERROR'
    );
    this.name = 'SchemaError';
  }
}

/**
 * Error thrown when a quoted cell is still open at the end of the dataset
 *
 * RECOVERY:
 * - Close the quote on the reported line, or double it (`""`) to keep it as text
 */
export class MalformedTextError extends PeakmapError {
  /**
   * @param line - 1-based line on which the unterminated quote opened
   */
  constructor(
    public readonly line: number,
    public readonly source: string | null = null
  ) {
    super(
      `Unterminated quoted cell opened on line ${line}${source ? ` of ${source}` : ''}`,
      'MALFORMED_TEXT'
    );
    this.name = 'MalformedTextError';
  }
}

/**
 * Error thrown when a requested region has no shape in a boundary document
 *
 * A province layer cannot be drawn without its outline, so this is fatal
 * rather than a skip.
 */
export class BoundaryLookupError extends PeakmapError {
  constructor(
    public readonly regionName: string,
    public readonly nameKey: string,
    public readonly source: string | null = null
  ) {
    super(
      `No boundary with ${nameKey} "${regionName}"${source ? ` in ${source}` : ''}`,
      'BOUNDARY_LOOKUP_ERROR'
    );
    this.name = 'BoundaryLookupError';
  }
}

/**
 * Error thrown when a boundary document is neither a province list nor a
 * GeoJSON FeatureCollection
 */
export class BoundaryFormatError extends PeakmapError {
  constructor(
    message: string,
    public readonly source: string | null = null
  ) {
    super(source ? `${message} (${source})` : message, 'BOUNDARY_FORMAT_ERROR');
    this.name = 'BoundaryFormatError';
  }
}

/**
 * Error thrown when a configuration file fails validation
 */
export class ConfigError extends PeakmapError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }

  /**
   * Get formatted summary of configuration issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * Error thrown when two layers in one document share a name
 */
export class DuplicateLayerError extends PeakmapError {
  constructor(public readonly layerName: string) {
    super(`Layer "${layerName}" already exists in this map`, 'DUPLICATE_LAYER');
    this.name = 'DuplicateLayerError';
  }
}

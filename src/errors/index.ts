/**
 * Error Types
 *
 * Fatal error conditions surfaced to callers. Cell-level parse failures are
 * never errors: stages turn them into nulls and count them instead.
 *
 * @module errors
 */

/**
 * Thrown when a dataset does not have the shape a stage needs: a required
 * column is absent, or two columns end up with the same name.
 */
export class SchemaMismatchError extends Error {
  constructor(
    message: string,
    /** Stage ID that rejected the dataset, if any */
    public readonly stageId?: string,
    /** Column names involved in the mismatch */
    public readonly columns: readonly string[] = []
  ) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

/**
 * Thrown for invalid configuration: environment, override files or
 * table names.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    /** Individual validation issues, one per line */
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the dataset source cannot read or parse its input.
 */
export class DatasetSourceError extends Error {
  constructor(
    message: string,
    /** File the source was reading, if any */
    public readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DatasetSourceError';
  }
}

/**
 * Get a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Friction Index Error Types
 *
 * Structural failures that abort a run. Data sparsity is never an error: it is
 * absorbed with a fallback value and reported as a diagnostic instead.
 *
 * - SchemaError: an input table does not have the required shape
 * - ConfigError: the index configuration is invalid
 */

/**
 * Machine-readable error codes
 */
export type FrictionIndexErrorCode = 'SCHEMA_ERROR' | 'CONFIG_ERROR';

/**
 * Base class for errors raised by the pipeline
 */
export abstract class FrictionIndexError extends Error {
  abstract readonly code: FrictionIndexErrorCode;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  abstract toLogString(): string;
}

// ============================================================================
// Schema Errors
// ============================================================================

/**
 * Why a table failed its schema check
 */
export type SchemaErrorReason = 'missing-column' | 'invalid-value' | 'duplicate-key';

/**
 * Details about the offending table cell
 */
export interface SchemaErrorDetails {
  /** Table name (biometric, demographic, enrolment, signals) */
  readonly table: string;
  readonly reason: SchemaErrorReason;
  readonly column?: string;
  /** Zero-based row index */
  readonly row?: number;
}

/**
 * Error thrown when an input table is missing a required column, carries an
 * unusable value, or repeats a key.
 *
 * @example
 * ```typescript
 * throw new SchemaError('biometric table is missing column biometric_retry_count', {
 *   table: 'biometric',
 *   reason: 'missing-column',
 *   column: 'biometric_retry_count',
 *   row: 0,
 * });
 * ```
 */
export class SchemaError extends FrictionIndexError {
  public readonly name = 'SchemaError' as const;
  public readonly code = 'SCHEMA_ERROR' as const;

  constructor(
    message: string,
    public readonly details: SchemaErrorDetails
  ) {
    super(message);
  }

  get table(): string {
    return this.details.table;
  }

  get column(): string | undefined {
    return this.details.column;
  }

  toLogString(): string {
    const parts = [`SchemaError: ${this.message}`, `  Table: ${this.details.table}`];
    if (this.details.column) {
      parts.push(`  Column: ${this.details.column}`);
    }
    if (this.details.row !== undefined) {
      parts.push(`  Row: ${this.details.row}`);
    }
    parts.push(`  Reason: ${this.details.reason}`);
    return parts.join('\n');
  }
}

// ============================================================================
// Config Errors
// ============================================================================

/**
 * Error thrown when weights or thresholds are unusable.
 *
 * Raised at construction time, before any computation runs.
 */
export class ConfigError extends FrictionIndexError {
  public readonly name = 'ConfigError' as const;
  public readonly code = 'CONFIG_ERROR' as const;

  constructor(
    message: string,
    /** Dotted path of the offending field, e.g. `weights.TSD` */
    public readonly field: string
  ) {
    super(message);
  }

  toLogString(): string {
    return [`ConfigError: ${this.message}`, `  Field: ${this.field}`].join('\n');
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isFrictionIndexError(error: unknown): error is FrictionIndexError {
  return error instanceof FrictionIndexError;
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

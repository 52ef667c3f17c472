/**
 * Input Table Validation
 *
 * zod schemas for the three observation tables. Every row is checked before
 * any signal is computed, so a structural problem aborts the run with a
 * SchemaError instead of producing partial output.
 *
 * Extra columns are ignored; state and district names are trimmed.
 */

import { z } from 'zod';
import { SchemaError } from '../core/errors.js';
import { PERIOD_PATTERN } from '../core/constants.js';
import { reportDegenerate } from '../core/diagnostics.js';
import { geoPeriodId } from '../core/utils/keys.js';
import type {
  DiagnosticSink,
  ObservationTable,
  ObservationTables,
} from '../core/types/index.js';

// ============================================================================
// Schemas
// ============================================================================

const nameField = z.string({ invalid_type_error: 'must be a string' }).trim().min(1, 'must not be empty');

const countField = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .nonnegative('must be >= 0');

const keyShape = {
  state: nameField,
  district: nameField,
  period: z
    .string({ invalid_type_error: 'must be a string' })
    .trim()
    .regex(PERIOD_PATTERN, 'must be a YYYY-MM period'),
};

const KeyOnlySchema = z.object(keyShape);

export const BiometricRowSchema = z.object({
  ...keyShape,
  biometric_update_count: countField,
  biometric_failure_count: countField,
  biometric_retry_count: countField,
});

export const DemographicRowSchema = z.object({
  ...keyShape,
  demographic_update_count: countField,
  address_updates: countField,
  name_updates: countField,
  dob_updates: countField,
});

export const EnrolmentRowSchema = z.object({
  ...keyShape,
  enrolment_count: countField,
});

const OBSERVATION_TABLES: readonly ObservationTable[] = ['biometric', 'demographic', 'enrolment'];

/**
 * Unvalidated input tables, as handed over by ingestion
 */
export interface RawObservationTables {
  readonly biometric: readonly unknown[];
  readonly demographic: readonly unknown[];
  readonly enrolment: readonly unknown[];
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Names of the columns a schema requires
 */
export function requiredColumns<S extends z.ZodRawShape>(schema: z.ZodObject<S>): string[] {
  return Object.keys(schema.shape);
}

/**
 * Validate every row of one table.
 *
 * @throws SchemaError on the first missing column, invalid value or repeated key
 */
export function validateTable<S extends z.ZodRawShape>(
  table: ObservationTable,
  rows: readonly unknown[],
  schema: z.ZodObject<S>
): z.infer<z.ZodObject<S>>[] {
  const columns = requiredColumns(schema);
  const seen = new Set<string>();
  const validated: z.infer<z.ZodObject<S>>[] = [];

  rows.forEach((row, index) => {
    if (typeof row !== 'object' || row === null || Array.isArray(row)) {
      throw new SchemaError(`${table} row ${index} is not an object`, {
        table,
        reason: 'invalid-value',
        row: index,
      });
    }

    for (const column of columns) {
      if (!(column in row)) {
        throw new SchemaError(`${table} table is missing column ${column}`, {
          table,
          reason: 'missing-column',
          column,
          row: index,
        });
      }
    }

    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const column = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : undefined;
      throw new SchemaError(
        `${table} row ${index}: ${column ?? 'row'} ${issue?.message ?? 'is invalid'}`,
        { table, reason: 'invalid-value', column, row: index }
      );
    }

    const key = KeyOnlySchema.parse(parsed.data);
    const id = geoPeriodId(key);
    if (seen.has(id)) {
      throw new SchemaError(
        `${table} table repeats key ${key.state} / ${key.district} / ${key.period}`,
        { table, reason: 'duplicate-key', row: index }
      );
    }
    seen.add(id);
    validated.push(parsed.data);
  });

  return validated;
}

/**
 * Validate all three tables of a run.
 *
 * An empty table is allowed (its counts default to 0) but reported as
 * degenerate input.
 */
export function validateObservationTables(
  raw: RawObservationTables,
  diagnostics?: DiagnosticSink
): ObservationTables {
  const tables: ObservationTables = {
    biometric: validateTable('biometric', raw.biometric, BiometricRowSchema),
    demographic: validateTable('demographic', raw.demographic, DemographicRowSchema),
    enrolment: validateTable('enrolment', raw.enrolment, EnrolmentRowSchema),
  };

  for (const table of OBSERVATION_TABLES) {
    if (tables[table].length === 0) {
      reportDegenerate(diagnostics, 'validation', `${table} table has no rows`, { table });
    }
  }

  return tables;
}

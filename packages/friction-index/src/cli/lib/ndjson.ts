/**
 * NDJSON Utilities for Input and Result Tables
 *
 * NDJSON (Newline-Delimited JSON) format:
 * - Optional line 1: header object with `_schema`, `_type`, `_count`
 * - Remaining lines: one row object each
 *
 * Blank lines are ignored. Rows come back unvalidated; the pipeline's schema
 * check owns their shape.
 *
 * @module cli/lib/ndjson
 */

import { readFile } from 'node:fs/promises';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { SchemaError } from '../../core/errors.js';
import type { ObservationTable } from '../../core/types/index.js';
import type { RawObservationTables } from '../../validation/schemas.js';

/**
 * NDJSON header, first line of every file this package writes
 */
export interface NdjsonHeader {
  readonly _schema: 'v1';
  /** Table carried by the file */
  readonly _type: string;
  readonly _count: number;
}

/**
 * Parsed NDJSON content
 */
export interface ParsedNdjson {
  readonly header: NdjsonHeader | null;
  readonly rows: readonly unknown[];
}

/**
 * Input file path per observation table
 */
export type ObservationPaths = Readonly<Record<ObservationTable, string>>;

function isHeaderLine(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && '_schema' in value;
}

/**
 * Parse NDJSON content for one table
 *
 * @throws SchemaError on a line that is not JSON, or a header of another
 *   schema version or table
 */
export function parseNdjson(content: string, table: string): ParsedNdjson {
  const lines = content.split('\n');
  const rows: unknown[] = [];
  let header: NdjsonHeader | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaError(`Failed to parse line ${i + 1} of ${table} input: ${reason}`, {
        table,
        reason: 'invalid-value',
        row: rows.length,
      });
    }

    if (rows.length === 0 && header === null && isHeaderLine(value)) {
      header = parseHeader(value, table);
      continue;
    }
    rows.push(value);
  }

  return { header, rows };
}

function parseHeader(value: Record<string, unknown>, table: string): NdjsonHeader {
  if (value._schema !== 'v1') {
    throw new SchemaError(`Unsupported NDJSON schema version: ${String(value._schema)}`, {
      table,
      reason: 'invalid-value',
      column: '_schema',
    });
  }
  const type = typeof value._type === 'string' ? value._type : table;
  if (type !== table) {
    throw new SchemaError(`Expected ${table} input, file header declares ${type}`, {
      table,
      reason: 'invalid-value',
      column: '_type',
    });
  }
  return {
    _schema: 'v1',
    _type: type,
    _count: typeof value._count === 'number' ? value._count : 0,
  };
}

/**
 * Read one observation table from disk
 */
export async function readObservationFile(
  filepath: string,
  table: ObservationTable
): Promise<readonly unknown[]> {
  const content = await readFile(filepath, 'utf-8');
  return parseNdjson(content, table).rows;
}

/**
 * Read all three observation tables
 */
export async function readObservationTables(paths: ObservationPaths): Promise<RawObservationTables> {
  const [biometric, demographic, enrolment] = await Promise.all([
    readObservationFile(paths.biometric, 'biometric'),
    readObservationFile(paths.demographic, 'demographic'),
    readObservationFile(paths.enrolment, 'enrolment'),
  ]);
  return { biometric, demographic, enrolment };
}

/**
 * Serialize rows behind a header line, with a trailing newline
 */
export function serializeNdjson(type: string, rows: readonly unknown[]): string {
  const header: NdjsonHeader = { _schema: 'v1', _type: type, _count: rows.length };
  const lines = [JSON.stringify(header), ...rows.map((row) => JSON.stringify(row))];
  return lines.join('\n') + '\n';
}

/**
 * Atomically write an NDJSON result table
 */
export async function writeNdjson(
  filepath: string,
  type: string,
  rows: readonly unknown[]
): Promise<void> {
  await atomicWriteFile(filepath, serializeNdjson(type, rows));
}

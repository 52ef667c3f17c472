import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { parseNdjson, readObservationTables, serializeNdjson } from './ndjson.js';
import { isSchemaError, SchemaError } from '../../core/errors.js';

const fixture = (name: string) =>
  fileURLToPath(new URL(`../../__tests__/fixtures/${name}.ndjson`, import.meta.url));

function captureSchemaError(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (error) {
    if (isSchemaError(error)) return error;
    throw error;
  }
  throw new Error('Expected a SchemaError');
}

describe('parseNdjson', () => {
  it('reads the header and skips blank lines', () => {
    const parsed = parseNdjson(
      '{"_schema":"v1","_type":"enrolment","_count":2}\n{"a":1}\n\n{"a":2}\n',
      'enrolment'
    );
    expect(parsed.header).toEqual({ _schema: 'v1', _type: 'enrolment', _count: 2 });
    expect(parsed.rows).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('accepts files without a header', () => {
    const parsed = parseNdjson('{"a":1}', 'enrolment');
    expect(parsed.header).toBeNull();
    expect(parsed.rows).toEqual([{ a: 1 }]);
  });

  it('rejects a header for another table', () => {
    const error = captureSchemaError(() =>
      parseNdjson('{"_schema":"v1","_type":"biometric","_count":0}', 'enrolment')
    );
    expect(error.column).toBe('_type');
    expect(error.message).toBe('Expected enrolment input, file header declares biometric');
  });

  it('rejects an unknown schema version', () => {
    const error = captureSchemaError(() => parseNdjson('{"_schema":"v2"}', 'enrolment'));
    expect(error.column).toBe('_schema');
  });

  it('names the line that is not JSON', () => {
    const error = captureSchemaError(() =>
      parseNdjson('{"_schema":"v1"}\n{"a":1}\n{oops', 'demographic')
    );
    expect(error.message).toMatch(/^Failed to parse line 3 of demographic input/);
    expect(error.details.row).toBe(1);
  });
});

describe('serializeNdjson', () => {
  it('writes a header line and a trailing newline', () => {
    expect(serializeNdjson('districts', [{ a: 1 }])).toBe(
      '{"_schema":"v1","_type":"districts","_count":1}\n{"a":1}\n'
    );
  });
});

describe('readObservationTables', () => {
  it('reads all three fixture tables', async () => {
    const tables = await readObservationTables({
      biometric: fixture('biometric'),
      demographic: fixture('demographic'),
      enrolment: fixture('enrolment'),
    });
    expect(tables.biometric).toHaveLength(5);
    expect(tables.demographic).toHaveLength(5);
    expect(tables.enrolment).toHaveLength(6);
  });
});

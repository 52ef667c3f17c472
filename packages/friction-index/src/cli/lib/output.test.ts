import { describe, it, expect } from 'vitest';
import { formatCsv, formatNdjson, formatOutput, formatTable, formatters, isOutputFormat } from './output.js';

const columns = [
  { key: 'name', header: 'District' },
  { key: 'afi', header: 'AFI', align: 'right' as const, formatter: formatters.fixed(1) },
];

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const table = formatTable(
      [
        { name: 'Kamrup', afi: 12.345 },
        { name: 'Gaya', afi: 7 },
      ],
      columns
    );
    expect(table.split('\n')).toEqual([
      'District |  AFI',
      '---------+-----',
      'Kamrup   | 12.3',
      'Gaya     |  7.0',
    ]);
  });

  it('reports an empty table', () => {
    expect(formatTable([], columns)).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('escapes commas and quotes', () => {
    const csv = formatCsv([{ name: 'Gaya, Bihar', note: 'say "hi"' }], [
      { key: 'name', header: 'District' },
      { key: 'note', header: 'Note' },
    ]);
    expect(csv).toBe('District,Note\n"Gaya, Bihar","say ""hi"""');
  });

  it('prints only the header for no rows', () => {
    expect(formatCsv([], columns)).toBe('District,AFI');
  });
});

describe('formatOutput', () => {
  const rows = [{ name: 'Gaya', afi: 7 }];

  it('dispatches on the format', () => {
    expect(formatOutput(rows, 'ndjson', columns)).toBe('{"name":"Gaya","afi":7}');
    expect(formatOutput(rows, 'json', columns)).toBe('[\n  {\n    "name": "Gaya",\n    "afi": 7\n  }\n]');
    expect(formatOutput(rows, 'csv', columns)).toBe('District,AFI\nGaya,7.0');
  });

  it('joins NDJSON lines without a trailing newline', () => {
    expect(formatNdjson([1, 2])).toBe('1\n2');
  });
});

describe('formatters', () => {
  it('renders missing numbers as a dash', () => {
    expect(formatters.fixed(2)(undefined)).toBe('-');
    expect(formatters.number(null)).toBe('-');
    expect(formatters.number(12500)).toBe('12,500');
  });
});

describe('isOutputFormat', () => {
  it('accepts only known formats', () => {
    expect(isOutputFormat('csv')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });
});

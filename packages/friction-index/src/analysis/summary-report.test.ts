import { describe, it, expect } from 'vitest';
import { centerLine, generateSummaryReport } from './summary-report.js';
import { aggregate } from '../aggregation/aggregator.js';
import { indexRecord } from '../__tests__/utils/fixtures.js';

const RULE = '='.repeat(60);

describe('centerLine', () => {
  it('puts the extra fill on the right', () => {
    expect(centerLine('ab', 5, '-')).toBe('-ab--');
    expect(centerLine('toolong', 3, '-')).toBe('toolong');
  });
});

describe('generateSummaryReport', () => {
  it('renders statistics, top states and the class distribution', () => {
    const records = [
      indexRecord('S1', 'D1', '2024-01', { afi: 100 }),
      indexRecord('S1', 'D2', '2024-01', { afi: 50 }),
      indexRecord('S2', 'D3', '2024-02', { afi: 0 }),
    ];
    const { states } = aggregate(records);

    expect(generateSummaryReport(records, states).split('\n')).toEqual([
      RULE,
      'AADHAAR FRICTION INDEX - SUMMARY REPORT',
      RULE,
      '',
      'Total Records: 3',
      'States Covered: 2',
      'Districts Covered: 3',
      'Time Periods: 2',
      '',
      `${'-'.repeat(23)}AFI Statistics${'-'.repeat(23)}`,
      'Minimum: 0.00',
      'Maximum: 100.00',
      'Mean: 50.00',
      'Median: 50.00',
      'Std Dev: 50.00',
      '',
      `${'-'.repeat(18)}Top 5 States by Avg AFI${'-'.repeat(19)}`,
      'S1: 75.00',
      'S2: 0.00',
      '',
      `${'-'.repeat(16)}Friction Class Distribution${'-'.repeat(17)}`,
      'High: 1 (33.3%)',
      'Medium: 1 (33.3%)',
      'Low: 1 (33.3%)',
      '',
      RULE,
    ]);
  });

  it('renders only the header counts for an empty run', () => {
    expect(generateSummaryReport([], []).split('\n')).toEqual([
      RULE,
      'AADHAAR FRICTION INDEX - SUMMARY REPORT',
      RULE,
      '',
      'Total Records: 0',
      'States Covered: 0',
      'Districts Covered: 0',
      'Time Periods: 0',
      '',
      RULE,
    ]);
  });
});

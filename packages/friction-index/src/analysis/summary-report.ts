/**
 * Plain-text summary report of a run
 *
 * @module analysis/summary-report
 */

import { districtId } from '../core/utils/keys.js';
import { max, mean, median, min, sampleStd } from '../core/utils/stats.js';
import { rankStates } from '../ranking/ranker.js';
import type { FrictionClass, IndexRecord, StateAggregate } from '../core/types/index.js';

const REPORT_WIDTH = 60;
const CLASS_ORDER: readonly FrictionClass[] = ['High', 'Medium', 'Low'];

/**
 * Center `text` in a line of `width`, padding with `fill`; extra fill goes right
 */
export function centerLine(text: string, width: number, fill: string): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return fill.repeat(left) + text + fill.repeat(padding - left);
}

export function generateSummaryReport(
  records: readonly IndexRecord[],
  states: readonly StateAggregate[]
): string {
  const rule = '='.repeat(REPORT_WIDTH);
  const lines: string[] = [rule, 'AADHAAR FRICTION INDEX - SUMMARY REPORT', rule];

  lines.push('');
  lines.push(`Total Records: ${records.length}`);
  lines.push(`States Covered: ${new Set(records.map((r) => r.key.state)).size}`);
  lines.push(`Districts Covered: ${new Set(records.map((r) => districtId(r.key))).size}`);
  lines.push(`Time Periods: ${new Set(records.map((r) => r.key.period)).size}`);

  if (records.length > 0) {
    const afi = records.map((r) => r.afi);
    lines.push('');
    lines.push(centerLine('AFI Statistics', REPORT_WIDTH, '-'));
    lines.push(`Minimum: ${min(afi).toFixed(2)}`);
    lines.push(`Maximum: ${max(afi).toFixed(2)}`);
    lines.push(`Mean: ${mean(afi).toFixed(2)}`);
    lines.push(`Median: ${median(afi).toFixed(2)}`);
    lines.push(`Std Dev: ${sampleStd(afi).toFixed(2)}`);

    lines.push('');
    lines.push(centerLine('Top 5 States by Avg AFI', REPORT_WIDTH, '-'));
    for (const state of rankStates(states, 5)) {
      lines.push(`${state.state}: ${state.afi.mean.toFixed(2)}`);
    }

    lines.push('');
    lines.push(centerLine('Friction Class Distribution', REPORT_WIDTH, '-'));
    for (const frictionClass of CLASS_ORDER) {
      const count = records.filter((r) => r.frictionClass === frictionClass).length;
      const pct = (count / records.length) * 100;
      lines.push(`${frictionClass}: ${count} (${pct.toFixed(1)}%)`);
    }
  }

  lines.push('');
  lines.push(rule);
  return lines.join('\n');
}

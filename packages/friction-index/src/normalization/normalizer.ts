/**
 * Min-max normalization into [0, 100]
 *
 * Always applied over the entire result set of the current run, never per
 * subgroup, so that scores stay comparable across districts and states. The
 * range is captured once and returned with the values.
 *
 * Degenerate input:
 * - max == min (including a single value): every output is 50
 * - empty series: empty output
 * Both are reported as DegenerateInputWarning through the optional sink.
 *
 * @module normalization/normalizer
 */

import {
  DEGENERATE_MIDPOINT,
  NORMALIZED_MAX,
  NORMALIZED_MIN,
} from '../core/constants.js';
import { reportDegenerate } from '../core/diagnostics.js';
import { max, min } from '../core/utils/stats.js';
import type { DiagnosticSink, PipelineStage } from '../core/types/index.js';

/**
 * Observed range of a series
 */
export interface NormalizationRange {
  readonly min: number;
  readonly max: number;
}

export interface NormalizedSeries {
  readonly values: readonly number[];
  /** null for an empty series */
  readonly range: NormalizationRange | null;
  /** True when the fallback value was used */
  readonly degenerate: boolean;
}

export interface NormalizeOptions {
  /** Series name for diagnostics */
  readonly label?: string;
  readonly stage?: PipelineStage;
  readonly diagnostics?: DiagnosticSink;
}

/**
 * Rescale a single value against a captured range
 */
export function rescale(value: number, range: NormalizationRange): number {
  const span = range.max - range.min;
  if (span === 0) return DEGENERATE_MIDPOINT;
  const scaled = NORMALIZED_MIN + ((value - range.min) * (NORMALIZED_MAX - NORMALIZED_MIN)) / span;
  return Math.min(NORMALIZED_MAX, Math.max(NORMALIZED_MIN, scaled));
}

/**
 * Normalize a whole series: `100 * (x - min) / (max - min)`
 */
export function normalize(
  series: readonly number[],
  options: NormalizeOptions = {}
): NormalizedSeries {
  const label = options.label ?? 'series';
  const stage = options.stage ?? 'normalization';

  if (series.length === 0) {
    reportDegenerate(options.diagnostics, stage, `Cannot normalize empty ${label}`, {
      series: label,
    });
    return { values: [], range: null, degenerate: true };
  }

  const range: NormalizationRange = { min: min(series), max: max(series) };

  if (range.max === range.min) {
    reportDegenerate(
      options.diagnostics,
      stage,
      `Zero normalization range for ${label}; using midpoint ${DEGENERATE_MIDPOINT}`,
      { series: label, value: range.min, count: series.length }
    );
    return {
      values: series.map(() => DEGENERATE_MIDPOINT),
      range,
      degenerate: true,
    };
  }

  return {
    values: series.map((value) => rescale(value, range)),
    range,
    degenerate: false,
  };
}

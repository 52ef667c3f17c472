/**
 * Component analysis: which signals drive the index
 *
 * @module analysis/component-analysis
 */

import { SIGNAL_NAMES } from '../core/constants.js';
import { max, mean, min, pearson, quantile, sampleStd } from '../core/utils/stats.js';
import type { IndexWeights } from '../core/config.js';
import type { IndexRecord, SignalName } from '../core/types/index.js';

/**
 * Descriptive statistics of one normalized signal
 */
export interface ComponentStats {
  readonly count: number;
  readonly mean: number;
  readonly std: number;
  readonly min: number;
  readonly p25: number;
  readonly p50: number;
  readonly p75: number;
  readonly max: number;
}

export interface ComponentAnalysis {
  /** Pearson correlation of each normalized signal with AFI */
  readonly correlations: Readonly<Record<SignalName, number>>;
  /** Signal most correlated with AFI; null without records */
  readonly dominantComponent: SignalName | null;
  /** Mean of weight × normalized signal */
  readonly averageContributions: Readonly<Record<SignalName, number>>;
  readonly componentStats: Readonly<Record<SignalName, ComponentStats>>;
}

export function describe(values: readonly number[]): ComponentStats {
  return {
    count: values.length,
    mean: mean(values),
    std: sampleStd(values),
    min: min(values),
    p25: quantile(values, 0.25),
    p50: quantile(values, 0.5),
    p75: quantile(values, 0.75),
    max: max(values),
  };
}

function perSignal<T>(fn: (name: SignalName) => T): Readonly<Record<SignalName, T>> {
  return { UIS: fn('UIS'), RIS: fn('RIS'), BSS: fn('BSS'), TSD: fn('TSD') };
}

export function analyzeComponents(
  records: readonly IndexRecord[],
  weights: IndexWeights
): ComponentAnalysis {
  const afi = records.map((r) => r.afi);
  const column = (name: SignalName) => records.map((r) => r.signals[name]);

  const correlations = perSignal((name) => pearson(column(name), afi));

  let dominantComponent: SignalName | null = null;
  if (records.length > 0) {
    dominantComponent = SIGNAL_NAMES[0];
    for (const name of SIGNAL_NAMES) {
      if (correlations[name] > correlations[dominantComponent]) dominantComponent = name;
    }
  }

  return {
    correlations,
    dominantComponent,
    averageContributions: perSignal((name) => mean(column(name).map((v) => v * weights[name]))),
    componentStats: perSignal((name) => describe(column(name))),
  };
}

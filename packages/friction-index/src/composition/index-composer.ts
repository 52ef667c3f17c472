/**
 * Index Composer
 *
 * Turns raw SignalRecords into IndexRecords:
 *
 * 1. Normalize UIS, RIS, BSS and TSD over the full run
 * 2. raw = w.UIS·UIS + w.RIS·RIS + w.BSS·BSS + w.TSD·TSD
 * 3. AFI = normalize(raw) over the full run
 * 4. Friction class from AFI (High ≥ 70, Medium ≥ 40, else Low)
 * 5. National rank, state rank and national percentile
 *
 * Weights are validated when the composer is constructed. Every normalization
 * range is computed once per run and returned with the records.
 *
 * @module composition/index-composer
 */

import { SIGNAL_NAMES } from '../core/constants.js';
import {
  createConfig,
  DEFAULT_CONFIG,
  type ClassThresholds,
  type FrictionIndexConfig,
  type FrictionIndexConfigInput,
} from '../core/config.js';
import { SchemaError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import {
  normalize,
  type NormalizationRange,
  type NormalizedSeries,
} from '../normalization/normalizer.js';
import { competitionRanks, groupedCompetitionRanks, percentileRanks } from './rankings.js';
import type {
  DiagnosticSink,
  FrictionClass,
  IndexRecord,
  SignalName,
  SignalRecord,
  SignalVector,
} from '../core/types/index.js';

const log = createLogger({ module: 'composition' });

/**
 * Ranges captured by one composition run
 */
export interface NormalizationRanges {
  readonly signals: Readonly<Record<SignalName, NormalizationRange | null>>;
  readonly composite: NormalizationRange | null;
}

export interface ComposedIndex {
  /** Same order as the input SignalRecords */
  readonly records: readonly IndexRecord[];
  readonly ranges: NormalizationRanges;
}

/**
 * Bucket an AFI value into a friction class
 */
export function classifyFriction(
  afi: number,
  thresholds: ClassThresholds = DEFAULT_CONFIG.classThresholds
): FrictionClass {
  if (afi >= thresholds.high) return 'High';
  if (afi >= thresholds.medium) return 'Medium';
  return 'Low';
}

/**
 * Reject signals that are not finite and non-negative
 *
 * @throws SchemaError naming the first offending record and signal
 */
export function validateSignals(records: readonly SignalRecord[]): void {
  records.forEach((record, row) => {
    for (const name of SIGNAL_NAMES) {
      const value = record.signals[name];
      if (!Number.isFinite(value) || value < 0) {
        throw new SchemaError(
          `Signal ${name} of ${record.key.state} / ${record.key.district} / ${record.key.period} must be a finite non-negative number, got ${value}`,
          { table: 'signals', reason: 'invalid-value', column: name, row }
        );
      }
    }
  });
}

export class IndexComposer {
  private readonly config: FrictionIndexConfig;

  /**
   * @throws ConfigError if the weights or class thresholds are invalid
   */
  constructor(config: FrictionIndexConfigInput = {}) {
    this.config = createConfig(config);
  }

  get weights(): FrictionIndexConfig['weights'] {
    return this.config.weights;
  }

  /**
   * Weighted sum of normalized signals
   */
  composite(signals: SignalVector): number {
    return SIGNAL_NAMES.reduce((acc, name) => acc + this.config.weights[name] * signals[name], 0);
  }

  compose(records: readonly SignalRecord[], diagnostics?: DiagnosticSink): ComposedIndex {
    validateSignals(records);

    const normalizeSignal = (name: SignalName): NormalizedSeries =>
      normalize(
        records.map((r) => r.signals[name]),
        { label: name, stage: 'composition', diagnostics }
      );
    const normalized: Readonly<Record<SignalName, NormalizedSeries>> = {
      UIS: normalizeSignal('UIS'),
      RIS: normalizeSignal('RIS'),
      BSS: normalizeSignal('BSS'),
      TSD: normalizeSignal('TSD'),
    };

    const normalizedVectors: SignalVector[] = records.map((_, i) => ({
      UIS: normalized.UIS.values[i],
      RIS: normalized.RIS.values[i],
      BSS: normalized.BSS.values[i],
      TSD: normalized.TSD.values[i],
    }));
    const rawComposites = normalizedVectors.map((signals) => this.composite(signals));
    const afi = normalize(rawComposites, { label: 'AFI', stage: 'composition', diagnostics });

    const nationalRanks = competitionRanks(afi.values);
    const stateRanks = groupedCompetitionRanks(
      afi.values,
      records.map((r) => r.key.state)
    );
    const percentiles = percentileRanks(afi.values);

    const composed: IndexRecord[] = records.map((record, i) => ({
      key: record.key,
      volumes: record.volumes,
      rawSignals: record.signals,
      signals: normalizedVectors[i],
      rawComposite: rawComposites[i],
      afi: afi.values[i],
      frictionClass: classifyFriction(afi.values[i], this.config.classThresholds),
      nationalRank: nationalRanks[i],
      stateRank: stateRanks[i],
      nationalPercentile: percentiles[i],
    }));

    log.debug('Composed friction index', {
      records: composed.length,
      compositeMin: afi.range?.min,
      compositeMax: afi.range?.max,
    });

    return {
      records: composed,
      ranges: {
        signals: {
          UIS: normalized.UIS.range,
          RIS: normalized.RIS.range,
          BSS: normalized.BSS.range,
          TSD: normalized.TSD.range,
        },
        composite: afi.range,
      },
    };
  }
}

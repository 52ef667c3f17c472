/**
 * Signal Computer
 *
 * Derives the four raw component signals for every geography-period:
 *
 *   UIS = totalUpdates / totalRecords × 100
 *   RIS = failedResolutions / totalAttempts × 100
 *   BSS = biometricFailures / biometricAttempts × 100
 *   TSD = sample std dev, across the district's periods, of a provisional
 *         composite built from normalized UIS, RIS and BSS
 *
 * TSD never reads the published AFI: the provisional composite only uses the
 * three signals that exist before TSD does.
 *
 * @module signals/signal-computer
 */

import { PROVISIONAL_SIGNAL_NAMES } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { districtId, groupBy } from '../core/utils/keys.js';
import { sampleStd } from '../core/utils/stats.js';
import { normalize } from '../normalization/normalizer.js';
import { joinObservations } from './join.js';
import type { IndexWeights } from '../core/config.js';
import type {
  JoinedObservation,
  ObservationTables,
  SignalName,
  SignalRecord,
  SignalVolumes,
} from '../core/types/index.js';

const log = createLogger({ module: 'signals' });

type ProvisionalSignals = Readonly<Record<Exclude<SignalName, 'TSD'>, number>>;

/**
 * `numerator / denominator × 100`, or 0 when the denominator is 0
 */
export function ratioPercent(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return (numerator / denominator) * 100;
}

/**
 * Activity volumes behind the ratio signals
 */
export function computeVolumes(observation: JoinedObservation): SignalVolumes {
  const totalUpdates = observation.biometricUpdates + observation.demographicUpdates;
  return {
    totalUpdates,
    totalRecords: totalUpdates + observation.enrolments,
    failedResolutions: observation.biometricRetries,
    totalAttempts: totalUpdates + observation.biometricRetries,
    biometricFailures: observation.biometricFailures,
    biometricAttempts: observation.biometricUpdates + observation.biometricFailures,
    enrolments: observation.enrolments,
  };
}

/**
 * UIS, RIS and BSS of one geography-period
 */
export function computeRatioSignals(volumes: SignalVolumes): ProvisionalSignals {
  return {
    UIS: ratioPercent(volumes.totalUpdates, volumes.totalRecords),
    RIS: ratioPercent(volumes.failedResolutions, volumes.totalAttempts),
    BSS: ratioPercent(volumes.biometricFailures, volumes.biometricAttempts),
  };
}

/**
 * UIS/RIS/BSS weights rescaled to sum to 1.
 *
 * Falls back to equal thirds when all three are zero.
 */
export function provisionalWeights(weights: IndexWeights): ProvisionalSignals {
  const total = weights.UIS + weights.RIS + weights.BSS;
  if (total <= 0) {
    return { UIS: 1 / 3, RIS: 1 / 3, BSS: 1 / 3 };
  }
  return {
    UIS: weights.UIS / total,
    RIS: weights.RIS / total,
    BSS: weights.BSS / total,
  };
}

/**
 * Provisional (pre-TSD) composite per record, normalized over the whole run
 */
export function provisionalComposites(
  signals: readonly ProvisionalSignals[],
  weights: IndexWeights
): number[] {
  const scale = provisionalWeights(weights);
  const column = (name: keyof ProvisionalSignals) =>
    normalize(signals.map((s) => s[name])).values;
  const normalized: Readonly<Record<keyof ProvisionalSignals, readonly number[]>> = {
    UIS: column('UIS'),
    RIS: column('RIS'),
    BSS: column('BSS'),
  };

  return signals.map((_, i) =>
    PROVISIONAL_SIGNAL_NAMES.reduce((acc, name) => acc + scale[name] * normalized[name][i], 0)
  );
}

/**
 * Temporal deviation per district: sample std dev of the provisional
 * composite across the district's periods (0 for a single period)
 */
export function temporalDeviationByDistrict(
  keys: readonly JoinedObservation['key'][],
  composites: readonly number[]
): Map<string, number> {
  const indexed = keys.map((key, i) => ({ key, composite: composites[i] }));
  const byDistrict = groupBy(indexed, (item) => districtId(item.key));

  const deviations = new Map<string, number>();
  for (const [id, items] of byDistrict) {
    deviations.set(id, sampleStd(items.map((item) => item.composite)));
  }
  return deviations;
}

export interface ComputeSignalsOptions {
  /** Composition weights; the UIS/RIS/BSS share drives the provisional composite */
  readonly weights: IndexWeights;
}

/**
 * Compute raw signals for every key present in at least one table.
 *
 * Output is sorted by (state, district, period).
 */
export function computeSignals(
  tables: ObservationTables,
  options: ComputeSignalsOptions
): SignalRecord[] {
  const observations = joinObservations(tables);
  const volumes = observations.map(computeVolumes);
  const ratios = volumes.map(computeRatioSignals);

  const composites = provisionalComposites(ratios, options.weights);
  const deviations = temporalDeviationByDistrict(
    observations.map((o) => o.key),
    composites
  );

  log.debug('Computed friction signals', {
    records: observations.length,
    districts: deviations.size,
  });

  return observations.map((observation, i) => ({
    key: observation.key,
    volumes: volumes[i],
    signals: {
      ...ratios[i],
      TSD: deviations.get(districtId(observation.key)) ?? 0,
    },
  }));
}

/**
 * Hidden Risk Detector
 *
 * A geography-period is hidden risk when its activity volume is below the
 * run's median while its AFI is above the run's 75th percentile: a problem
 * that volume-based prioritization would miss.
 *
 *   low_volume(x)    = totalUpdates(x) < median(totalUpdates)
 *   high_friction(x) = AFI(x) > p75(AFI)
 *
 * Thresholds are computed once over the full result set and stored with
 * every flagged record. Fewer than 2 records skip detection with an
 * EmptyResultWarning.
 *
 * @module risk/risk-detector
 */

import {
  HIGH_FRICTION_QUANTILE,
  LOW_VOLUME_QUANTILE,
  MIN_RISK_POPULATION,
} from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { quantile } from '../core/utils/stats.js';
import { rankRecords } from '../ranking/ranker.js';
import type {
  DiagnosticSink,
  HiddenRiskRecord,
  HiddenRiskResult,
  HiddenRiskThresholds,
  IndexRecord,
} from '../core/types/index.js';

const log = createLogger({ module: 'risk' });

/**
 * Median update volume and 75th-percentile AFI of a record set
 */
export function computeThresholds(records: readonly IndexRecord[]): HiddenRiskThresholds {
  return {
    medianTotalUpdates: quantile(
      records.map((r) => r.volumes.totalUpdates),
      LOW_VOLUME_QUANTILE
    ),
    p75Afi: quantile(
      records.map((r) => r.afi),
      HIGH_FRICTION_QUANTILE
    ),
    population: records.length,
  };
}

/**
 * Both predicates, strict on each side
 */
export function isHiddenRisk(
  record: Pick<IndexRecord, 'afi' | 'volumes'>,
  thresholds: HiddenRiskThresholds
): boolean {
  const lowVolume = record.volumes.totalUpdates < thresholds.medianTotalUpdates;
  const highFriction = record.afi > thresholds.p75Afi;
  return lowVolume && highFriction;
}

/**
 * Flag hidden-risk records, returned in ranking order
 */
export function detectHiddenRisk(
  records: readonly IndexRecord[],
  diagnostics?: DiagnosticSink
): HiddenRiskResult {
  if (records.length < MIN_RISK_POPULATION) {
    diagnostics?.report({
      code: 'EMPTY_RESULT',
      stage: 'risk',
      message: `Hidden risk detection needs at least ${MIN_RISK_POPULATION} records, got ${records.length}`,
      details: { records: records.length },
    });
    return { thresholds: null, records: [] };
  }

  const thresholds = computeThresholds(records);
  const flagged: HiddenRiskRecord[] = rankRecords(
    records.filter((record) => isHiddenRisk(record, thresholds))
  ).map((record) => ({ ...record, thresholds }));

  log.debug('Hidden risk detection complete', {
    population: thresholds.population,
    flagged: flagged.length,
    medianTotalUpdates: thresholds.medianTotalUpdates,
    p75Afi: thresholds.p75Afi,
  });

  return { thresholds, records: flagged };
}

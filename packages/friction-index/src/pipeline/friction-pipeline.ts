/**
 * Friction Index Pipeline
 *
 * One deterministic batch run over a frozen snapshot of the three input
 * tables:
 *
 *   config → validation → signals → composition → {aggregation, risk, ranking, analysis}
 *
 * Configuration and schema problems throw before any result exists; sparse
 * data only adds diagnostics. The caller gets either a complete result or a
 * single error.
 *
 * @module pipeline/friction-pipeline
 */

import { createConfig, type FrictionIndexConfig, type FrictionIndexConfigInput } from '../core/config.js';
import { DiagnosticCollector } from '../core/diagnostics.js';
import { createLogger } from '../core/utils/logger.js';
import { validateObservationTables, type RawObservationTables } from '../validation/schemas.js';
import { computeSignals } from '../signals/signal-computer.js';
import { IndexComposer, type NormalizationRanges } from '../composition/index-composer.js';
import { aggregate } from '../aggregation/aggregator.js';
import { detectHiddenRisk } from '../risk/risk-detector.js';
import { rankDistricts, topN } from '../ranking/ranker.js';
import { analyzeComponents, type ComponentAnalysis } from '../analysis/component-analysis.js';
import type {
  Diagnostic,
  DistrictAggregate,
  HiddenRiskResult,
  IndexRecord,
  MonthAggregate,
  StateAggregate,
} from '../core/types/index.js';

const log = createLogger({ module: 'pipeline' });

/**
 * Every result table of a run
 */
export interface FrictionRunResult {
  readonly config: FrictionIndexConfig;
  /** All geography-periods, sorted by (state, district, period) */
  readonly indexRecords: readonly IndexRecord[];
  readonly districts: readonly DistrictAggregate[];
  readonly states: readonly StateAggregate[];
  readonly months: readonly MonthAggregate[];
  readonly hiddenRisk: HiddenRiskResult;
  /** Ranked top-N records (config.topN) */
  readonly topRecords: readonly IndexRecord[];
  /** Highest-friction districts by mean AFI (config.topDistricts) */
  readonly topDistricts: readonly DistrictAggregate[];
  readonly componentAnalysis: ComponentAnalysis;
  readonly ranges: NormalizationRanges;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Run the full pipeline.
 *
 * @throws ConfigError before any computation if the configuration is invalid
 * @throws SchemaError if an input table is malformed
 */
export function runFrictionPipeline(
  tables: RawObservationTables,
  input: FrictionIndexConfigInput = {}
): FrictionRunResult {
  const config = createConfig(input);
  const composer = new IndexComposer(config);
  const diagnostics = new DiagnosticCollector();

  log.debug('Starting friction index run', {
    biometricRows: tables.biometric.length,
    demographicRows: tables.demographic.length,
    enrolmentRows: tables.enrolment.length,
  });

  const observations = validateObservationTables(tables, diagnostics);
  const signals = computeSignals(observations, { weights: config.weights });
  const composed = composer.compose(signals, diagnostics);
  const records = composed.records;

  const { districts, states, months } = aggregate(records, config.classThresholds);
  const hiddenRisk = detectHiddenRisk(records, diagnostics);

  const result: FrictionRunResult = {
    config,
    indexRecords: records,
    districts,
    states,
    months,
    hiddenRisk,
    topRecords: topN(records, config.topN),
    topDistricts: rankDistricts(districts, config.topDistricts),
    componentAnalysis: analyzeComponents(records, config.weights),
    ranges: composed.ranges,
    diagnostics: diagnostics.list(),
  };

  log.debug('Friction index run complete', {
    records: records.length,
    districts: districts.length,
    states: states.length,
    months: months.length,
    hiddenRisk: hiddenRisk.records.length,
    diagnostics: diagnostics.size,
  });

  return result;
}

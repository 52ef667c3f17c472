/**
 * Friction Index - district-level friction scoring
 *
 * @friction-index/core provides:
 * - Signal computation (UIS, RIS, BSS, TSD) from biometric, demographic and enrolment tables
 * - The bounded 0-100 composite friction index (AFI) with friction classes and rankings
 * - District, state and month rollups
 * - Hidden-risk detection with persisted thresholds
 *
 * @packageDocumentation
 */

// Pipeline
export {
  runFrictionPipeline,
  type FrictionRunResult,
} from './pipeline/friction-pipeline.js';

// Configuration
export {
  createConfig,
  createIndexWeights,
  DEFAULT_CONFIG,
  DEFAULT_WEIGHTS,
  type ClassThresholds,
  type FrictionIndexConfig,
  type FrictionIndexConfigInput,
  type IndexWeights,
} from './core/config.js';

// Errors
export {
  FrictionIndexError,
  SchemaError,
  ConfigError,
  isFrictionIndexError,
  isSchemaError,
  isConfigError,
  type FrictionIndexErrorCode,
  type SchemaErrorDetails,
  type SchemaErrorReason,
} from './core/errors.js';

export { DiagnosticCollector } from './core/diagnostics.js';
export { SIGNAL_NAMES } from './core/constants.js';

// Stages
export {
  validateObservationTables,
  BiometricRowSchema,
  DemographicRowSchema,
  EnrolmentRowSchema,
  type RawObservationTables,
} from './validation/schemas.js';
export { joinObservations } from './signals/join.js';
export { computeSignals, ratioPercent } from './signals/signal-computer.js';
export {
  normalize,
  type NormalizationRange,
  type NormalizedSeries,
} from './normalization/normalizer.js';
export {
  IndexComposer,
  classifyFriction,
  type ComposedIndex,
  type NormalizationRanges,
} from './composition/index-composer.js';
export {
  aggregate,
  aggregateByDistrict,
  aggregateByState,
  aggregateByMonth,
  type Aggregates,
} from './aggregation/aggregator.js';
export { detectHiddenRisk, computeThresholds, isHiddenRisk } from './risk/risk-detector.js';
export {
  rankRecords,
  passThrough,
  topN,
  rankDistricts,
  rankStates,
  auditExtract,
  type AuditRow,
} from './ranking/ranker.js';
export { analyzeComponents, type ComponentAnalysis, type ComponentStats } from './analysis/component-analysis.js';
export { generateSummaryReport } from './analysis/summary-report.js';

export type * from './core/types/index.js';

/**
 * Core type exports
 */

export type { GeoPeriodKey, DistrictKey } from './geo.js';
export type {
  BiometricObservation,
  DemographicObservation,
  EnrolmentObservation,
  ObservationTable,
  ObservationTables,
  JoinedObservation,
} from './observation.js';
export type {
  SignalName,
  SignalVector,
  FrictionClass,
  SignalVolumes,
  SignalRecord,
  IndexRecord,
} from './signals.js';
export type {
  SummaryStats,
  DistrictAggregate,
  StateAggregate,
  MonthAggregate,
} from './aggregates.js';
export type {
  HiddenRiskThresholds,
  HiddenRiskRecord,
  HiddenRiskResult,
} from './risk.js';
export type {
  PipelineStage,
  DegenerateInputWarning,
  EmptyResultWarning,
  Diagnostic,
  DiagnosticSink,
} from './diagnostics.js';

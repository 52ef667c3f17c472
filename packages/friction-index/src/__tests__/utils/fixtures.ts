/**
 * Test Fixture Factories
 *
 * Minimal valid rows and records with neutral defaults; each test overrides
 * only the fields it is about.
 */

import type {
  BiometricObservation,
  DemographicObservation,
  EnrolmentObservation,
  FrictionClass,
  GeoPeriodKey,
  IndexRecord,
  SignalRecord,
  SignalVector,
  SignalVolumes,
} from '../../core/types/index.js';

// ============================================================================
// Observation Rows
// ============================================================================

export function biometricRow(
  key: GeoPeriodKey,
  counts: Partial<Omit<BiometricObservation, keyof GeoPeriodKey>> = {}
): BiometricObservation {
  return {
    ...key,
    biometric_update_count: 0,
    biometric_failure_count: 0,
    biometric_retry_count: 0,
    ...counts,
  };
}

export function demographicRow(
  key: GeoPeriodKey,
  counts: Partial<Omit<DemographicObservation, keyof GeoPeriodKey>> = {}
): DemographicObservation {
  return {
    ...key,
    demographic_update_count: 0,
    address_updates: 0,
    name_updates: 0,
    dob_updates: 0,
    ...counts,
  };
}

export function enrolmentRow(key: GeoPeriodKey, enrolmentCount = 0): EnrolmentObservation {
  return { ...key, enrolment_count: enrolmentCount };
}

// ============================================================================
// Signal and Index Records
// ============================================================================

export const ZERO_SIGNALS: SignalVector = { UIS: 0, RIS: 0, BSS: 0, TSD: 0 };

export function volumes(overrides: Partial<SignalVolumes> = {}): SignalVolumes {
  return {
    totalUpdates: 0,
    totalRecords: 0,
    failedResolutions: 0,
    totalAttempts: 0,
    biometricFailures: 0,
    biometricAttempts: 0,
    enrolments: 0,
    ...overrides,
  };
}

export function signalRecord(key: GeoPeriodKey, signals: Partial<SignalVector>): SignalRecord {
  return { key, volumes: volumes(), signals: { ...ZERO_SIGNALS, ...signals } };
}

export interface IndexRecordOptions {
  readonly afi: number;
  readonly totalUpdates?: number;
  readonly enrolments?: number;
  readonly signals?: Partial<SignalVector>;
  readonly frictionClass?: FrictionClass;
  readonly nationalRank?: number;
}

function classOf(afi: number): FrictionClass {
  if (afi >= 70) return 'High';
  if (afi >= 40) return 'Medium';
  return 'Low';
}

/**
 * IndexRecord with the given AFI; signals default to 0
 */
export function indexRecord(
  state: string,
  district: string,
  period: string,
  options: IndexRecordOptions
): IndexRecord {
  const signals: SignalVector = { ...ZERO_SIGNALS, ...options.signals };
  return {
    key: { state, district, period },
    volumes: volumes({
      totalUpdates: options.totalUpdates ?? 0,
      enrolments: options.enrolments ?? 0,
    }),
    rawSignals: signals,
    signals,
    rawComposite: options.afi,
    afi: options.afi,
    frictionClass: options.frictionClass ?? classOf(options.afi),
    nationalRank: options.nationalRank ?? 1,
    stateRank: 1,
    nationalPercentile: 100,
  };
}

/**
 * Friction Index Constants
 */

import type { SignalName } from './types/index.js';

/**
 * Component signals in composition order. Also the tie-break order when
 * picking a dominant signal.
 */
export const SIGNAL_NAMES: readonly SignalName[] = ['UIS', 'RIS', 'BSS', 'TSD'] as const;

/**
 * Signals available before TSD exists; the provisional composite is built
 * from these
 */
export const PROVISIONAL_SIGNAL_NAMES: readonly Exclude<SignalName, 'TSD'>[] = [
  'UIS',
  'RIS',
  'BSS',
] as const;

/**
 * Output range of min-max normalization
 */
export const NORMALIZED_MIN = 0;
export const NORMALIZED_MAX = 100;

/**
 * Value assigned to every element of a series whose range is zero
 */
export const DEGENERATE_MIDPOINT = 50;

/**
 * Allowed deviation of the weight sum from 1.0
 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Quantiles used by hidden-risk detection
 */
export const LOW_VOLUME_QUANTILE = 0.5;
export const HIGH_FRICTION_QUANTILE = 0.75;

/**
 * Detection needs at least this many records for its quantiles to mean anything
 */
export const MIN_RISK_POPULATION = 2;

/**
 * Period token format
 */
export const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

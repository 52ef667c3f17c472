/**
 * Friction Index Configuration
 *
 * Weights and thresholds are an explicit value passed into each run. They are
 * validated once, here, and never mutated afterwards.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { SIGNAL_NAMES, WEIGHT_SUM_TOLERANCE } from './constants.js';
import type { SignalName } from './types/index.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Composition weight per signal; the four weights sum to 1.0
 */
export type IndexWeights = Readonly<Record<SignalName, number>>;

/**
 * AFI cut-offs between friction classes
 */
export interface ClassThresholds {
  /** AFI at or above this is High */
  readonly high: number;
  /** AFI at or above this (and below high) is Medium */
  readonly medium: number;
}

/**
 * Full configuration of a run
 */
export interface FrictionIndexConfig {
  readonly weights: IndexWeights;
  readonly classThresholds: ClassThresholds;
  /** Size of the ranked top-N record view */
  readonly topN: number;
  /** Size of the highest-friction district view */
  readonly topDistricts: number;
}

/**
 * Partial configuration accepted by createConfig
 */
export interface FrictionIndexConfigInput {
  readonly weights?: Readonly<Record<string, unknown>>;
  readonly classThresholds?: Partial<ClassThresholds>;
  readonly topN?: number;
  readonly topDistricts?: number;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_WEIGHTS: IndexWeights = {
  UIS: 0.3,
  RIS: 0.25,
  BSS: 0.25,
  TSD: 0.2,
};

export const DEFAULT_CONFIG: FrictionIndexConfig = {
  weights: DEFAULT_WEIGHTS,
  classThresholds: {
    high: 70,
    medium: 40,
  },
  topN: 100,
  topDistricts: 15,
};

// ============================================================================
// Schemas
// ============================================================================

function weightSchema(name: SignalName) {
  return z
    .number({
      required_error: `Weight ${name} is required`,
      invalid_type_error: `Weight ${name} must be a number`,
    })
    .finite(`Weight ${name} must be finite`)
    .nonnegative(`Weight ${name} must be >= 0`);
}

const WeightsSchema = z
  .object({
    UIS: weightSchema('UIS'),
    RIS: weightSchema('RIS'),
    BSS: weightSchema('BSS'),
    TSD: weightSchema('TSD'),
  })
  .strict();

const ClassThresholdsSchema = z
  .object({
    high: z.number().finite().min(0).max(100),
    medium: z.number().finite().min(0).max(100),
  })
  .refine((t) => t.medium < t.high, {
    message: 'classThresholds.medium must be below classThresholds.high',
    path: ['medium'],
  });

const SizeSchema = z.number().int('Must be an integer').nonnegative('Must be >= 0');

function toConfigError(error: z.ZodError, prefix: string): ConfigError {
  const issue = error.issues[0];
  const path = issue ? [prefix, ...issue.path.map(String)].filter(Boolean).join('.') : prefix;
  return new ConfigError(issue?.message ?? 'Invalid configuration', path);
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validate a weight map.
 *
 * @throws ConfigError if a weight is missing, not a finite non-negative
 * number, an unknown key is present, or the sum is not 1.0 ± 1e-6
 */
export function createIndexWeights(input: unknown): IndexWeights {
  const parsed = WeightsSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigError(parsed.error, 'weights');
  }

  const sum = SIGNAL_NAMES.reduce((acc, name) => acc + parsed.data[name], 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(`Weights must sum to 1.0, got ${sum}`, 'weights');
  }

  return Object.freeze({ ...parsed.data });
}

/**
 * Merge a partial configuration over the defaults and validate it.
 *
 * @throws ConfigError on the first invalid field
 */
export function createConfig(input: FrictionIndexConfigInput = {}): FrictionIndexConfig {
  const weights = createIndexWeights(input.weights ?? DEFAULT_CONFIG.weights);

  const thresholds = ClassThresholdsSchema.safeParse({
    ...DEFAULT_CONFIG.classThresholds,
    ...input.classThresholds,
  });
  if (!thresholds.success) {
    throw toConfigError(thresholds.error, 'classThresholds');
  }

  const topN = SizeSchema.safeParse(input.topN ?? DEFAULT_CONFIG.topN);
  if (!topN.success) {
    throw toConfigError(topN.error, 'topN');
  }

  const topDistricts = SizeSchema.safeParse(input.topDistricts ?? DEFAULT_CONFIG.topDistricts);
  if (!topDistricts.success) {
    throw toConfigError(topDistricts.error, 'topDistricts');
  }

  return Object.freeze({
    weights,
    classThresholds: Object.freeze({ ...thresholds.data }),
    topN: topN.data,
    topDistricts: topDistricts.data,
  });
}

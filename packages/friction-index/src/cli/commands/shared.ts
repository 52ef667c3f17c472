/**
 * Shared pieces of the index commands: input options, the pipeline call, and
 * the flat row projections the output formatters print.
 *
 * TYPE SAFETY: commander option bags are typed per command; no loose casts.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { runFrictionPipeline, type FrictionRunResult } from '../../pipeline/friction-pipeline.js';
import { readObservationTables, type ObservationPaths } from '../lib/ndjson.js';
import { formatters, isOutputFormat, type OutputFormat, type OutputRow, type TableColumn } from '../lib/output.js';
import { exitCodeFor, type GlobalContext } from '../lib/context.js';
import type { FrictionIndexConfigInput } from '../../core/config.js';
import type { DistrictAggregate, HiddenRiskRecord, IndexRecord } from '../../core/types/index.js';

// ============================================================================
// Input Options
// ============================================================================

/**
 * Input file options shared by every index command
 */
export interface InputOptions {
  readonly biometric: string;
  readonly demographic: string;
  readonly enrolment: string;
}

export function addInputOptions(command: Command): Command {
  return command
    .requiredOption('--biometric <file>', 'Biometric update table (NDJSON)')
    .requiredOption('--demographic <file>', 'Demographic update table (NDJSON)')
    .requiredOption('--enrolment <file>', 'Enrolment table (NDJSON)');
}

export function inputPaths(options: InputOptions): ObservationPaths {
  return {
    biometric: options.biometric,
    demographic: options.demographic,
    enrolment: options.enrolment,
  };
}

/**
 * Read the input tables and run the pipeline
 */
export async function runFromInputs(
  options: InputOptions,
  config: FrictionIndexConfigInput
): Promise<FrictionRunResult> {
  const tables = await readObservationTables(inputPaths(options));
  return runFrictionPipeline(tables, config);
}

/**
 * Validate a --format value
 *
 * @throws InvalidArgumentError for an unknown format
 */
export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Invalid format: ${value}. Must be one of: table, json, ndjson, csv`);
  }
  return value;
}

/**
 * Parse a positive integer option
 *
 * @throws InvalidArgumentError if the value is not a positive integer
 */
export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError(`Invalid limit: ${value}. Must be a positive integer`);
  }
  return limit;
}

/**
 * Log a failed command and set the process exit code
 */
export function failCommand(context: GlobalContext, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  context.logger.commandEnd(false, {
    error: message,
    ...(error instanceof Error && 'code' in error ? { code: error.code } : {}),
  });
  process.exitCode = exitCodeFor(error);
}

// ============================================================================
// Row Projections
// ============================================================================

export function recordRow(record: IndexRecord): OutputRow {
  return {
    rank: record.nationalRank,
    state: record.key.state,
    district: record.key.district,
    period: record.key.period,
    afi: record.afi,
    class: record.frictionClass,
    UIS: record.signals.UIS,
    RIS: record.signals.RIS,
    BSS: record.signals.BSS,
    TSD: record.signals.TSD,
    stateRank: record.stateRank,
    percentile: record.nationalPercentile,
    totalUpdates: record.volumes.totalUpdates,
  };
}

export function hiddenRiskRow(record: HiddenRiskRecord): OutputRow {
  return {
    ...recordRow(record),
    medianTotalUpdates: record.thresholds.medianTotalUpdates,
    p75Afi: record.thresholds.p75Afi,
  };
}

export function districtRow(district: DistrictAggregate): OutputRow {
  return {
    state: district.state,
    district: district.district,
    periods: district.count,
    meanAfi: district.afi.mean,
    maxAfi: district.afi.max,
    class: district.frictionClass,
    dominant: district.dominantSignal,
    totalUpdates: district.totalUpdates,
  };
}

const fixed1 = formatters.fixed(1);
const fixed2 = formatters.fixed(2);

export const RECORD_COLUMNS: readonly TableColumn[] = [
  { key: 'rank', header: 'Rank', align: 'right' },
  { key: 'state', header: 'State' },
  { key: 'district', header: 'District' },
  { key: 'period', header: 'Period' },
  { key: 'afi', header: 'AFI', align: 'right', formatter: fixed2 },
  { key: 'class', header: 'Class' },
  { key: 'UIS', header: 'UIS', align: 'right', formatter: fixed1 },
  { key: 'RIS', header: 'RIS', align: 'right', formatter: fixed1 },
  { key: 'BSS', header: 'BSS', align: 'right', formatter: fixed1 },
  { key: 'TSD', header: 'TSD', align: 'right', formatter: fixed1 },
];

export const HIDDEN_RISK_COLUMNS: readonly TableColumn[] = [
  ...RECORD_COLUMNS,
  { key: 'totalUpdates', header: 'Updates', align: 'right', formatter: formatters.number },
];

export const DISTRICT_COLUMNS: readonly TableColumn[] = [
  { key: 'state', header: 'State' },
  { key: 'district', header: 'District' },
  { key: 'periods', header: 'Periods', align: 'right' },
  { key: 'meanAfi', header: 'Mean AFI', align: 'right', formatter: fixed2 },
  { key: 'maxAfi', header: 'Max AFI', align: 'right', formatter: fixed2 },
  { key: 'class', header: 'Class' },
  { key: 'dominant', header: 'Dominant' },
];

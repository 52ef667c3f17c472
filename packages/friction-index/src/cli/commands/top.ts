/**
 * Top Command
 *
 * Prints the highest-friction geography-periods, or with --districts the
 * highest-friction districts by mean AFI.
 *
 * Usage:
 *   friction-index top --biometric <file> --demographic <file> --enrolment <file>
 *     [--limit <n>] [--districts] [--format table|json|ndjson|csv]
 */

import type { Command } from 'commander';
import { rankDistricts, topN } from '../../ranking/ranker.js';
import { formatOutput, printOutput, type OutputFormat } from '../lib/output.js';
import { getGlobalContext, type GlobalContext } from '../lib/context.js';
import {
  addInputOptions,
  DISTRICT_COLUMNS,
  districtRow,
  failCommand,
  parseFormat,
  parseLimit,
  RECORD_COLUMNS,
  recordRow,
  runFromInputs,
  type InputOptions,
} from './shared.js';

interface TopOptions extends InputOptions {
  readonly limit?: number;
  readonly districts?: boolean;
  readonly format: OutputFormat;
}

export function registerTopCommand(program: Command): void {
  addInputOptions(program.command('top').description('Show the highest-friction records'))
    .option('-n, --limit <n>', 'Number of rows (default: topN from config)', parseLimit)
    .option('--districts', 'Rank districts by mean AFI instead of single periods')
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormat, 'table')
    .action(async (options: TopOptions) => {
      const context = getGlobalContext();
      try {
        printOutput(await executeTop(options, context));
        context.logger.commandEnd(true);
      } catch (error) {
        failCommand(context, error);
      }
    });
}

/**
 * Render the top view in the requested format
 */
export async function executeTop(options: TopOptions, context: GlobalContext): Promise<string> {
  context.logger.commandStart('top', { limit: options.limit, districts: options.districts ?? false });

  const result = await runFromInputs(options, context.config.index);

  if (options.districts) {
    const districts = rankDistricts(result.districts, options.limit ?? result.config.topDistricts);
    return formatOutput(districts.map(districtRow), options.format, DISTRICT_COLUMNS);
  }

  const records = topN(result.indexRecords, options.limit ?? result.config.topN);
  return formatOutput(records.map(recordRow), options.format, RECORD_COLUMNS);
}

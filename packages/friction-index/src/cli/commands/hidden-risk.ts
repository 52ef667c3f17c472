/**
 * Hidden Risk Command
 *
 * Prints low-volume, high-friction geography-periods together with the
 * thresholds they were flagged against.
 *
 * Usage:
 *   friction-index hidden-risk --biometric <file> --demographic <file> --enrolment <file>
 *     [--format table|json|ndjson|csv]
 */

import type { Command } from 'commander';
import { formatJson, formatOutput, printOutput, type OutputFormat } from '../lib/output.js';
import { getGlobalContext, type GlobalContext } from '../lib/context.js';
import {
  addInputOptions,
  failCommand,
  HIDDEN_RISK_COLUMNS,
  hiddenRiskRow,
  parseFormat,
  runFromInputs,
  type InputOptions,
} from './shared.js';

interface HiddenRiskOptions extends InputOptions {
  readonly format: OutputFormat;
}

export function registerHiddenRiskCommand(program: Command): void {
  addInputOptions(
    program.command('hidden-risk').description('Show low-volume, high-friction records')
  )
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormat, 'table')
    .action(async (options: HiddenRiskOptions) => {
      const context = getGlobalContext();
      try {
        printOutput(await executeHiddenRisk(options, context));
        context.logger.commandEnd(true);
      } catch (error) {
        failCommand(context, error);
      }
    });
}

export async function executeHiddenRisk(
  options: HiddenRiskOptions,
  context: GlobalContext
): Promise<string> {
  context.logger.commandStart('hidden-risk');

  const { hiddenRisk } = await runFromInputs(options, context.config.index);

  if (options.format === 'json') {
    return formatJson({ thresholds: hiddenRisk.thresholds, records: hiddenRisk.records.map(hiddenRiskRow) });
  }

  const body = formatOutput(hiddenRisk.records.map(hiddenRiskRow), options.format, HIDDEN_RISK_COLUMNS);
  if (options.format !== 'table') {
    return body;
  }

  const { thresholds } = hiddenRisk;
  const heading = thresholds
    ? `Thresholds: totalUpdates < ${thresholds.medianTotalUpdates} and AFI > ${thresholds.p75Afi.toFixed(2)} (n=${thresholds.population})`
    : 'Thresholds: not computed (fewer than 2 records)';
  return `${heading}\n\n${body}`;
}

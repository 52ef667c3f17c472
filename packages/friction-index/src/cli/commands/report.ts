/**
 * Report Command
 *
 * Prints the plain-text summary report of a run.
 *
 * Usage:
 *   friction-index report --biometric <file> --demographic <file> --enrolment <file>
 */

import type { Command } from 'commander';
import { generateSummaryReport } from '../../analysis/summary-report.js';
import { printOutput } from '../lib/output.js';
import { getGlobalContext, type GlobalContext } from '../lib/context.js';
import { addInputOptions, failCommand, runFromInputs, type InputOptions } from './shared.js';

export function registerReportCommand(program: Command): void {
  addInputOptions(program.command('report').description('Print the summary report'))
    .action(async (options: InputOptions) => {
      const context = getGlobalContext();
      try {
        printOutput(await executeReport(options, context));
        context.logger.commandEnd(true);
      } catch (error) {
        failCommand(context, error);
      }
    });
}

export async function executeReport(options: InputOptions, context: GlobalContext): Promise<string> {
  context.logger.commandStart('report');
  const result = await runFromInputs(options, context.config.index);
  return generateSummaryReport(result.indexRecords, result.states);
}

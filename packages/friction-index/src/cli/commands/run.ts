/**
 * Run Command
 *
 * Runs the full pipeline over three NDJSON input tables and writes every
 * result table to an output directory.
 *
 * Usage:
 *   friction-index run --biometric <file> --demographic <file> --enrolment <file> [--out <dir>]
 *
 * Files written (each atomically):
 *   index-records.ndjson, districts.ndjson, states.ndjson, months.ndjson,
 *   hidden-risk.ndjson, top-records.ndjson, top-districts.ndjson,
 *   component-analysis.json, run-summary.json, summary-report.txt
 */

import type { Command } from 'commander';
import { join } from 'node:path';
import { atomicWriteFile, atomicWriteJSON } from '../../core/utils/atomic-write.js';
import { generateSummaryReport } from '../../analysis/summary-report.js';
import { writeNdjson } from '../lib/ndjson.js';
import { resolveOutputDir } from '../lib/config.js';
import { formatJson, formatTable, printOutput } from '../lib/output.js';
import { getGlobalContext, type GlobalContext } from '../lib/context.js';
import type { FrictionRunResult } from '../../pipeline/friction-pipeline.js';
import { addInputOptions, failCommand, runFromInputs, type InputOptions } from './shared.js';

interface RunOptions extends InputOptions {
  readonly out?: string;
}

/**
 * What a run left on disk
 */
export interface RunArtifacts {
  readonly outDir: string;
  readonly files: readonly string[];
  readonly result: FrictionRunResult;
}

export function registerRunCommand(program: Command): void {
  addInputOptions(
    program.command('run').description('Compute the friction index and write all result tables')
  )
    .option('-o, --out <dir>', 'Output directory (default: paths.output from config)')
    .action(async (options: RunOptions) => {
      const context = getGlobalContext();
      try {
        const artifacts = await executeRun(options, context);
        printOutput(
          context.config.json
            ? formatJson({ outDir: artifacts.outDir, files: artifacts.files })
            : formatTable(
                artifacts.files.map((file) => ({ file })),
                [{ key: 'file', header: 'Written' }]
              )
        );
        context.logger.commandEnd(true, {
          records: artifacts.result.indexRecords.length,
          diagnostics: artifacts.result.diagnostics.length,
        });
      } catch (error) {
        failCommand(context, error);
      }
    });
}

/**
 * Run the pipeline and write its result tables
 */
export async function executeRun(options: RunOptions, context: GlobalContext): Promise<RunArtifacts> {
  context.logger.commandStart('run', { ...options });

  const result = await runFromInputs(options, context.config.index);
  const outDir = options.out ?? resolveOutputDir(context.config);

  const ndjsonTables: ReadonlyArray<readonly [string, readonly unknown[]]> = [
    ['index-records', result.indexRecords],
    ['districts', result.districts],
    ['states', result.states],
    ['months', result.months],
    ['hidden-risk', result.hiddenRisk.records],
    ['top-records', result.topRecords],
    ['top-districts', result.topDistricts],
  ];

  const files: string[] = [];
  for (const [name, rows] of ndjsonTables) {
    const filepath = join(outDir, `${name}.ndjson`);
    await writeNdjson(filepath, name, rows);
    files.push(filepath);
  }

  const componentPath = join(outDir, 'component-analysis.json');
  await atomicWriteJSON(componentPath, result.componentAnalysis);
  files.push(componentPath);

  const summaryPath = join(outDir, 'run-summary.json');
  await atomicWriteJSON(summaryPath, {
    config: result.config,
    counts: {
      records: result.indexRecords.length,
      districts: result.districts.length,
      states: result.states.length,
      months: result.months.length,
      hiddenRisk: result.hiddenRisk.records.length,
    },
    hiddenRiskThresholds: result.hiddenRisk.thresholds,
    ranges: result.ranges,
    diagnostics: result.diagnostics,
  });
  files.push(summaryPath);

  const reportPath = join(outDir, 'summary-report.txt');
  await atomicWriteFile(reportPath, generateSummaryReport(result.indexRecords, result.states) + '\n');
  files.push(reportPath);

  return { outDir, files, result };
}

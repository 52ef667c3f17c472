/**
 * Diagnostic collection for a single run
 *
 * Stages report sparse-data fallbacks here. The collector keeps them in
 * order for the run result and mirrors each one to the logger at warn level.
 */

import type { Diagnostic, DiagnosticSink, PipelineStage } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';

export class DiagnosticCollector implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly log: Logger = createLogger({ module: 'diagnostics' })) {}

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.log.warn(diagnostic.message, {
      code: diagnostic.code,
      stage: diagnostic.stage,
      ...diagnostic.details,
    });
  }

  /**
   * Snapshot of everything reported so far
   */
  list(): readonly Diagnostic[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Report a degenerate-input condition, if a sink is attached
 */
export function reportDegenerate(
  sink: DiagnosticSink | undefined,
  stage: PipelineStage,
  message: string,
  details?: Readonly<Record<string, unknown>>
): void {
  sink?.report({ code: 'DEGENERATE_INPUT', stage, message, details });
}

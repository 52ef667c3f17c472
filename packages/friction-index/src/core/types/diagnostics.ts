/**
 * Diagnostic Types
 *
 * Non-fatal conditions noticed during a run. Sparse data is absorbed with a
 * fixed fallback value and reported here instead of aborting.
 */

/**
 * Pipeline stages that can emit diagnostics
 */
export type PipelineStage =
  | 'validation'
  | 'signals'
  | 'normalization'
  | 'composition'
  | 'aggregation'
  | 'risk'
  | 'ranking'
  | 'analysis';

/**
 * Zero-row input, or a normalization range of zero
 */
export interface DegenerateInputWarning {
  readonly code: 'DEGENERATE_INPUT';
  readonly stage: PipelineStage;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Fewer than 2 records reached the risk detector
 */
export interface EmptyResultWarning {
  readonly code: 'EMPTY_RESULT';
  readonly stage: PipelineStage;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export type Diagnostic = DegenerateInputWarning | EmptyResultWarning;

/**
 * Receives diagnostics from the stages of a run
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

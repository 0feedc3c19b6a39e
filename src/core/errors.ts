export type SummarizeErrorKind =
  | 'InvalidURL'
  | 'VideoUnavailable'
  | 'TranscriptionFailed'
  | 'EmptyTranscript'
  | 'SummarizationFailed'
  | 'MalformedSummaryResponse'
  | 'Cancelled';

/**
 * The single error type a summarize request rejects with. `kind` is stable and
 * meant for callers to map onto user-facing messages; the provider error that
 * triggered it, if any, is kept as `cause`.
 */
export class SummarizeError extends Error {
  readonly kind: SummarizeErrorKind;

  constructor(kind: SummarizeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SummarizeError';
    this.kind = kind;
  }
}

export function isSummarizeError(error: unknown, kind?: SummarizeErrorKind): error is SummarizeError {
  return error instanceof SummarizeError && (kind === undefined || error.kind === kind);
}

/**
 * Passes a SummarizeError through untouched and wraps anything else as `kind`.
 */
export function toSummarizeError(error: unknown, kind: SummarizeErrorKind, message: string): SummarizeError {
  if (error instanceof SummarizeError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new SummarizeError(kind, `${message}: ${detail}`, { cause: error });
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SummarizeError('Cancelled', 'Request was cancelled', { cause: signal.reason });
  }
}

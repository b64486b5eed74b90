export const EXTRACTION_FAILURE_KINDS = ['corrupted', 'timeout', 'other'] as const;
export type ExtractionFailureKind = (typeof EXTRACTION_FAILURE_KINDS)[number];

/** Engine-level failure, classified so callers can decide whether to retry */
export class ExtractionError extends Error {
  constructor(
    public readonly kind: ExtractionFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  static corrupted(message: string, cause?: unknown): ExtractionError {
    return new ExtractionError('corrupted', message, { cause });
  }

  static timeout(message: string, cause?: unknown): ExtractionError {
    return new ExtractionError('timeout', message, { cause });
  }

  static other(message: string, cause?: unknown): ExtractionError {
    return new ExtractionError('other', message, { cause });
  }
}

/** Map any thrown value to a failure kind */
export function classifyFailure(error: unknown): ExtractionFailureKind {
  if (error instanceof ExtractionError) return error.kind;
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') return 'timeout';
    const message = error.message.toLowerCase();
    if (message.includes('corrupt')) return 'corrupted';
    if (message.includes('timeout') || message.includes('timed out')) return 'timeout';
  }
  return 'other';
}

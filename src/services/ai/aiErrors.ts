export type AnalyzerErrorKind = 'rate_limit' | 'timeout' | 'transport' | 'parse' | 'not_configured';

export class AnalyzerError extends Error {
  kind: AnalyzerErrorKind;
  cause?: unknown;

  constructor(kind: AnalyzerErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'AnalyzerError';
    this.kind = kind;
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map whatever the SDK threw onto the analyzer's error kinds.
 */
export function classifyAIError(error: unknown): AnalyzerError {
  if (error instanceof AnalyzerError) {
    return error;
  }

  const message = errorMessage(error);

  if (
    message.includes('429') ||
    message.includes('Quota exceeded') ||
    message.includes('RATE_LIMIT_EXCEEDED') ||
    message.includes('RESOURCE_EXHAUSTED')
  ) {
    return new AnalyzerError('rate_limit', message, error);
  }

  if (
    (error instanceof Error && error.name === 'AbortError') ||
    /timed? ?out/i.test(message)
  ) {
    return new AnalyzerError('timeout', message, error);
  }

  return new AnalyzerError('transport', message, error);
}

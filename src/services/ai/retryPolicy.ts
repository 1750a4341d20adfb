import { logger } from '../../utils/logger';
import { AnalyzerError, classifyAIError } from './aiErrors';

export type BackoffFn = (attempt: number) => number;
export type RetryablePredicate = (error: AnalyzerError) => boolean;
export type SleepFn = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoff: BackoffFn;
  isRetryable: RetryablePredicate;
  sleep?: SleepFn;
}

export const delay: SleepFn = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** Delay grows by `baseDelayMs` per attempt: base, 2×base, 3×base... */
export function linearBackoff(baseDelayMs: number): BackoffFn {
  return (attempt: number) => baseDelayMs * (attempt + 1);
}

export const retryOnTransientErrors: RetryablePredicate = error => error.kind !== 'not_configured';

export class RetryPolicy {
  readonly maxAttempts: number;
  private backoff: BackoffFn;
  private isRetryable: RetryablePredicate;
  private sleep: SleepFn;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.backoff = options.backoff;
    this.isRetryable = options.isRetryable;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Run `operation` until it succeeds, a non-retryable error occurs, or attempts run out.
   * The last error is rethrown as an AnalyzerError.
   */
  async execute<T>(label: string, operation: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: AnalyzerError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = classifyAIError(error);
        logger.warn(`${label} attempt ${attempt + 1}/${this.maxAttempts} failed (${lastError.kind}): ${lastError.message}`);

        if (!this.isRetryable(lastError) || attempt === this.maxAttempts - 1) {
          break;
        }

        const wait = this.backoff(attempt);
        logger.info(`Retrying ${label} in ${wait}ms...`);
        await this.sleep(wait);
      }
    }

    throw lastError ?? new AnalyzerError('transport', `${label} failed without an error`);
  }
}

import { describe, expect, it, vi } from 'vitest';
import { AnalyzerError, classifyAIError } from './aiErrors';
import { RetryPolicy, linearBackoff, retryOnTransientErrors } from './retryPolicy';

function policy(sleep = vi.fn(async (_ms: number) => {})) {
  return {
    sleep,
    retry: new RetryPolicy({
      maxAttempts: 3,
      backoff: linearBackoff(2000),
      isRetryable: retryOnTransientErrors,
      sleep,
    }),
  };
}

describe('classifyAIError', () => {
  it('maps quota errors to rate_limit', () => {
    expect(classifyAIError(new Error('[429 Too Many Requests] Quota exceeded')).kind).toBe('rate_limit');
    expect(classifyAIError(new Error('RESOURCE_EXHAUSTED')).kind).toBe('rate_limit');
  });

  it('maps aborts and timeouts to timeout', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(classifyAIError(abort).kind).toBe('timeout');
    expect(classifyAIError(new Error('request timed out')).kind).toBe('timeout');
  });

  it('treats everything else as transport and passes AnalyzerErrors through', () => {
    expect(classifyAIError('socket hang up').kind).toBe('transport');
    const parseError = new AnalyzerError('parse', 'bad output');
    expect(classifyAIError(parseError)).toBe(parseError);
  });
});

describe('RetryPolicy', () => {
  it('returns the first successful result without sleeping', async () => {
    const { retry, sleep } = policy();
    await expect(retry.execute('op', async () => 'ok')).resolves.toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits base × (attempt + 1) between attempts', async () => {
    const { retry, sleep } = policy();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error('503 Service Unavailable');
      return 'recovered';
    });

    await expect(retry.execute('op', operation)).resolves.toBe('recovered');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('rethrows the last classified error once attempts run out', async () => {
    const { retry, sleep } = policy();
    const operation = vi.fn(async () => {
      throw new Error('429 rate limited');
    });

    await expect(retry.execute('op', operation)).rejects.toMatchObject({ kind: 'rate_limit' });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry a missing configuration', async () => {
    const { retry, sleep } = policy();
    const operation = vi.fn(async () => {
      throw new AnalyzerError('not_configured', 'AI service not configured');
    });

    await expect(retry.execute('op', operation)).rejects.toMatchObject({ kind: 'not_configured' });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

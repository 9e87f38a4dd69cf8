export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
  factor: 2,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the given retry (1-based), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, retry - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run an operation, retrying only the failures shouldRetry accepts.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleep = sleep,
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
      attempt++;
    }
  }
}

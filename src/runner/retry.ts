export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_WRITE_RETRY: RetryPolicy = { attempts: 4, delayMs: 1000 };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  policy: RetryPolicy;
  /** Runs after a failed attempt, only when another attempt follows. */
  recover?: (error: unknown, attempt: number) => Promise<void>;
  sleep?: Sleep;
}

/**
 * Run `operation` up to `policy.attempts` times with a fixed delay, running
 * the recovery step between attempts. The last error is rethrown.
 */
export async function retryWithRecovery<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, recover } = options;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;

      if (recover) {
        await recover(error, attempt);
      }
      if (policy.delayMs > 0) {
        await wait(policy.delayMs);
      }
    }
  }

  throw lastError;
}

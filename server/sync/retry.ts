import { TransientRemoteError } from "../../platform/errors";

export type RetryPolicy = Readonly<{
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  /** Override for tests (avoids real delays). */
  sleepFn?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: TransientRemoteError) => void;
}>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Runs `fn`, retrying only transient remote failures with exponential backoff.
 * Any other error, or the last transient one, propagates.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy = DEFAULT_RETRY_POLICY): Promise<T> {
  const sleepFn = policy.sleepFn ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientRemoteError) || attempt >= maxAttempts) throw err;
      const delayMs = backoffDelayMs(policy, attempt);
      policy.onRetry?.(attempt, delayMs, err);
      await sleepFn(delayMs);
    }
  }
}

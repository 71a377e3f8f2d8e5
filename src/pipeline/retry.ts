/**
 * Exponential backoff for transcription attempts
 */

export interface RetryPolicy {
  /** Total transcription attempts per file, first one included */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds */
  baseDelayMs: number;
  /** Upper bound for a single delay in milliseconds */
  maxDelayMs: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: true,
};

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  let delay = Math.min(policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)), policy.maxDelayMs);

  if (policy.jitter) {
    // "Equal jitter": between 50% and 100% of the computed delay.
    delay = delay * (0.5 + random() * 0.5);
  }

  return delay;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

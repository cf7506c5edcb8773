/**
 * Retry policy for provider calls
 *
 * Attempts run one after another; after each failed attempt except the last
 * the policy waits `backoffMs(attempt)` through its `sleep` function. Both are
 * injectable, so tests can drive the loop without real delays. An AbortSignal
 * stops further attempts and cuts a pending wait short.
 */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay after the given 1-based failed attempt */
  backoffMs: (attempt: number) => number;
  sleep: Sleep;
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number }
  | { success: false; error: Error; attempts: number; cancelled: boolean };

export interface RetryOptions {
  signal?: AbortSignal;
  /** Called after every failed attempt, before any wait */
  onAttemptFailed?: (info: { attempt: number; error: Error; willRetry: boolean; delayMs?: number }) => void;
}

/**
 * Exponential backoff: `baseMs * 2^(attempt - 1)`, so 1s, 2s, 4s, ... by default
 */
export function exponentialBackoff(baseMs: number = 1000): (attempt: number) => number {
  return (attempt: number) => baseMs * Math.pow(2, attempt - 1);
}

/**
 * Timer-based sleep that resolves early when the signal aborts
 */
export const defaultSleep: Sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: exponentialBackoff(1000),
  sleep: defaultSleep,
};

/**
 * Build a policy from partial overrides
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got: ${policy.maxAttempts}`);
  }
  return policy;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const cancelledError = (): Error => new Error("Operation cancelled");

/**
 * Run `fn` under `policy`, returning a result instead of throwing
 *
 * @example
 * ```typescript
 * const result = await executeWithRetry((attempt) => provider.complete(request), policy, { signal });
 * if (!result.success) {
 *   log.error("Gave up", { attempts: result.attempts, error: result.error.message });
 * }
 * ```
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const { signal, onAttemptFailed } = options;
  let lastError: Error | null = null;
  let attempts = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { success: false, error: lastError ?? cancelledError(), attempts, cancelled: true };
    }

    attempts = attempt;
    try {
      const data = await fn(attempt);
      return { success: true, data, attempts };
    } catch (error) {
      lastError = toError(error);
    }

    const willRetry = attempt < policy.maxAttempts && !signal?.aborted;
    const delayMs = willRetry ? policy.backoffMs(attempt) : undefined;
    onAttemptFailed?.({ attempt, error: lastError, willRetry, delayMs });

    if (delayMs !== undefined) {
      await policy.sleep(delayMs, signal);
    }
  }

  return {
    success: false,
    error: lastError ?? cancelledError(),
    attempts,
    cancelled: signal?.aborted ?? false,
  };
}

import { ProviderError, describeError } from "../errors";

export interface RetryPolicy {
  max_attempts: number;
  base_delay_ms: number;
  multiplier: number;
  max_delay_ms: number;
  jitter: number; // 0..1, fraction of the delay randomized either way
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 3,
  base_delay_ms: 1000,
  multiplier: 2,
  max_delay_ms: 10_000,
  jitter: 0.2,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  error: ProviderError;
}

export interface RetryHooks {
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

function abortedError(): ProviderError {
  return new ProviderError({ code: "aborted", message: "Provider call aborted", retryable: false });
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Delay before the attempt following `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const raw = policy.base_delay_ms * Math.pow(policy.multiplier, attempt - 1);
  const capped = Math.min(raw, policy.max_delay_ms);
  const jitter = Math.min(Math.max(policy.jitter, 0), 1);
  return Math.max(0, Math.round(capped * (1 + jitter * (random() * 2 - 1))));
}

export function toProviderError(e: unknown): ProviderError {
  if (e instanceof ProviderError) return e;
  return new ProviderError({ code: "unknown", message: describeError(e), retryable: false, cause: e });
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable ProviderError, or
 * `policy.max_attempts` is used up. The error that ends the loop carries the attempt count.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.max_attempts));
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (hooks.signal?.aborted) throw abortedError().withAttempts(attempt - 1);
    try {
      return { value: await operation(attempt), attempts: attempt };
    } catch (e) {
      const err = toProviderError(e);
      if (!err.retryable || attempt >= maxAttempts) throw err.withAttempts(attempt);
      const delayMs = backoffDelay(attempt, policy, hooks.random);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      try {
        await wait(delayMs, hooks.signal);
      } catch (sleepErr) {
        throw toProviderError(sleepErr).withAttempts(attempt);
      }
    }
  }
}

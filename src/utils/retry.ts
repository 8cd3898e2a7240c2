import { CancelledError } from "../errors.js";

export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 = no jitter, 1 = delay drawn anywhere in [0, delay] */
  jitter?: number;
};

export type RetryOptions = BackoffPolicy & {
  maxAttempts: number;
  /** Budget for the whole sequence; no sleep or attempt is started that would end past it. */
  deadlineMs?: number;
  signal?: AbortSignal;
  /** Decide whether an error is transient. Non-retryable errors are rethrown as-is. */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** Map the final transient error to what the caller sees. Defaults to rethrowing it. */
  onExhausted?: (lastError: unknown, attempts: number) => unknown;
  random?: () => number;
  now?: () => number;
};

/**
 * Delay before the retry that follows `attempt` (1-based).
 * Exponential from `baseDelayMs`, capped at `maxDelayMs`, with up to
 * `jitter * delay` subtracted.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
  const exp = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exp, policy.maxDelayMs);
  const jitter = policy.jitter ?? 0;
  return Math.floor(capped * (1 - jitter * random()));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const now = opts.now ?? Date.now;
  const start = now();
  const shouldRetry = opts.shouldRetry ?? (() => true);

  let lastError: unknown;
  let attempt = 0;
  while (attempt < opts.maxAttempts) {
    if (attempt > 0 && opts.deadlineMs !== undefined && now() - start >= opts.deadlineMs) break;
    attempt++;
    if (opts.signal?.aborted) throw new CancelledError();
    try {
      return await fn(attempt);
    } catch (err) {
      if (!shouldRetry(err)) throw err;
      lastError = err;
      if (attempt === opts.maxAttempts) break;

      const delay = backoffDelay(attempt, opts, opts.random);
      if (opts.deadlineMs !== undefined && now() - start + delay >= opts.deadlineMs) break;

      opts.onRetry?.(attempt, err, delay);
      await sleep(delay, opts.signal);
    }
  }
  throw opts.onExhausted ? opts.onExhausted(lastError, attempt) : lastError;
}

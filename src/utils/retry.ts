import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Non-blocking wait that rejects as soon as the signal aborts. */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export function backoffDelay(
  attempt: number,
  { baseDelayMs, backoffFactor = 2, maxDelayMs }: Pick<
    RetryOptions,
    "baseDelayMs" | "backoffFactor" | "maxDelayMs"
  >
): number {
  const raw = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
  return maxDelayMs === undefined ? raw : Math.min(raw, maxDelayMs);
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or the attempt cap
 * is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!options.isRetryable(error) || attempt === options.maxAttempts) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(attempt, error, delayMs);
      await wait(delayMs, options.signal);
    }
  }

  throw lastError;
}

export type PollResult<T> =
  | { done: true; value: T }
  | { done: false; retryAfterMs?: number };

/**
 * Handed to every check: waits taken through `sleep` count against the poll
 * budget, and `signal` aborts once the wall-clock deadline passes.
 */
export interface PollScope {
  sleep: Sleep;
  signal: AbortSignal;
}

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  /** Upper bound on the total wait, both slept and wall-clock. */
  maxWaitMs: number;
  /** Wait before the first check, e.g. a server-provided hint. */
  initialDelayMs?: number;
  /** Clamp for server-provided retryAfterMs hints. */
  minIntervalMs?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  now?: () => number;
  onTimeout: (attempts: number, waitedMs: number) => Error;
}

class WaitBudgetExhausted extends Error {}

class DeadlinePassed extends Error {}

/** Settles with `promise`, or rejects with the abort reason once `signal` fires. */
export async function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  signal.throwIfAborted();
  let onAbort = () => {};
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Bounded polling loop. `check` is called at most `maxAttempts` times. Every
 * wait, the loop's own and those a check takes through its scope, is charged
 * to `maxWaitMs`, and the whole loop is cut off once `maxWaitMs` of wall-clock
 * time has passed even if a check never settles. Running out of any budget
 * throws the error built by `onTimeout`.
 */
export async function pollUntil<T>(
  check: (attempt: number, scope: PollScope) => Promise<PollResult<T>>,
  options: PollOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const clamp = (ms: number) =>
    Math.min(Math.max(ms, options.minIntervalMs ?? 0), options.maxWaitMs);

  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(new DeadlinePassed()), options.maxWaitMs);
  const forwardAbort = () => deadline.abort(options.signal?.reason);
  if (options.signal?.aborted) forwardAbort();
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  const startedAt = now();
  let waitedMs = 0;
  let attempts = 0;

  const charged: Sleep = async (ms, signal = deadline.signal) => {
    if (waitedMs + ms > options.maxWaitMs) throw new WaitBudgetExhausted();
    await untilAborted(wait(ms, signal), deadline.signal);
    waitedMs += ms;
  };
  const scope: PollScope = { sleep: charged, signal: deadline.signal };

  try {
    if (options.initialDelayMs) await charged(clamp(options.initialDelayMs));

    while (attempts < options.maxAttempts) {
      attempts++;
      const result = await untilAborted(check(attempts, scope), deadline.signal);
      if (result.done) return result.value;

      if (attempts === options.maxAttempts) break;
      await charged(clamp(result.retryAfterMs ?? options.intervalMs));
    }
  } catch (error) {
    if (error instanceof WaitBudgetExhausted) throw options.onTimeout(attempts, waitedMs);
    if (deadline.signal.reason instanceof DeadlinePassed) {
      throw options.onTimeout(attempts, Math.max(waitedMs, now() - startedAt));
    }
    throw error;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", forwardAbort);
  }

  throw options.onTimeout(attempts, waitedMs);
}

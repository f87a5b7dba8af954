// src/retry.ts

/**
 * Returns the delay, in milliseconds, to wait before the given attempt.
 */
export type Backoff = (attempt: number) => number;

/**
 * Decides whether an attempt may run. Attempt numbering starts at 0.
 * Strategies may wait before answering; they must stop waiting once the
 * signal aborts.
 */
export type RetryStrategy = (attempt: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Longest delay a timer accepts; Node fires larger ones after 1ms.
 */
export const MAX_DELAY_MS = 2 ** 31 - 1;

/**
 * Resolves after `ms` milliseconds, or as soon as the signal aborts. Delays
 * above MAX_DELAY_MS are clamped to it.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.min(ms, MAX_DELAY_MS));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** `baseMs * 2^attempt` */
export function binaryExponential(baseMs: number): Backoff {
  return (attempt) => baseMs * 2 ** attempt;
}

/** `baseMs * attempt` */
export function linear(baseMs: number): Backoff {
  return (attempt) => baseMs * attempt;
}

export function constant(ms: number): Backoff {
  return () => ms;
}

/**
 * Waits according to the backoff algorithm before every attempt but the first.
 */
export function backoff(algorithm: Backoff): RetryStrategy {
  return async (attempt, signal) => {
    if (attempt > 0) {
      await sleep(algorithm(attempt), signal);
    }
    return true;
  };
}

/**
 * Allows at most `attempts` attempts.
 */
export function limit(attempts: number): RetryStrategy {
  return async (attempt) => attempt < attempts;
}

/**
 * Runs the strategies in order; the attempt may proceed only if all agree.
 */
export async function shouldAttempt(
  attempt: number,
  strategies: readonly RetryStrategy[],
  signal?: AbortSignal,
): Promise<boolean> {
  for (const strategy of strategies) {
    if (!(await strategy(attempt, signal))) {
      return false;
    }
  }
  return true;
}

/**
 * Bounded polling and retry primitives. Every wait in the orchestrator goes
 * through these so that no loop can block without a limit.
 */

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => global.setTimeout(resolve, ms));

export interface PollOptions {
  /** Maximum number of checks, including the first one */
  maxAttempts?: number;
  /** Stop once this much time has passed since the first check */
  timeoutMs?: number;
  /** Fixed delay between two checks */
  intervalMs: number;
  sleep?: Sleep;
  now?: Clock;
  onRetry?: (attempt: number, error?: unknown) => void;
}

export interface PollResult {
  ok: boolean;
  attempts: number;
  elapsedMs: number;
  lastError?: unknown;
}

/**
 * Run `check` until it returns true or a bound is reached. A check that
 * throws counts as a negative answer.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  options: PollOptions
): Promise<PollResult> {
  const { maxAttempts, timeoutMs, intervalMs } = options;
  if (maxAttempts === undefined && timeoutMs === undefined) {
    throw new Error('pollUntil requires maxAttempts or timeoutMs');
  }

  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let attempts = 0;
  let lastError: unknown;

  for (;;) {
    attempts++;
    let ready = false;
    try {
      ready = await check();
      lastError = undefined;
    } catch (error) {
      lastError = error;
    }

    const elapsedMs = now() - startedAt;
    if (ready) {
      return { ok: true, attempts, elapsedMs };
    }

    const attemptsExhausted =
      maxAttempts !== undefined && attempts >= maxAttempts;
    const timedOut = timeoutMs !== undefined && elapsedMs >= timeoutMs;
    if (attemptsExhausted || timedOut) {
      return { ok: false, attempts, elapsedMs, lastError };
    }

    options.onRetry?.(attempts, lastError);
    await wait(intervalMs);
  }
}

export interface RetryOptions {
  attempts: number;
  intervalMs: number;
  sleep?: Sleep;
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Run `action` up to `attempts` times with a fixed delay, rethrowing the last
 * error when every attempt failed.
 */
export async function retry<T>(
  action: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await action();
    } catch (error) {
      lastError = error;
      if (attempt < options.attempts) {
        options.onRetry?.(attempt, error);
        await wait(options.intervalMs);
      }
    }
  }

  throw lastError;
}

import { setTimeout as sleep } from "node:timers/promises";

export type RetryOptions = {
  attempts: number;
  /** Delay before retry `n` is `delayMs * n`. */
  delayMs: number;
  /** Errors for which this returns false end the loop immediately. */
  retriable?: (err: unknown) => boolean;
  onError?: (err: unknown, attempt: number) => void;
};

export type RetryResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function withRetry<T>(run: () => Promise<T>, options: RetryOptions): Promise<RetryResult<T>> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return { ok: true, value: await run() };
    } catch (err) {
      lastError = err;
      options.onError?.(err, attempt);
      if (options.retriable && !options.retriable(err)) break;
      if (attempt < attempts && options.delayMs > 0) {
        await sleep(options.delayMs * attempt);
      }
    }
  }
  return { ok: false, error: lastError };
}

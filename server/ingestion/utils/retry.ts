import { TransientSourceError } from "../../_core/errors";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Aborting stops the retry loop and rejects with the signal's reason */
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  /** Tag used in retry log lines */
  label?: string;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Retry with exponential backoff and jitter. Only TransientSourceError is
 * retried by default; anything else is rethrown on the first attempt.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const baseDelayMs = opts.baseDelayMs ?? 500;
  const maxDelayMs = opts.maxDelayMs ?? 8000;
  const isRetryable = opts.isRetryable ?? ((e: unknown) => e instanceof TransientSourceError);
  const label = opts.label ?? "retry";

  let attempt = 0;
  let lastErr: unknown;

  while (attempt < maxAttempts) {
    attempt++;
    if (opts.signal?.aborted) throw opts.signal.reason;
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || attempt >= maxAttempts) break;

      const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
      const jitter = baseDelayMs > 0 ? Math.floor(Math.random() * Math.min(250, baseDelayMs)) : 0;
      const delay = exp + jitter;
      console.warn(`[${label}] Attempt ${attempt}/${maxAttempts} failed: ${e instanceof Error ? e.message : String(e)}. Waiting ${delay}ms...`);
      await sleep(delay, opts.signal);
    }
  }

  throw lastErr;
}

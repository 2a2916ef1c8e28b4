// src/utils/backoff.ts

export interface BackoffOptions {
  baseMs: number;
  capMs: number;
  /** Relative jitter, 0.2 means ±20% */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 1000,
  capMs: 30_000,
  jitter: 0.2
};

/**
 * Exponential delay for the given zero-based attempt: base * 2^attempt,
 * capped, then spread by the jitter factor.
 */
export function computeBackoff(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt);
  const baseDelay = Math.min(options.capMs, options.baseMs * Math.pow(2, exponent));
  const spread = 1 + (random() * 2 - 1) * options.jitter;
  return Math.max(0, Math.round(baseDelay * spread));
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Aborted');
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && (error.name === 'AbortError' || error.message === 'Aborted');
}

import type { RetryBackoff } from './types';

const clamp = (value: number, min: number, max: number): number => {
  if (Number.isNaN(value)) {
    return min;
  }

  return Math.min(Math.max(value, min), max);
};

/**
 * Delay before retry number `retry` (1-based): `baseMs * multiplier^(retry-1)`,
 * jittered by `jitterRatio` and kept within `[baseMs, maxMs]`. A server-sent
 * `retryAfterMs` lengthens the delay but never past `maxMs`.
 */
export const computeRetryDelay = (
  retry: number,
  backoff: RetryBackoff,
  options: { random?: () => number; retryAfterMs?: number | null } = {},
): number => {
  const normalizedRetry = Math.max(1, Math.floor(retry));
  const { baseMs, multiplier, maxMs, jitterRatio } = backoff;

  const rawDelay = baseMs * multiplier ** (normalizedRetry - 1);
  let delay = clamp(rawDelay, baseMs, maxMs);

  if (jitterRatio > 0) {
    const random = options.random ?? Math.random;
    const jitter = (random() * 2 - 1) * delay * jitterRatio;
    delay = clamp(delay + jitter, baseMs, maxMs);
  }

  if (options.retryAfterMs !== undefined && options.retryAfterMs !== null) {
    delay = clamp(Math.max(delay, options.retryAfterMs), baseMs, maxMs);
  }

  return Math.round(delay);
};

export const sleepWithSignal = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

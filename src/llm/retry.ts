import * as log from '../utils/logger.js';

// ── Rate-limit backoff ───────────────────────────────────────
// Shared by the hosted providers. Anything other than a rate limit is
// rethrown on the first attempt.

export const MAX_ATTEMPTS = 3;
const BASE_WAIT_MS = 5000;

export class RateLimitedError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${provider} API rate limited`);
    this.name = 'RateLimitedError';
  }
}

export interface RetryOptions {
  attempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffMs(attempt: number, retryAfterMs?: number): number {
  return retryAfterMs ?? (attempt + 1) * BASE_WAIT_MS;
}

export async function withRateLimitRetry<T>(
  call: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = options.attempts ?? MAX_ATTEMPTS;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof RateLimitedError) || attempt >= attempts - 1) throw err;

      const waitMs = backoffMs(attempt, err.retryAfterMs);
      log.warn(`${err.provider} rate limited, retrying in ${String(Math.round(waitMs / 1000))}s`);
      await sleep(waitMs);
    }
  }
}

/**
 * Retry wrapper for Google API calls. Exponential backoff with jitter.
 */

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const MAX_DELAY_MS = 15000;

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

/**
 * HTTP status carried by a googleapis (gaxios) error, if any.
 */
export function errorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'number') return err.code;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null) {
    const response = err.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

export function isRetryable(err: unknown): boolean {
  const status = errorStatus(err);
  if (status !== undefined) {
    if (status === 429 || status >= 500) return true;
    if (status >= 400) return false;
  }
  if (err instanceof Error) {
    return /network|timeout|socket hang up|ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|rate.?limit/i.test(err.message);
  }
  return false;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  return Math.floor(ms * (0.5 + Math.random() * 0.5));
}

/**
 * Run a promise-returning function with retries on rate limiting, server
 * errors and dropped connections. Client errors are rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isRetryable(err)) throw err;
      const backoff = Math.min(baseDelayMs * Math.pow(2, attempt), MAX_DELAY_MS);
      attempt += 1;
      await delay(jitter(backoff));
    }
  }
}

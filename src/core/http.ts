/**
 * Explicit retry policy. The core never retries on its own: callers that want
 * retries pass a policy down to the authenticator, resolver or listing client.
 */
export interface RetryOptions {
  retries?: number;
  delayMs?: number;
}

export const NO_RETRY: Readonly<Required<RetryOptions>> = {
  retries: 0,
  delayMs: 0,
};

export const DEFAULT_TIMEOUT_MS = 20_000;

export interface RequestOptions {
  retry?: RetryOptions;
  timeoutMs?: number;
}

export async function retryOperation<T>(
  operation: () => Promise<T>,
  options: RetryOptions = NO_RETRY,
): Promise<T> {
  const retries = Math.max(0, options.retries ?? 0);
  const delayMs = options.delayMs ?? 300;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt >= retries) {
        break;
      }
      // Linear backoff.
      await sleep(delayMs * (attempt + 1));
    }
  }
  throw lastError;
}

/**
 * `fetch` with a per-attempt timeout. Only thrown failures (network errors,
 * timeouts) are retried; a non-2xx response is returned to the caller.
 */
export async function fetchWithRetry(
  input: string | URL,
  init: RequestInit | undefined = undefined,
  options: RequestOptions = {},
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return retryOperation(async () => {
    return fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  }, options.retry ?? NO_RETRY);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxAttempts: number;            // including the first try
  baseDelayMs: number;
  maxDelayMs: number;
}

export const CLEANUP_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
  onRetry?: (attempt: number, error: Error, delayMs: number) => void,
): Promise<T> {
  let lastError: Error = new Error('No attempts made');

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const isLastAttempt = attempt === options.maxAttempts - 1;
      if (isLastAttempt) throw lastError;

      // Exponential backoff: baseDelay * 2^attempt, capped
      const delayMs = Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
      onRetry?.(attempt + 1, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}

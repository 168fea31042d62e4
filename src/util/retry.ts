export interface NetworkPolicy {
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
}

export const DEFAULT_NETWORK_POLICY: NetworkPolicy = {
  timeoutMs: 60_000,
  maxRetries: 1,
  backoffMs: 500,
};

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: {
    maxRetries: number;
    backoffMs: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  },
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxRetries + 1);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts || (options.shouldRetry && !options.shouldRetry(error))) {
        break;
      }
      const waitMs = options.backoffMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, waitMs);
      await new Promise((resolve) => {
        setTimeout(resolve, waitMs);
      });
    }
  }

  throw lastError;
}

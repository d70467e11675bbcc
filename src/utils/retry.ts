/**
 * Retry with exponential backoff for calls to model backends
 */
import { RateLimitError } from '../core/errors/WorkflowErrors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Limit for one attempt, applied by the caller through withTimeout() */
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 120000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Executes a function with exponential backoff retry logic.
 *
 * Only errors accepted by `shouldRetry` are retried. The last error is
 * rethrown as is, so callers can still tell error classes apart.
 * Attempts are not timed here; wrap the work that should be timed in withTimeout().
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (error: unknown) => boolean = isRetryableError,
  onLog?: (log: RetryLog) => void
): Promise<T> {
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn();
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!willRetry) {
        throw error;
      }

      await sleep(delay);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }
}

/**
 * Reject with TimeoutError when `fn` has not settled after `timeoutMs`
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Structured retry log line for stderr
 */
export function createErrorLog(log: RetryLog, backend: string) {
  return {
    timestamp: log.timestamp.toISOString(),
    attempt: log.attempt,
    backend,
    error: log.error,
    next_retry_in_ms: log.nextRetryInMs,
    severity: log.attempt >= 3 ? 'HIGH' : 'MEDIUM',
  };
}

/**
 * Check if an error is worth retrying: backend rate limits, timeouts,
 * connection failures and 5xx responses.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = error instanceof Error && 'status' in error ? error.status : undefined;
  if (typeof status === 'number' && status >= 500) {
    return true;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}

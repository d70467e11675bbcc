import { GenerationParams, GeneratorResponse, mergeGenerationParams } from '../../core/entities/Generation.js';
import { Message } from '../../core/entities/Message.js';
import { IGenerator } from '../../core/interfaces/IGenerator.js';
import { createLogger } from '../../utils/logger.js';
import { RetryConfig, createErrorLog, isRetryableError, withRetry, withTimeout } from '../../utils/retry.js';
import { RateLimiter } from '../queue/RateLimiter.js';

const logger = createLogger('Generator');

export interface GeneratorOptions {
  /** Defaults merged under every call's params */
  params?: GenerationParams;
  /** Shared admission control; each attempt acquires a slot */
  rateLimiter?: RateLimiter | null;
  /** `null` disables retries */
  retry?: RetryConfig | null;
}

/**
 * Base class for completion backends. Subclasses implement one raw call;
 * this class layers default params, admission control and retries on top.
 */
export abstract class BaseGenerator implements IGenerator {
  readonly params: GenerationParams;
  readonly rateLimiter: RateLimiter | null;
  readonly retry: RetryConfig | null;

  constructor(options: GeneratorOptions = {}) {
    this.params = options.params ?? {};
    this.rateLimiter = options.rateLimiter ?? null;
    this.retry = options.retry ?? null;
  }

  /**
   * Identifier used in logs
   */
  abstract get backendName(): string;

  protected abstract doComplete(
    messages: readonly Message[],
    params: GenerationParams
  ): Promise<GeneratorResponse>;

  /**
   * Return a copy of this generator with different options
   */
  protected abstract copy(options: GeneratorOptions): BaseGenerator;

  async complete(messages: readonly Message[], params?: GenerationParams): Promise<GeneratorResponse> {
    const merged = mergeGenerationParams(this.params, params);
    const retry = this.retry;
    if (!retry) {
      return this.admit(() => this.doComplete(messages, merged));
    }

    // Each attempt is timed from the moment it holds a slot
    const attempt = () => this.admit(() => withTimeout(() => this.doComplete(messages, merged), retry.timeoutMs));

    return withRetry(attempt, retry, (error) => this.shouldRetry(error), (log) => {
      if (!log.success) {
        logger.warn(JSON.stringify(createErrorLog(log, this.backendName)));
      }
    });
  }

  async batchComplete(
    conversations: ReadonlyArray<readonly Message[]>,
    params?: GenerationParams
  ): Promise<GeneratorResponse[]> {
    return Promise.all(conversations.map((messages) => this.complete(messages, params)));
  }

  withParams(params: GenerationParams): BaseGenerator {
    return this.copy({
      params: mergeGenerationParams(this.params, params),
      rateLimiter: this.rateLimiter,
      retry: this.retry,
    });
  }

  withRateLimiter(rateLimiter: RateLimiter | null): BaseGenerator {
    return this.copy({ params: this.params, rateLimiter, retry: this.retry });
  }

  withRetries(retry: RetryConfig | null): BaseGenerator {
    return this.copy({ params: this.params, rateLimiter: this.rateLimiter, retry });
  }

  protected shouldRetry(error: unknown): boolean {
    return isRetryableError(error);
  }

  private admit<T>(fn: () => Promise<T>): Promise<T> {
    return this.rateLimiter ? this.rateLimiter.throttle(fn) : fn();
  }
}

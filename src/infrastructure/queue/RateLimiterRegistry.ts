import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import { DEFAULT_BURST_SIZE, DEFAULT_RPM, RateLimiter, RateLimiterOptions } from './RateLimiter.js';

const logger = createLogger('RateLimiterRegistry');

export const RateLimiterStrategySchema = z.object({
  limiterId: z.string().min(1, 'Limiter id must not be empty').default('global'),
  rpm: z.number().positive('rpm must be positive').default(DEFAULT_RPM),
  burstSize: z.number().int().min(1, 'Burst size must be at least 1').default(DEFAULT_BURST_SIZE),
});

/** Strategy as callers write it; every field has a default */
export type RateLimiterStrategy = z.input<typeof RateLimiterStrategySchema>;

export type LimiterDefaults = Omit<RateLimiterOptions, 'rpm' | 'burstSize'>;

/**
 * Named rate limiters shared by everything that talks to the same backend.
 *
 * Owned by the host application and handed to whatever builds generators.
 * The first reference to an id creates its limiter; later references get
 * the same instance, whatever settings they pass.
 */
export class RateLimiterRegistry {
  private limiters = new Map<string, RateLimiter>();

  constructor(private readonly defaults: LimiterDefaults = {}) {}

  getOrCreate(strategy: RateLimiterStrategy | string = {}): RateLimiter {
    const { limiterId, rpm, burstSize } = RateLimiterStrategySchema.parse(
      typeof strategy === 'string' ? { limiterId: strategy } : strategy
    );

    // Lookup and insert run without an await in between, so no other task can interleave
    const existing = this.limiters.get(limiterId);
    if (existing) {
      if (existing.rpm !== rpm || existing.burstSize !== burstSize) {
        logger.debug(
          `Limiter "${limiterId}" already exists (rpm=${existing.rpm}, burst=${existing.burstSize}); ignoring rpm=${rpm}, burst=${burstSize}`
        );
      }
      return existing;
    }

    const limiter = new RateLimiter({ ...this.defaults, rpm, burstSize });
    this.limiters.set(limiterId, limiter);
    logger.debug(`Created limiter "${limiterId}" (rpm=${rpm}, burst=${burstSize})`);
    return limiter;
  }

  get(limiterId: string): RateLimiter | null {
    return this.limiters.get(limiterId) ?? null;
  }

  has(limiterId: string): boolean {
    return this.limiters.has(limiterId);
  }

  ids(): string[] {
    return Array.from(this.limiters.keys());
  }

  clear(): void {
    this.limiters.clear();
  }
}

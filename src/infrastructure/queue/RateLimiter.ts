import { RateLimitError } from '../../core/errors/WorkflowErrors.js';
import { createLogger } from '../../utils/logger.js';
import { AdmissionQueue } from './AdmissionQueue.js';

const logger = createLogger('RateLimiter');

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RateLimiterOptions {
  /** Requests per minute; consecutive admissions are spaced by 60000 / rpm ms */
  rpm?: number;
  /** Maximum number of requests in flight */
  burstSize?: number;
  /** Error class that triggers a cooldown. `null` disables cooldowns. */
  rateLimitError?: ErrorClass | null;
  cooldownBaseMs?: number;
  maxCooldownMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  rpm: number;
  burstSize: number;
  inUse: number;
  waiting: number;
  cooldownCount: number;
  cooldownUntil: number | null;
}

export const DEFAULT_RPM = 500;
export const DEFAULT_BURST_SIZE = 10;
export const DEFAULT_COOLDOWN_BASE_MS = 1000;
export const DEFAULT_MAX_COOLDOWN_MS = 60000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Admission control for model calls.
 *
 * At most `burstSize` requests run at once, and request starts are spaced by
 * at least `60000 / rpm` ms. After a rate-limit error the next admission also
 * waits out an exponentially growing cooldown.
 */
export class RateLimiter {
  readonly rpm: number;
  readonly burstSize: number;

  private readonly slots: AdmissionQueue;
  private readonly lock = new AdmissionQueue(1);
  private readonly intervalMs: number;
  private readonly rateLimitError: ErrorClass | null;
  private readonly cooldownBaseMs: number;
  private readonly maxCooldownMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private nextRequestTime: number;
  private cooldownCount = 0;
  private cooldownUntil: number | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.rpm = options.rpm ?? DEFAULT_RPM;
    this.burstSize = options.burstSize ?? DEFAULT_BURST_SIZE;
    if (!(this.rpm > 0)) {
      throw new RangeError(`rpm must be positive, got ${this.rpm}`);
    }

    this.slots = new AdmissionQueue(this.burstSize);
    this.intervalMs = 60000 / this.rpm;
    this.rateLimitError = options.rateLimitError === undefined ? RateLimitError : options.rateLimitError;
    this.cooldownBaseMs = options.cooldownBaseMs ?? DEFAULT_COOLDOWN_BASE_MS;
    this.maxCooldownMs = options.maxCooldownMs ?? DEFAULT_MAX_COOLDOWN_MS;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? sleep;
    this.nextRequestTime = this.now();
  }

  /**
   * Suspend until a slot is free and the timing gate opens
   */
  async acquire(): Promise<void> {
    await this.slots.acquire();

    // Read, wait and advance the watermark as one critical section
    await this.lock.use(async () => {
      if (this.cooldownUntil !== null) {
        const cooldownWait = this.cooldownUntil - this.now();
        if (cooldownWait > 0) {
          logger.debug(`Cooling down for ${Math.round(cooldownWait)}ms`);
          await this.sleep(cooldownWait);
        }
      }

      const now = this.now();
      if (this.nextRequestTime > now) {
        await this.sleep(this.nextRequestTime - now);
      }
      this.nextRequestTime = Math.max(now, this.nextRequestTime) + this.intervalMs;
    });
  }

  release(): void {
    this.slots.release();
  }

  /**
   * Run `fn` between acquire() and release(). The slot is released on every
   * exit path; errors from `fn` are rethrown after the cooldown bookkeeping.
   */
  async throttle<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      const result = await fn();
      this.resetCooldown();
      return result;
    } catch (error) {
      if (this.isRateLimitError(error)) {
        this.startCooldown();
      } else {
        this.resetCooldown();
      }
      throw error;
    } finally {
      this.release();
    }
  }

  getStats(): RateLimiterStats {
    return {
      rpm: this.rpm,
      burstSize: this.burstSize,
      inUse: this.slots.inUse,
      waiting: this.slots.waiting,
      cooldownCount: this.cooldownCount,
      cooldownUntil: this.cooldownUntil,
    };
  }

  private isRateLimitError(error: unknown): boolean {
    return this.rateLimitError !== null && error instanceof this.rateLimitError;
  }

  private startCooldown(): void {
    const window = Math.min(this.cooldownBaseMs * 2 ** this.cooldownCount, this.maxCooldownMs);
    this.cooldownUntil = this.now() + window;
    this.cooldownCount++;
    logger.info(`Rate limited, next request not before ${window}ms from now (cooldown #${this.cooldownCount})`);
  }

  private resetCooldown(): void {
    this.cooldownCount = 0;
    this.cooldownUntil = null;
  }
}

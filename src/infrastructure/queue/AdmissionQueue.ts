/**
 * FIFO admission queue with a fixed number of slots (a counting semaphore).
 * Waiters are admitted strictly in arrival order.
 */
export class AdmissionQueue {
  private pending: Array<() => void> = [];
  private running = 0;
  private readonly maxConcurrent: number;

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`AdmissionQueue needs at least one slot, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Take a slot, suspending until one is free
   */
  acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.pending.push(resolve);
      this.processQueue();
    });
  }

  /**
   * Give a slot back and admit the next waiter, if any
   */
  release(): void {
    if (this.running === 0) {
      throw new Error('AdmissionQueue.release() called without a matching acquire()');
    }
    this.running--;
    this.processQueue();
  }

  /**
   * Run `fn` while holding a slot
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get inUse(): number {
    return this.running;
  }

  get waiting(): number {
    return this.pending.length;
  }

  get capacity(): number {
    return this.maxConcurrent;
  }

  private processQueue(): void {
    while (this.pending.length > 0 && this.running < this.maxConcurrent) {
      const admit = this.pending.shift();
      if (admit) {
        this.running++;
        admit();
      }
    }
  }
}

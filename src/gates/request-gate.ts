import type { Logger } from 'pino';
import { GateTimeoutError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';

export interface Permit {
  release(): void;
}

export interface GateStats {
  capacity: number;
  active: number;
  waiting: number;
  totalProcessed: number;
  timeouts: number;
}

interface Waiter {
  grant: () => void;
  timer: NodeJS.Timeout | undefined;
}

export class RequestGate {
  private active = 0;
  private totalProcessed = 0;
  private timeouts = 0;
  private readonly waiters: Waiter[] = [];
  private readonly logger: Logger;

  constructor(readonly capacity: number = 3, logger?: Logger) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Gate capacity must be a positive integer, got ${capacity}`);
    }
    this.logger = (logger ?? rootLogger).child({ component: 'request-gate' });
  }

  // FIFO: a free slot goes to the longest waiter before any newcomer
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) return Promise.reject(signal.reason);

    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active++;
      return Promise.resolve(this.createPermit());
    }

    if (timeoutMs <= 0) {
      this.timeouts++;
      return Promise.reject(new GateTimeoutError(0));
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        this.dropWaiter(waiter);
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.createPermit());
        },
        timer: undefined
      };

      waiter.timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        this.dropWaiter(waiter);
        this.timeouts++;
        this.logger.warn({ timeoutMs, waiting: this.waiters.length }, 'Gate acquire timed out');
        reject(new GateTimeoutError(timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async withPermit<T>(timeoutMs: number, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(timeoutMs, signal);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  stats(): GateStats {
    return {
      capacity: this.capacity,
      active: this.active,
      waiting: this.waiters.length,
      totalProcessed: this.totalProcessed,
      timeouts: this.timeouts
    };
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.active--;
        this.totalProcessed++;
        this.dispatch();
      }
    };
  }

  private dispatch(): void {
    while (this.active < this.capacity && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next) break;
      clearTimeout(next.timer);
      this.active++;
      next.grant();
    }
  }

  private dropWaiter(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
  }
}

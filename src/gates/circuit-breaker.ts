import type { Logger } from 'pino';
import { ServiceUnavailableError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';

export type CircuitPhase = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  // A failure further apart than this from the previous one restarts the streak
  failureWindowMs?: number;
  clock?: () => number;
  logger?: Logger;
}

export interface CircuitSnapshot {
  phase: CircuitPhase;
  consecutiveFailures: number;
  openedAt: number | null;
  lastFailureAt: number | null;
  trialInFlight: boolean;
  totalSuccesses: number;
  totalFailures: number;
  totalRejected: number;
  totalIgnored: number;
  retryAfterMs: number;
}

export type GuardResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

// failure: the service is unhealthy. success: it answered, even if the answer
// was unusable. ignore: the caller gave up, which says nothing about the service.
export type GuardVerdict = 'failure' | 'success' | 'ignore';

export interface GuardOptions {
  verdict?: (error: unknown) => GuardVerdict;
}

// Every read-modify-write below is synchronous, so a transition never
// interleaves with another request on the event loop.
export class CircuitBreaker {
  private phase: CircuitPhase = 'closed';
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private lastFailureAt: number | null = null;
  private trialInFlight = false;
  private totalSuccesses = 0;
  private totalFailures = 0;
  private totalRejected = 0;
  private totalIgnored = 0;

  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly failureWindowMs?: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerOptions) {
    this.failureThreshold = Math.max(1, options.failureThreshold);
    this.cooldownMs = options.cooldownMs;
    this.failureWindowMs = options.failureWindowMs;
    this.clock = options.clock ?? Date.now;
    this.logger = (options.logger ?? rootLogger).child({ component: 'circuit-breaker' });
  }

  async guard<T>(operation: () => Promise<T>, options: GuardOptions = {}): Promise<GuardResult<T>> {
    if (!this.admit()) {
      this.totalRejected++;
      return { ok: false, error: new ServiceUnavailableError(this.retryAfterMs()) };
    }

    try {
      const value = await operation();
      this.recordSuccess();
      return { ok: true, value };
    } catch (error) {
      const verdict = options.verdict?.(error) ?? 'failure';
      if (verdict === 'failure') {
        this.recordFailure();
      } else if (verdict === 'success') {
        this.recordSuccess();
      } else {
        this.recordIgnored();
      }
      return { ok: false, error };
    }
  }

  recordSuccess(): void {
    this.totalSuccesses++;
    this.consecutiveFailures = 0;
    if (this.phase === 'half_open') {
      this.trialInFlight = false;
      this.transition('closed');
      this.openedAt = null;
    }
  }

  recordFailure(): void {
    const now = this.clock();
    this.totalFailures++;

    if (this.phase === 'half_open') {
      this.trialInFlight = false;
      this.trip(now);
      this.lastFailureAt = now;
      return;
    }

    if (
      this.failureWindowMs !== undefined &&
      this.lastFailureAt !== null &&
      now - this.lastFailureAt > this.failureWindowMs
    ) {
      this.consecutiveFailures = 0;
    }

    this.consecutiveFailures++;
    this.lastFailureAt = now;

    if (this.phase === 'closed' && this.consecutiveFailures >= this.failureThreshold) {
      this.trip(now);
    }
  }

  // Frees a half-open trial slot without deciding the circuit's fate
  recordIgnored(): void {
    this.totalIgnored++;
    if (this.phase === 'half_open' && this.trialInFlight) {
      this.trialInFlight = false;
      this.logger.debug('Trial call abandoned by caller, circuit stays half-open');
    }
  }

  snapshot(): CircuitSnapshot {
    return {
      phase: this.currentPhase(),
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      lastFailureAt: this.lastFailureAt,
      trialInFlight: this.trialInFlight,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
      totalRejected: this.totalRejected,
      totalIgnored: this.totalIgnored,
      retryAfterMs: this.retryAfterMs()
    };
  }

  reset(): void {
    this.logger.info({ from: this.phase }, 'Circuit manually reset');
    this.phase = 'closed';
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.lastFailureAt = null;
    this.trialInFlight = false;
  }

  // Open becomes half-open lazily, on the first call after the cooldown
  private admit(): boolean {
    if (this.phase === 'open') {
      if (this.retryAfterMs() > 0) return false;
      this.transition('half_open');
    }

    if (this.phase === 'half_open') {
      if (this.trialInFlight) return false;
      this.trialInFlight = true;
      return true;
    }

    return true;
  }

  private currentPhase(): CircuitPhase {
    if (this.phase === 'open' && this.retryAfterMs() === 0) return 'half_open';
    return this.phase;
  }

  private retryAfterMs(): number {
    if (this.phase !== 'open' || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.cooldownMs - this.clock());
  }

  private trip(now: number): void {
    this.openedAt = now;
    this.transition('open');
  }

  private transition(next: CircuitPhase): void {
    if (next === this.phase) return;
    const from = this.phase;
    this.phase = next;
    const fields = { from, to: next, consecutiveFailures: this.consecutiveFailures };
    if (next === 'open') {
      this.logger.warn(fields, 'Circuit opened');
    } else {
      this.logger.info(fields, 'Circuit transition');
    }
  }
}

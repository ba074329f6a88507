import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { BrainMode, BrainOutcome, CategorizationResult } from '../types/index.js';
import type { CircuitBreaker, CircuitPhase, RequestGate } from '../gates/index.js';
import type { CacheLayer, CacheStats } from '../cache/index.js';

const CIRCUIT_STATE: Record<CircuitPhase, number> = { closed: 0, half_open: 1, open: 2 };

export interface MetricSources {
  breaker: CircuitBreaker;
  gate: RequestGate;
  cache: CacheLayer;
}

// One registry per runtime, so tests and several runtimes never share series
export class BrainMetrics {
  readonly registry = new Registry();

  private readonly requests = new Counter({
    name: 'brain_requests_total',
    help: 'Brain client requests by mode and answer source',
    labelNames: ['mode', 'source'] as const,
    registers: [this.registry]
  });

  private readonly duration = new Histogram({
    name: 'brain_request_duration_seconds',
    help: 'Brain client request time',
    labelNames: ['mode', 'source'] as const,
    buckets: [0.05, 0.1, 0.5, 1, 2.5, 5, 10, 25],
    registers: [this.registry]
  });

  private readonly degraded = new Counter({
    name: 'brain_degraded_total',
    help: 'Requests answered from a fallback, by reason',
    labelNames: ['mode', 'reason'] as const,
    registers: [this.registry]
  });

  private readonly confidence = new Histogram({
    name: 'brain_confidence_score',
    help: 'Confidence of answers returned',
    labelNames: ['mode'] as const,
    buckets: [0.5, 0.6, 0.7, 0.8, 0.85, 0.9, 0.95, 0.99, 1],
    registers: [this.registry]
  });

  private readonly issues = new Counter({
    name: 'brain_validation_issues_total',
    help: 'Problems found in remote answers, by kind',
    labelNames: ['kind'] as const,
    registers: [this.registry]
  });

  private readonly categorizations = new Counter({
    name: 'brain_categorizations_total',
    help: 'Transaction categorizations by source',
    labelNames: ['source'] as const,
    registers: [this.registry]
  });

  constructor(sources: MetricSources) {
    const { breaker, gate, cache } = sources;

    new Gauge({
      name: 'brain_circuit_state',
      help: 'Circuit breaker state (0 closed, 1 half-open, 2 open)',
      registers: [this.registry],
      collect() {
        this.set(CIRCUIT_STATE[breaker.snapshot().phase]);
      }
    });

    new Gauge({
      name: 'brain_gate_active',
      help: 'Remote calls holding a gate slot',
      registers: [this.registry],
      collect() {
        this.set(gate.stats().active);
      }
    });

    new Gauge({
      name: 'brain_gate_waiting',
      help: 'Requests queued for a gate slot',
      registers: [this.registry],
      collect() {
        this.set(gate.stats().waiting);
      }
    });

    new Gauge({
      name: 'brain_cache_operations',
      help: 'Cache operations since start, by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
      collect() {
        const stats: CacheStats = cache.stats();
        for (const [result, count] of Object.entries(stats)) {
          this.set({ result }, count);
        }
      }
    });
  }

  recordOutcome(mode: BrainMode, outcome: BrainOutcome): void {
    const source = outcome.result.source;
    this.requests.inc({ mode, source });
    this.duration.observe({ mode, source }, outcome.processingTimeMs / 1000);
    this.confidence.observe({ mode }, outcome.result.confidence.score);
    if (outcome.degraded) {
      this.degraded.inc({ mode, reason: outcome.reason ?? 'remote_error' });
    }
    for (const issue of outcome.issues ?? []) {
      this.issues.inc({ kind: issue.kind });
    }
  }

  recordCategorization(result: CategorizationResult): void {
    this.categorizations.inc({ source: result.source });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}

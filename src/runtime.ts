import type { Logger } from 'pino';
import type { GatewayConfig } from './config/index.js';
import { logger as rootLogger } from './logger.js';
import { CircuitBreaker, RequestGate } from './gates/index.js';
import { CacheLayer, MemoryCacheStore, createRedisStore, type CacheStore } from './cache/index.js';
import { loadTaxonomy, type Taxonomy } from './filters/index.js';
import { loadKeywordClassifier, type FastClassifier } from './classifier/keyword-classifier.js';
import { FeedbackLedger } from './feedback/feedback-ledger.js';
import { BrainClient } from './inference/brain-client.js';
import { HttpBrainTransport, type BrainTransport } from './inference/transport.js';
import type { SleepFn } from './inference/retry.js';
import { Orchestrator } from './orchestrator/orchestrator.js';
import type { ScorerOptions } from './confidence/scorer.js';
import { BrainMetrics } from './metrics/index.js';

export interface RuntimeOverrides {
  transport?: BrainTransport;
  store?: CacheStore;
  classifier?: FastClassifier;
  taxonomy?: Taxonomy;
  ledger?: FeedbackLedger;
  logger?: Logger;
  clock?: () => number;
  sleep?: SleepFn;
  random?: () => number;
}

export interface BrainRuntime {
  config: GatewayConfig;
  logger: Logger;
  taxonomy: Taxonomy;
  classifier: FastClassifier;
  breaker: CircuitBreaker;
  gate: RequestGate;
  cache: CacheLayer;
  ledger: FeedbackLedger;
  brain: BrainClient;
  orchestrator: Orchestrator;
  metrics: BrainMetrics;
  close(): Promise<void>;
}

export function scorerOptions(config: GatewayConfig): ScorerOptions {
  return {
    thresholds: { high: config.confidence.high, medium: config.confidence.medium },
    probabilitySaturation: config.confidence.probability_saturation
  };
}

// Breaker and gate are shared by every request that goes through this runtime
export function createBrainRuntime(config: GatewayConfig, overrides: RuntimeOverrides = {}): BrainRuntime {
  const logger = overrides.logger ?? rootLogger;
  const taxonomy = overrides.taxonomy ?? loadTaxonomy(config.data.taxonomy_path);
  const classifier = overrides.classifier ?? loadKeywordClassifier(config.data.keywords_path);

  const breaker = new CircuitBreaker({
    failureThreshold: config.breaker.failure_threshold,
    cooldownMs: config.breaker.cooldown_ms,
    failureWindowMs: config.breaker.failure_window_ms,
    clock: overrides.clock,
    logger
  });

  const gate = new RequestGate(config.gate.capacity, logger);

  const store = overrides.store
    ?? (config.cache.redis_url ? createRedisStore(config.cache.redis_url, logger) : new MemoryCacheStore());
  const cache = new CacheLayer(store, logger);

  const ledger = overrides.ledger ?? new FeedbackLedger({
    consensusThreshold: config.feedback.consensus_threshold,
    maxKeys: config.feedback.max_keys,
    logger
  });

  const transport = overrides.transport ?? new HttpBrainTransport({
    baseUrl: config.remote.base_url,
    queryPath: config.remote.query_path,
    healthPath: config.remote.health_path,
    logger
  });

  const scorer = scorerOptions(config);
  const metrics = new BrainMetrics({ breaker, gate, cache });

  const brain = new BrainClient({
    transport,
    breaker,
    gate,
    cache,
    taxonomy,
    fallbackClassifier: classifier,
    history: ledger,
    settings: {
      retry: {
        maxAttempts: config.retry.max_attempts,
        backoffBaseMs: config.retry.backoff_base_ms,
        backoffMaxMs: config.retry.backoff_max_ms,
        attemptTimeoutsMs: config.retry.attempt_timeouts_ms
      },
      overallTimeoutMs: config.timeouts.overall_ms,
      gateTimeoutMs: config.gate.acquire_timeout_ms,
      cacheTtlMs: config.cache.ttl_ms,
      tolerance: config.validation.tolerance,
      inputGuard: {
        enabled: config.input_guard.enabled,
        suspicionThreshold: config.input_guard.suspicion_threshold
      },
      scorer
    },
    logger,
    sleep: overrides.sleep,
    random: overrides.random,
    metrics
  });

  const orchestrator = new Orchestrator({ classifier, brain, taxonomy, ledger, scorer, logger, metrics });

  return {
    config,
    logger,
    taxonomy,
    classifier,
    breaker,
    gate,
    cache,
    ledger,
    brain,
    orchestrator,
    metrics,
    close: () => cache.close()
  };
}

import type { Logger } from 'pino';
import type {
  BrainMode,
  BrainOutcome,
  BrainResult,
  ClassificationRequest,
  ClassifyOptions,
  ConfidenceResult,
  ConfidenceSignals,
  DegradeReason,
  SourceFacts,
  ValidationIssue,
  ValidationResult
} from '../types/index.js';
import { assertNever } from '../types/index.js';
import {
  DeadlineExceededError,
  GateTimeoutError,
  ServiceUnavailableError,
  ValidationFailureError,
  describeError,
  isRetryable
} from '../errors.js';
import type {
  CircuitBreaker,
  CircuitSnapshot,
  GateStats,
  GuardResult,
  GuardVerdict,
  Permit,
  RequestGate
} from '../gates/index.js';
import { DEFAULT_SUSPICION_THRESHOLD, screenInput } from '../gates/index.js';
import type { CacheLayer, CacheStats } from '../cache/index.js';
import type { FastClassifier } from '../classifier/keyword-classifier.js';
import type { AgreementSource } from '../feedback/feedback-ledger.js';
import { validateResponse, DEFAULT_TOLERANCE, type Taxonomy } from '../filters/index.js';
import { scoreConfidence, type ScorerOptions } from '../confidence/scorer.js';
import { logger as rootLogger } from '../logger.js';
import { Deadline, abortReason, withTimeout } from './deadline.js';
import {
  DEFAULT_RETRY_POLICY,
  attemptTimeout,
  backoffDelay,
  sleep as defaultSleep,
  type RetryPolicy,
  type SleepFn
} from './retry.js';
import type { BrainTransport, RemoteReply } from './transport.js';
import type { BrainMetrics } from '../metrics/index.js';
import { CHAT_FALLBACK_TEXT, analysisFallback, parseFallback } from './fallback.js';

export interface BrainClientSettings {
  retry: RetryPolicy;
  overallTimeoutMs: number;
  gateTimeoutMs: number;
  cacheTtlMs: number;
  tolerance: number;
  inputGuard: { enabled: boolean; suspicionThreshold: number };
  scorer: ScorerOptions;
}

export const DEFAULT_CLIENT_SETTINGS: BrainClientSettings = {
  retry: DEFAULT_RETRY_POLICY,
  overallTimeoutMs: 20_000,
  gateTimeoutMs: 5_000,
  cacheTtlMs: 3_600_000,
  tolerance: DEFAULT_TOLERANCE,
  inputGuard: { enabled: true, suspicionThreshold: DEFAULT_SUSPICION_THRESHOLD },
  scorer: {}
};

export interface BrainClientDeps {
  transport: BrainTransport;
  breaker: CircuitBreaker;
  gate: RequestGate;
  cache: CacheLayer;
  taxonomy: Taxonomy;
  fallbackClassifier: FastClassifier;
  history?: AgreementSource;
  settings?: Partial<BrainClientSettings>;
  logger?: Logger;
  sleep?: SleepFn;
  random?: () => number;
  metrics?: BrainMetrics;
}

export interface BrainClientStats {
  breaker: CircuitSnapshot;
  gate: GateStats;
  cache: CacheStats;
}

// Text answers carry no category, so taxonomy and agreement do not apply
export const TEXT_SIGNALS: ConfidenceSignals = {
  categoryInTaxonomy: null,
  outputWellFormed: true,
  historicalAgreementRate: null
};

// Only the remote's own trouble moves the circuit. A spent budget or a caller
// abort is neither, and a reply that fails validation still means it answered.
function breakerVerdict(error: unknown): GuardVerdict {
  if (error instanceof ValidationFailureError) return 'success';
  if (error instanceof DeadlineExceededError) return 'ignore';
  return 'failure';
}

function budgetError(deadline: Deadline): DeadlineExceededError {
  const reason = deadline.signal.aborted ? abortReason(deadline.signal) : undefined;
  return reason instanceof DeadlineExceededError ? reason : new DeadlineExceededError();
}

interface DegradeDetails {
  issues?: ValidationIssue[];
  unverifiedContent?: string;
}

export class BrainClient {
  private readonly transport: BrainTransport;
  private readonly breaker: CircuitBreaker;
  private readonly gate: RequestGate;
  private readonly cache: CacheLayer;
  private readonly taxonomy: Taxonomy;
  private readonly fallbackClassifier: FastClassifier;
  private readonly history?: AgreementSource;
  private readonly settings: BrainClientSettings;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly metrics?: BrainMetrics;

  constructor(deps: BrainClientDeps) {
    this.transport = deps.transport;
    this.breaker = deps.breaker;
    this.gate = deps.gate;
    this.cache = deps.cache;
    this.taxonomy = deps.taxonomy;
    this.fallbackClassifier = deps.fallbackClassifier;
    this.history = deps.history;
    this.settings = { ...DEFAULT_CLIENT_SETTINGS, ...deps.settings };
    this.logger = (deps.logger ?? rootLogger).child({ component: 'brain-client' });
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.metrics = deps.metrics;
  }

  async classify(request: ClassificationRequest, options: ClassifyOptions = {}): Promise<BrainOutcome> {
    const startedAt = Date.now();
    const deadline = new Deadline(options.deadlineMs ?? this.settings.overallTimeoutMs, options.signal);

    try {
      const outcome = await this.run(request, options, deadline, startedAt);
      this.metrics?.recordOutcome(request.mode, outcome);
      return outcome;
    } finally {
      deadline.dispose();
    }
  }

  chat(message: string, context: SourceFacts = {}, options?: ClassifyOptions): Promise<BrainOutcome> {
    return this.classify(this.request('chat', message, context), options);
  }

  analyze(query: string, context: SourceFacts = {}, options?: ClassifyOptions): Promise<BrainOutcome> {
    return this.classify(this.request('analyze', query, context), options);
  }

  parse(text: string, context: SourceFacts = {}, options?: ClassifyOptions): Promise<BrainOutcome> {
    return this.classify(this.request('parse', text, context), options);
  }

  // Liveness of the remote service; never counted by the breaker
  ping(timeoutMs = 2_000): Promise<boolean> {
    return this.transport.health(AbortSignal.timeout(timeoutMs));
  }

  stats(): BrainClientStats {
    return {
      breaker: this.breaker.snapshot(),
      gate: this.gate.stats(),
      cache: this.cache.stats()
    };
  }

  private request(mode: BrainMode, query: string, context: SourceFacts): ClassificationRequest {
    return { mode, query, context, createdAt: new Date() };
  }

  private async run(
    request: ClassificationRequest,
    options: ClassifyOptions,
    deadline: Deadline,
    startedAt: number
  ): Promise<BrainOutcome> {
    const useCache = options.useCache !== false;
    const log = this.logger.child({ mode: request.mode });

    const guard = this.settings.inputGuard;
    if (guard.enabled) {
      const screening = screenInput(request.query, guard.suspicionThreshold);
      if (screening.blocked) {
        log.warn(
          { code: screening.code, pattern: screening.pattern, suspicion: screening.suspicion },
          'Input rejected before the remote call'
        );
        return this.degrade(request, 'input_rejected', startedAt);
      }
    }

    if (useCache) {
      const cached = await this.cache.get(request.mode, request.query, deadline.signal);
      if (cached) {
        log.debug('Cache hit');
        return { result: cached, degraded: false, fromCache: true, processingTimeMs: Date.now() - startedAt };
      }
    }

    let permit: Permit;
    try {
      permit = await this.gate.acquire(deadline.bound(this.settings.gateTimeoutMs), deadline.signal);
    } catch (error) {
      const reason: DegradeReason = error instanceof GateTimeoutError && !deadline.expired()
        ? 'gate_timeout'
        : 'deadline_exceeded';
      log.warn({ reason, error: describeError(error) }, 'No request slot, answering from fallback');
      return this.degrade(request, reason, startedAt);
    }

    let guarded: GuardResult<RemoteReply>;
    try {
      guarded = await this.breaker.guard(() => this.callWithRetry(request, deadline, log), {
        verdict: breakerVerdict
      });
    } finally {
      permit.release();
    }

    if (!guarded.ok) {
      const reason = this.reasonFor(guarded.error, deadline);
      log.warn({ reason, error: describeError(guarded.error) }, 'Remote call failed, answering from fallback');
      const issues: ValidationIssue[] | undefined = guarded.error instanceof ValidationFailureError
        ? [{ kind: 'malformed_output', detail: guarded.error.message }]
        : undefined;
      return this.degrade(request, reason, startedAt, { issues });
    }

    const reply = guarded.value;
    const raw = request.mode === 'parse' ? reply.parsedData ?? reply.response : reply.response;
    const validation = validateResponse(raw, request.mode, request.context, {
      taxonomy: this.taxonomy,
      tolerance: this.settings.tolerance
    });

    if (!validation.isSafe) {
      log.warn({ issues: validation.issues.map(issue => issue.kind) }, 'Remote response failed validation');
      return this.degrade(request, 'validation_failed', startedAt, {
        issues: validation.issues,
        unverifiedContent: validation.sanitizedContent
      });
    }

    const result = this.remoteResult(request, reply, validation);
    if (useCache) {
      await this.cache.put(request.mode, request.query, result, this.settings.cacheTtlMs, deadline.signal);
    }

    return { result, degraded: false, fromCache: false, processingTimeMs: Date.now() - startedAt };
  }

  private async callWithRetry(request: ClassificationRequest, deadline: Deadline, log: Logger): Promise<RemoteReply> {
    const policy = this.settings.retry;
    const payload = { mode: request.mode, query: request.query, context: request.context };
    let lastError: unknown = new DeadlineExceededError();

    for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
      if (deadline.expired()) break;
      const timeoutMs = deadline.bound(attemptTimeout(policy, attempt));

      try {
        return await withTimeout(timeoutMs, deadline.signal, signal => this.transport.query(payload, signal));
      } catch (error) {
        // An attempt cut short by the request's own budget is not the remote's fault
        if (deadline.expired()) throw budgetError(deadline);
        lastError = error;
        if (!isRetryable(error) || attempt === policy.maxAttempts - 1) throw error;

        const delayMs = deadline.bound(backoffDelay(attempt, policy, this.random));
        log.warn({ attempt: attempt + 1, delayMs, error: describeError(error) }, 'Transient remote failure, retrying');
        await this.sleep(delayMs, deadline.signal);
      }
    }

    throw deadline.expired() ? budgetError(deadline) : lastError;
  }

  private reasonFor(error: unknown, deadline: Deadline): DegradeReason {
    if (error instanceof ServiceUnavailableError) return 'circuit_open';
    if (error instanceof ValidationFailureError) return 'validation_failed';
    if (error instanceof DeadlineExceededError || deadline.expired()) return 'deadline_exceeded';
    return 'remote_error';
  }

  private score(signals: ConfidenceSignals): ConfidenceResult {
    return scoreConfidence(signals, this.settings.scorer);
  }

  private remoteResult(request: ClassificationRequest, reply: RemoteReply, validation: ValidationResult): BrainResult {
    const labels = validation.labels ?? [];
    const category = labels.length > 0 ? labels[0].category : undefined;

    const confidence = request.mode === 'parse'
      ? this.score({
        modelProbability: reply.confidence,
        categoryInTaxonomy: labels.length > 0,
        outputWellFormed: true,
        historicalAgreementRate: category === undefined ? undefined : this.history?.agreementRate(request.query, category)
      })
      : this.score({ ...TEXT_SIGNALS, modelProbability: reply.confidence });

    return {
      mode: request.mode,
      text: validation.sanitizedContent ?? '',
      labels,
      confidence,
      source: 'remote'
    };
  }

  private fallbackResult(request: ClassificationRequest): BrainResult {
    switch (request.mode) {
      case 'parse': {
        const { labels, probability } = parseFallback(request.query, this.fallbackClassifier);
        const category = labels[0].category;
        return {
          mode: request.mode,
          text: JSON.stringify(labels),
          labels,
          confidence: this.score({
            modelProbability: probability,
            categoryInTaxonomy: this.taxonomy.has(category),
            outputWellFormed: true,
            historicalAgreementRate: this.history?.agreementRate(request.query, category)
          }),
          source: 'fallback'
        };
      }
      case 'analyze':
        return {
          mode: request.mode,
          text: analysisFallback(request.context),
          labels: [],
          confidence: this.score(TEXT_SIGNALS),
          source: 'fallback'
        };
      case 'chat':
        return {
          mode: request.mode,
          text: CHAT_FALLBACK_TEXT,
          labels: [],
          confidence: this.score(TEXT_SIGNALS),
          source: 'fallback'
        };
      default:
        return assertNever(request.mode);
    }
  }

  private degrade(
    request: ClassificationRequest,
    reason: DegradeReason,
    startedAt: number,
    details: DegradeDetails = {}
  ): BrainOutcome {
    return {
      result: this.fallbackResult(request),
      degraded: true,
      fromCache: false,
      reason,
      ...(details.issues ? { issues: details.issues } : {}),
      ...(details.unverifiedContent !== undefined ? { unverifiedContent: details.unverifiedContent } : {}),
      processingTimeMs: Date.now() - startedAt
    };
  }
}

import type { Logger } from 'pino';
import type {
  AdviceResult,
  BrainOutcome,
  CategorizationResult,
  ClassifyOptions,
  ConfidenceResult,
  DegradeReason,
  SourceFacts
} from '../types/index.js';
import { TEXT_SIGNALS, type BrainClient } from '../inference/brain-client.js';
import type { FastClassifier, FastPrediction } from '../classifier/keyword-classifier.js';
import type { FeedbackLedger } from '../feedback/feedback-ledger.js';
import type { Taxonomy } from '../filters/index.js';
import { scoreConfidence, disclaimerFor, type ScorerOptions } from '../confidence/scorer.js';
import { CHAT_FALLBACK_TEXT, analysisFallback } from '../inference/fallback.js';
import { describeError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { BrainMetrics } from '../metrics/index.js';

export interface OrchestratorDeps {
  classifier: FastClassifier;
  brain: BrainClient;
  taxonomy: Taxonomy;
  ledger?: FeedbackLedger;
  scorer?: ScorerOptions;
  logger?: Logger;
  metrics?: BrainMetrics;
}

const FAILED_PREDICTION: FastPrediction = { category: 'Other', probability: 0 };

// A merchant users have agreed on counts like a strong merchant-table match
export const CONSENSUS_PROBABILITY = 0.9;

export class Orchestrator {
  private readonly classifier: FastClassifier;
  private readonly brain: BrainClient;
  private readonly taxonomy: Taxonomy;
  private readonly ledger?: FeedbackLedger;
  private readonly scorer: ScorerOptions;
  private readonly logger: Logger;
  private readonly metrics?: BrainMetrics;

  constructor(deps: OrchestratorDeps) {
    this.classifier = deps.classifier;
    this.brain = deps.brain;
    this.taxonomy = deps.taxonomy;
    this.ledger = deps.ledger;
    this.scorer = deps.scorer ?? {};
    this.logger = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.metrics = deps.metrics;
  }

  // Never rejects: remote trouble folds into a degraded, low-confidence answer
  async categorize(
    description: string,
    sourceFacts: SourceFacts = {},
    options: ClassifyOptions = {}
  ): Promise<CategorizationResult> {
    const result = await this.resolveCategory(description, sourceFacts, options);
    this.metrics?.recordCategorization(result);
    return result;
  }

  async advise(query: string, sourceFacts: SourceFacts = {}, options: ClassifyOptions = {}): Promise<AdviceResult> {
    return this.textAnswer('analyze', query, sourceFacts, options);
  }

  async chat(message: string, context: SourceFacts = {}, options: ClassifyOptions = {}): Promise<AdviceResult> {
    return this.textAnswer('chat', message, context, options);
  }

  private async resolveCategory(
    description: string,
    sourceFacts: SourceFacts,
    options: ClassifyOptions
  ): Promise<CategorizationResult> {
    const startedAt = Date.now();
    const consensus = this.consensus(description);
    const fast = consensus === undefined
      ? this.predict(description)
      : { category: consensus, probability: CONSENSUS_PROBABILITY };
    const category = this.taxonomy.normalize(fast.category) ?? fast.category;

    const confidence = scoreConfidence({
      modelProbability: fast.probability,
      categoryInTaxonomy: this.taxonomy.has(category),
      outputWellFormed: category.trim().length > 0,
      historicalAgreementRate: consensus === undefined ? this.ledger?.agreementRate(description, category) : 1
    }, this.scorer);

    if (confidence.decision !== 'reject') {
      this.ledger?.recordObservation(description, category);
      return {
        description,
        category,
        confidence,
        source: 'fast',
        disclaimer: confidence.decision === 'accept_with_disclaimer',
        disclaimerText: disclaimerFor(confidence),
        lowConfidence: false,
        degraded: false,
        processingTimeMs: Date.now() - startedAt
      };
    }

    let outcome: BrainOutcome;
    try {
      outcome = await this.brain.classify(
        { mode: 'parse', query: description, context: sourceFacts, createdAt: new Date() },
        options
      );
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Remote categorization threw');
      return this.degraded(description, category, confidence, 'remote_error', startedAt);
    }

    const [label] = outcome.result.labels;
    if (!outcome.degraded && label) {
      this.ledger?.recordObservation(description, label.category);
      const remoteConfidence = outcome.result.confidence;
      return {
        description,
        category: label.category,
        confidence: remoteConfidence,
        source: 'remote',
        disclaimer: remoteConfidence.decision !== 'accept',
        disclaimerText: disclaimerFor(remoteConfidence),
        lowConfidence: remoteConfidence.tier === 'low',
        degraded: false,
        processingTimeMs: Date.now() - startedAt
      };
    }

    return {
      ...this.degraded(description, category, confidence, outcome.reason ?? 'remote_error', startedAt),
      ...(outcome.issues ? { issues: outcome.issues } : {})
    };
  }

  private async textAnswer(
    mode: 'analyze' | 'chat',
    query: string,
    context: SourceFacts,
    options: ClassifyOptions
  ): Promise<AdviceResult> {
    const startedAt = Date.now();
    try {
      const outcome = mode === 'analyze'
        ? await this.brain.analyze(query, context, options)
        : await this.brain.chat(query, context, options);
      return {
        text: outcome.result.text,
        confidence: outcome.result.confidence,
        disclaimerText: disclaimerFor(outcome.result.confidence),
        degraded: outcome.degraded,
        ...(outcome.reason ? { reason: outcome.reason } : {}),
        ...(outcome.issues ? { issues: outcome.issues } : {}),
        processingTimeMs: outcome.processingTimeMs
      };
    } catch (error) {
      this.logger.error({ mode, error: describeError(error) }, 'Remote answer threw');
      const confidence = scoreConfidence(TEXT_SIGNALS, this.scorer);
      return {
        text: mode === 'analyze' ? analysisFallback(context) : CHAT_FALLBACK_TEXT,
        confidence,
        disclaimerText: disclaimerFor(confidence),
        degraded: true,
        reason: 'remote_error',
        processingTimeMs: Date.now() - startedAt
      };
    }
  }

  // User corrections that reached consensus win over the classifier's guess
  private consensus(description: string): string | undefined {
    const agreed = this.ledger?.consensus(description);
    if (agreed === undefined) return undefined;
    const category = this.taxonomy.normalize(agreed);
    if (category) this.logger.debug({ category }, 'Using feedback consensus');
    return category;
  }

  private predict(description: string): FastPrediction {
    try {
      return this.classifier.classify(description);
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Fast classifier threw');
      return FAILED_PREDICTION;
    }
  }

  private degraded(
    description: string,
    category: string,
    confidence: ConfidenceResult,
    reason: DegradeReason,
    startedAt: number
  ): CategorizationResult {
    return {
      description,
      category,
      confidence,
      source: 'fallback',
      disclaimer: true,
      disclaimerText: disclaimerFor(confidence),
      lowConfidence: true,
      degraded: true,
      reason,
      processingTimeMs: Date.now() - startedAt
    };
  }
}

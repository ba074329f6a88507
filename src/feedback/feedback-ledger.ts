import type { Logger } from 'pino';
import { logger as rootLogger } from '../logger.js';

// Fire-and-forget: implementations must not throw back into the caller
export interface FeedbackHook {
  recordCorrection(originalCategory: string, correctedCategory: string, description: string): void;
}

export interface AgreementSource {
  agreementRate(description: string, category: string): number | undefined;
}

export interface CorrectionRecord {
  key: string;
  description: string;
  originalCategory: string;
  correctedCategory: string;
  recordedAt: Date;
}

export type CorrectionSink = (record: CorrectionRecord) => Promise<void>;

export interface FeedbackLedgerOptions {
  consensusThreshold?: number;
  maxRecords?: number;
  // Merchant keys kept; the least recently recorded one goes first
  maxKeys?: number;
  sink?: CorrectionSink;
  logger?: Logger;
  clock?: () => Date;
}

export interface FeedbackStats {
  totalCorrections: number;
  totalObservations: number;
  uniqueKeys: number;
  consensusKeys: number;
  evictedKeys: number;
}

// Letters only, lowercased, first three words: "WHOLEFDS MKT #10234" -> "wholefds mkt"
export function merchantKey(description: string): string {
  return description
    .replace(/[^a-zA-Z\s]/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 3)
    .join(' ');
}

// Re-inserting moves the key to the back of the map's iteration order
function increment(tallies: Map<string, Map<string, number>>, key: string, category: string): void {
  const counts = tallies.get(key) ?? new Map<string, number>();
  tallies.delete(key);
  tallies.set(key, counts);
  counts.set(category, (counts.get(category) ?? 0) + 1);
}

function total(counts: Map<string, number>): number {
  let sum = 0;
  for (const count of counts.values()) sum += count;
  return sum;
}

export class FeedbackLedger implements FeedbackHook, AgreementSource {
  private readonly history = new Map<string, Map<string, number>>();
  private readonly corrections = new Map<string, Map<string, number>>();
  private readonly records: CorrectionRecord[] = [];
  private totalCorrections = 0;
  private totalObservations = 0;
  private evictedKeys = 0;

  private readonly consensusThreshold: number;
  private readonly maxRecords: number;
  private readonly maxKeys: number;
  private readonly sink?: CorrectionSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: FeedbackLedgerOptions = {}) {
    this.consensusThreshold = options.consensusThreshold ?? 3;
    this.maxRecords = options.maxRecords ?? 1000;
    this.maxKeys = Math.max(1, options.maxKeys ?? 10_000);
    this.sink = options.sink;
    this.logger = (options.logger ?? rootLogger).child({ component: 'feedback' });
    this.clock = options.clock ?? (() => new Date());
  }

  recordCorrection(originalCategory: string, correctedCategory: string, description: string): void {
    const key = merchantKey(description);
    if (!key || !correctedCategory.trim()) {
      this.logger.debug({ description }, 'Ignoring correction without a usable key');
      return;
    }

    increment(this.corrections, key, correctedCategory);
    increment(this.history, key, correctedCategory);
    this.totalCorrections++;
    this.evictStale();

    const record: CorrectionRecord = {
      key,
      description,
      originalCategory,
      correctedCategory,
      recordedAt: this.clock()
    };
    this.records.push(record);
    if (this.records.length > this.maxRecords) this.records.shift();

    const consensus = this.consensus(description);
    this.logger.info({ key, from: originalCategory, to: correctedCategory, consensus }, 'Correction recorded');

    const sink = this.sink;
    if (sink) {
      void Promise.resolve()
        .then(() => sink(record))
        .catch((error: unknown) => {
          this.logger.warn({ error, key }, 'Correction sink failed');
        });
    }
  }

  // A final categorization the system settled on
  recordObservation(description: string, category: string): void {
    const key = merchantKey(description);
    if (!key) return;
    increment(this.history, key, category);
    this.totalObservations++;
    this.evictStale();
  }

  agreementRate(description: string, category: string): number | undefined {
    const counts = this.history.get(merchantKey(description));
    if (!counts) return undefined;
    const sum = total(counts);
    if (sum === 0) return undefined;
    return (counts.get(category) ?? 0) / sum;
  }

  // Needs at least `consensusThreshold` votes and a strict majority
  consensus(description: string): string | undefined {
    const counts = this.corrections.get(merchantKey(description));
    if (!counts) return undefined;

    let top: [string, number] | undefined;
    for (const entry of counts) {
      if (!top || entry[1] > top[1]) top = entry;
    }
    if (!top) return undefined;

    const [category, count] = top;
    return count >= this.consensusThreshold && count > total(counts) / 2 ? category : undefined;
  }

  recentCorrections(limit = 50): CorrectionRecord[] {
    return this.records.slice(-limit).reverse();
  }

  stats(): FeedbackStats {
    let consensusKeys = 0;
    for (const key of this.corrections.keys()) {
      if (this.consensus(key) !== undefined) consensusKeys++;
    }
    return {
      totalCorrections: this.totalCorrections,
      totalObservations: this.totalObservations,
      uniqueKeys: this.history.size,
      consensusKeys,
      evictedKeys: this.evictedKeys
    };
  }

  // Every corrected key is also in history, so history order decides for both
  private evictStale(): void {
    while (this.history.size > this.maxKeys) {
      const oldest = this.history.keys().next();
      if (oldest.done) return;
      this.history.delete(oldest.value);
      this.corrections.delete(oldest.value);
      this.evictedKeys++;
    }
  }
}

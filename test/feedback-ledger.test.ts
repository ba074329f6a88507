import { describe, it, expect, vi } from 'vitest';
import { FeedbackLedger, merchantKey, type CorrectionSink } from '../src/feedback/feedback-ledger.js';

const WHOLE_FOODS = 'WHOLEFDS MKT #10234 AUSTIN TX';

// 0 -> "a", 25 -> "z", 26 -> "ba"
function letters(n: number): string {
  let out = '';
  let rest = n;
  do {
    out = String.fromCharCode(97 + (rest % 26)) + out;
    rest = Math.floor(rest / 26);
  } while (rest > 0);
  return out;
}

describe('merchantKey', () => {
  it('keeps the first three words of letters only', () => {
    expect(merchantKey(WHOLE_FOODS)).toBe('wholefds mkt austin');
    expect(merchantKey('SQ *BLUE BOTTLE')).toBe('sq blue bottle');
    expect(merchantKey('#1234 5678')).toBe('');
  });
});

describe('FeedbackLedger', () => {
  it('reaches consensus after enough matching corrections', () => {
    const ledger = new FeedbackLedger({ consensusThreshold: 3 });

    ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);
    ledger.recordCorrection('Other', 'Groceries', 'WHOLEFDS MKT #555 AUSTIN TX');
    expect(ledger.consensus(WHOLE_FOODS)).toBeUndefined();

    ledger.recordCorrection('Shopping & Retail', 'Groceries', WHOLE_FOODS);
    expect(ledger.consensus(WHOLE_FOODS)).toBe('Groceries');
  });

  it('requires a strict majority', () => {
    const ledger = new FeedbackLedger({ consensusThreshold: 3 });

    for (let i = 0; i < 3; i++) ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);
    for (let i = 0; i < 3; i++) ledger.recordCorrection('Other', 'Shopping & Retail', WHOLE_FOODS);

    expect(ledger.consensus(WHOLE_FOODS)).toBeUndefined();
  });

  it('reports how often a category agrees with history', () => {
    const ledger = new FeedbackLedger();

    for (let i = 0; i < 3; i++) ledger.recordObservation(WHOLE_FOODS, 'Groceries');
    ledger.recordObservation(WHOLE_FOODS, 'Other');

    expect(ledger.agreementRate(WHOLE_FOODS, 'Groceries')).toBe(0.75);
    expect(ledger.agreementRate(WHOLE_FOODS, 'Travel')).toBe(0);
    expect(ledger.agreementRate('NEVER SEEN BEFORE', 'Groceries')).toBeUndefined();
  });

  it('counts corrections as history', () => {
    const ledger = new FeedbackLedger();

    ledger.recordObservation(WHOLE_FOODS, 'Other');
    ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);

    expect(ledger.agreementRate(WHOLE_FOODS, 'Groceries')).toBe(0.5);
  });

  it('hands each correction to the sink without waiting for it', async () => {
    const recordedAt = new Date('2024-03-01T12:00:00Z');
    const sink = vi.fn<CorrectionSink>(async () => undefined);
    const ledger = new FeedbackLedger({ sink, clock: () => recordedAt });

    ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);

    expect(sink).not.toHaveBeenCalled();
    await vi.waitFor(() =>
      expect(sink).toHaveBeenCalledWith({
        key: 'wholefds mkt austin',
        description: WHOLE_FOODS,
        originalCategory: 'Other',
        correctedCategory: 'Groceries',
        recordedAt
      })
    );
  });

  it('keeps recording when the sink fails', async () => {
    const sink = vi.fn<CorrectionSink>(async () => {
      throw new Error('disk full');
    });
    const ledger = new FeedbackLedger({ sink });

    expect(() => ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS)).not.toThrow();
    await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(1));
    expect(ledger.stats().totalCorrections).toBe(1);
  });

  it('ignores corrections without a usable merchant key', () => {
    const ledger = new FeedbackLedger();

    ledger.recordCorrection('Other', 'Groceries', '#1234 5678');

    expect(ledger.stats()).toEqual({
      totalCorrections: 0,
      totalObservations: 0,
      uniqueKeys: 0,
      consensusKeys: 0,
      evictedKeys: 0
    });
  });

  it('lists recent corrections newest first, up to its cap', () => {
    const ledger = new FeedbackLedger({ maxRecords: 2 });

    ledger.recordCorrection('Other', 'Groceries', 'KROGER 123');
    ledger.recordCorrection('Other', 'Travel', 'DELTA AIR 456');
    ledger.recordCorrection('Other', 'Healthcare', 'CVS PHARMACY 789');

    expect(ledger.recentCorrections().map(record => record.correctedCategory)).toEqual(['Healthcare', 'Travel']);
    expect(ledger.recentCorrections(1).map(record => record.key)).toEqual(['cvs pharmacy']);
  });

  it('summarizes what it has seen', () => {
    const ledger = new FeedbackLedger({ consensusThreshold: 2 });

    ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);
    ledger.recordCorrection('Other', 'Groceries', WHOLE_FOODS);
    ledger.recordObservation('DELTA AIR 456', 'Travel');

    expect(ledger.stats()).toEqual({
      totalCorrections: 2,
      totalObservations: 1,
      uniqueKeys: 2,
      consensusKeys: 1,
      evictedKeys: 0
    });
  });

  it('forgets the least recently recorded merchants past its key cap', () => {
    const ledger = new FeedbackLedger({ maxKeys: 2, consensusThreshold: 1 });

    ledger.recordCorrection('Other', 'Groceries', 'KROGER 123');
    ledger.recordObservation('DELTA AIR 456', 'Travel');
    ledger.recordObservation('KROGER 999', 'Groceries');
    ledger.recordObservation('CVS PHARMACY 789', 'Healthcare');

    expect(ledger.agreementRate('DELTA AIR 456', 'Travel')).toBeUndefined();
    expect(ledger.agreementRate('KROGER 123', 'Groceries')).toBe(1);
    expect(ledger.consensus('KROGER 123')).toBe('Groceries');
    expect(ledger.stats()).toMatchObject({ uniqueKeys: 2, evictedKeys: 1 });
  });

  it('stays within its key cap however many merchants it sees', () => {
    const ledger = new FeedbackLedger({ maxKeys: 100 });

    for (let i = 0; i < 2_000; i++) {
      ledger.recordObservation(`MERCHANT ${letters(i)}`, 'Other');
    }

    expect(ledger.stats().uniqueKeys).toBe(100);
  });
});

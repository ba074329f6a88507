import { describe, it, expect } from 'vitest';
import { KeywordClassifier } from '../src/classifier/keyword-classifier.js';
import { keywordClassifier } from './helpers.js';

describe('KeywordClassifier', () => {
  it('matches a single merchant keyword', () => {
    expect(keywordClassifier.classify('STARBUCKS #1234 SEATTLE')).toEqual({
      category: 'Coffee & Beverages',
      probability: 0.8
    });
    expect(keywordClassifier.classify('WHOLEFDS MKT #10234 AUSTIN TX')).toEqual({
      category: 'Groceries',
      probability: 0.8
    });
  });

  it('is more certain with several keywords from one category', () => {
    const prediction = keywordClassifier.classify('BP 76 GAS STATION');

    expect(prediction.category).toBe('Gas & Fuel');
    expect(prediction.probability).toBeCloseTo(0.85);
  });

  it('trusts rule order less when categories compete', () => {
    expect(keywordClassifier.classify('UBER EATS 8005928996')).toEqual({
      category: 'Food Delivery',
      probability: 0.55
    });
  });

  it('requires short keywords to stand alone', () => {
    expect(keywordClassifier.classify('BPM STUDIO')).toEqual({ category: 'Other', probability: 0.1 });
  });

  it('falls back to the default category', () => {
    expect(keywordClassifier.classify('ACME WIDGETS LLC')).toEqual({ category: 'Other', probability: 0.1 });
  });

  it('caps the probability', () => {
    const classifier = new KeywordClassifier(
      [{ category: 'Travel', keywords: ['AIR', 'HOTEL', 'RESORT', 'CRUISE', 'TOUR', 'TRIP'] }],
      'Uncategorized'
    );

    expect(classifier.classify('air hotel resort cruise tour trip').probability).toBe(0.95);
    expect(classifier.classify('lunch')).toEqual({ category: 'Uncategorized', probability: 0.1 });
  });
});

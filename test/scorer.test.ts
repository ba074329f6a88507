import { describe, it, expect } from 'vitest';
import { scoreConfidence, disclaimerFor } from '../src/confidence/scorer.js';

describe('scoreConfidence', () => {
  it('accepts a confident, well-formed, historically stable prediction', () => {
    const result = scoreConfidence({
      modelProbability: 0.95,
      categoryInTaxonomy: true,
      outputWellFormed: true,
      historicalAgreementRate: 1.0
    });

    expect(result.score).toBe(1);
    expect(result.tier).toBe('high');
    expect(result.decision).toBe('accept');
    expect(result.factors).toEqual([
      ['model_probability', 0.4],
      ['category_in_taxonomy', 0.2],
      ['output_well_formed', 0.2],
      ['historical_agreement_rate', 0.2]
    ]);
  });

  it('derates missing signals and records the lost weight', () => {
    const result = scoreConfidence({
      modelProbability: 0.95,
      categoryInTaxonomy: true,
      outputWellFormed: true
    });

    expect(result.score).toBe(0.8);
    expect(result.tier).toBe('medium');
    expect(result.decision).toBe('accept_with_disclaimer');
    expect(result.factors[result.factors.length - 1]).toEqual(['derated:historical_agreement_rate', 0.2]);
  });

  it('rejects when no signal is present', () => {
    const result = scoreConfidence({});

    expect(result.score).toBe(0);
    expect(result.tier).toBe('low');
    expect(result.decision).toBe('reject');
    expect(result.factors.map(([name]) => name)).toEqual([
      'derated:model_probability',
      'derated:category_in_taxonomy',
      'derated:output_well_formed',
      'derated:historical_agreement_rate'
    ]);
  });

  it('spreads the weight of signals that do not apply over the rest', () => {
    const result = scoreConfidence({
      modelProbability: 0.95,
      categoryInTaxonomy: null,
      outputWellFormed: true,
      historicalAgreementRate: null
    });

    expect(result).toEqual({
      score: 1,
      tier: 'high',
      decision: 'accept',
      factors: [
        ['model_probability', 0.6667],
        ['output_well_formed', 0.3333]
      ]
    });
  });

  it('still derates a missing signal next to ones that do not apply', () => {
    const result = scoreConfidence({
      categoryInTaxonomy: null,
      outputWellFormed: true,
      historicalAgreementRate: null
    });

    expect(result).toEqual({
      score: 0.3333,
      tier: 'low',
      decision: 'reject',
      factors: [
        ['output_well_formed', 0.3333],
        ['derated:model_probability', 0.6667]
      ]
    });
  });

  it('treats NaN as a missing signal', () => {
    const result = scoreConfidence({
      modelProbability: Number.NaN,
      categoryInTaxonomy: true,
      outputWellFormed: true,
      historicalAgreementRate: 1
    });

    expect(result.score).toBe(0.6);
    expect(result.tier).toBe('medium');
    expect(result.factors).toContainEqual(['derated:model_probability', 0.4]);
  });

  it('clamps out-of-range inputs into [0, 1]', () => {
    const result = scoreConfidence({
      modelProbability: 7,
      categoryInTaxonomy: true,
      outputWellFormed: true,
      historicalAgreementRate: -3
    });

    expect(result.score).toBe(0.8);
    expect(result.factors).toContainEqual(['historical_agreement_rate', 0]);
  });

  it('never decreases when model probability rises', () => {
    let previous = -1;
    for (let step = 0; step <= 20; step++) {
      const { score } = scoreConfidence({
        modelProbability: step / 20,
        categoryInTaxonomy: false,
        outputWellFormed: true,
        historicalAgreementRate: 0.5
      });
      expect(score).toBeGreaterThanOrEqual(previous);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
      previous = score;
    }
  });

  it('never decreases when a boolean signal flips to true', () => {
    const base = { modelProbability: 0.5, historicalAgreementRate: 0.3 };
    const off = scoreConfidence({ ...base, categoryInTaxonomy: false, outputWellFormed: false });
    const taxonomyOn = scoreConfidence({ ...base, categoryInTaxonomy: true, outputWellFormed: false });
    const bothOn = scoreConfidence({ ...base, categoryInTaxonomy: true, outputWellFormed: true });

    expect(taxonomyOn.score).toBeGreaterThanOrEqual(off.score);
    expect(bothOn.score).toBeGreaterThanOrEqual(taxonomyOn.score);
  });

  it('takes tier boundaries from the supplied thresholds', () => {
    const signals = { modelProbability: 0.95, categoryInTaxonomy: true, outputWellFormed: true };

    expect(scoreConfidence(signals, { thresholds: { high: 0.8, medium: 0.6 } }).tier).toBe('high');
    expect(scoreConfidence(signals, { thresholds: { high: 0.9, medium: 0.85 } }).decision).toBe('reject');
  });
});

describe('disclaimerFor', () => {
  it('has no disclaimer for high confidence', () => {
    const result = scoreConfidence({
      modelProbability: 1,
      categoryInTaxonomy: true,
      outputWellFormed: true,
      historicalAgreementRate: 1
    });
    expect(disclaimerFor(result)).toBeUndefined();
  });

  it('asks for review on medium confidence', () => {
    const result = scoreConfidence({ modelProbability: 0.95, categoryInTaxonomy: true, outputWellFormed: true });
    expect(disclaimerFor(result)).toBe(
      'This result has moderate confidence. Please review it before relying on it.'
    );
  });

  it('warns on low confidence', () => {
    expect(disclaimerFor(scoreConfidence({}))).toBe(
      'This result has low confidence and may be inaccurate. Verify it against your own records.'
    );
  });
});

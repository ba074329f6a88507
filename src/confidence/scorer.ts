import type {
  ConfidenceFactor,
  ConfidenceResult,
  ConfidenceSignals,
  ConfidenceThresholds,
  ConfidenceWeights
} from '../types/index.js';

export const DEFAULT_WEIGHTS: ConfidenceWeights = {
  modelProbability: 0.4,
  categoryInTaxonomy: 0.2,
  outputWellFormed: 0.2,
  historicalAgreementRate: 0.2
};

export const DEFAULT_THRESHOLDS: ConfidenceThresholds = {
  high: 0.85,
  medium: 0.6
};

export interface ScorerOptions {
  thresholds?: ConfidenceThresholds;
  weights?: ConfidenceWeights;
  // Classifier probabilities at or above this count as certainty.
  probabilitySaturation?: number;
}

export const DEFAULT_PROBABILITY_SATURATION = 0.95;

const SIGNAL_NAMES: [keyof ConfidenceSignals, string][] = [
  ['modelProbability', 'model_probability'],
  ['categoryInTaxonomy', 'category_in_taxonomy'],
  ['outputWellFormed', 'output_well_formed'],
  ['historicalAgreementRate', 'historical_agreement_rate']
];

const MODERATE_DISCLAIMER =
  'This result has moderate confidence. Please review it before relying on it.';
const LOW_DISCLAIMER =
  'This result has low confidence and may be inaccurate. Verify it against your own records.';

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

// Returns undefined for missing or non-finite input
function signalValue(
  signals: ConfidenceSignals,
  key: keyof ConfidenceSignals,
  saturation: number
): number | undefined {
  const raw = signals[key];
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === 'boolean') return raw ? 1 : 0;
  if (!Number.isFinite(raw)) return undefined;
  if (key === 'modelProbability' && saturation > 0) {
    return clamp01(clamp01(raw) / saturation);
  }
  return clamp01(raw);
}

export function scoreConfidence(
  signals: ConfidenceSignals,
  options: ScorerOptions = {}
): ConfidenceResult {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const weights = options.weights ?? DEFAULT_WEIGHTS;
  const saturation = options.probabilitySaturation ?? DEFAULT_PROBABILITY_SATURATION;

  const factors: ConfidenceFactor[] = [];
  const derated: ConfidenceFactor[] = [];
  let total = 0;

  const applicable = SIGNAL_NAMES.filter(([key]) => signals[key] !== null);
  const fullWeight = sumWeights(weights, SIGNAL_NAMES);
  const applicableWeight = sumWeights(weights, applicable);
  const scale = applicableWeight > 0 ? fullWeight / applicableWeight : 0;

  for (const [key, name] of applicable) {
    const weight = weights[key] * scale;
    const value = signalValue(signals, key, saturation);
    if (value === undefined) {
      derated.push([`derated:${name}`, round4(weight)]);
      continue;
    }
    const contribution = weight * value;
    factors.push([name, round4(contribution)]);
    total += contribution;
  }

  const score = round4(clamp01(total));
  return {
    score,
    ...classify(score, thresholds),
    factors: [...factors, ...derated]
  };
}

function sumWeights(weights: ConfidenceWeights, names: [keyof ConfidenceSignals, string][]): number {
  return names.reduce((sum, [key]) => sum + weights[key], 0);
}

function classify(
  score: number,
  thresholds: ConfidenceThresholds
): Pick<ConfidenceResult, 'tier' | 'decision'> {
  if (score >= thresholds.high) return { tier: 'high', decision: 'accept' };
  if (score >= thresholds.medium) return { tier: 'medium', decision: 'accept_with_disclaimer' };
  return { tier: 'low', decision: 'reject' };
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function disclaimerFor(result: ConfidenceResult): string | undefined {
  switch (result.tier) {
    case 'high':
      return undefined;
    case 'medium':
      return MODERATE_DISCLAIMER;
    case 'low':
      return LOW_DISCLAIMER;
  }
}

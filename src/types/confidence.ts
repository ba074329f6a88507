export type ConfidenceTier = 'high' | 'medium' | 'low';

export type ConfidenceDecision = 'accept' | 'accept_with_disclaimer' | 'reject';

// undefined: the signal is missing and its weight is lost.
// null: the signal does not apply and the other weights are scaled up to cover it.
export interface ConfidenceSignals {
  modelProbability?: number | null;
  categoryInTaxonomy?: boolean | null;
  outputWellFormed?: boolean | null;
  historicalAgreementRate?: number | null;
}

export interface ConfidenceThresholds {
  high: number;
  medium: number;
}

export interface ConfidenceWeights {
  modelProbability: number;
  categoryInTaxonomy: number;
  outputWellFormed: number;
  historicalAgreementRate: number;
}

// Ordered [factor, contribution] pairs. Missing signals show up as
// ['derated:<signal>', weightLost].
export type ConfidenceFactor = [name: string, contribution: number];

export interface ConfidenceResult {
  score: number;
  tier: ConfidenceTier;
  factors: ConfidenceFactor[];
  decision: ConfidenceDecision;
}

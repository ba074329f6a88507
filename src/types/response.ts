import type { ConfidenceResult } from './confidence.js';
import type { BrainMode } from './request.js';
import type { ParsedLabel, ValidationIssue } from './validation.js';

export type DegradeReason =
  | 'gate_timeout'
  | 'circuit_open'
  | 'remote_error'
  | 'validation_failed'
  | 'deadline_exceeded'
  | 'input_rejected';

export type ResultSource = 'remote' | 'cache' | 'fallback';

export interface BrainResult {
  mode: BrainMode;
  text: string;
  labels: ParsedLabel[];
  confidence: ConfidenceResult;
  source: ResultSource;
}

export interface BrainOutcome {
  result: BrainResult;
  degraded: boolean;
  fromCache: boolean;
  reason?: DegradeReason;
  issues?: ValidationIssue[];
  // Redacted remote text kept for inspection only; never shown as-is.
  unverifiedContent?: string;
  processingTimeMs: number;
}

export type CategorizationSource = 'fast' | 'remote' | 'fallback';

export interface CategorizationResult {
  description: string;
  category: string;
  confidence: ConfidenceResult;
  source: CategorizationSource;
  disclaimer: boolean;
  disclaimerText?: string;
  lowConfidence: boolean;
  degraded: boolean;
  reason?: DegradeReason;
  issues?: ValidationIssue[];
  processingTimeMs: number;
}

export interface AdviceResult {
  text: string;
  confidence: ConfidenceResult;
  disclaimerText?: string;
  degraded: boolean;
  reason?: DegradeReason;
  issues?: ValidationIssue[];
  processingTimeMs: number;
}

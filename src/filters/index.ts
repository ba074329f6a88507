export { filterStructure, type StructureResult } from './schema.js';
export { Taxonomy, loadTaxonomy, filterTaxonomy, DEFAULT_TAXONOMY_PATH } from './taxonomy.js';
export {
  filterArithmetic,
  parseAmount,
  formatAmount,
  DEFAULT_TOLERANCE,
  UNVERIFIED_AMOUNT,
  UNVERIFIED_PERCENT
} from './arithmetic.js';
export { filterPii, redactPii } from './pii.js';
export {
  filterAdvice,
  ADVICE_REMOVED,
  TOPIC_DISCLAIMERS,
  type AdviceTopic,
  type AdviceFilterResult
} from './advice.js';
export { readFacts, factTotal, sumAmounts, type TrustedFacts } from './facts.js';

import type { BrainMode, FilterResult, SourceFacts, ValidationIssue, ValidationResult } from '../types/index.js';
import { assertNever } from '../types/index.js';
import { filterStructure } from './schema.js';
import { filterTaxonomy, type Taxonomy, type TaxonomyEntry } from './taxonomy.js';
import { DEFAULT_TOLERANCE, filterArithmetic } from './arithmetic.js';
import { filterPii } from './pii.js';
import { filterAdvice } from './advice.js';
import { readFacts, type TrustedFacts } from './facts.js';

export interface ValidatorOptions {
  taxonomy: Taxonomy;
  tolerance?: number;
}

// Arithmetic then PII on one piece of remote text
function sanitizeText(
  text: string,
  facts: TrustedFacts,
  tolerance: number,
  index?: number
): { text: string; issues: ValidationIssue[] } {
  const steps: FilterResult[] = [];
  let current = text;

  const arithmetic = filterArithmetic(current, facts, tolerance);
  steps.push(arithmetic);
  current = arithmetic.rewritten ?? current;

  const pii = filterPii(current);
  steps.push(pii);
  current = pii.rewritten ?? current;

  const issues = steps.flatMap(step => step.issues);
  return {
    text: current,
    issues: index === undefined ? issues : issues.map(issue => ({ ...issue, index }))
  };
}

export function validateResponse(
  raw: unknown,
  mode: BrainMode,
  sourceFacts: SourceFacts,
  options: ValidatorOptions
): ValidationResult {
  const facts = readFacts(sourceFacts);
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const structure = filterStructure(raw, mode);
  const issues: ValidationIssue[] = [...structure.issues];

  switch (mode) {
    case 'parse': {
      const sanitized: TaxonomyEntry[] = structure.entries.map(entry => {
        const result = sanitizeText(entry.label, facts, tolerance, entry.index);
        issues.push(...result.issues);
        return { ...entry, label: result.text };
      });

      const taxonomy = filterTaxonomy(sanitized, options.taxonomy);
      issues.push(...taxonomy.issues);

      return {
        isSafe: issues.length === 0,
        issues,
        sanitizedContent: JSON.stringify(taxonomy.labels),
        labels: taxonomy.labels
      };
    }

    case 'chat':
    case 'analyze': {
      if (!structure.passed) {
        return { isSafe: false, issues, labels: [] };
      }
      const result = sanitizeText(structure.text, facts, tolerance);
      const advice = filterAdvice(result.text);
      issues.push(...result.issues, ...advice.issues);
      return {
        isSafe: issues.length === 0,
        issues,
        sanitizedContent: advice.rewritten ?? result.text,
        labels: []
      };
    }

    default:
      return assertNever(mode);
  }
}

export type ValidationIssueKind =
  | 'malformed_output'
  | 'unknown_category'
  | 'arithmetic_mismatch'
  | 'pii_detected'
  | 'harmful_advice';

export interface ValidationIssue {
  kind: ValidationIssueKind;
  detail: string;
  // Entry position for parse-mode arrays
  index?: number;
}

export interface ParsedLabel {
  label: string;
  category: string;
}

export interface ValidationResult {
  isSafe: boolean;
  issues: ValidationIssue[];
  sanitizedContent?: string;
  labels?: ParsedLabel[];
}

export interface FilterResult {
  passed: boolean;
  issues: ValidationIssue[];
  rewritten?: string;
}

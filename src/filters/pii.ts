import type { FilterResult, ValidationIssue } from '../types/index.js';

// Order matters: grouped card numbers before bare digit runs, both before phones
const PII_PATTERNS: [RegExp, string, string][] = [
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL REDACTED]', 'email address'],
  [/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN REDACTED]', 'social security number'],
  [/\b\d{4}(?:[ -]\d{4}){2}[ -]\d{1,7}\b/g, '[ACCOUNT REDACTED]', 'card number'],
  [/\b\d{8,19}\b/g, '[ACCOUNT REDACTED]', 'account number'],
  [/(?:\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}\b/g, '[PHONE REDACTED]', 'phone number']
];

export function filterPii(text: string): FilterResult {
  const issues: ValidationIssue[] = [];
  let rewritten = text;

  for (const [pattern, replacement, label] of PII_PATTERNS) {
    rewritten = rewritten.replace(pattern, () => {
      issues.push({ kind: 'pii_detected', detail: `${label} redacted` });
      return replacement;
    });
  }

  return {
    passed: issues.length === 0,
    issues,
    rewritten: rewritten !== text ? rewritten : undefined
  };
}

export function redactPii(text: string): string {
  return filterPii(text).rewritten ?? text;
}

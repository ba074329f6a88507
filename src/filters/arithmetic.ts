import type { FilterResult, ValidationIssue } from '../types/index.js';
import {
  factTotal,
  mentionedCategory,
  referenceFigures,
  sumAmounts,
  type TrustedFacts
} from './facts.js';

export const UNVERIFIED_AMOUNT = '[unverified amount]';
export const UNVERIFIED_PERCENT = '[unverified percentage]';
export const DEFAULT_TOLERANCE = 0.01;

// Percentage points
const PERCENT_TOLERANCE = 0.5;

const AMOUNT = String.raw`\$?\s?\d[\d,]*(?:\.\d+)?`;

// "$6.50 + $156.23 = $162.73"
const SUM_EXPRESSION = new RegExp(String.raw`(${AMOUNT}(?:\s*\+\s*${AMOUNT})+)\s*=\s*(${AMOUNT})`, 'g');

const NUMBER = String.raw`\d[\d,]*(?:\.\d+)?`;
const PERCENT_WORD = String.raw`(?:%|percent\b|per\s?cent\b|pct\b)`;
const NOT_PERCENT = String.raw`(?![\d.,]*\s?${PERCENT_WORD})`;

// "$1,250", "1,250.00 dollars", "1,250", "42.10"; a bare count like "3" is not money
const MONEY = [
  String.raw`${NUMBER}\s?(?:dollars|usd|bucks)\b`,
  String.raw`\$\s?${NUMBER}`,
  String.raw`\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?${NOT_PERCENT}`,
  String.raw`\d+\.\d{2}\b${NOT_PERCENT}`
].join('|');

// "total spending is $300", "you spent 42.10", "the sum comes to 300 dollars"
const CLAIM_BEFORE = new RegExp(
  String.raw`\b(?:total|sum|spent|altogether|combined|overall)\b[^.$\n\u0000]{0,40}?(${MONEY})`,
  'gi'
);

// "$300 in total"
const CLAIM_AFTER = new RegExp(String.raw`(${MONEY})\s+(?:in total|total|altogether|combined|overall)\b`, 'gi');

// "40% of your spending", "40 percent of the monthly budget"
const PERCENT_OF = new RegExp(
  String.raw`(\d+(?:\.\d+)?)\s?${PERCENT_WORD}\s+of\s+(?:your\s+|the\s+)?(?:total\s+|monthly\s+)?(spending|expenses|budget|income)\b`,
  'gi'
);

// "40 percent on groceries", "12 pct for dining"
const PERCENT_ON = new RegExp(String.raw`(\d+(?:\.\d+)?)\s?${PERCENT_WORD}\s+(?:on|for|towards?)\s`, 'gi');

const LEADING_PERCENT = new RegExp(String.raw`^\d+(?:\.\d+)?\s?${PERCENT_WORD}`, 'i');

const PLACEHOLDER = /\u0000(\d+)\u0000/g;

// "$1,250.00", "1,250 dollars" -> 1250
export function parseAmount(text: string): number {
  return Number(text.replace(/[^\d.]/g, ''));
}

export function formatAmount(value: number): string {
  return `$${value.toFixed(2)}`;
}

function within(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance + 1e-9;
}

function sentenceAround(text: string, index: number): string {
  let start = index;
  while (start > 0 && !/[.!?\n]\s/.test(text.slice(start - 1, start + 1))) start--;
  let end = index;
  while (end < text.length && !/[.!?\n](\s|$)/.test(text.slice(end, end + 2))) end++;
  return text.slice(start, end + 1);
}

// Aggregates are recomputed from source facts, never taken on trust. Anything
// that disagrees or cannot be recomputed is replaced in the rewritten text.
export function filterArithmetic(
  text: string,
  facts: TrustedFacts,
  tolerance: number = DEFAULT_TOLERANCE
): FilterResult {
  const issues: ValidationIssue[] = [];
  const expressions: string[] = [];

  const mismatch = (detail: string) => {
    issues.push({ kind: 'arithmetic_mismatch', detail });
  };

  const verifyClaim = (stated: number, sentence: string): boolean => {
    const category = mentionedCategory(sentence, facts);
    const candidates = category ? [category[1]] : referenceFigures(facts);
    if (candidates.length === 0) {
      mismatch(`${formatAmount(stated)} cannot be recomputed from source facts`);
      return false;
    }
    if (candidates.some(candidate => within(candidate, stated, tolerance))) return true;
    mismatch(`${formatAmount(stated)} stated, source facts give ${formatAmount(candidates[0])}`);
    return false;
  };

  let working = text.replace(SUM_EXPRESSION, (match: string, operandText: string, resultText: string) => {
    const operands = operandText.split('+').map(parseAmount);
    const stated = parseAmount(resultText);
    const computed = sumAmounts(operands);
    let verified = true;

    if (!within(computed, stated, tolerance)) {
      mismatch(`${formatAmount(stated)} stated, operands sum to ${formatAmount(computed)}`);
      verified = false;
    } else if (facts.amounts.length > 0) {
      const stray = operands.find(op => !facts.amounts.some(known => within(known, op, tolerance)));
      if (stray !== undefined) {
        mismatch(`operand ${formatAmount(stray)} is not among the source amounts`);
        verified = false;
      }
    }

    expressions.push(verified ? match : `${operandText} = ${UNVERIFIED_AMOUNT}`);
    return `\u0000${expressions.length - 1}\u0000`;
  });

  const replaceClaim = (match: string, amountText: string, offset: number, whole: string): string => {
    const verified = verifyClaim(parseAmount(amountText), sentenceAround(whole, offset));
    return verified ? match : match.replace(amountText, UNVERIFIED_AMOUNT);
  };

  working = working.replace(CLAIM_BEFORE, replaceClaim);
  working = working.replace(CLAIM_AFTER, replaceClaim);

  const checkPercent = (match: string, stated: number, denominator: number | undefined, sentence: string): string => {
    const category = mentionedCategory(sentence, facts);
    if (!category || denominator === undefined || denominator <= 0) {
      mismatch(`${stated}% cannot be recomputed from source facts`);
      return match.replace(LEADING_PERCENT, UNVERIFIED_PERCENT);
    }

    const computed = (category[1] / denominator) * 100;
    if (within(computed, stated, PERCENT_TOLERANCE)) return match;
    mismatch(`${stated}% stated, source facts give ${computed.toFixed(1)}%`);
    return match.replace(LEADING_PERCENT, UNVERIFIED_PERCENT);
  };

  working = working.replace(
    PERCENT_OF,
    (match: string, percentText: string, base: string, offset: number, whole: string) => {
      const denominator = base.toLowerCase() === 'income' ? facts.income : factTotal(facts);
      return checkPercent(match, Number(percentText), denominator, sentenceAround(whole, offset));
    }
  );

  working = working.replace(PERCENT_ON, (match: string, percentText: string, offset: number, whole: string) =>
    checkPercent(match, Number(percentText), factTotal(facts), sentenceAround(whole, offset))
  );

  working = working.replace(PLACEHOLDER, (_match: string, index: string) => expressions[Number(index)] ?? '');

  return {
    passed: issues.length === 0,
    issues,
    rewritten: working !== text ? working : undefined
  };
}

import { z } from 'zod';
import type { FastClassifier } from '../classifier/keyword-classifier.js';
import type { ParsedLabel, SourceFacts } from '../types/index.js';
import { readFacts, sumAmounts } from '../filters/index.js';

export const CHAT_FALLBACK_TEXT =
  "I can't reach the assistant right now. You can still review your transactions, budgets and goals, " +
  'and ask again in a moment.';

export const ANALYSIS_NO_DATA_TEXT = 'Please provide your financial data for analysis.';

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export function formatCurrency(value: number): string {
  return currency.format(value);
}

const monthlyIncome = z.number().finite();
const goals = z.array(z.unknown());

// Built only from the caller's own figures, so it needs no validation
export function analysisFallback(context: SourceFacts): string {
  const facts = readFacts(context);
  const parts: string[] = [];

  const statedIncome = monthlyIncome.safeParse(context.monthly_income);
  const income = facts.income ?? (statedIncome.success ? statedIncome.data : undefined);
  if (income !== undefined) {
    parts.push(`Your monthly income is ${formatCurrency(income)}.`);
  }

  if (facts.spending.length > 0) {
    const total = sumAmounts(facts.spending.map(([, amount]) => amount));
    const top = [...facts.spending].sort(([, a], [, b]) => b - a).slice(0, 3);
    parts.push(`Your total monthly spending is ${formatCurrency(total)}.`);
    parts.push(`Top spending categories: ${top.map(([name, amount]) => `${name} (${formatCurrency(amount)})`).join(', ')}.`);
  }

  const goalList = goals.safeParse(context.goals);
  if (goalList.success) {
    parts.push(`You have ${goalList.data.length} active goals.`);
  }

  return parts.length > 0 ? parts.join(' ') : ANALYSIS_NO_DATA_TEXT;
}

export function parseFallback(query: string, classifier: FastClassifier): { labels: ParsedLabel[]; probability: number } {
  const prediction = classifier.classify(query);
  return {
    labels: [{ label: query.trim(), category: prediction.category }],
    probability: prediction.probability
  };
}

import { z } from 'zod';
import type { SourceFacts } from '../types/index.js';

const amountList = z.array(z.number().finite());
const amountMap = z.record(z.number().finite());
const amount = z.number().finite();

// The subset of caller facts arithmetic checks may rely on
export interface TrustedFacts {
  amounts: number[];
  spending: [name: string, amount: number][];
  totals: [name: string, amount: number][];
  income?: number;
}

export function readFacts(facts: SourceFacts): TrustedFacts {
  const amounts = amountList.safeParse(facts.amounts);
  const spending = amountMap.safeParse(facts.spending);
  const totals = amountMap.safeParse(facts.totals);
  const income = amount.safeParse(facts.income);

  return {
    amounts: amounts.success ? amounts.data : [],
    spending: spending.success ? Object.entries(spending.data) : [],
    totals: totals.success ? Object.entries(totals.data) : [],
    income: income.success ? income.data : undefined
  };
}

export function sumAmounts(values: number[]): number {
  const cents = values.reduce((acc, value) => acc + Math.round(value * 100), 0);
  return cents / 100;
}

// Overall total: an explicit `totals.total`, else the sum of the itemized facts
export function factTotal(facts: TrustedFacts): number | undefined {
  const explicit = facts.totals.find(([name]) => name.toLowerCase() === 'total');
  if (explicit) return explicit[1];
  if (facts.amounts.length > 0) return sumAmounts(facts.amounts);
  if (facts.spending.length > 0) return sumAmounts(facts.spending.map(([, value]) => value));
  return undefined;
}

export function referenceFigures(facts: TrustedFacts): number[] {
  const figures: number[] = [];
  const total = factTotal(facts);
  if (total !== undefined) figures.push(total);
  figures.push(...facts.totals.map(([, value]) => value));
  figures.push(...facts.spending.map(([, value]) => value));
  figures.push(...facts.amounts);
  return figures;
}

// Longest spending category named in the text, if any
export function mentionedCategory(
  text: string,
  facts: TrustedFacts
): [name: string, amount: number] | undefined {
  const lower = text.toLowerCase();
  return [...facts.spending]
    .sort(([a], [b]) => b.length - a.length)
    .find(([name]) => lower.includes(name.toLowerCase()));
}

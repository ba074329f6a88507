import type { FilterResult, ValidationIssue } from '../types/index.js';

export const ADVICE_REMOVED = '[unsafe advice removed]';

export type AdviceTopic = 'investment' | 'tax' | 'debt' | 'insurance' | 'legal';

export interface AdviceFilterResult extends FilterResult {
  topics: AdviceTopic[];
}

// Advice no answer may carry, whatever the facts say
const HARMFUL_PATTERNS: [RegExp, string][] = [
  [/\b(?:guaranteed|certain|sure|risk[- ]?free|no[- ]risk|zero[- ]risk)\s+(?:profits?|returns?|income|gains?|money|investments?)\b/gi, 'guaranteed returns'],
  [/\bguarantee[sd]?\s+.{0,30}?\b(?:returns?|profits?|gains?)\b/gi, 'guaranteed returns'],
  [/\b(?:completely|totally|absolutely|entirely|100%)\s+risk[- ]?free\b/gi, 'risk-free claim'],
  [/\b(?:get\s+rich\s+quick|make\s+(?:fast|quick|easy)\s+money|double\s+your\s+money)\b/gi, 'get rich quick'],
  [/\b(?:put|invest)\s+(?:all\s+(?:of\s+)?your\s+(?:money|savings)|everything|100%)\s+(?:into|in)\s+\w+/gi, 'all-in recommendation'],
  [/\b(?:evade|avoid\s+paying|hide\s+(?:\w+\s+){0,3}from)\s+(?:the\s+)?(?:irs|taxes|tax\s+authorities)\b/gi, 'tax evasion'],
  [/\b(?:just\s+)?(?:ignore|don't\s+pay|stop\s+paying|skip\s+paying)\s+(?:your\s+)?(?:debts?|bills?|loans?|credit\s+cards?)\b/gi, 'ignoring debt'],
  [/\b(?:use|spend|invest|put)\s+(?:all\s+(?:of\s+)?)?(?:your\s+)?emergency\s+fund\s+(?:on|in|into|for)\s+(?:stocks?|crypto\w*|invest\w*)/gi, 'emergency fund in risky assets']
];

const TOPIC_PATTERNS: [RegExp, AdviceTopic][] = [
  [/\b(?:invest(?:ing|ments?)?|stocks?|bonds?|portfolio|401\(?k\)?|ira|roth|mutual funds?|etfs?|crypto(?:currency)?)\b/i, 'investment'],
  [/\b(?:tax(?:es)?|deductions?|deductible|irs)\b/i, 'tax'],
  [/\b(?:debts?|loans?|mortgages?|borrow(?:ing)?)\b/i, 'debt'],
  [/\b(?:insurance|premiums?|annuit(?:y|ies))\b/i, 'insurance'],
  [/\b(?:legal|lawsuits?|sue|court|attorney|lawyer)\b/i, 'legal']
];

export const TOPIC_DISCLAIMERS: Record<AdviceTopic, string> = {
  investment: 'Investments carry risk, and past performance does not predict future results.',
  tax: 'Tax rules vary, so check with a tax professional about your situation.',
  debt: 'A financial counselor can help you weigh debt repayment options.',
  insurance: 'Coverage needs vary, so ask an insurance professional what fits you.',
  legal: 'This is not legal advice. Talk to an attorney about legal matters.'
};

// Harmful phrases are cut and fail the answer. Sensitive topics only add
// their disclaimer once.
export function filterAdvice(text: string): AdviceFilterResult {
  const issues: ValidationIssue[] = [];
  let rewritten = text;

  for (const [pattern, label] of HARMFUL_PATTERNS) {
    rewritten = rewritten.replace(pattern, () => {
      issues.push({ kind: 'harmful_advice', detail: `${label} removed` });
      return ADVICE_REMOVED;
    });
  }

  const topics = TOPIC_PATTERNS.filter(([pattern]) => pattern.test(rewritten)).map(([, topic]) => topic);
  const missing = topics
    .map(topic => TOPIC_DISCLAIMERS[topic])
    .filter(disclaimer => !rewritten.toLowerCase().includes(disclaimer.toLowerCase()));
  if (missing.length > 0) {
    rewritten = `${rewritten}\n\n${missing.join(' ')}`;
  }

  return {
    passed: issues.length === 0,
    issues,
    topics,
    rewritten: rewritten !== text ? rewritten : undefined
  };
}

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

export interface FastPrediction {
  category: string;
  probability: number;
}

// Local statistical classifier consulted before any remote call
export interface FastClassifier {
  classify(text: string): FastPrediction;
}

const keywordFileSchema = z.object({
  default_category: z.string().min(1).default('Other'),
  rules: z.array(
    z.object({
      category: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1)
    })
  )
});

export type KeywordRule = z.infer<typeof keywordFileSchema>['rules'][number];

export const DEFAULT_KEYWORDS_PATH = resolve(process.cwd(), 'data', 'merchant-keywords.json');

const SINGLE_MATCH_PROBABILITY = 0.8;
const EXTRA_HIT_BONUS = 0.05;
const MAX_PROBABILITY = 0.95;
const AMBIGUOUS_PROBABILITY = 0.55;
const UNMATCHED_PROBABILITY = 0.1;

interface CompiledRule {
  category: string;
  patterns: RegExp[];
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords start at a word boundary; short ones (BP, 76, HEB) must also end at one
function compileKeyword(keyword: string): RegExp {
  const upper = keyword.toUpperCase();
  const tail = upper.length < 4 ? '(?![A-Z0-9])' : '';
  return new RegExp(`(?<![A-Z0-9])${escapeRegex(upper)}${tail}`);
}

export class KeywordClassifier implements FastClassifier {
  private readonly rules: CompiledRule[];

  constructor(rules: KeywordRule[], private readonly defaultCategory: string = 'Other') {
    this.rules = rules.map(rule => ({
      category: rule.category,
      patterns: rule.keywords.map(compileKeyword)
    }));
  }

  classify(text: string): FastPrediction {
    const upper = text.toUpperCase();
    const matches = this.rules
      .map(rule => ({
        category: rule.category,
        hits: rule.patterns.filter(pattern => pattern.test(upper)).length
      }))
      .filter(match => match.hits > 0);

    const [best] = matches;
    if (!best) {
      return { category: this.defaultCategory, probability: UNMATCHED_PROBABILITY };
    }

    // Keywords from several categories: keep rule order but trust it less
    if (matches.length > 1) {
      return { category: best.category, probability: AMBIGUOUS_PROBABILITY };
    }

    const probability = Math.min(MAX_PROBABILITY, SINGLE_MATCH_PROBABILITY + EXTRA_HIT_BONUS * (best.hits - 1));
    return { category: best.category, probability };
  }
}

export function loadKeywordClassifier(path: string = DEFAULT_KEYWORDS_PATH): KeywordClassifier {
  const parsed = keywordFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  return new KeywordClassifier(parsed.rules, parsed.default_category);
}

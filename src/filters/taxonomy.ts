import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { ParsedLabel, ValidationIssue } from '../types/index.js';

const taxonomyFileSchema = z.object({
  categories: z.array(z.string().min(1)).min(1),
  aliases: z.record(z.string()).default({})
});

export const DEFAULT_TAXONOMY_PATH = resolve(process.cwd(), 'data', 'taxonomy.json');

export class Taxonomy {
  private readonly canonical = new Map<string, string>();
  private readonly aliases = new Map<string, string>();

  constructor(categories: string[], aliases: Record<string, string> = {}) {
    for (const category of categories) {
      this.canonical.set(category.trim().toLowerCase(), category);
    }
    for (const [alias, target] of Object.entries(aliases)) {
      const resolved = this.canonical.get(target.trim().toLowerCase());
      if (resolved) this.aliases.set(alias.trim().toLowerCase(), resolved);
    }
  }

  // Canonical name for a category or one of its aliases
  normalize(category: string): string | undefined {
    const key = category.trim().toLowerCase();
    return this.canonical.get(key) ?? this.aliases.get(key);
  }

  has(category: string): boolean {
    return this.normalize(category) !== undefined;
  }

  categories(): string[] {
    return Array.from(this.canonical.values());
  }
}

export function loadTaxonomy(path: string = DEFAULT_TAXONOMY_PATH): Taxonomy {
  const parsed = taxonomyFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  return new Taxonomy(parsed.categories, parsed.aliases);
}

export interface TaxonomyEntry {
  index: number;
  label: string;
  category?: string;
}

export interface TaxonomyFilterResult {
  passed: boolean;
  issues: ValidationIssue[];
  labels: ParsedLabel[];
}

// Unknown categories drop the entry; nothing is guessed in its place.
export function filterTaxonomy(entries: TaxonomyEntry[], taxonomy: Taxonomy): TaxonomyFilterResult {
  const issues: ValidationIssue[] = [];
  const labels: ParsedLabel[] = [];

  for (const entry of entries) {
    const category = entry.category === undefined ? undefined : taxonomy.normalize(entry.category);
    if (category === undefined) {
      issues.push({
        kind: 'unknown_category',
        detail: entry.category === undefined
          ? `entry ${entry.index} has no category`
          : `"${entry.category}" is not a known category`,
        index: entry.index
      });
      continue;
    }
    labels.push({ label: entry.label, category });
  }

  return { passed: issues.length === 0, issues, labels };
}

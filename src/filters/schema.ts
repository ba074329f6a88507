import { z } from 'zod';
import type { BrainMode, ValidationIssue } from '../types/index.js';
import { assertNever } from '../types/index.js';
import type { TaxonomyEntry } from './taxonomy.js';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

const entrySchema = z.object({
  label: z.string().trim().min(1),
  category: z.string().optional()
});

const wrappedSchema = z.object({ items: z.array(z.unknown()) });

export interface StructureResult {
  passed: boolean;
  issues: ValidationIssue[];
  entries: TaxonomyEntry[];
  text: string;
}

function malformed(detail: string): StructureResult {
  return {
    passed: false,
    issues: [{ kind: 'malformed_output', detail }],
    entries: [],
    text: ''
  };
}

function decodeJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  const fenced = FENCED_BLOCK.exec(raw);
  const body = (fenced ? fenced[1] : raw).trim();
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

function structureEntries(raw: unknown): StructureResult {
  let value = raw;
  if (typeof raw === 'string') {
    const decoded = decodeJson(raw);
    if (!decoded.ok) return malformed('response is not valid JSON');
    value = decoded.value;
  }

  const wrapped = wrappedSchema.safeParse(value);
  const items = Array.isArray(value) ? value : wrapped.success ? wrapped.data.items : undefined;
  if (!items) return malformed('expected an array of {label, category} entries');
  if (items.length === 0) return malformed('response contains no entries');

  const issues: ValidationIssue[] = [];
  const entries: TaxonomyEntry[] = [];

  items.forEach((item, index) => {
    const parsed = entrySchema.safeParse(item);
    if (!parsed.success) {
      issues.push({ kind: 'malformed_output', detail: `entry ${index} has no usable label`, index });
      return;
    }
    entries.push({ index, label: parsed.data.label, category: parsed.data.category });
  });

  return {
    passed: issues.length === 0,
    issues,
    entries,
    text: entries.map(entry => entry.label).join('\n')
  };
}

function structureText(raw: unknown): StructureResult {
  if (typeof raw !== 'string') return malformed('expected free text');
  if (raw.trim().length === 0) return malformed('response is empty');
  return { passed: true, issues: [], entries: [], text: raw.trim() };
}

export function filterStructure(raw: unknown, mode: BrainMode): StructureResult {
  switch (mode) {
    case 'parse':
      return structureEntries(raw);
    case 'chat':
    case 'analyze':
      return structureText(raw);
    default:
      return assertNever(mode);
  }
}

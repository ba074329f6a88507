export type BrainMode = 'chat' | 'analyze' | 'parse';

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

// Caller-supplied facts. The validator only trusts the typed fields; the rest
// is passed to the remote service untouched.
export interface SourceFacts {
  amounts?: number[];
  spending?: Record<string, number>;
  totals?: Record<string, number>;
  income?: number;
  [key: string]: unknown;
}

export interface ClassificationRequest {
  mode: BrainMode;
  query: string;
  context: SourceFacts;
  createdAt: Date;
}

export interface ClassifyOptions {
  // Overall budget for this call, gate wait and backoff included.
  deadlineMs?: number;
  signal?: AbortSignal;
  useCache?: boolean;
}

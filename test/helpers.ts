import { vi, type Mock } from 'vitest';
import type { BrainTransport, RemoteQuery, RemoteReply } from '../src/inference/transport.js';
import { BrainClient, type BrainClientSettings } from '../src/inference/brain-client.js';
import { CircuitBreaker, RequestGate } from '../src/gates/index.js';
import { CacheLayer, MemoryCacheStore, type CacheStore } from '../src/cache/index.js';
import { loadTaxonomy } from '../src/filters/index.js';
import { loadKeywordClassifier } from '../src/classifier/keyword-classifier.js';
import type { AgreementSource } from '../src/feedback/feedback-ledger.js';
import type { SleepFn } from '../src/inference/retry.js';
import { BrainMetrics } from '../src/metrics/index.js';

export type ReplyHandler = (payload: RemoteQuery, signal: AbortSignal, call: number) => Promise<RemoteReply>;

export class FakeTransport implements BrainTransport {
  readonly calls: RemoteQuery[] = [];
  healthy = true;

  constructor(private readonly handler: ReplyHandler) {}

  async query(payload: RemoteQuery, signal: AbortSignal): Promise<RemoteReply> {
    this.calls.push(payload);
    return this.handler(payload, signal, this.calls.length);
  }

  async health(): Promise<boolean> {
    return this.healthy;
  }
}

// Reads (unless told otherwise) and writes stay pending forever
export class HangingStore implements CacheStore {
  calls = 0;

  constructor(private readonly options: { hangReads: boolean } = { hangReads: true }) {}

  get(): Promise<string | null> {
    this.calls++;
    if (!this.options.hangReads) return Promise.resolve(null);
    return new Promise(() => undefined);
  }

  set(): Promise<void> {
    this.calls++;
    return new Promise(() => undefined);
  }

  async del(): Promise<void> {
    this.calls++;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const taxonomy = loadTaxonomy();
export const keywordClassifier = loadKeywordClassifier();

export interface ClientFixture {
  client: BrainClient;
  breaker: CircuitBreaker;
  gate: RequestGate;
  cache: CacheLayer;
  store: MemoryCacheStore;
  sleep: Mock<SleepFn>;
  metrics: BrainMetrics;
}

export interface ClientFixtureOptions {
  settings?: Partial<BrainClientSettings>;
  failureThreshold?: number;
  capacity?: number;
  history?: AgreementSource;
  cacheStore?: CacheStore;
}

export function makeClient(transport: BrainTransport, options: ClientFixtureOptions = {}): ClientFixture {
  const breaker = new CircuitBreaker({
    failureThreshold: options.failureThreshold ?? 5,
    cooldownMs: 30_000
  });
  const gate = new RequestGate(options.capacity ?? 3);
  const store = new MemoryCacheStore();
  const cache = new CacheLayer(options.cacheStore ?? store);
  const sleep = vi.fn<SleepFn>(async () => undefined);
  const metrics = new BrainMetrics({ breaker, gate, cache });

  const client = new BrainClient({
    transport,
    breaker,
    gate,
    cache,
    taxonomy,
    fallbackClassifier: keywordClassifier,
    history: options.history,
    settings: options.settings,
    sleep,
    random: () => 1,
    metrics
  });

  return { client, breaker, gate, cache, store, sleep, metrics };
}

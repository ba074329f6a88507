import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(8090),
    host: z.string().default('127.0.0.1')
  }).default({}),

  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  }).default({}),

  cors: z.object({
    allowed_origins: z.array(z.string()).default(['http://localhost:3000'])
  }).default({}),

  rate_limits: z.object({
    requests_per_minute: z.coerce.number().int().positive().default(120)
  }).default({}),

  remote: z.object({
    base_url: z.string().url().default('http://localhost:8080'),
    query_path: z.string().default('/query'),
    health_path: z.string().default('/health')
  }).default({}),

  confidence: z.object({
    high: z.coerce.number().min(0).max(1).default(0.85),
    medium: z.coerce.number().min(0).max(1).default(0.6),
    probability_saturation: z.coerce.number().gt(0).max(1).default(0.95)
  }).refine(value => value.high >= value.medium, {
    message: 'confidence.high must not be below confidence.medium'
  }).default({}),

  breaker: z.object({
    failure_threshold: z.coerce.number().int().positive().default(5),
    cooldown_ms: z.coerce.number().int().positive().default(30_000),
    failure_window_ms: z.coerce.number().int().positive().default(60_000)
  }).default({}),

  gate: z.object({
    capacity: z.coerce.number().int().positive().default(3),
    acquire_timeout_ms: z.coerce.number().int().positive().default(5_000)
  }).default({}),

  retry: z.object({
    max_attempts: z.coerce.number().int().positive().default(3),
    backoff_base_ms: z.coerce.number().int().nonnegative().default(500),
    backoff_max_ms: z.coerce.number().int().nonnegative().default(4_000),
    attempt_timeouts_ms: z.array(z.coerce.number().int().positive()).min(1).default([2_000, 4_000, 6_000])
  }).default({}),

  timeouts: z.object({
    overall_ms: z.coerce.number().int().positive().default(20_000)
  }).default({}),

  cache: z.object({
    ttl_ms: z.coerce.number().int().positive().default(3_600_000),
    redis_url: z.string().optional()
  }).default({}),

  input_guard: z.object({
    enabled: z.boolean().default(true),
    suspicion_threshold: z.coerce.number().int().positive().default(5)
  }).default({}),

  validation: z.object({
    tolerance: z.coerce.number().nonnegative().default(0.01)
  }).default({}),

  feedback: z.object({
    consensus_threshold: z.coerce.number().int().positive().default(3),
    max_keys: z.coerce.number().int().positive().default(10_000)
  }).default({}),

  data: z.object({
    taxonomy_path: z.string().optional(),
    keywords_path: z.string().optional()
  }).default({})
});

export type GatewayConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export function configPaths(cwd: string, home: string): string[] {
  return [
    resolve(cwd, 'brain-gateway.yaml'),
    resolve(home, '.brain-gateway', 'config.yaml'),
    resolve(home, '.config', 'brain-gateway', 'config.yaml')
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? { ...value } : {};
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  const overrides: [string | undefined, string, string][] = [
    [env.BRAIN_URL, 'remote', 'base_url'],
    [env.REDIS_URL, 'cache', 'redis_url'],
    [env.PORT, 'server', 'port'],
    [env.HOST, 'server', 'host'],
    [env.LOG_LEVEL, 'logging', 'level']
  ];

  for (const [value, name, key] of overrides) {
    if (value === undefined || value === '') continue;
    merged[name] = { ...section(merged, name), [key]: value };
  }

  return merged;
}

export function parseConfig(raw: unknown, source = 'configuration'): GatewayConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${details}`);
  }
  return result.data;
}

// First YAML file found wins, then environment overrides on top
export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();
  const env = options.env ?? process.env;

  let raw: Record<string, unknown> = {};
  let source = 'default configuration';

  for (const path of configPaths(cwd, home)) {
    if (existsSync(path)) {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      if (isRecord(parsed)) {
        raw = parsed;
      } else if (parsed !== null && parsed !== undefined) {
        throw new Error(`Invalid configuration in ${path}: expected a mapping at the top level`);
      }
      source = `configuration in ${path}`;
      break;
    }
  }

  return parseConfig(applyEnvOverrides(raw, env), source);
}

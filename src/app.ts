import { fastify, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { BrainRuntime } from './runtime.js';
import { describeError } from './errors.js';

export const VERSION = '0.1.0';

const factsSchema = z.record(z.unknown());

const categorizeBody = z.object({
  description: z.string().trim().min(1).max(500),
  source_facts: factsSchema.optional(),
  deadline_ms: z.number().int().positive().optional()
});

const queryBody = z.object({
  mode: z.enum(['chat', 'analyze', 'parse']),
  query: z.string().trim().min(1).max(4000),
  context: factsSchema.optional(),
  use_cache: z.boolean().optional(),
  deadline_ms: z.number().int().positive().optional()
});

const feedbackBody = z.object({
  original_category: z.string().trim().min(1),
  corrected_category: z.string().trim().min(1),
  description: z.string().trim().min(1).max(500)
});

function badRequest(error: z.ZodError): { error: string; details: string[] } {
  return {
    error: 'invalid_request',
    details: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
  };
}

export async function buildServer(runtime: BrainRuntime): Promise<FastifyInstance> {
  const { config, logger } = runtime;

  const app = fastify({
    logger: false,
    genReqId: request => {
      const header = request.headers['x-request-id'];
      return typeof header === 'string' && header.length > 0 ? header : uuidv4();
    }
  });

  await app.register(cors, {
    origin: config.cors.allowed_origins,
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error, request, reply) => {
    logger.error({ request_id: request.id, error: describeError(error) }, 'Unhandled route error');
    const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    void reply.status(status).send({ request_id: request.id, error: status === 500 ? 'internal_error' : error.message });
  });

  app.get('/api/health', async () => {
    const stats = runtime.brain.stats();
    const remoteReachable = await runtime.brain.ping();
    return {
      status: stats.breaker.phase === 'closed' && remoteReachable ? 'healthy' : 'degraded',
      version: VERSION,
      remote_reachable: remoteReachable,
      breaker: stats.breaker.phase,
      gate: stats.gate
    };
  });

  app.post('/api/categorize', async (request, reply) => {
    const parsed = categorizeBody.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return badRequest(parsed.error);
    }

    const { description, source_facts, deadline_ms } = parsed.data;
    const result = await runtime.orchestrator.categorize(description, source_facts ?? {}, {
      deadlineMs: deadline_ms
    });

    logger.info({
      request_id: request.id,
      source: result.source,
      tier: result.confidence.tier,
      degraded: result.degraded,
      processing_time_ms: result.processingTimeMs
    }, 'Categorization processed');

    return { request_id: request.id, ...result };
  });

  app.post('/api/query', async (request, reply) => {
    const parsed = queryBody.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return badRequest(parsed.error);
    }

    const { mode, query, context, use_cache, deadline_ms } = parsed.data;
    const outcome = await runtime.brain.classify(
      { mode, query, context: context ?? {}, createdAt: new Date() },
      { useCache: use_cache, deadlineMs: deadline_ms }
    );

    logger.info({
      request_id: request.id,
      mode,
      degraded: outcome.degraded,
      from_cache: outcome.fromCache,
      processing_time_ms: outcome.processingTimeMs
    }, 'Query processed');

    return { request_id: request.id, ...outcome };
  });

  app.post('/api/feedback', async (request, reply) => {
    const parsed = feedbackBody.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return badRequest(parsed.error);
    }

    const { original_category, corrected_category, description } = parsed.data;
    const corrected = runtime.taxonomy.normalize(corrected_category);
    if (!corrected) {
      reply.status(400);
      return { error: 'unknown_category', details: [`"${corrected_category}" is not a known category`] };
    }

    runtime.ledger.recordCorrection(original_category, corrected, description);
    reply.status(202);
    return {
      request_id: request.id,
      accepted: true,
      consensus_category: runtime.ledger.consensus(description) ?? null
    };
  });

  app.get('/api/resilience', async () => {
    return {
      ...runtime.brain.stats(),
      feedback: runtime.ledger.stats()
    };
  });

  app.get('/metrics', async (_request, reply) => {
    const body = await runtime.metrics.render();
    reply.header('content-type', runtime.metrics.contentType);
    return body;
  });

  app.post('/api/resilience/reset', async () => {
    runtime.breaker.reset();
    return { reset: true, breaker: runtime.breaker.snapshot() };
  });

  return app;
}

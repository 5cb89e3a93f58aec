import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import pino, { type Logger } from 'pino';
import { z } from 'zod';

import type { PolicyGuardConfig } from './config.js';
import { AuditWriteFailedError, DecisionUnavailableError, isModerationError } from './errors.js';
import { createAuthHook, originPattern, type TransportConfig } from './http/auth.js';
import type { ModerationService } from './service.js';
import { SERVICE_VERSION, type AuditRecord, type Decision } from './types/index.js';

const STATUS_BY_CODE: Record<string, number> = {
  DECISION_UNAVAILABLE: 503,
  EMBEDDING_UNAVAILABLE: 503,
  MODERATION_ABORTED: 499,
  DIMENSION_MISMATCH: 500
};

const policyBodySchema = z.object({
  policies: z
    .array(
      z.object({
        text: z.string().min(1),
        source: z.enum(['static', 'scraped', 'news_feed']).default('static')
      })
    )
    .min(1)
    .max(500)
});

const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50)
});

export interface ModerateResponse {
  verdict: Decision['verdict'];
  reason: string;
  policies_cited: string[];
  provider_used: Decision['provider_used'] | 'NONE';
  latency_ms: number;
  event_id?: string;
  fail_closed?: boolean;
  compliance_warning?: string;
}

function toResponse(decision: Decision, record?: AuditRecord): ModerateResponse {
  return {
    verdict: decision.verdict,
    reason: decision.reason,
    policies_cited: [...decision.policies_cited],
    provider_used: decision.provider_used,
    latency_ms: decision.latency_ms,
    event_id: record?.event_id
  };
}

function sendError(reply: FastifyReply, error: unknown, logger: Logger) {
  if (isModerationError(error)) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    logger.error({ code: error.code, err: error.message }, 'Moderation failed');
    return reply.status(status).send({ error: error.code, message: error.message });
  }

  logger.error({ err: error }, 'Unexpected failure');
  return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Unexpected failure' });
}

export async function buildServer(
  config: PolicyGuardConfig,
  service: ModerationService,
  logger: Logger = pino({ level: 'silent' })
): Promise<FastifyInstance> {
  const { pipeline, ingestor, index, auditLog, engine } = service;

  const transportConfig: TransportConfig = {
    apiKeys: new Set(config.auth.api_keys),
    allowedOrigins: config.auth.allowed_origins
  };
  const requireAuth = createAuthHook(transportConfig);

  const moderateBodySchema = z.object({
    text: z.string().min(1).max(config.rate_limits.max_input_chars)
  });

  // Create Fastify server
  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins.map(originPattern),
    credentials: true
  });

  await app.register(rateLimit, {
    max: Math.ceil(config.rate_limits.requests_per_second * 60),
    timeWindow: '1 minute'
  });

  // Health endpoint
  // Health endpoint
  app.get('/api/health', async () => {
    return {
      status: 'healthy',
      version: SERVICE_VERSION,
      index: { policies: index.size, dimension: index.getDimension() ?? null },
      providers: engine.getProviders(),
      audit: { records: auditLog.size, signing: auditLog.signing }
    };
  });

  app.post('/api/moderate', { preHandler: requireAuth }, async (request, reply) => {
    const body = moderateBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'INVALID_REQUEST', issues: body.error.issues.map(i => i.message) });
    }

    // Abort the pipeline if the client goes away before we answer
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    let auditRecord: AuditRecord | undefined;

    try {
      const decision = await pipeline.moderate(body.data.text, {
        signal: controller.signal,
        onAudit: record => {
          auditRecord = record;
        }
      });
      return toResponse(decision, auditRecord);
    } catch (error) {
      if (error instanceof AuditWriteFailedError) {
        logger.error({ err: error.message }, 'Decision returned without audit record');
        return {
          ...toResponse(error.decision),
          compliance_warning: 'Decision was not recorded in the audit log'
        };
      }

      if (error instanceof DecisionUnavailableError && config.moderation.fail_closed) {
        logger.warn({ err: error.message }, 'Decision unavailable, failing closed');
        const response: ModerateResponse = {
          verdict: 'FLAGGED',
          reason: 'No moderation decision could be produced; flagged by fail-closed policy',
          policies_cited: [],
          provider_used: 'NONE',
          latency_ms: 0,
          fail_closed: true
        };
        return response;
      }

      return sendError(reply, error, logger);
    }
  });

  app.post('/api/policies', { preHandler: requireAuth }, async (request, reply) => {
    const body = policyBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'INVALID_REQUEST', issues: body.error.issues.map(i => i.message) });
    }

    try {
      const report = await ingestor.ingestWithReport({ name: 'api', fetch: () => body.data.policies });
      return {
        upserted: report.upserted,
        unchanged: report.unchanged,
        failed: report.failed,
        total: index.size
      };
    } catch (error) {
      return sendError(reply, error, logger);
    }
  });

  app.get('/api/audit', { preHandler: requireAuth }, async (request, reply) => {
    const query = auditQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'INVALID_REQUEST', issues: query.error.issues.map(i => i.message) });
    }
    return { records: auditLog.tail(query.data.limit) };
  });

  // Full chain and signature check; reads the whole log
  app.get('/api/audit/verify', { preHandler: requireAuth }, async () => auditLog.verify());

  return app;
}

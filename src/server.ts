// src/server.ts
// Fastify app assembly. main.ts builds the real dependencies and listens;
// tests call buildServer() with in-process stand-ins.
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { config, type AIConfig } from './config';
import {
  createHealthChecks,
  getLogLevel,
  getRequestLogger,
  registerObservability,
  requestIdGenerator,
} from './observability';
import { registerRateLimit } from './middleware/rateLimit';
import type { LlmClient } from './ai/types';
import { createAnalysisServices } from './analysis';
import type { ActsRepository } from './reference/actsRepository';

import analysisRoutes from './routes/analysis';
import healthRoutes from './routes/health';
import metricsRoutes from './routes/metrics';

const SERVICE_NAME = 'contract-sentinel';
const SERVICE_VERSION = process.env.npm_package_version || '1.0.0';

export interface ServerDeps {
  llm: LlmClient;
  acts: ActsRepository;
  /** Defaults to the provider key check against config.ai */
  providerConfigured?: boolean;
  corsOrigins?: readonly string[];
  limits?: { maxTextLength: number; uploadMaxBytes: number };
}

/** Whether the configured provider has what it needs to make calls. */
export function isProviderConfigured(ai: AIConfig): boolean {
  switch (ai.provider) {
    case 'openai':
      return ai.openaiKey.length > 0;
    case 'anthropic':
      return ai.anthropicKey.length > 0;
    case 'dev':
      return true;
  }
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: getLogLevel() },
    // Completion lines come from the request logger hooks
    disableRequestLogging: true,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);

  await app.register(cors, { origin: [...(deps.corsOrigins ?? config.cors.origins)] });

  // Must be before route registration
  await registerRateLimit(app);

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (isClientError(err)) {
      return reply.code(err.statusCode ?? 400).send({
        error: err.code ?? (err.statusCode === 429 ? 'rate_limited' : 'bad_request'),
        message: err.message,
      });
    }
    getRequestLogger(req).error({ err }, 'Unhandled route error');
    return reply.code(500).send({ error: 'internal_error' });
  });

  const services = createAnalysisServices({ llm: deps.llm, acts: deps.acts });
  const health = createHealthChecks({
    provider: deps.llm.provider,
    providerConfigured: deps.providerConfigured ?? isProviderConfigured(config.ai),
    acts: deps.acts,
  });

  app.get('/', async () => ({ name: SERVICE_NAME, version: SERVICE_VERSION }));

  await app.register(analysisRoutes, { services, limits: deps.limits ?? config.limits });
  await app.register(healthRoutes, { health });
  await app.register(metricsRoutes);

  return app;
}

// src/middleware/rateLimit.ts
// Rate limiting for the analysis endpoints

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Per-client limits by route type. Every analysis route makes at least one
 * model call; the full analysis makes three.
 */
export const ANALYSIS_RATE_LIMITS = {
  full: { max: 10, timeWindow: '1 hour' },
  single: { max: 30, timeWindow: '1 hour' },
  clauseDetail: { max: 60, timeWindow: '1 hour' },
};

export type AnalysisRouteType = keyof typeof ANALYSIS_RATE_LIMITS;

/**
 * Rate limit key: x-user-id header when present, client IP otherwise.
 */
export function getClientKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin. Must run before route registration;
 * limits apply only to routes that opt in via getRateLimitConfig().
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 hour',
    keyGenerator: getClientKey,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}

export function getRateLimitConfig(routeType: AnalysisRouteType) {
  return {
    config: {
      rateLimit: ANALYSIS_RATE_LIMITS[routeType],
    },
  };
}

// src/routes/health.ts
// Health check endpoints with Kubernetes probe support.
// - GET /health - Full status with provider and reference data checks
// - GET /health/ready - Readiness probe
// - GET /health/live - Liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { HealthChecks } from "../observability/healthCheck";

export interface HealthRoutesOptions {
  health: HealthChecks;
}

/* ---------- Route Registration ---------- */
export default async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  const { health } = opts;

  /**
   * GET /health
   * 200 when healthy or degraded, 503 when unhealthy
   */
  app.get(
    "/health",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      const status = health.getHealthStatus();
      const statusCode = status.status === "unhealthy" ? 503 : 200;
      return reply.code(statusCode).send(status);
    }
  );

  app.get(
    "/health/ready",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      if (health.isReady()) {
        return reply.code(200).send({ ready: true });
      }
      return reply.code(503).send({ ready: false });
    }
  );

  app.get(
    "/health/live",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      if (health.isAlive()) {
        return reply.code(200).send({ alive: true });
      }
      return reply.code(503).send({ alive: false });
    }
  );
}

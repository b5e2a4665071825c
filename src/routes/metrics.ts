// src/routes/metrics.ts
// GET /metrics: all registered metrics in Prometheus text format.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { registry } from "../observability/metrics";

export default async function metricsRoutes(app: FastifyInstance) {
  app.get(
    "/metrics",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      try {
        const metrics = await registry.metrics();
        return reply
          .header("Content-Type", registry.contentType)
          .send(metrics);
      } catch (err) {
        app.log.error({ err }, "Failed to collect metrics");
        return reply.code(500).send({ error: "metrics_unavailable", message: "Failed to collect metrics" });
      }
    }
  );
}

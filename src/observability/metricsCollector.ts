// src/observability/metricsCollector.ts
// Fastify hooks that collect HTTP metrics at request lifecycle points.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { recordHttpRequest, METRICS_ENABLED } from "./metrics";
import { createLogger } from "./logger";

const log = createLogger("metrics");

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Register metrics collection hooks with Fastify
 */
export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.info("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      // Route pattern when matched, raw URL for 404s
      const routePattern = req.routeOptions.url ?? req.url;

      recordHttpRequest(req.method, routePattern, reply.statusCode, duration);

      requestStartTimes.delete(req);
    }
  );

  log.debug("Metrics collection enabled");
}

// src/observability/index.ts
// Observability exports and combined Fastify registration.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
} from "./requestId";

/* ---------- Request Logger ---------- */
export { registerRequestLogger, getRequestLogger } from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordAiRequest,
  recordJsonRepair,
  recordDocumentExtraction,
  METRICS_ENABLED,
} from "./metrics";

export { registerMetricsCollector } from "./metricsCollector";

/* ---------- Health Checks ---------- */
export {
  createHealthChecks,
  type HealthChecks,
  type HealthDeps,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/**
 * Register request ID, request logging and metrics hooks.
 * Call right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}

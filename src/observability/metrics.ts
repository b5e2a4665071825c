// src/observability/metrics.ts
// Prometheus metrics (prom-client).
// Exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "sentinel";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "contract-sentinel",
});

// Default Node.js metrics (memory, CPU, event loop, etc.)
if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

/* ---------- AI Metrics ---------- */

/**
 * LLM calls made by the analysis orchestrators
 */
export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Total number of AI operation requests",
  labelNames: ["action", "provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "AI operation duration in seconds",
  labelNames: ["action", "provider"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/**
 * Which stage of the JSON repair pipeline produced the result
 */
export const jsonRepairTotal = new Counter({
  name: `${METRICS_PREFIX}_json_repair_total`,
  help: "Model responses by JSON repair stage",
  labelNames: ["stage"] as const,
  registers: [registry],
});

/* ---------- Document Metrics ---------- */

export const documentExtractionsTotal = new Counter({
  name: `${METRICS_PREFIX}_document_extractions_total`,
  help: "Uploaded document text extractions",
  labelNames: ["kind", "status"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe(
    { method, route: normalizeRoute(route) },
    durationMs / 1000
  );
}

export function recordAiRequest(
  action: string,
  provider: string,
  status: "success" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  aiRequestsTotal.inc({ action, provider, status });
  aiRequestDuration.observe({ action, provider }, durationMs / 1000);
}

export function recordJsonRepair(stage: string): void {
  if (!METRICS_ENABLED) return;
  jsonRepairTotal.inc({ stage });
}

export function recordDocumentExtraction(
  kind: string,
  status: "success" | "error"
): void {
  if (!METRICS_ENABLED) return;
  documentExtractionsTotal.inc({ kind, status });
}

/* ---------- Route Normalization ---------- */

/**
 * Strip the query string and collapse numeric segments
 */
function normalizeRoute(route: string): string {
  const path = route.split("?")[0];
  return path.replace(/\/\d+/g, "/:id");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };

// src/observability/requestId.ts
// Request ID generation for log correlation.
// Honors an upstream X-Request-ID header when present.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default

/* ---------- Request ID Generation ---------- */

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Custom request ID generator for Fastify configuration.
 * Use this in Fastify({ genReqId: requestIdGenerator })
 *
 * Note: genReqId receives IncomingMessage, not FastifyRequest
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (typeof incomingId === "string" && incomingId.length > 0) {
    return incomingId;
  }

  return generateRequestId();
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Echo the request ID back on every response.
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}

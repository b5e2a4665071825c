// src/observability/requestLogger.ts
// Request/response logging with timing.
// Captures the caller identity (x-user-id) and the requested output language.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  userId?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function buildRequestContext(req: FastifyRequest): RequestContext {
  const userId = req.headers["x-user-id"];

  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    userId: typeof userId === "string" ? userId : undefined,
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

const requestLoggers = new WeakMap<FastifyRequest, Logger>();
const requestStartTimes = new WeakMap<FastifyRequest, number>();

/* ---------- Fastify Hook Registration ---------- */

/**
 * Register request logging hooks with Fastify
 *
 * Logs:
 * - Request start (debug)
 * - Completion with status code and duration
 * - Handler errors with error details
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());

    const log = createChildLogger(baseLogger, buildRequestContext(req));
    requestLoggers.set(req, log);

    log.debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(getRequestLogger(req), {
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
      requestLoggers.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}

/* ---------- Request Logger Access ---------- */

/**
 * Get the request-scoped logger.
 * Falls back to the base http logger outside the request lifecycle.
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? baseLogger;
}

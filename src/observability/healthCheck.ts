// src/observability/healthCheck.ts
// Health checks for the model provider configuration and the reference
// acts dataset. Supports Kubernetes-style readiness and liveness probes.

import type { ProviderId } from "../ai/types";
import type { ActsRepository } from "../reference/actsRepository";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  error?: string;
}

export interface ProviderCheckResult extends HealthCheckResult {
  provider: ProviderId;
}

export interface ActsCheckResult extends HealthCheckResult {
  acts?: number;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    aiProvider: ProviderCheckResult;
    referenceActs: ActsCheckResult;
  };
}

export interface HealthDeps {
  provider: ProviderId;
  /** False when the provider needs an API key that is not set */
  providerConfigured: boolean;
  acts: ActsRepository;
}

export interface HealthChecks {
  getHealthStatus(): HealthStatus;
  isReady(): boolean;
  isAlive(): boolean;
}

/* ---------- Configuration ---------- */

const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Health Checks ---------- */

function checkProvider(deps: HealthDeps): ProviderCheckResult {
  if (deps.providerConfigured) {
    return { status: "up", provider: deps.provider };
  }
  return { status: "down", provider: deps.provider, error: "API key not configured" };
}

/**
 * Reports the dataset state without loading it.
 */
function checkActs(acts: ActsRepository): ActsCheckResult {
  const state = acts.getState();
  switch (state.status) {
    case "loaded":
      return { status: "up", acts: state.acts.length };
    case "absent":
      return { status: "down", error: state.reason };
    case "not_loaded":
      return { status: "down", error: "not loaded" };
  }
}

/* ---------- Combined Health Check ---------- */

export function createHealthChecks(deps: HealthDeps): HealthChecks {
  function getHealthStatus(): HealthStatus {
    const checks = {
      aiProvider: checkProvider(deps),
      referenceActs: checkActs(deps.acts),
    };

    // Missing reference acts only degrade compliance prompts
    let status: HealthStatus["status"];
    if (checks.aiProvider.status === "down") {
      status = "unhealthy";
    } else if (checks.referenceActs.status === "down") {
      status = "degraded";
    } else {
      status = "healthy";
    }

    if (status !== "healthy") {
      log.debug({ checks }, "Health check not fully up");
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
    };
  }

  return {
    getHealthStatus,

    /** Ready when model calls can be made. */
    isReady: () => getHealthStatus().status !== "unhealthy",

    /** True while the process answers. */
    isAlive: () => true,
  };
}

/**
 * Monitoring Module
 *
 *   - Request metrics middleware (latency, status codes, error rates)
 *   - /api/health endpoint with deep checks (DB, ffmpeg)
 *   - /api/health/live for liveness probes
 *   - /api/health/ready for readiness probes
 */

import type { Express, Request, Response, NextFunction } from "express";
import { sql } from "drizzle-orm";
import type { AppServices } from "../container";
import type { Database } from "../db";
import logger from "../logger";
import { errorMessage } from "../utils/errors";
import { checkFfmpegAvailable } from "../services/video";

// ============================================================================
// Types
// ============================================================================

interface RequestMetrics {
  totalRequests: number;
  totalErrors: number;
  statusCodes: Record<number, number>;
  latencyHistogram: number[]; // last 1000 request latencies (ms)
  startedAt: Date;
}

export interface HealthCheckResult {
  status: "healthy" | "degraded" | "unhealthy";
  uptime: number;
  timestamp: string;
  version: string;
  checks: {
    database: ComponentHealth;
    ffmpeg: ComponentHealth;
  };
  metrics: {
    totalRequests: number;
    totalErrors: number;
    p95LatencyMs: number;
  };
}

export interface ComponentHealth {
  status: "up" | "down" | "unconfigured";
  latencyMs?: number;
  detail?: string;
}

// ============================================================================
// In-memory metrics store (ring buffer for latencies)
// ============================================================================

const metrics: RequestMetrics = {
  totalRequests: 0,
  totalErrors: 0,
  statusCodes: {},
  latencyHistogram: [],
  startedAt: new Date(),
};

const MAX_LATENCY_SAMPLES = 1000;

function recordRequest(statusCode: number, latencyMs: number) {
  metrics.totalRequests++;
  metrics.statusCodes[statusCode] = (metrics.statusCodes[statusCode] || 0) + 1;
  if (statusCode >= 500) metrics.totalErrors++;

  metrics.latencyHistogram.push(latencyMs);
  if (metrics.latencyHistogram.length > MAX_LATENCY_SAMPLES) {
    metrics.latencyHistogram.shift();
  }
}

export function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)];
}

// ============================================================================
// Request metrics middleware
// ============================================================================

export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationNs = Number(process.hrtime.bigint() - start);
      recordRequest(res.statusCode, Math.round(durationNs / 1_000_000));
    });

    next();
  };
}

// ============================================================================
// Health check: deep probe of all dependencies
// ============================================================================

export async function checkDatabase(db: Database | undefined): Promise<ComponentHealth> {
  if (!db) {
    return { status: "unconfigured" };
  }
  const start = Date.now();
  try {
    await db.execute(sql`SELECT 1`);
    return { status: "up", latencyMs: Date.now() - start };
  } catch (err) {
    return { status: "down", latencyMs: Date.now() - start, detail: errorMessage(err) };
  }
}

export async function checkFfmpeg(binaries: { ffmpeg: string; ffprobe: string }): Promise<ComponentHealth> {
  const start = Date.now();
  const result = await checkFfmpegAvailable(binaries);
  if (result.ffmpeg && result.ffprobe) {
    return { status: "up", latencyMs: Date.now() - start };
  }
  return {
    status: "down",
    latencyMs: Date.now() - start,
    detail: `ffmpeg: ${result.ffmpeg}, ffprobe: ${result.ffprobe}`,
  };
}

export async function runHealthCheck(health: AppServices["health"]): Promise<HealthCheckResult> {
  const [database, ffmpeg] = await Promise.all([
    checkDatabase(health.db),
    checkFfmpeg(health.binaries),
  ]);

  // Uploads cannot be processed without ffmpeg, reads still work
  let status: HealthCheckResult["status"] = "healthy";
  if (database.status === "down") status = "unhealthy";
  else if (ffmpeg.status === "down") status = "degraded";

  return {
    status,
    uptime: Math.round((Date.now() - metrics.startedAt.getTime()) / 1000),
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || "unknown",
    checks: { database, ffmpeg },
    metrics: {
      totalRequests: metrics.totalRequests,
      totalErrors: metrics.totalErrors,
      p95LatencyMs: percentile(metrics.latencyHistogram, 95),
    },
  };
}

// ============================================================================
// Route handlers
// ============================================================================

export function registerMonitoringRoutes(app: Express, health: AppServices["health"]) {
  // Liveness probe: always returns 200 if process is running
  app.get("/api/health/live", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Readiness probe: tolerates degraded
  app.get("/api/health/ready", async (_req, res) => {
    const result = await runHealthCheck(health);
    res.status(result.status === "unhealthy" ? 503 : 200).json(result);
  });

  // Deep health check: every dependency must be up
  app.get("/api/health", async (_req, res) => {
    const result = await runHealthCheck(health);
    res.status(result.status === "healthy" ? 200 : 503).json(result);
  });

  logger.info("[Monitoring] Health and metrics routes registered");
}

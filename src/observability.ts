/**
 * Operational logging (pino) and metrics (Prometheus). Kept apart from the
 * audit access log.
 */

import pino, { type Logger } from "pino";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { LogConfig } from "./config";

export type { Logger };

export const SERVICE_NAME = "swiss-qr-service";

// ============================================================================
// Pino Logger
// ============================================================================

export function createLogger(config: LogConfig): Logger {
  return pino({
    level: config.level,
    transport: config.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    base: {
      service: SERVICE_NAME,
      env: process.env.NODE_ENV || "development",
    },
  });
}

export function remoteAddressOf(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Logs every request before it is dispatched and again once the response
 * has finished.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;

    logger.info(
      { method: req.method, path, query: req.query, remoteAddress: remoteAddressOf(req) },
      `${req.method} request to ${path}`
    );

    res.on("finish", () => {
      const durationMs = Date.now() - start;
      logger.info({ path, status: res.statusCode, durationMs }, `Request ${path} completed in ${durationMs}ms.`);
    });

    next();
  };
}

// ============================================================================
// Prometheus Metrics
// ============================================================================

type DispatchLabel = "method" | "route" | "status";

export interface DispatchMetrics {
  readonly requests: Counter<DispatchLabel>;
  readonly duration: Histogram<DispatchLabel>;
}

export interface Metrics {
  readonly registry: Registry;
  readonly dispatch: DispatchMetrics;
}

export interface MetricsOptions {
  registry?: Registry;
  /** Process metrics (CPU, memory, event loop). */
  collectDefaults?: boolean;
}

/**
 * Builds a fresh registry per app so that several apps (tests) never
 * collide on metric names.
 */
export function createMetrics(options: MetricsOptions = {}): Metrics {
  const registry = options.registry ?? new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix: "qr_" });
  }

  const requests = new Counter({
    name: "qr_dispatched_requests_total",
    help: "Total number of requests dispatched to a route",
    labelNames: ["method", "route", "status"] as const,
    registers: [registry],
  });

  const duration = new Histogram({
    name: "qr_dispatch_duration_ms",
    help: "Duration of dispatched requests in milliseconds",
    labelNames: ["method", "route", "status"] as const,
    buckets: [5, 10, 50, 100, 200, 500, 1000, 2000, 5000],
    registers: [registry],
  });

  return { registry, dispatch: { requests, duration } };
}

export function metricsHandler(registry: Registry, logger: Logger): RequestHandler {
  return (req: Request, res: Response) => {
    registry
      .metrics()
      .then((body) => {
        res.set("Content-Type", registry.contentType);
        res.end(body);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, "Error collecting metrics");
        res.status(500).end("Error collecting metrics");
      });
  };
}

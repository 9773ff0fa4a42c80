/**
 * Express application wiring. Everything the app needs is passed in, so
 * tests build it in-process against in-memory stores.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import type { Logger } from "pino";
import swaggerUi from "swagger-ui-express";
import { AccessManager } from "./auth/accessManager";
import type { DataAccessLayer } from "./db/dataAccessLayer";
import { RouteNotFoundError, translateError } from "./errors";
import { defaultHandlers } from "./handlers";
import { createMetrics, metricsHandler, requestLogger, SERVICE_NAME } from "./observability";
import { buildOpenApiDocument, DEFAULT_API_INFO, type ApiInfo } from "./openapi";
import { DEFAULT_BODY_LIMIT, Dispatcher } from "./routing/dispatcher";
import type { RestHandler } from "./routing/handlers";
import { PUBLIC_API_PREFIX, RouteTable } from "./routing/routeTable";

export interface AppDependencies {
  dataAccessLayer: DataAccessLayer;
  logger: Logger;
  handlers?: RestHandler[];
  /** Redirect plain-HTTP requests to https. */
  enforceSsl?: boolean;
  collectDefaultMetrics?: boolean;
  /** Largest accepted public API request body, e.g. "10mb". */
  bodyLimit?: string;
  apiInfo?: ApiInfo;
}

export interface ServiceApp {
  app: express.Express;
  routes: RouteTable;
  dispatcher: Dispatcher;
}

export function enforceSsl(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (req.secure) {
      next();
      return;
    }
    res.redirect(301, `https://${req.hostname}${req.originalUrl}`);
  };
}

/**
 * Builds the app. Throws RouteConflictError when two handlers claim the
 * same verb and path.
 */
export function createApp(deps: AppDependencies): ServiceApp {
  const { dataAccessLayer, logger } = deps;
  const routes = RouteTable.build(deps.handlers ?? defaultHandlers());
  const metrics = createMetrics({ collectDefaults: deps.collectDefaultMetrics ?? true });
  const dispatcher = new Dispatcher({
    routes,
    accessManager: new AccessManager(dataAccessLayer.tokenStore),
    dataAccessLayer,
    logger,
    metrics: metrics.dispatch,
    bodyLimit: deps.bodyLimit ?? DEFAULT_BODY_LIMIT,
  });
  const openApi = buildOpenApiDocument(routes, deps.apiInfo ?? DEFAULT_API_INFO);

  const app = express();

  // Middleware
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(cors());
  app.use(requestLogger(logger));
  if (deps.enforceSsl) {
    app.use(enforceSsl());
  }

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME, routes: routes.size, timestamp: new Date().toISOString() });
  });

  app.get("/swagger-docs", (req, res) => {
    res.json(openApi);
  });
  app.use("/swagger-ui", swaggerUi.serve, swaggerUi.setup(openApi));

  app.get("/metrics", metricsHandler(metrics.registry, logger));

  // Public API: bodies are handed to handlers as raw bytes.
  app.use(PUBLIC_API_PREFIX, dispatcher.router());

  // 404 handler
  app.use((req, res) => {
    res.status(404).json(new RouteNotFoundError().toStatus());
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error({ err, req: { method: req.method, url: req.originalUrl } }, `Exception during handling of request to ${req.path}`);
    if (res.headersSent) {
      return next(err);
    }
    const body = translateError(err);
    res.status(body.code).json(body);
  });

  return { app, routes, dispatcher };
}

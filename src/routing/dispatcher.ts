/**
 * Per-request pipeline: route → read body → authorize → handle → respond →
 * record.
 *
 * Every routed request ends with exactly one access record carrying the
 * final status code, whether it was denied, handled, failed or had its body
 * rejected. Unrouted requests fall through to the 404 handler and are not
 * recorded.
 */

import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
  type Router,
} from "express";
import type { Logger } from "pino";
import { AccessManager, extractSecret } from "../auth/accessManager";
import type { DataAccessLayer } from "../db/dataAccessLayer";
import {
  AuditWriteFailureError,
  HandlerFailureError,
  MalformedBodyError,
  PayloadTooLargeError,
  RouteNotFoundError,
  ServiceError,
  TokenLookupError,
} from "../errors";
import { NO_TOKEN, type AccessRecord } from "../models/access";
import type { Token } from "../models/token";
import type { DispatchMetrics } from "../observability";
import { remoteAddressOf } from "../observability";
import { attempt } from "../utils/result";
import { invokeHandler, json, type HandlerResponse, type QueryParams, type RequestContext } from "./handlers";
import type { RouteEntry, RouteTable } from "./routeTable";

export const DEFAULT_BODY_LIMIT = "10mb";

export interface InboundRequest {
  readonly method: string;
  readonly path: string;
  readonly query: QueryParams;
  readonly authorization: string | undefined;
  readonly contentType: string | undefined;
  readonly body: Buffer;
  readonly remoteAddress: string;
}

export interface DispatchOutcome {
  readonly route: RouteEntry;
  /** Token to attribute the request to, if one was resolved. */
  readonly token: Token | null;
  readonly response: HandlerResponse;
  readonly startedAt: number;
}

export interface DispatcherDeps {
  routes: RouteTable;
  accessManager: AccessManager;
  dataAccessLayer: DataAccessLayer;
  logger: Logger;
  metrics?: DispatchMetrics;
  clock?: () => number;
  /** Largest accepted request body, in body-parser notation. */
  bodyLimit?: string;
}

interface RoutedRequest {
  readonly route: RouteEntry;
  readonly startedAt: number;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export class Dispatcher {
  private readonly routes: RouteTable;
  private readonly accessManager: AccessManager;
  private readonly dataAccessLayer: DataAccessLayer;
  private readonly logger: Logger;
  private readonly metrics: DispatchMetrics | undefined;
  private readonly clock: () => number;
  private readonly bodyLimit: string;

  private readonly routed = new WeakMap<Request, RoutedRequest>();
  private lastTimestamp = 0;
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(deps: DispatcherDeps) {
    this.routes = deps.routes;
    this.accessManager = deps.accessManager;
    this.dataAccessLayer = deps.dataAccessLayer;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? Date.now;
    this.bodyLimit = deps.bodyLimit ?? DEFAULT_BODY_LIMIT;
  }

  /** Clock reading that never goes below one already handed out. */
  private now(): number {
    this.lastTimestamp = Math.max(this.clock(), this.lastTimestamp);
    return this.lastTimestamp;
  }

  private begin(): void {
    this.inFlight++;
  }

  private end(): void {
    this.inFlight--;
    if (this.inFlight === 0) {
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve();
      }
    }
  }

  /** Resolves once every routed request in progress has been recorded. */
  drain(): Promise<void> {
    if (this.inFlight === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Resolves, authorizes and handles one request. Returns null when no
   * route matches. Never rejects because of a handler or token store
   * failure.
   */
  async dispatch(request: InboundRequest): Promise<DispatchOutcome | null> {
    const route = this.routes.match(request.method, request.path);
    if (route === undefined) {
      return null;
    }
    return this.handle(route, request, this.now());
  }

  private async handle(route: RouteEntry, request: InboundRequest, startedAt: number): Promise<DispatchOutcome> {
    const lookup = await attempt(() =>
      this.accessManager.authorize(extractSecret(request.authorization), route.requiredPermissions)
    );
    if (!lookup.ok) {
      const failure = new TokenLookupError(lookup.error);
      this.logger.error({ err: lookup.error, path: request.path }, `Token lookup failed for request to ${request.path}`);
      return { route, token: null, response: json(failure.toStatus(), failure.status), startedAt };
    }

    const authorization = lookup.value;
    if (!authorization.ok) {
      const denied = authorization.error;
      this.logger.warn(
        { path: request.path, method: request.method, tokenId: denied.token?.id ?? NO_TOKEN },
        "Unauthorized request"
      );
      return { route, token: denied.token, response: json(denied.toStatus(), denied.status), startedAt };
    }

    const token = authorization.value;
    const ctx: RequestContext = {
      method: route.verb,
      path: request.path,
      query: request.query,
      contentType: request.contentType,
      body: request.body,
      remoteAddress: request.remoteAddress,
      token,
    };

    const result = await attempt(() => invokeHandler(route.handler, ctx));
    if (!result.ok) {
      const failure = new HandlerFailureError(request.path, result.error);
      this.logger.error({ err: result.error, path: request.path }, `Exception during handling of request to ${request.path}`);
      return { route, token, response: json(failure.toStatus(), failure.status), startedAt };
    }

    return { route, token, response: result.value, startedAt };
  }

  /**
   * Stage run once the response has been written. Appends the access record;
   * a failing append is logged and otherwise ignored.
   */
  async onResponseFinalized(outcome: DispatchOutcome, request: InboundRequest, statusCode: number): Promise<void> {
    const timestamp = this.now();
    const record: AccessRecord = {
      tokenId: outcome.token?.id ?? NO_TOKEN,
      remoteAddress: request.remoteAddress,
      path: request.path,
      method: request.method,
      statusCode,
      timestamp,
    };

    if (this.metrics !== undefined) {
      const labels = { method: outcome.route.verb, route: outcome.route.path, status: String(statusCode) };
      this.metrics.requests.inc(labels);
      this.metrics.duration.observe(labels, timestamp - outcome.startedAt);
    }

    const appended = await attempt(() => this.dataAccessLayer.accessLogs.append(record));
    if (!appended.ok) {
      const failure = new AuditWriteFailureError(appended.error);
      this.logger.error({ err: appended.error, record }, failure.message);
    }
  }

  /** Whole cycle without a transport, as the HTTP layer would run it. */
  async serve(request: InboundRequest): Promise<HandlerResponse> {
    const route = this.routes.match(request.method, request.path);
    if (route === undefined) {
      const notFound = new RouteNotFoundError();
      return json(notFound.toStatus(), notFound.status);
    }
    this.begin();
    try {
      const outcome = await this.handle(route, request, this.now());
      await this.onResponseFinalized(outcome, request, outcome.response.status);
      return outcome.response;
    } finally {
      this.end();
    }
  }

  /** Maps an error raised on a routed request outside the handler. */
  failureFor(path: string, error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }
    const status = statusOf(error);
    if (status === 413) {
      return new PayloadTooLargeError(this.bodyLimit, { cause: error });
    }
    if (status !== undefined && status >= 400 && status < 500) {
      return new MalformedBodyError(error, status);
    }
    return new HandlerFailureError(path, error);
  }

  /**
   * Express binding, to be mounted below the public prefix. Unmatched
   * requests leave the router untouched; matched ones have their body read
   * as raw bytes and are recorded whatever happens afterwards.
   */
  router(): Router {
    const router = express.Router();
    router.use(
      this.matchRoute(),
      express.raw({ type: () => true, limit: this.bodyLimit }),
      this.handleRouted(),
      this.handleRoutedError()
    );
    return router;
  }

  private matchRoute(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const route = this.routes.match(req.method, req.baseUrl + req.path);
      if (route === undefined) {
        next("router");
        return;
      }
      this.routed.set(req, { route, startedAt: this.now() });
      this.begin();
      next();
    };
  }

  private handleRouted(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const routed = this.routed.get(req);
      if (routed === undefined) {
        next();
        return;
      }
      const request = toInboundRequest(req);
      this.handle(routed.route, request, routed.startedAt)
        .then(async (outcome) => {
          writeResponse(res, outcome.response);
          await this.finalize(req, outcome, request, res.statusCode);
        })
        .catch(next);
    };
  }

  /** Body rejections and anything else thrown on a routed request. */
  private handleRoutedError(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction) => {
      const routed = this.routed.get(req);
      if (routed === undefined) {
        next(err);
        return;
      }
      const request = toInboundRequest(req);
      if (res.headersSent) {
        this.release(req);
        next(err);
        return;
      }

      const failure = this.failureFor(request.path, err);
      if (failure.status >= 500) {
        this.logger.error({ err, path: request.path }, `Exception during handling of request to ${request.path}`);
      } else {
        this.logger.warn({ err, path: request.path }, failure.message);
      }
      const outcome: DispatchOutcome = {
        route: routed.route,
        token: null,
        response: json(failure.toStatus(), failure.status),
        startedAt: routed.startedAt,
      };
      writeResponse(res, outcome.response);
      this.finalize(req, outcome, request, res.statusCode).catch(next);
    };
  }

  private async finalize(req: Request, outcome: DispatchOutcome, request: InboundRequest, statusCode: number): Promise<void> {
    try {
      await this.onResponseFinalized(outcome, request, statusCode);
    } finally {
      this.release(req);
    }
  }

  private release(req: Request): void {
    if (this.routed.delete(req)) {
      this.end();
    }
  }
}

export function flattenQuery(query: Request["query"]): QueryParams {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") {
      flat[key] = value;
    } else if (Array.isArray(value)) {
      const first: unknown = value[0];
      if (typeof first === "string") {
        flat[key] = first;
      }
    }
  }
  return flat;
}

export function toInboundRequest(req: Request): InboundRequest {
  return {
    method: req.method,
    path: req.baseUrl + req.path,
    query: flattenQuery(req.query),
    authorization: req.get("authorization"),
    contentType: req.get("content-type"),
    body: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
    remoteAddress: remoteAddressOf(req),
  };
}

function writeResponse(res: Response, response: HandlerResponse): void {
  switch (response.kind) {
    case "json":
      res.status(response.status).json(response.body);
      return;
    case "binary":
      res.status(response.status).type(response.contentType).send(response.data);
      return;
  }
}

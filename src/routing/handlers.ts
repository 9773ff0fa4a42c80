/**
 * Capability-typed REST handlers. A handler is exactly one of the four verb
 * variants; the dispatcher switches on `verb` to call it.
 */

import type { Permission, Token } from "../models/token";
import { errorStatus } from "../models/status";

export const HTTP_VERBS = ["GET", "POST", "PATCH", "DELETE"] as const;

export type HttpVerb = (typeof HTTP_VERBS)[number];

export function isHttpVerb(value: string): value is HttpVerb {
  return (HTTP_VERBS as readonly string[]).includes(value);
}

export type QueryParams = Readonly<Record<string, string>>;

export interface RequestContext {
  readonly method: HttpVerb;
  readonly path: string;
  readonly query: QueryParams;
  readonly contentType: string | undefined;
  /** Raw request body; empty when the request had none. */
  readonly body: Buffer;
  readonly remoteAddress: string;
  readonly token: Token | null;
}

export interface JsonResponse {
  readonly kind: "json";
  readonly status: number;
  readonly body: unknown;
}

export interface BinaryResponse {
  readonly kind: "binary";
  readonly status: number;
  readonly contentType: string;
  readonly data: Buffer;
}

export type HandlerResponse = JsonResponse | BinaryResponse;

export function json(body: unknown, status = 200): JsonResponse {
  return { kind: "json", status, body };
}

export function binary(contentType: string, data: Buffer, status = 200): BinaryResponse {
  return { kind: "binary", status, contentType, data };
}

export function badRequest(message: string): JsonResponse {
  return json(errorStatus(400, message), 400);
}

// ----------------------------------------------------------------------------
// OpenAPI metadata declared by each handler
// ----------------------------------------------------------------------------

export type JsonSchema = Readonly<Record<string, unknown>>;

export interface ParameterDoc {
  readonly name: string;
  readonly description?: string;
  readonly required?: boolean;
  readonly schema: JsonSchema;
}

export interface ContentDoc {
  readonly contentType: string;
  readonly schema: JsonSchema;
}

export interface ResponseDoc {
  readonly description: string;
  readonly content?: readonly ContentDoc[];
}

export interface HandlerDoc {
  readonly summary: string;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly parameters?: readonly ParameterDoc[];
  readonly requestBody?: ContentDoc;
  readonly responses: Readonly<Record<number, ResponseDoc>>;
}

// ----------------------------------------------------------------------------
// Handler variants
// ----------------------------------------------------------------------------

interface RestHandlerBase {
  /** Path segment below the public API prefix, e.g. "generate". */
  readonly route: string;
  readonly requiredPermissions: ReadonlySet<Permission>;
  readonly doc: HandlerDoc;
}

export interface GetRestHandler extends RestHandlerBase {
  readonly verb: "GET";
  get(ctx: RequestContext): Promise<HandlerResponse>;
}

export interface PostRestHandler extends RestHandlerBase {
  readonly verb: "POST";
  post(ctx: RequestContext): Promise<HandlerResponse>;
}

export interface PatchRestHandler extends RestHandlerBase {
  readonly verb: "PATCH";
  patch(ctx: RequestContext): Promise<HandlerResponse>;
}

export interface DeleteRestHandler extends RestHandlerBase {
  readonly verb: "DELETE";
  delete(ctx: RequestContext): Promise<HandlerResponse>;
}

export type RestHandler = GetRestHandler | PostRestHandler | PatchRestHandler | DeleteRestHandler;

export function invokeHandler(handler: RestHandler, ctx: RequestContext): Promise<HandlerResponse> {
  switch (handler.verb) {
    case "GET":
      return handler.get(ctx);
    case "POST":
      return handler.post(ctx);
    case "PATCH":
      return handler.patch(ctx);
    case "DELETE":
      return handler.delete(ctx);
  }
}

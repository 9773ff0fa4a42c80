/**
 * OpenAPI 3 description of the public API, derived from the route table.
 */

import type { ContentDoc, ResponseDoc } from "./routing/handlers";
import type { RouteEntry, RouteTable } from "./routing/routeTable";
import { ErrorStatusJsonSchema } from "./schemas/jsonSchemas";

export interface ApiContact {
  name?: string;
  email?: string;
  url?: string;
}

export interface ApiInfo {
  title: string;
  version: string;
  description?: string;
  contact?: ApiContact;
}

export const DEFAULT_API_INFO: ApiInfo = {
  title: "Swiss QR Web Service",
  version: "1.0.0",
  description: "Generates and reads Swiss QR-bill payment codes.",
};

type OpenApiObject = Record<string, unknown>;

function contentOf(entries: readonly ContentDoc[]): OpenApiObject {
  const content: OpenApiObject = {};
  for (const entry of entries) {
    content[entry.contentType] = { schema: entry.schema };
  }
  return content;
}

function responseOf(doc: ResponseDoc): OpenApiObject {
  return doc.content === undefined
    ? { description: doc.description }
    : { description: doc.description, content: contentOf(doc.content) };
}

const errorResponse = (description: string): OpenApiObject => ({
  description,
  content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorStatus" } } },
});

function operationOf(entry: RouteEntry): OpenApiObject {
  const { doc } = entry.handler;
  const responses: OpenApiObject = {};
  for (const [status, response] of Object.entries(doc.responses)) {
    responses[status] = responseOf(response);
  }
  responses["401"] = errorResponse("Unauthorized request!");
  responses["500"] = errorResponse("Internal server error");

  const operation: OpenApiObject = {
    summary: doc.summary,
    operationId: `${entry.verb.toLowerCase()}${entry.path.replace(/[^A-Za-z0-9]+(.)?/g, (_, c: string | undefined) => (c ?? "").toUpperCase())}`,
    tags: doc.tags ?? [],
    parameters: (doc.parameters ?? []).map((parameter) => ({
      in: "query",
      name: parameter.name,
      description: parameter.description,
      required: parameter.required ?? false,
      schema: parameter.schema,
    })),
    responses,
    security: entry.requiredPermissions.size > 0 ? [{ bearerAuth: [] }] : [],
    "x-required-permissions": [...entry.requiredPermissions],
  };
  if (doc.description !== undefined) {
    operation.description = doc.description;
  }
  if (doc.requestBody !== undefined) {
    operation.requestBody = { required: true, content: contentOf([doc.requestBody]) };
  }
  return operation;
}

export function buildOpenApiDocument(routes: RouteTable, info: ApiInfo = DEFAULT_API_INFO): OpenApiObject {
  const paths: Record<string, OpenApiObject> = {};
  for (const entry of routes.list()) {
    const item = paths[entry.path] ?? {};
    item[entry.verb.toLowerCase()] = operationOf(entry);
    paths[entry.path] = item;
  }

  return {
    openapi: "3.0.3",
    info,
    paths,
    components: {
      schemas: { ErrorStatus: ErrorStatusJsonSchema },
      securitySchemes: {
        bearerAuth: { type: "http", scheme: "bearer", description: "Token secret, optionally prefixed with \"Bearer \"" },
      },
    },
  };
}

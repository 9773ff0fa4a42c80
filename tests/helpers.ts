import pino from "pino";
import { Writable } from "stream";
import { DataAccessLayer } from "../src/db/dataAccessLayer";
import type { Permission, Token } from "../src/models/token";
import { InMemoryAccessLog } from "../src/repositories/accessLog";
import { InMemoryTokenStore } from "../src/repositories/tokenStore";
import type { InboundRequest } from "../src/routing/dispatcher";
import type {
  GetRestHandler,
  HandlerResponse,
  PostRestHandler,
  RequestContext,
} from "../src/routing/handlers";
import type { BillInput } from "../src/schemas/bill";

export const silentLogger = pino({ level: "silent" });

export function makeToken(id: string, secret: string, permissions: Permission[], createdAt = 0): Token {
  return { id, secret, permissions: new Set(permissions), createdAt };
}

export function memoryLayer(tokens: Token[] = []) {
  const tokenStore = new InMemoryTokenStore(tokens);
  const accessLog = new InMemoryAccessLog();
  const dataAccessLayer = new DataAccessLayer(tokenStore, accessLog);
  return { tokenStore, accessLog, dataAccessLayer };
}

type Impl = (ctx: RequestContext) => Promise<HandlerResponse>;

export function stubGet(route: string, permissions: Permission[], impl: Impl): GetRestHandler {
  return {
    verb: "GET",
    route,
    requiredPermissions: new Set(permissions),
    doc: { summary: `GET ${route}`, responses: { 200: { description: "ok" } } },
    get: impl,
  };
}

export function stubPost(route: string, permissions: Permission[], impl: Impl): PostRestHandler {
  return {
    verb: "POST",
    route,
    requiredPermissions: new Set(permissions),
    doc: { summary: `POST ${route}`, responses: { 200: { description: "ok" } } },
    post: impl,
  };
}

export function inbound(overrides: Partial<InboundRequest> & Pick<InboundRequest, "method" | "path">): InboundRequest {
  return {
    query: {},
    authorization: undefined,
    contentType: undefined,
    body: Buffer.alloc(0),
    remoteAddress: "10.0.0.1",
    ...overrides,
  };
}

export function captureOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

export const sampleBill: BillInput = {
  account: "CH58 0077 7000 1234 5678 9",
  creditor: {
    name: "Example Pottery AG",
    street: "Bahnhofstrasse",
    buildingNumber: "1",
    postalCode: "8001",
    town: "Zurich",
    country: "CH",
  },
  amount: 150.5,
  currency: "CHF",
  debtor: {
    name: "Jane Placeholder",
    postalCode: "3000",
    town: "Bern",
    country: "CH",
  },
  referenceType: "SCOR",
  reference: "RF27INVOICE2026",
  unstructuredMessage: "Order 42",
};

/** `sampleBill` after validation and normalization. */
export const sampleBillParsed = {
  account: "CH5800777000123456789",
  creditor: {
    name: "Example Pottery AG",
    street: "Bahnhofstrasse",
    buildingNumber: "1",
    postalCode: "8001",
    town: "Zurich",
    country: "CH",
  },
  amount: 150.5,
  currency: "CHF",
  debtor: {
    name: "Jane Placeholder",
    postalCode: "3000",
    town: "Bern",
    country: "CH",
  },
  referenceType: "SCOR",
  reference: "RF27INVOICE2026",
  unstructuredMessage: "Order 42",
};

import { RouteConflictError } from "../errors";
import type { Permission } from "../models/token";
import type { HttpVerb, RestHandler } from "./handlers";

export const PUBLIC_API_PREFIX = "/api/public";

export interface RouteEntry {
  readonly verb: HttpVerb;
  /** Full path, e.g. "/api/public/generate". */
  readonly path: string;
  readonly requiredPermissions: ReadonlySet<Permission>;
  readonly handler: RestHandler;
}

function joinPath(prefix: string, segment: string): string {
  const trimmed = segment.replace(/^\/+|\/+$/g, "");
  return trimmed === "" ? prefix : `${prefix}/${trimmed}`;
}

/** Drops a trailing slash so "/x/" and "/x" resolve alike. */
export function normalizePath(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, "") : path;
}

function keyOf(verb: string, path: string): string {
  return `${verb} ${path}`;
}

/**
 * At most one handler per (verb, path). Filled once at start-up, then
 * sealed.
 */
export class RouteTable {
  private readonly entries = new Map<string, RouteEntry>();
  private sealed = false;

  constructor(readonly prefix: string = PUBLIC_API_PREFIX) {}

  static build(handlers: Iterable<RestHandler>, prefix: string = PUBLIC_API_PREFIX): RouteTable {
    const table = new RouteTable(prefix);
    for (const handler of handlers) {
      table.register(handler);
    }
    return table.seal();
  }

  register(handler: RestHandler): RouteEntry {
    if (this.sealed) {
      throw new Error("Route table is sealed; routes can only be registered at start-up");
    }
    const path = joinPath(this.prefix, handler.route);
    const key = keyOf(handler.verb, path);
    if (this.entries.has(key)) {
      throw new RouteConflictError(handler.verb, path);
    }
    const entry: RouteEntry = Object.freeze({
      verb: handler.verb,
      path,
      requiredPermissions: handler.requiredPermissions,
      handler,
    });
    this.entries.set(key, entry);
    return entry;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  match(verb: string, path: string): RouteEntry | undefined {
    return this.entries.get(keyOf(verb.toUpperCase(), normalizePath(path)));
  }

  list(): RouteEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

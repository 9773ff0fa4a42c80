import { MalformedBodyError } from "../errors";
import type { RequestContext } from "../routing/handlers";
import { attemptSync, err, type Result } from "../utils/result";

/** Parses the raw request body as JSON. */
export function readJsonBody(ctx: RequestContext): Result<unknown, MalformedBodyError> {
  if (ctx.body.length === 0) {
    return err(new MalformedBodyError(new Error("request body is empty")));
  }
  const parsed = attemptSync((): unknown => JSON.parse(ctx.body.toString("utf8")));
  return parsed.ok ? parsed : err(new MalformedBodyError(parsed.error));
}

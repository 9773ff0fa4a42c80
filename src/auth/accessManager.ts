/**
 * Resolves bearer secrets to tokens and checks them against a route's
 * required permissions.
 */

import { UnauthorizedError } from "../errors";
import { grantsAll, type Permission, type Token } from "../models/token";
import type { TokenStore } from "../repositories/tokenStore";
import { err, ok, type Result } from "../utils/result";

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Secret carried by an Authorization header. An optional `Bearer ` prefix
 * is dropped; a missing header yields the empty string.
 */
export function extractSecret(header: string | undefined): string {
  if (header === undefined) {
    return "";
  }
  return header.trim().replace(BEARER_PREFIX, "").trim();
}

export class AccessManager {
  constructor(private readonly tokens: TokenStore) {}

  /**
   * Ok carries the resolved token (null only for anonymous routes called
   * without a known secret). Err carries the token matched during lookup,
   * if any, so the denial can still be attributed.
   */
  async authorize(
    presentedSecret: string,
    required: ReadonlySet<Permission>
  ): Promise<Result<Token | null, UnauthorizedError>> {
    const token = await this.tokens.findBySecret(presentedSecret);

    if (required.size === 0) {
      return ok(token);
    }
    if (token === null || !grantsAll(token, required)) {
      return err(new UnauthorizedError(token));
    }
    return ok(token);
  }
}

import crypto from "crypto";
import { v4 as uuidv4 } from "uuid";
import type { Permission, Token } from "../models/token";

export interface TokenStore {
  /** Exact-match lookup on the secret. */
  findBySecret(secret: string): Promise<Token | null>;
  list(): Promise<Token[]>;
  issue(permissions: Iterable<Permission>): Promise<Token>;
  revoke(id: string): Promise<boolean>;
}

export function generateToken(permissions: Iterable<Permission>, now: number = Date.now()): Token {
  return {
    id: uuidv4(),
    secret: crypto.randomBytes(24).toString("hex"),
    permissions: new Set(permissions),
    createdAt: now,
  };
}

/**
 * Copy-on-write store: writers swap in a new map, so a lookup that is in
 * flight keeps reading the snapshot it started with.
 */
export class InMemoryTokenStore implements TokenStore {
  private bySecret: ReadonlyMap<string, Token>;

  constructor(tokens: Iterable<Token> = []) {
    const initial = new Map<string, Token>();
    for (const token of tokens) {
      if (initial.has(token.secret)) {
        throw new Error(`Duplicate token secret for token ${token.id}`);
      }
      initial.set(token.secret, token);
    }
    this.bySecret = initial;
  }

  async findBySecret(secret: string): Promise<Token | null> {
    if (secret === "") {
      return null;
    }
    return this.bySecret.get(secret) ?? null;
  }

  async list(): Promise<Token[]> {
    return [...this.bySecret.values()].sort((a, b) => a.createdAt - b.createdAt);
  }

  async issue(permissions: Iterable<Permission>): Promise<Token> {
    let token = generateToken(permissions);
    while (this.bySecret.has(token.secret)) {
      token = generateToken(token.permissions);
    }
    const next = new Map(this.bySecret);
    next.set(token.secret, token);
    this.bySecret = next;
    return token;
  }

  async revoke(id: string): Promise<boolean> {
    const next = new Map(this.bySecret);
    let removed = false;
    for (const [secret, token] of next) {
      if (token.id === id) {
        next.delete(secret);
        removed = true;
      }
    }
    if (removed) {
      this.bySecret = next;
    }
    return removed;
  }
}

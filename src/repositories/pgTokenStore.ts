import { z } from "zod";
import type { Queryable } from "../db/queryable";
import { isPermission, type Permission, type Token } from "../models/token";
import { generateToken, type TokenStore } from "./tokenStore";

const TokenRowSchema = z.object({
  id: z.string(),
  secret: z.string(),
  permissions: z.array(z.string()),
  created_at: z.coerce.date(),
});

type TokenRow = z.infer<typeof TokenRowSchema>;

function toToken(row: TokenRow): Token {
  return {
    id: row.id,
    secret: row.secret,
    permissions: new Set(row.permissions.filter(isPermission)),
    createdAt: row.created_at.getTime(),
  };
}

const SELECT_ACTIVE = `SELECT id, secret, permissions, created_at FROM api_tokens WHERE revoked_at IS NULL`;

export class PgTokenStore implements TokenStore {
  constructor(private readonly db: Queryable) {}

  async findBySecret(secret: string): Promise<Token | null> {
    if (secret === "") {
      return null;
    }
    const { rows } = await this.db.query(`${SELECT_ACTIVE} AND secret = $1`, [secret]);
    return rows.length > 0 ? toToken(TokenRowSchema.parse(rows[0])) : null;
  }

  async list(): Promise<Token[]> {
    const { rows } = await this.db.query(`${SELECT_ACTIVE} ORDER BY created_at ASC`);
    return rows.map((row) => toToken(TokenRowSchema.parse(row)));
  }

  async issue(permissions: Iterable<Permission>): Promise<Token> {
    const token = generateToken(permissions);
    await this.db.query(
      `INSERT INTO api_tokens (id, secret, permissions, created_at) VALUES ($1, $2, $3, $4)`,
      [token.id, token.secret, [...token.permissions], new Date(token.createdAt)]
    );
    return token;
  }

  async revoke(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE api_tokens SET revoked_at = now() WHERE id = $1 AND revoked_at IS NULL`,
      [id]
    );
    return (rowCount ?? 0) > 0;
  }
}

/**
 * Bearer tokens and the permission atoms they grant.
 */

export const PERMISSIONS = ["qr:generate", "qr:scan"] as const;

export type Permission = (typeof PERMISSIONS)[number];

export function isPermission(value: string): value is Permission {
  return (PERMISSIONS as readonly string[]).includes(value);
}

export interface Token {
  readonly id: string;
  /** Opaque bearer string presented in the Authorization header. */
  readonly secret: string;
  readonly permissions: ReadonlySet<Permission>;
  /** Milliseconds since epoch. */
  readonly createdAt: number;
}

/**
 * True iff the token grants every permission in `required`.
 * An empty requirement is satisfied by any token.
 */
export function grantsAll(token: Token, required: ReadonlySet<Permission>): boolean {
  for (const permission of required) {
    if (!token.permissions.has(permission)) {
      return false;
    }
  }
  return true;
}

export const QR_GENERATE: Permission = "qr:generate";
export const QR_SCAN: Permission = "qr:scan";

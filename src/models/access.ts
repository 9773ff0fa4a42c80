/**
 * Audit trail entry, one per completed routed request.
 */

/** Recorded as tokenId when no token was resolved for the request. */
export const NO_TOKEN = "no token";

export interface AccessRecord {
  readonly tokenId: string;
  readonly remoteAddress: string;
  readonly path: string;
  readonly method: string;
  readonly statusCode: number;
  /** Milliseconds since epoch. */
  readonly timestamp: number;
}

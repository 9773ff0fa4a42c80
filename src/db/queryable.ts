/**
 * The slice of a pg Pool the repositories use. Rows come back untyped and
 * are validated by each repository.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

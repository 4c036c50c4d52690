import type { Pool, PoolClient } from 'pg';

export type SqlRow = Record<string, unknown>;

/**
 * The slice of a Postgres driver the stores need: one parameterized statement per call.
 */
export interface SqlClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: SqlRow[] }>;
}

/**
 * Runs statements on a `pg` pool (one pooled connection per statement) or on a checked-out client.
 */
export class PgSqlClient implements SqlClient {
  constructor(private readonly pool: Pool | PoolClient) {}

  async query(sql: string, params: unknown[] = []): Promise<{ rows: SqlRow[] }> {
    const result = await this.pool.query<SqlRow>(sql, params);

    return { rows: result.rows };
  }
}

const PG_UNIQUE_VIOLATION = '23505';

/**
 * Checks if an error is a PostgreSQL unique constraint violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  const isErrorObject = typeof error === 'object' && error !== null;
  return isErrorObject && 'code' in error && error.code === PG_UNIQUE_VIOLATION;
}

export interface PostgresQueryResult {
    rows: unknown[];
}

/**
 * The slice of a PostgreSQL connection the checkpoint store uses.
 * `pg.Client` and a checked-out `pg.PoolClient` satisfy it; `BEGIN` and
 * `COMMIT` must reach the same connection.
 */
export interface PostgresQueryable {
    query(text: string, values?: unknown[]): Promise<PostgresQueryResult>;
}

/**
 * The slice of `pg` the gateway uses. `pg.Pool` and `pg.PoolClient`
 * satisfy these; tests pass jest mocks.
 */
export type SqlRow = Record<string, unknown>;

export type SqlResult = {
  rows: SqlRow[];
  rowCount: number | null;
};

export interface SqlQueryable {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlQueryable {
  release(): void;
}

export interface SqlPool extends SqlQueryable {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export type PostgresPersistenceGatewayOptions = {
  connectionString: string;
  /** Pool size (pg default: 10) */
  maxConnections?: number;
};

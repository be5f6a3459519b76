/**
 * SqlClient: minimal warehouse connection used by the persistent state store,
 * introspection and the CLI executor.
 *
 * Avoids a hard dependency on the vendor driver; `@lakeshift/databricks`
 * provides the real implementation.
 */

/** A result row: column name → value */
export type SqlRow = Record<string, unknown>;

export interface SqlClient {
  /** Open the connection. Throws ConnectionError if already connected. */
  connect(): Promise<void>;

  /** Run a statement, discarding any result */
  execute(sql: string): Promise<void>;

  /** Run a statement and return its rows */
  query(sql: string): Promise<SqlRow[]>;

  /** Release the connection. Safe to call multiple times. */
  close(): Promise<void>;
}

/** Creates a not-yet-connected client */
export type SqlClientFactory = () => SqlClient;

import { DBSQLClient } from '@databricks/sql';
import {
  ConnectionError,
  Logger,
  getErrorMessage,
  type SqlClient,
  type SqlClientFactory,
  type SqlRow,
} from '@lakeshift/core';

/**
 * The slice of the driver this package uses. `DBSQLClient` satisfies it;
 * tests pass an in-process stand-in.
 */
export interface DriverOperation {
  fetchAll(): Promise<object[]>;
  close(): Promise<unknown>;
}

export interface DriverSession {
  executeStatement(statement: string): Promise<DriverOperation>;
  close(): Promise<unknown>;
}

export interface DriverClient {
  connect(options: { host: string; path: string; token: string }): Promise<unknown>;
  openSession(): Promise<DriverSession>;
  close(): Promise<unknown>;
}

export interface DatabricksClientOptions {
  host: string;
  token: string;
  httpPath: string;
  /** Defaults to a new DBSQLClient */
  createDriver?: () => DriverClient;
  logger?: Logger;
}

/**
 * SqlClient over a Databricks SQL warehouse. One session per connection;
 * statements run one at a time.
 */
export class DatabricksClient implements SqlClient {
  private driver: DriverClient | null = null;
  private session: DriverSession | null = null;
  private readonly createDriver: () => DriverClient;
  private readonly logger: Logger;

  constructor(private readonly options: DatabricksClientOptions) {
    this.createDriver = options.createDriver ?? (() => new DBSQLClient());
    this.logger = (options.logger ?? new Logger()).child('Databricks');
  }

  get connected(): boolean {
    return this.session !== null;
  }

  async connect(): Promise<void> {
    if (this.driver) {
      throw new ConnectionError('Already connected. Call close() before connecting again.');
    }

    const driver = this.createDriver();
    this.driver = driver;
    try {
      await driver.connect({
        host: this.options.host,
        path: this.options.httpPath,
        token: this.options.token,
      });
      this.session = await driver.openSession();
    } catch (err) {
      this.driver = null;
      try {
        await driver.close();
      } catch (closeErr) {
        this.logger.warn(`Could not close the driver after a failed connect: ${getErrorMessage(closeErr)}`);
      }
      throw err;
    }
  }

  async execute(sql: string): Promise<void> {
    await this.run(sql);
  }

  async query(sql: string): Promise<SqlRow[]> {
    const rows = await this.run(sql);
    return rows.map(row => Object.fromEntries(Object.entries(row)));
  }

  async close(): Promise<void> {
    const { session, driver } = this;
    this.session = null;
    this.driver = null;
    try {
      if (session) await session.close();
    } finally {
      if (driver) await driver.close();
    }
  }

  private async run(sql: string): Promise<object[]> {
    if (!this.session) {
      throw new ConnectionError('Not connected. Call connect() first.');
    }
    const operation = await this.session.executeStatement(sql);
    try {
      return await operation.fetchAll();
    } finally {
      await operation.close();
    }
  }
}

export function databricksClientFactory(options: DatabricksClientOptions): SqlClientFactory {
  return () => new DatabricksClient(options);
}

/**
 * Connect a fresh client, run `fn`, and close the client on every path.
 */
export async function withSqlClient<T>(factory: SqlClientFactory, fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = factory();
  await client.connect();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

import { resolve } from 'node:path';
import {
  createLogger,
  loadConfig,
  validateForDbOps,
  type Config,
  type DbConfig,
  type Env,
  type Logger,
  type Schema,
  type SqlClient,
  type SqlClientFactory,
} from '@lakeshift/core';
import {
  DatabricksMigrationStateStore,
  SchemaIntrospector,
  databricksClientFactory,
  withSqlClient,
} from '@lakeshift/databricks';

/** Options accepted before or after any subcommand */
export type GlobalOptions = {
  catalog?: string;
  schema?: string;
  schemaDir?: string;
  migrationsDir?: string;
  stateTable?: string;
};

export interface CliDeps {
  /** Environment record, usually `process.env` after dotenv has loaded */
  env: Env;
  /** Base for relative paths. Default `process.cwd()` */
  cwd?: string;
  logger?: Logger;
  /** Client factory for a validated configuration. Default: Databricks SQL warehouse */
  createClientFactory?: (config: DbConfig) => SqlClientFactory;
  /** Clock for generated file headers */
  now?: () => Date;
}

function defaultClientFactory(config: DbConfig, logger: Logger): SqlClientFactory {
  return databricksClientFactory({
    host: config.databricksHost,
    token: config.databricksToken,
    httpPath: config.databricksHttpPath,
    logger,
  });
}

/**
 * Per-invocation state shared by the commands: resolved dependencies plus
 * the exit code a command sets when it finishes without throwing.
 */
export class CliContext {
  readonly env: Env;
  readonly cwd: string;
  readonly logger: Logger;
  readonly now: () => Date;
  exitCode = 0;
  private readonly createClientFactory: (config: DbConfig) => SqlClientFactory;

  constructor(deps: CliDeps) {
    this.env = deps.env;
    this.cwd = deps.cwd ?? process.cwd();
    this.logger = deps.logger ?? createLogger();
    this.now = deps.now ?? (() => new Date());
    this.createClientFactory = deps.createClientFactory ?? (config => defaultClientFactory(config, this.logger));
  }

  config(options: GlobalOptions): Config {
    return loadConfig(this.env, options);
  }

  /** Throws ConfigError when anything a warehouse call needs is missing */
  dbConfig(options: GlobalOptions): DbConfig {
    return validateForDbOps(this.config(options));
  }

  path(relative: string): string {
    return resolve(this.cwd, relative);
  }

  /** Connect, run `fn`, and close the connection on every path */
  withClient<T>(config: DbConfig, fn: (client: SqlClient) => Promise<T>): Promise<T> {
    return withSqlClient(this.createClientFactory(config), fn);
  }

  stateStore(client: SqlClient, config: DbConfig): DatabricksMigrationStateStore {
    return new DatabricksMigrationStateStore(client, {
      catalog: config.catalog,
      schema: config.schema,
      stateTable: config.stateTable,
      logger: this.logger,
    });
  }

  /** Live schema of the configured catalog schema */
  async introspect(config: DbConfig): Promise<Schema> {
    return this.withClient(config, client =>
      new SchemaIntrospector(client, {
        catalog: config.catalog,
        schema: config.schema,
        logger: this.logger,
      }).introspect()
    );
  }
}

import {
  Logger,
  MigrationParseError,
  MigrationStateConflictError,
  sqlString,
  type AppliedMigration,
  type MigrationStateStore,
  type RecordAppliedParams,
  type SqlClient,
  type SqlRow,
} from '@lakeshift/core';
import { STATE_TABLE_COLUMNS, qualifiedName, stateTableDdl } from './schema';
import { toBool, toDate, toNumber, toStr } from './rows';

const SELECT_COLUMNS = STATE_TABLE_COLUMNS.join(', ');

export interface DatabricksStateStoreOptions {
  catalog: string;
  schema: string;
  /** Default `_lakeshift_migrations` */
  stateTable?: string;
  logger?: Logger;
}

/**
 * Migration ledger kept in a Delta table in the target schema.
 * The table is created on first use.
 */
export class DatabricksMigrationStateStore implements MigrationStateStore {
  readonly tableName: string;
  private readonly logger: Logger;
  private initialized: Promise<void> | null = null;

  constructor(
    private readonly client: SqlClient,
    options: DatabricksStateStoreOptions
  ) {
    this.tableName = qualifiedName(options.catalog, options.schema, options.stateTable ?? '_lakeshift_migrations');
    this.logger = (options.logger ?? new Logger()).child('StateStore');
  }

  /** Create the ledger table if absent. Runs once per instance; retried after a failure. */
  async init(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.createTable();
    }
    try {
      await this.initialized;
    } catch (err) {
      this.initialized = null;
      throw err;
    }
  }

  private async createTable(): Promise<void> {
    await this.client.execute(stateTableDdl(this.tableName));
    this.logger.debug(`Ensured ledger table ${this.tableName}`);
  }

  async listApplied(): Promise<AppliedMigration[]> {
    await this.init();
    const rows = await this.client.query(
      `SELECT ${SELECT_COLUMNS} FROM ${this.tableName} ORDER BY version ASC`
    );
    return rows.map(toAppliedMigration);
  }

  async getLastApplied(): Promise<AppliedMigration | null> {
    await this.init();
    const rows = await this.client.query(
      `SELECT ${SELECT_COLUMNS} FROM ${this.tableName} ORDER BY version DESC LIMIT 1`
    );
    const [row] = rows;
    return row ? toAppliedMigration(row) : null;
  }

  async hasApplied(version: number): Promise<boolean> {
    await this.init();
    const rows = await this.client.query(
      `SELECT 1 AS found FROM ${this.tableName} WHERE version = ${sqlInteger(version)} LIMIT 1`
    );
    return rows.length > 0;
  }

  async recordApplied(params: RecordAppliedParams): Promise<void> {
    await this.init();
    const version = sqlInteger(params.version);

    const existing = await this.client.query(
      `SELECT checksum FROM ${this.tableName} WHERE version = ${version} LIMIT 1`
    );
    const [row] = existing;
    if (row) {
      const recorded = toStr(row['checksum']) ?? '';
      if (recorded !== params.checksum) {
        throw new MigrationStateConflictError(params.version, recorded, params.checksum);
      }
      return;
    }

    const error = params.error !== undefined ? sqlString(params.error) : 'NULL';
    await this.client.execute(
      `INSERT INTO ${this.tableName} (version, name, checksum, applied_at, success, error) VALUES (` +
        `${version}, ${sqlString(params.name)}, ${sqlString(params.checksum)}, current_timestamp(), ` +
        `${params.success ? 'true' : 'false'}, ${error})`
    );
    this.logger.debug(`Recorded V${params.version} success=${params.success}`);
  }
}

function sqlInteger(version: number): string {
  if (!Number.isSafeInteger(version) || version < 0) {
    throw new MigrationParseError(`Invalid migration version: ${version}`);
  }
  return String(version);
}

function toAppliedMigration(row: SqlRow): AppliedMigration {
  const error = toStr(row['error']);
  return {
    version: toNumber(row['version']),
    name: toStr(row['name']) ?? '',
    checksum: toStr(row['checksum']) ?? '',
    appliedAt: toDate(row['applied_at']),
    success: toBool(row['success']),
    ...(error !== undefined ? { error } : {}),
  };
}

/**
 * Migration runner: verifies checksums, plans pending work and applies it
 * strictly in ascending version order, one migration at a time.
 */

import type {
  AppliedMigration,
  MigrationExecutor,
  MigrationFile,
  PendingMigration,
} from '../types/migration';
import type { MigrationStateStore } from '../interfaces/migration-state-store';
import { MigrationChecksumMismatchError, getErrorMessage } from '../types/errors';
import { Logger } from '../utils/logger';
import { substituteVariables } from '../utils/sql';

/**
 * Pending migrations: those whose version is not in `appliedVersions`,
 * ascending by version. Pure.
 */
export function planMigrations(
  migrations: readonly MigrationFile[],
  appliedVersions: ReadonlySet<number>
): PendingMigration[] {
  return [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter(m => !appliedVersions.has(m.version))
    .map(({ version, name, path, checksum, sql }) => ({ version, name, path, checksum, sql }));
}

/**
 * Throws MigrationChecksumMismatchError for the first file whose checksum
 * differs from what was recorded for its version.
 */
export function verifyChecksums(
  migrations: readonly MigrationFile[],
  applied: readonly AppliedMigration[]
): void {
  const recorded = new Map(applied.map(a => [a.version, a]));
  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    const record = recorded.get(migration.version);
    if (record && record.checksum !== migration.checksum) {
      throw new MigrationChecksumMismatchError(
        migration.version,
        migration.name,
        record.checksum,
        migration.checksum
      );
    }
  }
}

export function migrationLabel(m: { version: number; name: string }): string {
  return `V${m.version}__${m.name}`;
}

export interface MigrationRunnerOptions {
  stateStore: MigrationStateStore;
  executor: MigrationExecutor;
  catalog: string;
  schema: string;
  logger?: Logger;
}

export interface ApplyOptions {
  /** Log what would run; execute and record nothing */
  dryRun?: boolean;
}

export interface ApplyResult {
  /** Pending set at the start of the run */
  pending: PendingMigration[];
  /** Migrations executed and recorded as successful */
  applied: PendingMigration[];
  dryRun: boolean;
}

export class MigrationRunner {
  private readonly stateStore: MigrationStateStore;
  private readonly executor: MigrationExecutor;
  private readonly catalog: string;
  private readonly schema: string;
  private readonly logger: Logger;

  constructor(options: MigrationRunnerOptions) {
    this.stateStore = options.stateStore;
    this.executor = options.executor;
    this.catalog = options.catalog;
    this.schema = options.schema;
    this.logger = (options.logger ?? new Logger()).child('Runner');
  }

  /** Pending migrations after checksum verification */
  async plan(migrations: readonly MigrationFile[]): Promise<PendingMigration[]> {
    const applied = await this.stateStore.listApplied();
    verifyChecksums(migrations, applied);
    return planMigrations(migrations, new Set(applied.map(a => a.version)));
  }

  /**
   * Apply every pending migration.
   *
   * A failing executor call is recorded with success=false, then its error
   * is rethrown and nothing after it runs. A failure to write that record
   * is logged; the executor's error is still the one thrown.
   */
  async apply(migrations: readonly MigrationFile[], options: ApplyOptions = {}): Promise<ApplyResult> {
    const dryRun = options.dryRun ?? false;
    const pending = await this.plan(migrations);
    const applied: PendingMigration[] = [];

    if (pending.length === 0) {
      this.logger.info('Schema is up to date. No pending migrations.');
      return { pending, applied, dryRun };
    }

    for (const migration of pending) {
      const label = migrationLabel(migration);

      if (dryRun) {
        this.logger.info(`[DRY RUN] Would apply ${label}`);
        continue;
      }

      this.logger.info(`Applying ${label}...`);
      const sql = substituteVariables(migration.sql, { catalog: this.catalog, schema: this.schema });

      try {
        await this.executor(sql, migration.version);
      } catch (err) {
        this.logger.error(`Failed ${label}: ${String(err)}`);
        try {
          await this.stateStore.recordApplied({
            version: migration.version,
            name: migration.name,
            checksum: migration.checksum,
            success: false,
            error: String(err),
          });
        } catch (recordErr) {
          this.logger.error(`Could not record failure of ${label}: ${getErrorMessage(recordErr)}`);
        }
        throw err;
      }

      await this.stateStore.recordApplied({
        version: migration.version,
        name: migration.name,
        checksum: migration.checksum,
        success: true,
      });
      applied.push(migration);
      this.logger.info(`Applied ${label}`);
    }

    return { pending, applied, dryRun };
  }
}

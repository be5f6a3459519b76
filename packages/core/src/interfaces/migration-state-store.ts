import type { AppliedMigration, RecordAppliedParams } from '../types/migration';

/**
 * Ledger of which migration versions have run.
 * Implement this for each storage backend (memory, Databricks table, ...).
 *
 * Every implementation must honor the recording contract:
 * - Same version, same checksum: no-op. The first outcome is kept, even if
 *   the second call reports a different `success`.
 * - Same version, different checksum: throw MigrationStateConflictError and
 *   leave stored state untouched.
 */
export interface MigrationStateStore {
  /** All recorded migrations, ascending by version */
  listApplied(): Promise<AppliedMigration[]>;

  /** Highest recorded version, or null when the ledger is empty */
  getLastApplied(): Promise<AppliedMigration | null>;

  /** True if the version was recorded at least once, regardless of success */
  hasApplied(version: number): Promise<boolean>;

  /** Record the outcome of running a migration */
  recordApplied(params: RecordAppliedParams): Promise<void>;
}

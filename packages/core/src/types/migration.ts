/**
 * Migration Types: files on disk, ledger records, pending work.
 */

/** A parsed `V<version>__<name>.sql` file. Never mutated after parse. */
export interface MigrationFile {
  readonly version: number;
  readonly name: string;
  /** Opaque locator (file path or filename) */
  readonly path: string;
  /** SHA-256 hex of the content with line endings normalized to LF */
  readonly checksum: string;
  readonly sql: string;
}

/** A ledger entry. Failed runs count as applied. */
export interface AppliedMigration {
  readonly version: number;
  readonly name: string;
  readonly checksum: string;
  readonly appliedAt: Date;
  readonly success: boolean;
  readonly error?: string;
}

/** A migration file not yet recorded in the ledger */
export interface PendingMigration {
  readonly version: number;
  readonly name: string;
  readonly path: string;
  readonly checksum: string;
  readonly sql: string;
}

/** Parameters for recording a run outcome */
export interface RecordAppliedParams {
  version: number;
  name: string;
  checksum: string;
  success: boolean;
  error?: string;
}

/**
 * Runs one migration's SQL (already substituted) against the warehouse.
 * Throwing marks the migration failed and stops the run.
 */
export type MigrationExecutor = (sql: string, version: number) => Promise<void>;

import type { ChangeKind } from './change';

/**
 * Base error for all lakeshift errors.
 */
export class LakeshiftError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'LakeshiftError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Declared schema is malformed or invalid.
 */
export class SchemaLoadError extends LakeshiftError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super('SCHEMA_LOAD', message);
    this.name = 'SchemaLoadError';
  }
}

/**
 * Reading the live catalog state failed.
 */
export class IntrospectionError extends LakeshiftError {
  constructor(message: string, public readonly originalError?: unknown) {
    super('INTROSPECTION', message);
    this.name = 'IntrospectionError';
  }
}

/**
 * Reserved for differ-internal failures.
 */
export class DiffError extends LakeshiftError {
  constructor(message: string) {
    super('DIFF', message);
    this.name = 'DiffError';
  }
}

/**
 * Generation-time contract violation (e.g. NOT NULL column without default).
 */
export class CodegenError extends LakeshiftError {
  constructor(message: string) {
    super('CODEGEN', message);
    this.name = 'CodegenError';
  }
}

export interface UnsupportedChangeSummary {
  readonly kind: ChangeKind;
  readonly tableName: string;
  readonly errorMessage: string;
}

/**
 * One or more changes cannot be rendered safely. `kind` is the first offender;
 * `changes` lists every one of them.
 */
export class UnsupportedChangeError extends LakeshiftError {
  public readonly kind: ChangeKind;

  constructor(public readonly changes: UnsupportedChangeSummary[]) {
    const lines = changes.map(c => `  - ${c.kind}: ${c.tableName}: ${c.errorMessage}`);
    super(
      'UNSUPPORTED_CHANGE',
      `Cannot generate migration - ${changes.length} unsupported change(s):\n${lines.join('\n')}`
    );
    this.name = 'UnsupportedChangeError';
    this.kind = changes[0]?.kind ?? 'create_table';
  }
}

/**
 * Malformed migration filename, empty content, or duplicate version.
 */
export class MigrationParseError extends LakeshiftError {
  constructor(message: string) {
    super('MIGRATION_PARSE', message);
    this.name = 'MigrationParseError';
  }
}

/**
 * Same version recorded again with a different checksum.
 */
export class MigrationStateConflictError extends LakeshiftError {
  constructor(
    public readonly version: number,
    public readonly recordedChecksum: string,
    public readonly attemptedChecksum: string
  ) {
    super(
      'MIGRATION_STATE_CONFLICT',
      `Migration ${version} already recorded with checksum ${recordedChecksum}, ` +
        `but attempted to record with checksum ${attemptedChecksum}`
    );
    this.name = 'MigrationStateConflictError';
  }
}

/**
 * An applied migration's file no longer hashes to the recorded checksum.
 */
export class MigrationChecksumMismatchError extends LakeshiftError {
  constructor(
    public readonly version: number,
    public readonly migrationName: string,
    public readonly recordedChecksum: string,
    public readonly actualChecksum: string
  ) {
    super(
      'MIGRATION_CHECKSUM_MISMATCH',
      `Migration V${version}__${migrationName} checksum mismatch: ` +
        `recorded=${recordedChecksum}, file=${actualChecksum}`
    );
    this.name = 'MigrationChecksumMismatchError';
  }
}

/**
 * A statement of a migration failed against the warehouse.
 */
export class MigrationExecutionError extends LakeshiftError {
  constructor(
    public readonly version: number,
    message: string,
    public readonly originalError?: unknown
  ) {
    super('MIGRATION_EXECUTION', message);
    this.name = 'MigrationExecutionError';
  }
}

/**
 * Missing or invalid connection/catalog/schema configuration.
 */
export class ConfigError extends LakeshiftError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

/**
 * Connection used in the wrong lifecycle state.
 */
export class ConnectionError extends LakeshiftError {
  constructor(message: string) {
    super('CONNECTION', message);
    this.name = 'ConnectionError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

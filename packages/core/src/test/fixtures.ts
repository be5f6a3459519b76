/**
 * Test Fixtures
 *
 * Builders for schema models and migration files, plus a recording
 * executor and a capturing logger for runner assertions.
 *
 * Usage:
 * ```typescript
 * const users = table('users', [column('id', 'BIGINT', { nullable: false })], {
 *   primaryKey: { columns: ['id'], rely: true },
 * });
 * const changes = diffSchemas(emptySchema(), schemaOf(users));
 * ```
 */
import type { Column, Schema, Table } from '../types/schema';
import type { MigrationExecutor, MigrationFile } from '../types/migration';
import { createSchema } from '../schema/model';
import { parseMigration } from '../migrations/parser';
import { Logger, type LogLevel } from '../utils/logger';

export function column(name: string, type: string, overrides: Partial<Omit<Column, 'name' | 'type'>> = {}): Column {
  return { name, type, nullable: true, ...overrides };
}

export function table(
  name: string,
  columns: Column[],
  overrides: Partial<Omit<Table, 'name' | 'columns'>> = {}
): Table {
  return {
    name,
    columns,
    checkConstraints: [],
    liquidClustering: [],
    partitionedBy: [],
    tableProperties: {},
    ...overrides,
  };
}

export function schemaOf(...tables: Table[]): Schema {
  return createSchema(tables);
}

/** Parsed migration with a conventional filename */
export function migration(version: number, name: string, sql: string): MigrationFile {
  return parseMigration(sql, `V${version}__${name}.sql`);
}

export interface RecordingExecutor {
  executor: MigrationExecutor;
  calls: { sql: string; version: number }[];
}

/**
 * Executor that records its calls. Versions listed in `failOn` throw
 * `Error('boom on V<version>')` after being recorded.
 */
export function recordingExecutor(failOn: number[] = []): RecordingExecutor {
  const calls: { sql: string; version: number }[] = [];
  return {
    calls,
    executor: async (sql, version) => {
      calls.push({ sql, version });
      if (failOn.includes(version)) {
        throw new Error(`boom on V${version}`);
      }
    },
  };
}

export interface CapturedLogger {
  logger: Logger;
  out: string[];
  err: string[];
}

/** Logger writing into arrays instead of the console */
export function captureLogger(level: LogLevel = 'info'): CapturedLogger {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    logger: new Logger({ level, stdout: m => out.push(m), stderr: m => err.push(m) }),
  };
}

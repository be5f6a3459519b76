/**
 * Shared setup for CLI tests: a temporary project directory, a captured
 * logger and a factory that hands out one in-process SQL client.
 */
import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import type { DbConfig } from '@lakeshift/core';
import { captureLogger } from '@lakeshift/core/test';
import { FakeSqlClient } from '@lakeshift/databricks/test';
import { runCLI } from '../src/index';

export const DB_ENV = {
  LAKESHIFT_CATALOG: 'main',
  LAKESHIFT_SCHEMA: 'analytics',
  DATABRICKS_HOST: 'example.cloud.databricks.com',
  DATABRICKS_TOKEN: 'test-secret',
  DATABRICKS_WAREHOUSE_ID: 'abc',
};

export const USERS_YAML = `
table: users
columns:
  - name: id
    type: BIGINT
    nullable: false
  - name: email
    type: STRING
`;

export const ORDERS_YAML = `
table: orders
columns:
  - name: id
    type: BIGINT
    nullable: false
  - name: user_id
    type: BIGINT
`;

export async function makeProjectDir(): Promise<string> {
  const dir = join(tmpdir(), `lakeshift-cli-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function writeProjectFile(root: string, relative: string, content: string): Promise<string> {
  const path = join(root, relative);
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, content, 'utf-8');
  return path;
}

export interface Invocation {
  code: number;
  out: string[];
  err: string[];
  configs: DbConfig[];
}

/** Run the CLI in `cwd`; every warehouse connection gets `client` */
export async function invoke(
  args: string[],
  options: { cwd: string; env?: Record<string, string>; client?: FakeSqlClient }
): Promise<Invocation> {
  const { logger, out, err } = captureLogger();
  const configs: DbConfig[] = [];
  const client = options.client ?? new FakeSqlClient();

  const code = await runCLI(args, {
    env: options.env ?? {},
    cwd: options.cwd,
    logger,
    now: () => new Date('2024-05-01T12:00:00.000Z'),
    createClientFactory: config => {
      configs.push(config);
      return () => client;
    },
  });

  return { code, out, err, configs };
}

/** Live `users` table with a single NOT NULL id column, plus any extra columns */
export function usersWarehouse(extraColumns: string[] = []): FakeSqlClient {
  return new FakeSqlClient()
    .on(/information_schema\.tables/, [{ table_name: 'users' }])
    .on(/information_schema\.columns/, [
      { table_name: 'users', column_name: 'id', full_data_type: 'bigint', is_nullable: 'NO' },
      ...extraColumns.map(name => ({
        table_name: 'users',
        column_name: name,
        full_data_type: 'string',
        is_nullable: 'YES',
      })),
    ]);
}

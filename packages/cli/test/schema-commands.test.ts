/**
 * Schema Command Tests
 *
 * Drives the commander program end to end with a temporary project
 * directory and an in-process warehouse:
 * - validate, diff (offline and online)
 * - generate to stdout, --output and --next-version
 * - destructive change refusal
 * - export and check
 * - exit codes for configuration and usage errors
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { loadSchema, parseMigrationsDir } from '@lakeshift/core';
import { slugify } from '../src/commands/schema';
import { DB_ENV, ORDERS_YAML, USERS_YAML, invoke, makeProjectDir, usersWarehouse, writeProjectFile } from './helpers';

const MISSING_CONFIG =
  'Error: Missing required configuration: LAKESHIFT_CATALOG, LAKESHIFT_SCHEMA, DATABRICKS_HOST, ' +
  'DATABRICKS_TOKEN, DATABRICKS_HTTP_PATH or DATABRICKS_WAREHOUSE_ID';

describe('schema commands', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeProjectDir();
    await writeProjectFile(dir, 'schema/users.yaml', USERS_YAML);
    await writeProjectFile(dir, 'schema/orders.yaml', ORDERS_YAML);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('lists the declared tables', async () => {
      const result = await invoke(['validate'], { cwd: dir });

      expect(result.code).toBe(0);
      expect(result.out).toEqual(['Validated 2 table(s):', '  - orders (2 columns)', '  - users (2 columns)']);
    });

    it('honours --schema-dir', async () => {
      await writeProjectFile(dir, 'tables/users.yaml', USERS_YAML);
      const result = await invoke(['--schema-dir', 'tables', 'validate'], { cwd: dir });

      expect(result.out).toEqual(['Validated 1 table(s):', '  - users (2 columns)']);
    });

    it('fails with exit code 1 on an invalid file', async () => {
      await writeProjectFile(dir, 'schema/bad.yaml', 'table: bad\ncolumns:\n  - name: id\n    typo: INT\n');
      const result = await invoke(['validate'], { cwd: dir });

      expect(result.code).toBe(1);
      expect(result.err).toHaveLength(1);
      expect(result.err[0]).toContain('Invalid schema in');
    });
  });

  describe('diff', () => {
    it('compares against an empty schema offline', async () => {
      const result = await invoke(['diff'], { cwd: dir });

      expect(result.code).toBe(0);
      expect(result.out).toEqual([
        'Found 2 change(s) (offline mode):',
        '  - create_table: orders',
        '  - create_table: users',
      ]);
    });

    it('reports no changes for an empty declared schema', async () => {
      await fs.rm(join(dir, 'schema'), { recursive: true });
      await fs.mkdir(join(dir, 'schema'));
      const result = await invoke(['diff'], { cwd: dir });

      expect(result.out).toEqual(['No changes detected']);
    });

    it('compares against the live schema online', async () => {
      const client = usersWarehouse();
      const result = await invoke(['diff', '--online'], { cwd: dir, env: DB_ENV, client });

      expect(result.code).toBe(0);
      expect(result.out).toEqual([
        'Found 2 change(s) (online mode):',
        '  - create_table: orders',
        '  - add_column: users',
      ]);
      expect(result.configs[0]?.databricksHttpPath).toBe('/sql/1.0/warehouses/abc');
      expect(client.connects).toBe(1);
      expect(client.closes).toBe(1);
    });

    it('exits with code 2 when online configuration is missing', async () => {
      const result = await invoke(['diff', '--online'], { cwd: dir });

      expect(result.code).toBe(2);
      expect(result.err).toEqual([MISSING_CONFIG]);
    });
  });

  describe('generate', () => {
    it('prints the migration to stdout', async () => {
      const result = await invoke(['generate', 'Initial tables'], { cwd: dir });

      expect(result.code).toBe(0);
      expect(result.out).toHaveLength(1);
      const sql = result.out[0] ?? '';
      expect(sql.startsWith('-- Migration: Auto-generated\n-- Description: Initial tables\n')).toBe(true);
      expect(sql).toContain('-- Generated: 2024-05-01T12:00:00.000Z');
      expect(sql).toContain('CREATE TABLE IF NOT EXISTS ${catalog}.${schema}.orders (');
    });

    it('writes the next version into the migrations directory', async () => {
      await writeProjectFile(dir, 'sql/migrations/V1__init.sql', 'SELECT 1;\n');
      const result = await invoke(['generate', 'Add core tables', '--next-version'], { cwd: dir });

      const expected = join(dir, 'sql', 'migrations', 'V2__add_core_tables.sql');
      expect(result.code).toBe(0);
      expect(result.out).toEqual([`Wrote ${expected} (2 change(s))`]);

      const content = await fs.readFile(expected, 'utf-8');
      expect(content.startsWith('-- Migration: Auto-generated\n-- Description: Add core tables\n')).toBe(true);

      const migrations = await parseMigrationsDir(join(dir, 'sql', 'migrations'));
      expect(migrations.map(m => m.version)).toEqual([1, 2]);
    });

    it('starts at version 1 without a migrations directory', async () => {
      const result = await invoke(['generate', 'first', '--next-version'], { cwd: dir });
      expect(result.out).toEqual([`Wrote ${join(dir, 'sql', 'migrations', 'V1__first.sql')} (2 change(s))`]);
    });

    it('refuses destructive changes by default', async () => {
      const client = usersWarehouse(['legacy']);
      const result = await invoke(['generate', 'cleanup', '--online'], { cwd: dir, env: DB_ENV, client });

      expect(result.code).toBe(1);
      expect(result.err).toEqual([
        'Error: Destructive changes detected. Use --allow-destructive to proceed: drop_column: users',
      ]);
    });

    it('writes destructive changes with --allow-destructive', async () => {
      const client = usersWarehouse(['legacy']);
      const result = await invoke(
        ['generate', 'cleanup', '--online', '--allow-destructive', '--output', 'out/cleanup.sql'],
        { cwd: dir, env: DB_ENV, client }
      );

      const path = join(dir, 'out', 'cleanup.sql');
      expect(result.code).toBe(0);
      expect(result.out).toEqual([`Wrote ${path} (3 change(s))`]);

      const content = await fs.readFile(path, 'utf-8');
      expect(content).toContain('-- WARNING: This migration contains destructive changes:\n--   - drop_column: users\n');
      expect(content).toContain('ALTER TABLE ${catalog}.${schema}.users DROP COLUMN IF EXISTS legacy;');
    });

    it('rejects --output together with --next-version', async () => {
      const result = await invoke(['generate', 'x', '--output', 'a.sql', '--next-version'], { cwd: dir });

      expect(result.code).toBe(2);
      expect(result.err).toEqual(['Error: Use either --output or --next-version, not both']);
    });

    it('reports when there is nothing to generate', async () => {
      const client = usersWarehouse(['email']);
      await fs.rm(join(dir, 'schema', 'orders.yaml'));
      const result = await invoke(['generate', 'noop', '--online'], { cwd: dir, env: DB_ENV, client });

      expect(result.code).toBe(0);
      expect(result.out).toEqual(['No changes to generate']);
    });

    it('requires a description', async () => {
      const result = await invoke(['generate'], { cwd: dir });

      expect(result.code).toBe(1);
      expect(result.err[0]).toContain("missing required argument 'description'");
    });
  });

  describe('export', () => {
    it('writes live tables as YAML', async () => {
      const client = usersWarehouse(['nickname']);
      const result = await invoke(['export', '--output', 'exported'], { cwd: dir, env: DB_ENV, client });

      const outDir = join(dir, 'exported');
      expect(result.code).toBe(0);
      expect(result.out).toEqual([`Exported 1 table(s) to ${outDir}`, `  - ${join(outDir, 'users.yaml')}`]);

      const exported = await loadSchema(outDir);
      expect(exported.tables['users']?.columns.map(c => c.name)).toEqual(['id', 'nickname']);
    });
  });

  describe('check', () => {
    beforeEach(async () => {
      await fs.rm(join(dir, 'schema', 'orders.yaml'));
    });

    it('passes when the database satisfies the declared schema', async () => {
      const result = await invoke(['check'], { cwd: dir, env: DB_ENV, client: usersWarehouse(['email']) });

      expect(result.code).toBe(0);
      expect(result.out).toEqual(['Database matches the declared schema (1 table(s))']);
    });

    it('exits with code 1 and lists drift', async () => {
      const result = await invoke(['check'], { cwd: dir, env: DB_ENV, client: usersWarehouse() });

      expect(result.code).toBe(1);
      expect(result.err).toEqual([
        'Error: Found 1 schema issue(s):',
        "Error: missing_column: Column 'email' missing from table 'users'",
      ]);
    });
  });

  describe('program', () => {
    it('prints the version', async () => {
      const result = await invoke(['--version'], { cwd: dir });

      expect(result.code).toBe(0);
      expect(result.out).toEqual(['0.1.0']);
    });

    it('exits with code 1 on an unknown command', async () => {
      const result = await invoke(['frobnicate'], { cwd: dir });

      expect(result.code).toBe(1);
      expect(result.err[0]).toContain("unknown command 'frobnicate'");
    });
  });
});

describe('slugify', () => {
  it('joins lowercase words with underscores', () => {
    expect(slugify('Add users table!')).toBe('add_users_table');
    expect(slugify('V2: Drop-legacy')).toBe('v2_drop_legacy');
  });

  it('falls back for descriptions without letters or digits', () => {
    expect(slugify('  --  ')).toBe('migration');
  });
});

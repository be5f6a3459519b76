/**
 * Migration file parser: `V<version>__<name>.sql` files into immutable records.
 */

import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { MigrationFile } from '../types/migration';
import { MigrationParseError, getErrorMessage } from '../types/errors';

export const MIGRATION_FILENAME_PATTERN = /^V(\d+)__(.+)\.sql$/;

/** SHA-256 hex of the content with CRLF and CR normalized to LF */
export function computeChecksum(content: string): string {
  const normalized = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  return createHash('sha256').update(normalized, 'utf8').digest('hex');
}

/**
 * Parse one migration from its content and filename.
 * `path` defaults to the filename.
 */
export function parseMigration(content: string, filename: string, path: string = filename): MigrationFile {
  const match = MIGRATION_FILENAME_PATTERN.exec(filename);
  const [, versionText, name] = match ?? [];
  if (versionText === undefined || !name) {
    throw new MigrationParseError(
      `Invalid filename '${filename}'. Expected format: V<version>__name.sql`
    );
  }

  if (!content.trim()) {
    throw new MigrationParseError(`Migration file '${filename}' is empty`);
  }

  return Object.freeze({
    version: Number.parseInt(versionText, 10),
    name,
    path,
    checksum: computeChecksum(content),
    sql: content,
  });
}

/**
 * Parse every matching file in a directory, ascending by version.
 *
 * Non-matching files are skipped. A missing or empty directory yields [].
 * Two files with the same version fail the whole parse.
 */
export async function parseMigrationsDir(dir: string): Promise<MigrationFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw new MigrationParseError(`Cannot read migrations directory '${dir}': ${getErrorMessage(err)}`);
  }

  const migrations: MigrationFile[] = [];
  const seen = new Map<number, string>();

  for (const filename of entries.sort()) {
    if (!MIGRATION_FILENAME_PATTERN.test(filename)) continue;

    const path = join(dir, filename);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      throw new MigrationParseError(`Cannot read migration file '${filename}': ${getErrorMessage(err)}`);
    }

    const migration = parseMigration(content, filename, path);
    const previous = seen.get(migration.version);
    if (previous !== undefined) {
      throw new MigrationParseError(
        `Duplicate version ${migration.version}: '${previous}' and '${filename}'`
      );
    }
    seen.set(migration.version, filename);
    migrations.push(migration);
  }

  return migrations.sort((a, b) => a.version - b.version);
}

/** Highest version in the list, or 0 */
export function maxVersion(migrations: readonly MigrationFile[]): number {
  return migrations.reduce((max, m) => Math.max(max, m.version), 0);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

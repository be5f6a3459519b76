/**
 * Migration File Parser Tests
 *
 * - Filename pattern and version parsing
 * - Line-ending-insensitive checksums
 * - Directory scanning, ordering and duplicate detection
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { computeChecksum, maxVersion, parseMigration, parseMigrationsDir } from '../migrations/parser';
import { MigrationParseError } from '../types/errors';

describe('Migration File Parser', () => {
  describe('parseMigration', () => {
    it('parses version and name', () => {
      const m = parseMigration('SELECT 1;\n', 'V001__create_users.sql');
      expect(m.version).toBe(1);
      expect(m.name).toBe('create_users');
      expect(m.path).toBe('V001__create_users.sql');
      expect(m.sql).toBe('SELECT 1;\n');
      expect(m.checksum).toBe('b4e0497804e46e0a0b0b8c31975b062152d551bac49c3c2e80932567b4085dcd');
    });

    it('returns a frozen record', () => {
      expect(Object.isFrozen(parseMigration('SELECT 1;', 'V1__a.sql'))).toBe(true);
    });

    it.each(['V1_bad.sql', '001__no_v.sql', 'V__missing_version.sql', 'V1__.sql', 'V1__name.txt'])(
      'rejects %s',
      filename => {
        expect(() => parseMigration('SELECT 1;', filename)).toThrow(MigrationParseError);
      }
    );

    it('rejects empty and whitespace-only content', () => {
      expect(() => parseMigration('', 'V1__a.sql')).toThrow(MigrationParseError);
      expect(() => parseMigration('  \n\t\n', 'V1__a.sql')).toThrow("Migration file 'V1__a.sql' is empty");
    });
  });

  describe('computeChecksum', () => {
    it('is the same for LF, CRLF and CR line endings', () => {
      const lf = computeChecksum('SELECT 1;\nSELECT 2;\n');
      expect(computeChecksum('SELECT 1;\r\nSELECT 2;\r\n')).toBe(lf);
      expect(computeChecksum('SELECT 1;\rSELECT 2;\r')).toBe(lf);
    });

    it('changes with content', () => {
      expect(computeChecksum('SELECT 1;')).not.toBe(computeChecksum('SELECT 2;'));
    });
  });

  describe('parseMigrationsDir', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `lakeshift-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await fs.mkdir(testDir, { recursive: true });
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('sorts numerically and skips non-matching files', async () => {
      await fs.writeFile(join(testDir, 'V10__ten.sql'), 'SELECT 10;');
      await fs.writeFile(join(testDir, 'V2__two.sql'), 'SELECT 2;');
      await fs.writeFile(join(testDir, 'V1__one.sql'), 'SELECT 1;');
      await fs.writeFile(join(testDir, 'README.md'), '# notes');
      await fs.writeFile(join(testDir, 'rollback.sql'), 'SELECT 0;');

      const migrations = await parseMigrationsDir(testDir);

      expect(migrations.map(m => m.version)).toEqual([1, 2, 10]);
      expect(migrations[0]?.path).toBe(join(testDir, 'V1__one.sql'));
      expect(maxVersion(migrations)).toBe(10);
    });

    it('rejects duplicate versions even with different names', async () => {
      await fs.writeFile(join(testDir, 'V1__first.sql'), 'SELECT 1;');
      await fs.writeFile(join(testDir, 'V001__second.sql'), 'SELECT 2;');

      await expect(parseMigrationsDir(testDir)).rejects.toThrow(
        "Duplicate version 1: 'V001__second.sql' and 'V1__first.sql'"
      );
    });

    it('returns an empty list for an empty or missing directory', async () => {
      expect(await parseMigrationsDir(testDir)).toEqual([]);
      expect(await parseMigrationsDir(join(testDir, 'missing'))).toEqual([]);
      expect(maxVersion([])).toBe(0);
    });
  });
});

/**
 * Schema Model Tests
 *
 * - Lookups
 * - Table and primary key equality
 * - Well-formedness checks
 */
import { describe, it, expect } from 'vitest';
import {
  assertWellFormedTable,
  getColumn,
  getTable,
  hasColumnMapping,
  primaryKeysEqual,
  tableNames,
  tablesEqual,
  validateTable,
} from '../schema/model';
import { SchemaLoadError } from '../types/errors';
import { column, schemaOf, table } from './fixtures';

describe('Schema Model', () => {
  const users = table('users', [column('id', 'BIGINT', { nullable: false }), column('email', 'STRING')]);

  describe('lookups', () => {
    it('finds tables and columns by name', () => {
      const schema = schemaOf(users);
      expect(getTable(schema, 'users')).toBe(users);
      expect(getTable(schema, 'orders')).toBeUndefined();
      expect(getColumn(users, 'email')?.type).toBe('STRING');
      expect(getColumn(users, 'missing')).toBeUndefined();
    });

    it('does not resolve inherited object keys as tables', () => {
      expect(getTable(schemaOf(users), 'toString')).toBeUndefined();
    });

    it('enumerates table names as a set', () => {
      expect(tableNames(schemaOf(users, table('orders', [])))).toEqual(new Set(['users', 'orders']));
    });
  });

  describe('primaryKeysEqual', () => {
    it('requires same order and rely flag', () => {
      expect(primaryKeysEqual({ columns: ['a', 'b'], rely: true }, { columns: ['a', 'b'], rely: true })).toBe(true);
      expect(primaryKeysEqual({ columns: ['a', 'b'], rely: true }, { columns: ['b', 'a'], rely: true })).toBe(false);
      expect(primaryKeysEqual({ columns: ['a'], rely: true }, { columns: ['a'], rely: false })).toBe(false);
    });

    it('treats two absent keys as equal', () => {
      expect(primaryKeysEqual(undefined, undefined)).toBe(true);
      expect(primaryKeysEqual(undefined, { columns: ['a'], rely: false })).toBe(false);
    });
  });

  describe('tablesEqual', () => {
    it('ignores column order', () => {
      const reordered = table('users', [column('email', 'STRING'), column('id', 'BIGINT', { nullable: false })]);
      expect(tablesEqual(users, reordered)).toBe(true);
    });

    it('ignores clustering and partition order', () => {
      const a = table('t', [], { liquidClustering: ['x', 'y'], partitionedBy: ['p', 'q'] });
      const b = table('t', [], { liquidClustering: ['y', 'x'], partitionedBy: ['q', 'p'] });
      expect(tablesEqual(a, b)).toBe(true);
    });

    it('detects property differences', () => {
      const a = table('t', [], { tableProperties: { k: '1' } });
      const b = table('t', [], { tableProperties: { k: '2' } });
      expect(tablesEqual(a, b)).toBe(false);
    });
  });

  describe('hasColumnMapping', () => {
    it('is true only for name mode', () => {
      expect(hasColumnMapping(table('t', [], { tableProperties: { 'delta.columnMapping.mode': 'name' } }))).toBe(true);
      expect(hasColumnMapping(table('t', [], { tableProperties: { 'delta.columnMapping.mode': 'id' } }))).toBe(false);
      expect(hasColumnMapping(table('t', []))).toBe(false);
    });
  });

  describe('well-formedness', () => {
    it('accepts a valid table', () => {
      expect(validateTable(users)).toEqual([]);
      expect(() => assertWellFormedTable(users)).not.toThrow();
    });

    it('rejects more than four clustering columns', () => {
      const wide = table('wide', [], { liquidClustering: ['a', 'b', 'c', 'd', 'e'] });
      expect(() => assertWellFormedTable(wide)).toThrow(SchemaLoadError);
      expect(validateTable(wide)).toEqual([
        { path: 'tables.wide.liquid_clustering', message: 'At most 4 clustering columns allowed, got 5' },
      ]);
    });

    it('rejects duplicate column names', () => {
      const dup = table('dup', [column('a', 'INT'), column('a', 'STRING')]);
      expect(validateTable(dup)).toEqual([{ path: 'tables.dup.columns[1].name', message: 'Duplicate column "a"' }]);
    });
  });
});

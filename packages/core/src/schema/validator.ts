/**
 * Schema validator: checks that a live schema satisfies the declared one.
 *
 * Only declared tables and columns are checked; anything extra in the
 * database is ignored.
 */

import type { Schema } from '../types/schema';
import { getTable } from './model';
import { normalizeType } from './type-rules';

export type SchemaIssueKind = 'missing_table' | 'missing_column' | 'type_mismatch' | 'constraint_mismatch';

export interface SchemaIssue {
  readonly kind: SchemaIssueKind;
  readonly table: string;
  readonly column?: string;
  readonly message: string;
}

export interface SchemaValidationResult {
  /** True iff `issues` is empty */
  readonly ok: boolean;
  readonly issues: SchemaIssue[];
}

export function validateSchema(declared: Schema, actual: Schema): SchemaValidationResult {
  const issues: SchemaIssue[] = [];

  for (const tableName of Object.keys(declared.tables).sort()) {
    const expected = getTable(declared, tableName);
    if (!expected) continue;

    const found = getTable(actual, tableName);
    if (!found) {
      issues.push({
        kind: 'missing_table',
        table: tableName,
        message: `Table '${tableName}' not found in database`,
      });
      continue;
    }

    const actualColumns = new Map(found.columns.map(c => [c.name, c]));
    for (const col of expected.columns) {
      const other = actualColumns.get(col.name);
      if (!other) {
        issues.push({
          kind: 'missing_column',
          table: tableName,
          column: col.name,
          message: `Column '${col.name}' missing from table '${tableName}'`,
        });
        continue;
      }

      if (normalizeType(col.type) !== normalizeType(other.type)) {
        issues.push({
          kind: 'type_mismatch',
          table: tableName,
          column: col.name,
          message: `Column '${col.name}' type mismatch: expected ${col.type}, got ${other.type}`,
        });
        continue;
      }

      if (col.nullable !== other.nullable) {
        const describe = (nullable: boolean) => (nullable ? 'nullable' : 'NOT NULL');
        issues.push({
          kind: 'constraint_mismatch',
          table: tableName,
          column: col.name,
          message: `Column '${col.name}' nullable mismatch: expected ${describe(col.nullable)}, got ${describe(other.nullable)}`,
        });
      }
    }
  }

  return { ok: issues.length === 0, issues };
}

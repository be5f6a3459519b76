/**
 * Schema differ: compares the current schema against the declared one and
 * returns the ordered list of changes needed to reach the declared state.
 *
 * Pure and deterministic. Tables present only in the current schema are left
 * alone: the differ builds toward the declared state and never prunes.
 */

import type { Change, ChangeKind } from '../types/change';
import type { Column, Schema, Table } from '../types/schema';
import { primaryKeysEqual, sameMembers } from './model';
import { checkTypeChange, normalizeType } from './type-rules';

const NO_FLAGS = {
  isDestructive: false,
  isUnsupported: false,
  requiresColumnMapping: false,
} as const;

/** Dependency buckets: creates first, drops last */
export const CHANGE_PRIORITY: Readonly<Record<ChangeKind, number>> = {
  create_table: 0,
  add_column: 1,
  alter_column_type: 2,
  alter_column_nullability: 2,
  alter_column_default: 2,
  set_primary_key: 3,
  add_foreign_key: 3,
  add_check_constraint: 3,
  alter_clustering: 4,
  alter_table_properties: 4,
  // Not in the dependency order; always unsupported, so it sorts with unknown kinds.
  alter_partitioning: 99,
  drop_check_constraint: 5,
  drop_foreign_key: 5,
  drop_primary_key: 5,
  drop_column: 6,
  drop_table: 7,
};

const byString = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Compute the changes that turn `source` (current state, possibly empty) into
 * `target` (declared state).
 */
export function diffSchemas(source: Schema, target: Schema): Change[] {
  const changes: Change[] = [];

  for (const name of Object.keys(target.tables).sort(byString)) {
    const declared = target.tables[name];
    if (!declared) continue;

    const current = Object.prototype.hasOwnProperty.call(source.tables, name)
      ? source.tables[name]
      : undefined;

    if (!current) {
      changes.push({ ...NO_FLAGS, kind: 'create_table', tableName: name, table: declared });
      continue;
    }

    changes.push(...diffTable(name, current, declared));
  }

  return orderChanges(changes);
}

/** Stable sort by dependency bucket; unknown kinds go last. */
export function orderChanges(changes: readonly Change[]): Change[] {
  return changes
    .map((change, index) => ({ change, index }))
    .sort((a, b) => {
      const pa = CHANGE_PRIORITY[a.change.kind] ?? 99;
      const pb = CHANGE_PRIORITY[b.change.kind] ?? 99;
      return pa - pb || a.index - b.index;
    })
    .map(entry => entry.change);
}

export function diffTable(tableName: string, source: Table, target: Table): Change[] {
  return [
    ...diffColumns(tableName, source, target),
    ...diffConstraints(tableName, source, target),
    ...diffClustering(tableName, source, target),
    ...diffPartitioning(tableName, source, target),
    ...diffProperties(tableName, source, target),
  ];
}

function diffColumns(tableName: string, source: Table, target: Table): Change[] {
  const changes: Change[] = [];
  const sourceCols = new Map(source.columns.map(c => [c.name, c]));
  const targetCols = new Map(target.columns.map(c => [c.name, c]));

  for (const name of [...targetCols.keys()].sort(byString)) {
    const column = targetCols.get(name);
    if (column && !sourceCols.has(name)) {
      changes.push({ ...NO_FLAGS, kind: 'add_column', tableName, column });
    }
  }

  for (const name of [...sourceCols.keys()].sort(byString)) {
    if (!targetCols.has(name)) {
      changes.push({
        ...NO_FLAGS,
        kind: 'drop_column',
        tableName,
        columnName: name,
        isDestructive: true,
        requiresColumnMapping: true,
      });
    }
  }

  for (const name of [...sourceCols.keys()].sort(byString)) {
    const from = sourceCols.get(name);
    const to = targetCols.get(name);
    if (from && to) changes.push(...diffColumn(tableName, from, to));
  }

  return changes;
}

/** Type, nullability and default are compared independently; never merged. */
function diffColumn(tableName: string, source: Column, target: Column): Change[] {
  const changes: Change[] = [];

  if (normalizeType(source.type) !== normalizeType(target.type)) {
    const check = checkTypeChange(source.type, target.type);
    changes.push({
      ...NO_FLAGS,
      kind: 'alter_column_type',
      tableName,
      columnName: source.name,
      fromType: source.type,
      toType: target.type,
      isUnsupported: !check.supported,
      errorMessage: check.errorMessage,
    });
  }

  if (source.nullable !== target.nullable) {
    changes.push({
      ...NO_FLAGS,
      kind: 'alter_column_nullability',
      tableName,
      columnName: source.name,
      fromNullable: source.nullable,
      toNullable: target.nullable,
    });
  }

  if (source.default !== target.default) {
    changes.push({
      ...NO_FLAGS,
      kind: 'alter_column_default',
      tableName,
      columnName: source.name,
      fromDefault: source.default,
      toDefault: target.default,
    });
  }

  return changes;
}

function diffConstraints(tableName: string, source: Table, target: Table): Change[] {
  const changes: Change[] = [];

  // Reordered columns or a flipped rely flag regenerate the key.
  if (!primaryKeysEqual(source.primaryKey, target.primaryKey)) {
    if (source.primaryKey) {
      changes.push({ ...NO_FLAGS, kind: 'drop_primary_key', tableName, primaryKey: source.primaryKey });
    }
    if (target.primaryKey) {
      changes.push({ ...NO_FLAGS, kind: 'set_primary_key', tableName, primaryKey: target.primaryKey });
    }
  }

  const sourceChecks = new Map(source.checkConstraints.map(c => [c.name, c]));
  const targetChecks = new Map(target.checkConstraints.map(c => [c.name, c]));

  for (const name of [...targetChecks.keys()].sort(byString)) {
    const constraint = targetChecks.get(name);
    if (constraint && !sourceChecks.has(name)) {
      changes.push({ ...NO_FLAGS, kind: 'add_check_constraint', tableName, constraint });
    }
  }

  for (const name of [...sourceChecks.keys()].sort(byString)) {
    if (!targetChecks.has(name)) {
      changes.push({ ...NO_FLAGS, kind: 'drop_check_constraint', tableName, constraintName: name });
    }
  }

  return changes;
}

function diffClustering(tableName: string, source: Table, target: Table): Change[] {
  if (sameMembers(source.liquidClustering, target.liquidClustering)) return [];
  return [
    {
      ...NO_FLAGS,
      kind: 'alter_clustering',
      tableName,
      fromColumns: [...source.liquidClustering],
      toColumns: [...target.liquidClustering],
    },
  ];
}

function diffPartitioning(tableName: string, source: Table, target: Table): Change[] {
  if (sameMembers(source.partitionedBy, target.partitionedBy)) return [];
  const from = `[${source.partitionedBy.join(', ')}]`;
  const to = `[${target.partitionedBy.join(', ')}]`;
  return [
    {
      ...NO_FLAGS,
      kind: 'alter_partitioning',
      tableName,
      fromColumns: [...source.partitionedBy],
      toColumns: [...target.partitionedBy],
      isUnsupported: true,
      errorMessage:
        `Cannot change partitioning for table '${tableName}'. Current: ${from}, Desired: ${to}. ` +
        'Delta Lake does not support changing partition columns. You must recreate the table.',
    },
  ];
}

/** Merge-only: keys absent from the declared table are never removed. */
function diffProperties(tableName: string, source: Table, target: Table): Change[] {
  const changed: Record<string, string> = {};
  for (const [key, value] of Object.entries(target.tableProperties)) {
    const current = Object.prototype.hasOwnProperty.call(source.tableProperties, key)
      ? source.tableProperties[key]
      : undefined;
    if (current !== value) changed[key] = value;
  }

  if (Object.keys(changed).length === 0) return [];
  return [{ ...NO_FLAGS, kind: 'alter_table_properties', tableName, properties: changed }];
}

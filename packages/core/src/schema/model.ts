import type { Column, PrimaryKey, Schema, Table } from '../types/schema';
import { COLUMN_MAPPING_PROPERTY, MAX_CLUSTERING_COLUMNS } from '../types/schema';
import { SchemaLoadError, type ValidationIssue } from '../types/errors';

/**
 * Build a schema from a list of tables. Later tables with the same name replace earlier ones.
 */
export function createSchema(tables: Iterable<Table> = []): Schema {
  const byName: Record<string, Table> = {};
  for (const table of tables) {
    byName[table.name] = table;
  }
  return { tables: byName };
}

/** An empty schema, used as the current state in offline mode */
export function emptySchema(): Schema {
  return { tables: {} };
}

export function getTable(schema: Schema, name: string): Table | undefined {
  return Object.prototype.hasOwnProperty.call(schema.tables, name) ? schema.tables[name] : undefined;
}

export function tableNames(schema: Schema): Set<string> {
  return new Set(Object.keys(schema.tables));
}

export function getColumn(table: Table, name: string): Column | undefined {
  return table.columns.find(c => c.name === name);
}

/** True when the table allows DROP/RENAME COLUMN without rewriting data */
export function hasColumnMapping(table: Table): boolean {
  return table.tableProperties[COLUMN_MAPPING_PROPERTY] === 'name';
}

/** Order-insensitive list comparison */
export function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const item of left) {
    if (!right.has(item)) return false;
  }
  return true;
}

/**
 * Primary keys are equal when both are absent, or both have the same
 * columns in the same order and the same rely flag.
 */
export function primaryKeysEqual(a: PrimaryKey | undefined, b: PrimaryKey | undefined): boolean {
  if (!a || !b) return a === b;
  if (a.rely !== b.rely) return false;
  if (a.columns.length !== b.columns.length) return false;
  return a.columns.every((col, i) => col === b.columns[i]);
}

export function columnsEqual(a: Column, b: Column): boolean {
  return (
    a.name === b.name &&
    a.type.toUpperCase() === b.type.toUpperCase() &&
    a.nullable === b.nullable &&
    a.default === b.default &&
    a.generated === b.generated &&
    a.check === b.check &&
    a.comment === b.comment &&
    a.foreignKey?.table === b.foreignKey?.table &&
    a.foreignKey?.column === b.foreignKey?.column
  );
}

function propertiesEqual(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every(k => Object.prototype.hasOwnProperty.call(b, k) && a[k] === b[k]);
}

/**
 * Table equality. Column, clustering and partition order are insignificant;
 * columns and check constraints are compared by name.
 */
export function tablesEqual(a: Table, b: Table): boolean {
  if (a.name !== b.name || a.comment !== b.comment) return false;
  if (a.columns.length !== b.columns.length) return false;
  for (const col of a.columns) {
    const other = getColumn(b, col.name);
    if (!other || !columnsEqual(col, other)) return false;
  }

  if (!primaryKeysEqual(a.primaryKey, b.primaryKey)) return false;

  if (a.checkConstraints.length !== b.checkConstraints.length) return false;
  for (const cc of a.checkConstraints) {
    const other = b.checkConstraints.find(c => c.name === cc.name);
    if (!other || other.expression !== cc.expression) return false;
  }

  return (
    sameMembers(a.liquidClustering, b.liquidClustering) &&
    sameMembers(a.partitionedBy, b.partitionedBy) &&
    propertiesEqual(a.tableProperties, b.tableProperties)
  );
}

/**
 * Structural problems that make a table unusable by the differ/generator.
 */
export function validateTable(table: Table): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const path = `tables.${table.name || '<unnamed>'}`;

  if (!table.name) issues.push({ path: 'table', message: 'Table name is required' });

  const seen = new Set<string>();
  table.columns.forEach((col, i) => {
    if (!col.name) issues.push({ path: `${path}.columns[${i}].name`, message: 'Column name is required' });
    if (!col.type.trim()) issues.push({ path: `${path}.columns[${i}].type`, message: 'Column type is required' });
    if (seen.has(col.name)) {
      issues.push({ path: `${path}.columns[${i}].name`, message: `Duplicate column "${col.name}"` });
    }
    seen.add(col.name);
  });

  if (table.liquidClustering.length > MAX_CLUSTERING_COLUMNS) {
    issues.push({
      path: `${path}.liquid_clustering`,
      message: `At most ${MAX_CLUSTERING_COLUMNS} clustering columns allowed, got ${table.liquidClustering.length}`,
    });
  }

  return issues;
}

/** Throws SchemaLoadError if the table is not well-formed */
export function assertWellFormedTable(table: Table): void {
  const issues = validateTable(table);
  if (issues.length > 0) {
    throw new SchemaLoadError(
      `Table "${table.name}" is invalid: ${issues.map(i => i.message).join('; ')}`,
      issues
    );
  }
}

/**
 * Migration code generator: renders an ordered change list as a
 * parameterized SQL migration document.
 *
 * Table names are emitted as `${catalog}.${schema}.<table>`; the runner
 * substitutes the placeholders at apply time.
 */

import type { Change, ChangeOf } from '../types/change';
import type { Column, PrimaryKey, Table } from '../types/schema';
import { COLUMN_MAPPING_PROPERTY } from '../types/schema';
import { CodegenError, UnsupportedChangeError } from '../types/errors';
import { qualifiedPlaceholderName as fqn, sqlString } from '../utils/sql';

export interface GenerateOptions {
  /** Clock for the `Generated:` header line */
  now?: () => Date;
}

/**
 * Render a migration document.
 *
 * Throws UnsupportedChangeError listing every unsupported change before
 * anything is rendered. An empty change list yields the header only.
 */
export function generateMigration(
  changes: readonly Change[],
  description: string,
  options: GenerateOptions = {}
): string {
  const unsupported = changes.filter(c => c.isUnsupported);
  if (unsupported.length > 0) {
    throw new UnsupportedChangeError(
      unsupported.map(c => ({
        kind: c.kind,
        tableName: c.tableName,
        errorMessage: c.errorMessage ?? 'Unsupported change',
      }))
    );
  }

  const now = options.now ?? (() => new Date());
  const lines: string[] = [
    '-- Migration: Auto-generated',
    `-- Description: ${description.trim().replace(/\s*\r?\n\s*/g, ' ')}`,
    `-- Generated: ${now().toISOString()}`,
    '',
    '-- Variable substitution: ${catalog}, ${schema}',
    '',
  ];

  const destructive = changes.filter(c => c.isDestructive);
  if (destructive.length > 0) {
    lines.push('-- WARNING: This migration contains destructive changes:');
    for (const change of destructive) {
      lines.push(`--   - ${change.kind}: ${change.tableName}`);
    }
    lines.push('');
  }

  for (const change of changes) {
    lines.push(`-- ${change.kind}: ${change.tableName}`);
    if (change.requiresColumnMapping) {
      lines.push(`-- Requires: ${COLUMN_MAPPING_PROPERTY} = 'name'`);
    }
    lines.push(renderChange(change));
    lines.push('');
  }

  return lines.join('\n');
}

/** SQL for a single change, without the header comments */
export function renderChange(change: Change): string {
  switch (change.kind) {
    case 'create_table':
      return renderCreateTable(change.table);
    case 'drop_table':
      // Never executed automatically.
      return `-- DROP TABLE IF EXISTS ${fqn(change.tableName)};`;
    case 'add_column':
      return renderAddColumn(change);
    case 'drop_column':
      return `ALTER TABLE ${fqn(change.tableName)} DROP COLUMN IF EXISTS ${change.columnName};`;
    case 'alter_column_type':
      return `ALTER TABLE ${fqn(change.tableName)} ALTER COLUMN ${change.columnName} TYPE ${change.toType};`;
    case 'alter_column_nullability':
      return (
        `ALTER TABLE ${fqn(change.tableName)} ALTER COLUMN ${change.columnName} ` +
        `${change.toNullable ? 'DROP' : 'SET'} NOT NULL;`
      );
    case 'alter_column_default':
      return change.toDefault !== undefined
        ? `ALTER TABLE ${fqn(change.tableName)} ALTER COLUMN ${change.columnName} SET DEFAULT ${change.toDefault};`
        : `ALTER TABLE ${fqn(change.tableName)} ALTER COLUMN ${change.columnName} DROP DEFAULT;`;
    case 'set_primary_key':
      return (
        `ALTER TABLE ${fqn(change.tableName)} ADD ` +
        `${primaryKeyClause(change.tableName, change.primaryKey)};`
      );
    case 'drop_primary_key':
      return `ALTER TABLE ${fqn(change.tableName)} DROP PRIMARY KEY IF EXISTS;`;
    case 'add_foreign_key':
      return (
        `ALTER TABLE ${fqn(change.tableName)} ADD CONSTRAINT ` +
        `${foreignKeyName(change.tableName, change.columnName)} FOREIGN KEY (${change.columnName}) ` +
        `REFERENCES ${fqn(change.referencedTable)}(${change.referencedColumn});`
      );
    case 'drop_foreign_key':
      return (
        `ALTER TABLE ${fqn(change.tableName)} DROP CONSTRAINT IF EXISTS ` +
        `${foreignKeyName(change.tableName, change.columnName)};`
      );
    case 'add_check_constraint':
      return (
        `ALTER TABLE ${fqn(change.tableName)} ADD CONSTRAINT ${change.constraint.name} ` +
        `CHECK (${change.constraint.expression});`
      );
    case 'drop_check_constraint':
      return `ALTER TABLE ${fqn(change.tableName)} DROP CONSTRAINT IF EXISTS ${change.constraintName};`;
    case 'alter_clustering': {
      const target = change.toColumns.length > 0 ? `(${change.toColumns.join(', ')})` : 'NONE';
      return (
        `ALTER TABLE ${fqn(change.tableName)} CLUSTER BY ${target};\n` +
        '-- Note: Run OPTIMIZE to apply clustering changes'
      );
    }
    case 'alter_partitioning':
      throw new UnsupportedChangeError([
        {
          kind: change.kind,
          tableName: change.tableName,
          errorMessage: change.errorMessage ?? 'Partitioning cannot be changed on an existing table',
        },
      ]);
    case 'alter_table_properties':
      return `ALTER TABLE ${fqn(change.tableName)} SET TBLPROPERTIES (${propertyList(change.properties)});`;
    default: {
      const unknown: never = change;
      throw new CodegenError(`Unknown change kind: ${JSON.stringify(unknown)}`);
    }
  }
}

function renderAddColumn(change: ChangeOf<'add_column'>): string {
  const { column } = change;
  if (!column.nullable && column.default === undefined) {
    throw new CodegenError(
      `Cannot add NOT NULL column '${column.name}' to table '${change.tableName}' without a default value`
    );
  }
  return `ALTER TABLE ${fqn(change.tableName)} ADD COLUMN IF NOT EXISTS ${columnDefinition(column)};`;
}

/**
 * CREATE TABLE plus one ADD CONSTRAINT per check constraint, since the
 * engine only accepts CHECK through ALTER TABLE.
 */
function renderCreateTable(table: Table): string {
  const parts = table.columns.map(col => `    ${columnDefinition(col)}`);
  if (table.primaryKey) {
    parts.push(`    ${primaryKeyClause(table.name, table.primaryKey)}`);
  }

  let sql = `CREATE TABLE IF NOT EXISTS ${fqn(table.name)} (\n${parts.join(',\n')}\n) USING DELTA`;

  if (table.liquidClustering.length > 0) {
    sql += `\nCLUSTER BY (${table.liquidClustering.join(', ')})`;
  } else if (table.partitionedBy.length > 0) {
    sql += `\nPARTITIONED BY (${table.partitionedBy.join(', ')})`;
  }

  if (Object.keys(table.tableProperties).length > 0) {
    sql += `\nTBLPROPERTIES (${propertyList(table.tableProperties)})`;
  }

  if (table.comment) {
    sql += `\nCOMMENT ${sqlString(table.comment)}`;
  }

  sql += ';';

  for (const check of table.checkConstraints) {
    sql += `\nALTER TABLE ${fqn(table.name)} ADD CONSTRAINT ${check.name} CHECK (${check.expression});`;
  }

  return sql;
}

export function columnDefinition(column: Column): string {
  let def = `${column.name} ${column.type}`;
  if (column.generated) def += ` GENERATED ${column.generated}`;
  if (!column.nullable) def += ' NOT NULL';
  if (column.default !== undefined) def += ` DEFAULT ${column.default}`;
  if (column.comment) def += ` COMMENT ${sqlString(column.comment)}`;
  return def;
}

function primaryKeyClause(tableName: string, pk: PrimaryKey): string {
  return `CONSTRAINT pk_${tableName} PRIMARY KEY (${pk.columns.join(', ')}) ${pk.rely ? 'RELY' : 'NORELY'}`;
}

function foreignKeyName(tableName: string, columnName: string): string {
  return `fk_${tableName}_${columnName}`;
}

function propertyList(properties: Readonly<Record<string, string>>): string {
  return Object.entries(properties)
    .map(([key, value]) => `${sqlString(key)} = ${sqlString(value)}`)
    .join(', ');
}

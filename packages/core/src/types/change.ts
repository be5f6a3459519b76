/**
 * Change Types: output of the schema differ.
 *
 * Each change kind carries only the payload relevant to it, so the code
 * generator's per-kind dispatch is checked for exhaustiveness.
 */

import type { CheckConstraint, Column, PrimaryKey, Table } from './schema';

/** Fixed enumeration of change kinds, as they appear in generated SQL headers */
export type ChangeKind =
  | 'create_table'
  | 'drop_table'
  | 'add_column'
  | 'drop_column'
  | 'alter_column_type'
  | 'alter_column_nullability'
  | 'alter_column_default'
  | 'set_primary_key'
  | 'drop_primary_key'
  | 'add_foreign_key'
  | 'drop_foreign_key'
  | 'add_check_constraint'
  | 'drop_check_constraint'
  | 'alter_clustering'
  | 'alter_partitioning'
  | 'alter_table_properties';

/** Fields every change carries */
interface ChangeBase {
  readonly tableName: string;
  /** Data loss possible */
  readonly isDestructive: boolean;
  /** Engine cannot perform this; blocks code generation */
  readonly isUnsupported: boolean;
  /** Table must have name-based column mapping enabled first */
  readonly requiresColumnMapping: boolean;
  /** Always set when `isUnsupported` is true */
  readonly errorMessage?: string;
}

export interface CreateTableChange extends ChangeBase {
  readonly kind: 'create_table';
  readonly table: Table;
}

export interface DropTableChange extends ChangeBase {
  readonly kind: 'drop_table';
}

export interface AddColumnChange extends ChangeBase {
  readonly kind: 'add_column';
  readonly column: Column;
}

export interface DropColumnChange extends ChangeBase {
  readonly kind: 'drop_column';
  readonly columnName: string;
}

export interface AlterColumnTypeChange extends ChangeBase {
  readonly kind: 'alter_column_type';
  readonly columnName: string;
  readonly fromType: string;
  readonly toType: string;
}

export interface AlterColumnNullabilityChange extends ChangeBase {
  readonly kind: 'alter_column_nullability';
  readonly columnName: string;
  readonly fromNullable: boolean;
  readonly toNullable: boolean;
}

export interface AlterColumnDefaultChange extends ChangeBase {
  readonly kind: 'alter_column_default';
  readonly columnName: string;
  readonly fromDefault?: string;
  readonly toDefault?: string;
}

export interface SetPrimaryKeyChange extends ChangeBase {
  readonly kind: 'set_primary_key';
  readonly primaryKey: PrimaryKey;
}

export interface DropPrimaryKeyChange extends ChangeBase {
  readonly kind: 'drop_primary_key';
  readonly primaryKey: PrimaryKey;
}

export interface AddForeignKeyChange extends ChangeBase {
  readonly kind: 'add_foreign_key';
  readonly columnName: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
}

export interface DropForeignKeyChange extends ChangeBase {
  readonly kind: 'drop_foreign_key';
  readonly columnName: string;
}

export interface AddCheckConstraintChange extends ChangeBase {
  readonly kind: 'add_check_constraint';
  readonly constraint: CheckConstraint;
}

export interface DropCheckConstraintChange extends ChangeBase {
  readonly kind: 'drop_check_constraint';
  readonly constraintName: string;
}

export interface AlterClusteringChange extends ChangeBase {
  readonly kind: 'alter_clustering';
  readonly fromColumns: readonly string[];
  /** Target order preserved; empty means remove clustering */
  readonly toColumns: readonly string[];
}

export interface AlterPartitioningChange extends ChangeBase {
  readonly kind: 'alter_partitioning';
  readonly fromColumns: readonly string[];
  readonly toColumns: readonly string[];
}

export interface AlterTablePropertiesChange extends ChangeBase {
  readonly kind: 'alter_table_properties';
  /** Only the added or changed keys */
  readonly properties: Readonly<Record<string, string>>;
}

export type Change =
  | CreateTableChange
  | DropTableChange
  | AddColumnChange
  | DropColumnChange
  | AlterColumnTypeChange
  | AlterColumnNullabilityChange
  | AlterColumnDefaultChange
  | SetPrimaryKeyChange
  | DropPrimaryKeyChange
  | AddForeignKeyChange
  | DropForeignKeyChange
  | AddCheckConstraintChange
  | DropCheckConstraintChange
  | AlterClusteringChange
  | AlterPartitioningChange
  | AlterTablePropertiesChange;

/** Narrow a change union member by kind */
export type ChangeOf<K extends ChangeKind> = Extract<Change, { kind: K }>;

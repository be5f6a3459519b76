/**
 * On-disk YAML shape of a declared table (snake_case keys) and its JSON Schema.
 */

import type { Table, Column } from '../types/schema';

export type ScalarValue = string | number | boolean;

export interface ColumnDocument {
  name: string;
  type: string;
  nullable?: boolean;
  default?: ScalarValue;
  generated?: string;
  check?: string;
  foreign_key?: { table: string; column: string };
  comment?: string;
}

export interface TableDocument {
  table: string;
  comment?: string;
  columns: ColumnDocument[];
  primary_key?: { columns: string[]; rely?: boolean };
  check_constraints?: { name: string; expression: string }[];
  liquid_clustering?: string[];
  partitioned_by?: string[];
  table_properties?: Record<string, ScalarValue>;
}

export interface SchemaDocument {
  tables: TableDocument[];
}

const scalar = { type: ['string', 'number', 'boolean'] };
const stringList = { type: 'array', items: { type: 'string' } };

export const COLUMN_JSON_SCHEMA = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', minLength: 1 },
    nullable: { type: 'boolean' },
    default: scalar,
    generated: { type: 'string' },
    check: { type: 'string' },
    foreign_key: {
      type: 'object',
      properties: {
        table: { type: 'string', minLength: 1 },
        column: { type: 'string', minLength: 1 },
      },
      required: ['table', 'column'],
      additionalProperties: false,
    },
    comment: { type: 'string' },
  },
  required: ['name', 'type'],
  additionalProperties: false,
};

export const TABLE_JSON_SCHEMA = {
  type: 'object',
  properties: {
    table: { type: 'string', minLength: 1 },
    comment: { type: 'string' },
    columns: { type: 'array', items: COLUMN_JSON_SCHEMA },
    primary_key: {
      type: 'object',
      properties: {
        columns: { ...stringList, minItems: 1 },
        rely: { type: 'boolean' },
      },
      required: ['columns'],
      additionalProperties: false,
    },
    check_constraints: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          expression: { type: 'string', minLength: 1 },
        },
        required: ['name', 'expression'],
        additionalProperties: false,
      },
    },
    liquid_clustering: stringList,
    partitioned_by: stringList,
    table_properties: { type: 'object', additionalProperties: scalar },
  },
  required: ['table', 'columns'],
  additionalProperties: false,
};

export const SCHEMA_JSON_SCHEMA = {
  type: 'object',
  properties: {
    tables: { type: 'array', items: TABLE_JSON_SCHEMA },
  },
  required: ['tables'],
  additionalProperties: false,
};

// ── Document ↔ model ────────────────────────────────────────────

function columnFromDocument(doc: ColumnDocument): Column {
  return {
    name: doc.name,
    type: doc.type,
    nullable: doc.nullable ?? true,
    ...(doc.default !== undefined ? { default: String(doc.default) } : {}),
    ...(doc.generated !== undefined ? { generated: doc.generated } : {}),
    ...(doc.check !== undefined ? { check: doc.check } : {}),
    ...(doc.foreign_key ? { foreignKey: { table: doc.foreign_key.table, column: doc.foreign_key.column } } : {}),
    ...(doc.comment !== undefined ? { comment: doc.comment } : {}),
  };
}

export function tableFromDocument(doc: TableDocument): Table {
  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(doc.table_properties ?? {})) {
    properties[key] = String(value);
  }

  return {
    name: doc.table,
    columns: doc.columns.map(columnFromDocument),
    ...(doc.primary_key
      ? { primaryKey: { columns: [...doc.primary_key.columns], rely: doc.primary_key.rely ?? false } }
      : {}),
    checkConstraints: (doc.check_constraints ?? []).map(c => ({ name: c.name, expression: c.expression })),
    liquidClustering: [...(doc.liquid_clustering ?? [])],
    partitionedBy: [...(doc.partitioned_by ?? [])],
    tableProperties: properties,
    ...(doc.comment !== undefined ? { comment: doc.comment } : {}),
  };
}

function columnToDocument(col: Column): ColumnDocument {
  const doc: ColumnDocument = { name: col.name, type: col.type };
  if (!col.nullable) doc.nullable = false;
  if (col.default !== undefined) doc.default = col.default;
  if (col.generated !== undefined) doc.generated = col.generated;
  if (col.check !== undefined) doc.check = col.check;
  if (col.foreignKey) doc.foreign_key = { table: col.foreignKey.table, column: col.foreignKey.column };
  if (col.comment !== undefined) doc.comment = col.comment;
  return doc;
}

/** Inverse of tableFromDocument; fields at their defaults are omitted */
export function tableToDocument(table: Table): TableDocument {
  const doc: TableDocument = {
    table: table.name,
    ...(table.comment ? { comment: table.comment } : {}),
    columns: table.columns.map(columnToDocument),
  };

  if (table.primaryKey) {
    doc.primary_key = { columns: [...table.primaryKey.columns] };
    if (table.primaryKey.rely) doc.primary_key.rely = true;
  }
  if (table.checkConstraints.length > 0) {
    doc.check_constraints = table.checkConstraints.map(c => ({ name: c.name, expression: c.expression }));
  }
  if (table.liquidClustering.length > 0) doc.liquid_clustering = [...table.liquidClustering];
  if (table.partitionedBy.length > 0) doc.partitioned_by = [...table.partitionedBy];
  if (Object.keys(table.tableProperties).length > 0) doc.table_properties = { ...table.tableProperties };
  return doc;
}

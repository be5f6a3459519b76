/**
 * SchemaIntrospector: reads the live state of one catalog schema into the
 * same Schema model the YAML loader produces.
 *
 * Catalog-wide facts (tables, columns, keys) come from information_schema in
 * one query each; per-table facts (properties, clustering, partitioning)
 * from SHOW TBLPROPERTIES and DESCRIBE DETAIL.
 */

import {
  IntrospectionError,
  Logger,
  assertIdentifier,
  createSchema,
  getErrorMessage,
  sqlString,
  type CheckConstraint,
  type Column,
  type ForeignKey,
  type PrimaryKey,
  type Schema,
  type SqlClient,
  type SqlRow,
  type Table,
} from '@lakeshift/core';
import { toStr, toStringList } from './rows';

const CHECK_CONSTRAINT_PREFIX = 'delta.constraints.';

/** Properties worth diffing; the engine sets many others on its own */
export const KEPT_PROPERTY_PREFIXES = [
  'delta.enableChangeDataFeed',
  'delta.autoOptimize',
  'delta.columnMapping',
  'delta.minReaderVersion',
  'delta.minWriterVersion',
] as const;

export interface SchemaIntrospectorOptions {
  catalog: string;
  schema: string;
  logger?: Logger;
}

function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export class SchemaIntrospector {
  private readonly catalog: string;
  private readonly schema: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: SqlClient,
    options: SchemaIntrospectorOptions
  ) {
    this.catalog = assertIdentifier(options.catalog, 'catalog');
    this.schema = assertIdentifier(options.schema, 'schema');
    this.logger = (options.logger ?? new Logger()).child('Introspect');
  }

  async introspect(): Promise<Schema> {
    const names = await this.tableNames();
    this.logger.debug(`Found ${names.length} table(s) in ${this.catalog}.${this.schema}`);
    if (names.length === 0) return createSchema();

    const columns = await this.columnsByTable();
    const primaryKeys = await this.primaryKeysByTable();
    const foreignKeys = await this.foreignKeysByTable();

    const tables: Table[] = [];
    for (const name of names) {
      const properties = await this.properties(name);
      const detail = await this.detail(name);
      const fks = foreignKeys.get(name);
      const primaryKey = primaryKeys.get(name);

      tables.push({
        name,
        columns: (columns.get(name) ?? []).map(col => {
          const fk = fks?.get(col.name);
          return fk ? { ...col, foreignKey: fk } : col;
        }),
        ...(primaryKey ? { primaryKey } : {}),
        checkConstraints: properties.checks,
        liquidClustering: detail.clustering,
        partitionedBy: detail.partitioning,
        tableProperties: properties.kept,
      });
    }

    return createSchema(tables);
  }

  private fqn(table: string): string {
    return `${this.catalog}.${this.schema}.${quoteIdentifier(table)}`;
  }

  private get infoSchema(): string {
    return `${this.catalog}.information_schema`;
  }

  private async run(what: string, sql: string): Promise<SqlRow[]> {
    try {
      return await this.client.query(sql);
    } catch (err) {
      throw new IntrospectionError(`Failed to read ${what}: ${getErrorMessage(err)}`, err);
    }
  }

  /** Managed and external tables, minus internal ones whose names start with `_` */
  private async tableNames(): Promise<string[]> {
    const rows = await this.run(
      'tables',
      `SELECT table_name FROM ${this.infoSchema}.tables ` +
        `WHERE table_schema = ${sqlString(this.schema)} AND table_type IN ('MANAGED', 'EXTERNAL') ` +
        'ORDER BY table_name'
    );
    return rows
      .map(row => toStr(row['table_name']) ?? '')
      .filter(name => name !== '' && !name.startsWith('_'));
  }

  private async columnsByTable(): Promise<Map<string, Column[]>> {
    const rows = await this.run(
      'columns',
      'SELECT table_name, column_name, full_data_type, is_nullable, column_default, comment ' +
        `FROM ${this.infoSchema}.columns WHERE table_schema = ${sqlString(this.schema)} ` +
        'ORDER BY table_name, ordinal_position'
    );

    const byTable = new Map<string, Column[]>();
    for (const row of rows) {
      const table = toStr(row['table_name']) ?? '';
      const defaultValue = toStr(row['column_default']);
      const comment = toStr(row['comment']);
      const column: Column = {
        name: toStr(row['column_name']) ?? '',
        type: toStr(row['full_data_type']) ?? '',
        nullable: toStr(row['is_nullable']) === 'YES',
        ...(defaultValue !== undefined ? { default: defaultValue } : {}),
        ...(comment !== undefined ? { comment } : {}),
      };
      const list = byTable.get(table) ?? [];
      list.push(column);
      byTable.set(table, list);
    }
    return byTable;
  }

  /** `enforced = 'YES'` maps to RELY */
  private async primaryKeysByTable(): Promise<Map<string, PrimaryKey>> {
    const rows = await this.run(
      'primary keys',
      'SELECT tc.table_name, tc.enforced, kcu.column_name, kcu.ordinal_position ' +
        `FROM ${this.infoSchema}.table_constraints tc ` +
        `JOIN ${this.infoSchema}.key_column_usage kcu ` +
        'ON tc.constraint_catalog = kcu.constraint_catalog ' +
        'AND tc.constraint_schema = kcu.constraint_schema ' +
        'AND tc.constraint_name = kcu.constraint_name ' +
        `WHERE tc.table_schema = ${sqlString(this.schema)} AND tc.constraint_type = 'PRIMARY KEY' ` +
        'ORDER BY tc.table_name, kcu.ordinal_position'
    );

    const byTable = new Map<string, { columns: string[]; rely: boolean }>();
    for (const row of rows) {
      const table = toStr(row['table_name']) ?? '';
      const entry = byTable.get(table) ?? { columns: [], rely: toStr(row['enforced']) === 'YES' };
      entry.columns.push(toStr(row['column_name']) ?? '');
      byTable.set(table, entry);
    }
    return byTable;
  }

  private async foreignKeysByTable(): Promise<Map<string, Map<string, ForeignKey>>> {
    const rows = await this.run(
      'foreign keys',
      'SELECT kcu.table_name, kcu.column_name, ' +
        'ccu.table_name AS referenced_table, ccu.column_name AS referenced_column ' +
        `FROM ${this.infoSchema}.referential_constraints rc ` +
        `JOIN ${this.infoSchema}.key_column_usage kcu ` +
        'ON rc.constraint_catalog = kcu.constraint_catalog ' +
        'AND rc.constraint_schema = kcu.constraint_schema ' +
        'AND rc.constraint_name = kcu.constraint_name ' +
        `JOIN ${this.infoSchema}.constraint_column_usage ccu ` +
        'ON rc.unique_constraint_catalog = ccu.constraint_catalog ' +
        'AND rc.unique_constraint_schema = ccu.constraint_schema ' +
        'AND rc.unique_constraint_name = ccu.constraint_name ' +
        `WHERE kcu.table_schema = ${sqlString(this.schema)}`
    );

    const byTable = new Map<string, Map<string, ForeignKey>>();
    for (const row of rows) {
      const table = toStr(row['table_name']) ?? '';
      const columns = byTable.get(table) ?? new Map<string, ForeignKey>();
      columns.set(toStr(row['column_name']) ?? '', {
        table: toStr(row['referenced_table']) ?? '',
        column: toStr(row['referenced_column']) ?? '',
      });
      byTable.set(table, columns);
    }
    return byTable;
  }

  /** CHECK constraints live in table properties under `delta.constraints.` */
  private async properties(table: string): Promise<{ checks: CheckConstraint[]; kept: Record<string, string> }> {
    const rows = await this.run(`properties of ${table}`, `SHOW TBLPROPERTIES ${this.fqn(table)}`);
    const checks: CheckConstraint[] = [];
    const kept: Record<string, string> = {};

    for (const row of rows) {
      const key = toStr(row['key']) ?? '';
      const value = toStr(row['value']) ?? '';
      if (key.startsWith(CHECK_CONSTRAINT_PREFIX)) {
        checks.push({ name: key.slice(CHECK_CONSTRAINT_PREFIX.length), expression: value });
      } else if (KEPT_PROPERTY_PREFIXES.some(prefix => key.startsWith(prefix))) {
        kept[key] = value;
      }
    }
    return { checks, kept };
  }

  private async detail(table: string): Promise<{ clustering: string[]; partitioning: string[] }> {
    const [row] = await this.run(`detail of ${table}`, `DESCRIBE DETAIL ${this.fqn(table)}`);
    return {
      clustering: toStringList(row?.['clusteringColumns']),
      partitioning: toStringList(row?.['partitionColumns']),
    };
  }
}

/**
 * Schema Types: Tables, Columns, Constraints
 *
 * In-memory model of a catalog schema. Produced by the YAML loader (declared
 * state) and by introspection (current state); consumed by the differ.
 *
 * Primary and foreign keys are informational only: the engine never enforces
 * them. CHECK constraints ARE enforced at write time.
 */

// ── Constraints ─────────────────────────────────────────────────

/** Informational reference to another table's column. Never enforced. */
export interface ForeignKey {
  readonly table: string;
  readonly column: string;
}

/**
 * Primary key. Column order is significant for equality.
 * `rely` lets the optimizer assume uniqueness without enforcing it.
 */
export interface PrimaryKey {
  readonly columns: readonly string[];
  readonly rely: boolean;
}

/** Named boolean expression, enforced by the engine on write. */
export interface CheckConstraint {
  readonly name: string;
  readonly expression: string;
}

// ── Column & Table ──────────────────────────────────────────────

/** Column definition within a table */
export interface Column {
  readonly name: string;
  /** Free-text SQL type; case preserved, compared uppercase */
  readonly type: string;
  /** Defaults to true */
  readonly nullable: boolean;
  /** Literal default expression, e.g. `'active'` or `0` */
  readonly default?: string;
  /** Generation clause, e.g. `ALWAYS AS IDENTITY` */
  readonly generated?: string;
  /** Inline check expression (informational) */
  readonly check?: string;
  readonly foreignKey?: ForeignKey;
  readonly comment?: string;
}

/** Table definition */
export interface Table {
  readonly name: string;
  /** Ordered for rendering; compared as a name-keyed mapping */
  readonly columns: readonly Column[];
  readonly primaryKey?: PrimaryKey;
  readonly checkConstraints: readonly CheckConstraint[];
  /** At most 4 columns. Order matters for SQL, not for equality. */
  readonly liquidClustering: readonly string[];
  /** Cannot be changed once the table exists */
  readonly partitionedBy: readonly string[];
  /** Merge-only: absent keys are never dropped */
  readonly tableProperties: Readonly<Record<string, string>>;
  readonly comment?: string;
}

/** Complete schema: table name → table */
export interface Schema {
  readonly tables: Readonly<Record<string, Table>>;
}

/** Maximum number of liquid clustering columns the engine accepts */
export const MAX_CLUSTERING_COLUMNS = 4;

/** Table property enabling name-based column mapping */
export const COLUMN_MAPPING_PROPERTY = 'delta.columnMapping.mode';

// Types
export type {
  ForeignKey,
  PrimaryKey,
  CheckConstraint,
  Column,
  Table,
  Schema,
} from './types/schema';
export { MAX_CLUSTERING_COLUMNS, COLUMN_MAPPING_PROPERTY } from './types/schema';
export type {
  ChangeKind,
  Change,
  ChangeOf,
  CreateTableChange,
  DropTableChange,
  AddColumnChange,
  DropColumnChange,
  AlterColumnTypeChange,
  AlterColumnNullabilityChange,
  AlterColumnDefaultChange,
  SetPrimaryKeyChange,
  DropPrimaryKeyChange,
  AddForeignKeyChange,
  DropForeignKeyChange,
  AddCheckConstraintChange,
  DropCheckConstraintChange,
  AlterClusteringChange,
  AlterPartitioningChange,
  AlterTablePropertiesChange,
} from './types/change';
export type {
  MigrationFile,
  AppliedMigration,
  PendingMigration,
  RecordAppliedParams,
  MigrationExecutor,
} from './types/migration';
export {
  LakeshiftError,
  SchemaLoadError,
  IntrospectionError,
  DiffError,
  CodegenError,
  UnsupportedChangeError,
  MigrationParseError,
  MigrationStateConflictError,
  MigrationChecksumMismatchError,
  MigrationExecutionError,
  ConfigError,
  ConnectionError,
  toError,
  getErrorMessage,
} from './types/errors';
export type { ValidationIssue, UnsupportedChangeSummary } from './types/errors';

// Interfaces
export type { MigrationStateStore } from './interfaces/migration-state-store';
export type { SqlClient, SqlClientFactory, SqlRow } from './interfaces/sql-client';

// Schema
export {
  createSchema,
  emptySchema,
  getTable,
  tableNames,
  getColumn,
  hasColumnMapping,
  sameMembers,
  primaryKeysEqual,
  columnsEqual,
  tablesEqual,
  validateTable,
  assertWellFormedTable,
} from './schema/model';
export { normalizeType, baseType, isWidening, checkTypeChange, type TypeChangeCheck } from './schema/type-rules';
export { diffSchemas, diffTable, orderChanges, CHANGE_PRIORITY } from './schema/differ';
export { generateMigration, renderChange, columnDefinition, type GenerateOptions } from './schema/codegen';
export type { TableDocument, ColumnDocument, SchemaDocument } from './schema/document';
export { tableFromDocument } from './schema/document';
export { loadSchema, parseTableDocument, parseTableYaml, parseSchemaYaml } from './schema/loader';
export { tableToDocument, exportTableYaml, exportSchemaToDirectory } from './schema/exporter';
export {
  validateSchema,
  type SchemaIssue,
  type SchemaIssueKind,
  type SchemaValidationResult,
} from './schema/validator';

// Migrations
export {
  MIGRATION_FILENAME_PATTERN,
  computeChecksum,
  parseMigration,
  parseMigrationsDir,
  maxVersion,
} from './migrations/parser';
export {
  MigrationRunner,
  planMigrations,
  verifyChecksums,
  migrationLabel,
  type MigrationRunnerOptions,
  type ApplyOptions,
  type ApplyResult,
} from './migrations/runner';

// Implementations
export { MemoryMigrationStateStore } from './impl/memory-state-store';

// Config
export {
  loadConfig,
  validateForDbOps,
  requireCatalogAndSchema,
  DEFAULT_CONFIG,
  type Config,
  type DbConfig,
  type Env,
} from './config';

// Utils
export { Logger, createLogger, silentLogger, type LogLevel, type LogSink, type LoggerOptions } from './utils/logger';
export {
  CATALOG_PLACEHOLDER,
  SCHEMA_PLACEHOLDER,
  escapeSqlString,
  sqlString,
  isValidIdentifier,
  assertIdentifier,
  qualifiedPlaceholderName,
  substituteVariables,
  splitSqlStatements,
} from './utils/sql';

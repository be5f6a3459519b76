// Client
export {
  DatabricksClient,
  databricksClientFactory,
  withSqlClient,
  type DatabricksClientOptions,
  type DriverClient,
  type DriverSession,
  type DriverOperation,
} from './client';

// Schema
export { qualifiedName, stateTableDdl, STATE_TABLE_COLUMNS } from './schema';

// Stores
export { DatabricksMigrationStateStore, type DatabricksStateStoreOptions } from './state-store';

// Introspection
export { SchemaIntrospector, KEPT_PROPERTY_PREFIXES, type SchemaIntrospectorOptions } from './introspect';

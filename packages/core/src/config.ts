/**
 * Configuration: resolved from an explicit environment record plus overrides.
 */

import { ConfigError } from './types/errors';
import { assertIdentifier } from './utils/sql';

export interface Config {
  catalog?: string;
  schema?: string;
  /** Directory (or single file) holding declared table YAML */
  schemaDir: string;
  migrationsDir: string;
  stateTable: string;
  databricksHost?: string;
  databricksToken?: string;
  databricksHttpPath?: string;
  databricksWarehouseId?: string;
}

/** Config with everything a warehouse operation needs */
export interface DbConfig extends Config {
  catalog: string;
  schema: string;
  databricksHost: string;
  databricksToken: string;
  databricksHttpPath: string;
}

export const DEFAULT_CONFIG = {
  schemaDir: 'schema',
  migrationsDir: 'sql/migrations',
  stateTable: '_lakeshift_migrations',
} as const;

export type Env = Readonly<Record<string, string | undefined>>;

const ENV_KEYS = {
  catalog: 'LAKESHIFT_CATALOG',
  schema: 'LAKESHIFT_SCHEMA',
  schemaDir: 'LAKESHIFT_SCHEMA_DIR',
  migrationsDir: 'LAKESHIFT_MIGRATIONS_DIR',
  stateTable: 'LAKESHIFT_STATE_TABLE',
  databricksHost: 'DATABRICKS_HOST',
  databricksToken: 'DATABRICKS_TOKEN',
  databricksHttpPath: 'DATABRICKS_HTTP_PATH',
  databricksWarehouseId: 'DATABRICKS_WAREHOUSE_ID',
} as const satisfies Record<keyof Config, string>;

/** Empty or whitespace-only counts as unset */
function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Build a Config. Non-empty overrides win over the environment, which wins
 * over defaults.
 */
export function loadConfig(env: Env = {}, overrides: Partial<Config> = {}): Config {
  const pick = (key: keyof Config): string | undefined =>
    nonEmpty(overrides[key]) ?? nonEmpty(env[ENV_KEYS[key]]);

  return {
    catalog: pick('catalog'),
    schema: pick('schema'),
    schemaDir: pick('schemaDir') ?? DEFAULT_CONFIG.schemaDir,
    migrationsDir: pick('migrationsDir') ?? DEFAULT_CONFIG.migrationsDir,
    stateTable: pick('stateTable') ?? DEFAULT_CONFIG.stateTable,
    databricksHost: pick('databricksHost'),
    databricksToken: pick('databricksToken'),
    databricksHttpPath: pick('databricksHttpPath'),
    databricksWarehouseId: pick('databricksWarehouseId'),
  };
}

/**
 * Check everything a warehouse operation needs. Reports all missing fields
 * in one ConfigError. The warehouse id alone stands in for the http path.
 */
export function validateForDbOps(config: Config): DbConfig {
  const { catalog, schema, databricksHost, databricksToken } = config;
  const databricksHttpPath =
    config.databricksHttpPath ??
    (config.databricksWarehouseId ? `/sql/1.0/warehouses/${config.databricksWarehouseId}` : undefined);

  const missing: string[] = [];
  if (!catalog) missing.push(ENV_KEYS.catalog);
  if (!schema) missing.push(ENV_KEYS.schema);
  if (!databricksHost) missing.push(ENV_KEYS.databricksHost);
  if (!databricksToken) missing.push(ENV_KEYS.databricksToken);
  if (!databricksHttpPath) missing.push(`${ENV_KEYS.databricksHttpPath} or ${ENV_KEYS.databricksWarehouseId}`);

  if (!catalog || !schema || !databricksHost || !databricksToken || !databricksHttpPath) {
    throw new ConfigError(`Missing required configuration: ${missing.join(', ')}`);
  }

  assertIdentifier(catalog, 'catalog');
  assertIdentifier(schema, 'schema');
  assertIdentifier(config.stateTable, 'state table');

  return { ...config, catalog, schema, databricksHost, databricksToken, databricksHttpPath };
}

/** Catalog and schema only, for commands that render SQL without connecting */
export function requireCatalogAndSchema(config: Config): { catalog: string; schema: string } {
  const { catalog, schema } = config;
  if (!catalog || !schema) {
    const missing: string[] = [];
    if (!catalog) missing.push(ENV_KEYS.catalog);
    if (!schema) missing.push(ENV_KEYS.schema);
    throw new ConfigError(`Missing required configuration: ${missing.join(', ')}`);
  }
  return { catalog: assertIdentifier(catalog, 'catalog'), schema: assertIdentifier(schema, 'schema') };
}

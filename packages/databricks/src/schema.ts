import { assertIdentifier } from '@lakeshift/core';

export const STATE_TABLE_COLUMNS = ['version', 'name', 'checksum', 'applied_at', 'success', 'error'] as const;

/** `catalog.schema.table`, each part checked as a plain identifier */
export function qualifiedName(catalog: string, schema: string, table: string): string {
  return [
    assertIdentifier(catalog, 'catalog'),
    assertIdentifier(schema, 'schema'),
    assertIdentifier(table, 'table'),
  ].join('.');
}

/** Migration ledger table */
export function stateTableDdl(fqn: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${fqn} (
  version     BIGINT NOT NULL,
  name        STRING NOT NULL,
  checksum    STRING NOT NULL,
  applied_at  TIMESTAMP NOT NULL,
  success     BOOLEAN NOT NULL,
  error       STRING
) USING DELTA
COMMENT 'lakeshift migration ledger'`.trim();
}

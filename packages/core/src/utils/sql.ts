import { ConfigError } from '../types/errors';

/** Placeholder tokens left in generated files, resolved at apply time */
export const CATALOG_PLACEHOLDER = '${catalog}';
export const SCHEMA_PLACEHOLDER = '${schema}';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Double embedded single quotes for use inside a '...' literal */
export function escapeSqlString(value: string): string {
  return value.replace(/'/g, "''");
}

/** Quote and escape a string literal */
export function sqlString(value: string): string {
  return `'${escapeSqlString(value)}'`;
}

export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

/**
 * Identifiers are interpolated into SQL text (the driver has no bind
 * parameters for them), so only plain letters/digits/underscore pass.
 */
export function assertIdentifier(value: string, label: string): string {
  if (!isValidIdentifier(value)) {
    throw new ConfigError(
      `Invalid ${label} "${value}": must contain only letters, digits and underscores, and not start with a digit`
    );
  }
  return value;
}

/** `${catalog}.${schema}.<table>` */
export function qualifiedPlaceholderName(tableName: string): string {
  return `${CATALOG_PLACEHOLDER}.${SCHEMA_PLACEHOLDER}.${tableName}`;
}

/** Plain textual replacement of the placeholder tokens */
export function substituteVariables(sql: string, vars: { catalog: string; schema: string }): string {
  return sql.split(CATALOG_PLACEHOLDER).join(vars.catalog).split(SCHEMA_PLACEHOLDER).join(vars.schema);
}

/**
 * Split SQL text into statements on `;`.
 *
 * Whole-line `--` comments are removed first, then empty segments are
 * dropped. A `;` inside a single-quoted literal does not end a statement;
 * a doubled `''` stays inside the literal.
 */
export function splitSqlStatements(sql: string): string[] {
  const withoutComments = sql
    .split(/\r?\n/)
    .filter(line => !line.trimStart().startsWith('--'))
    .join('\n');

  const statements: string[] = [];
  let current = '';
  let inLiteral = false;
  for (const char of withoutComments) {
    if (char === "'") inLiteral = !inLiteral;
    if (char === ';' && !inLiteral) {
      const stmt = current.trim();
      if (stmt) statements.push(stmt);
      current = '';
      continue;
    }
    current += char;
  }
  const last = current.trim();
  if (last) statements.push(last);
  return statements;
}

/**
 * YAML schema loader.
 *
 * Accepts either a single file with a top-level `tables:` list, or a
 * directory of `*.yaml` / `*.yml` files holding one table each. Documents
 * are checked against a closed JSON Schema, so an unknown or misspelled
 * field fails the load.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import Ajv, { type ErrorObject } from 'ajv';
import { parse as parseYaml } from 'yaml';
import type { Schema, Table } from '../types/schema';
import { SchemaLoadError, getErrorMessage, type ValidationIssue } from '../types/errors';
import { assertWellFormedTable, createSchema } from './model';
import {
  SCHEMA_JSON_SCHEMA,
  TABLE_JSON_SCHEMA,
  tableFromDocument,
  type SchemaDocument,
  type TableDocument,
} from './document';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateTableDocument = ajv.compile<TableDocument>(TABLE_JSON_SCHEMA);
const validateSchemaDocument = ajv.compile<SchemaDocument>(SCHEMA_JSON_SCHEMA);

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

function toIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(e => {
    const extra: unknown = e.params.additionalProperty;
    const message =
      e.keyword === 'additionalProperties' && typeof extra === 'string'
        ? `unknown field "${extra}"`
        : e.message ?? 'is invalid';
    return { path: e.instancePath || '/', message };
  });
}

function invalid(source: string, issues: ValidationIssue[]): SchemaLoadError {
  const details = issues.map(i => `${i.path} ${i.message}`).join('; ');
  return new SchemaLoadError(`Invalid schema in ${source}: ${details}`, issues);
}

function parseYamlText(text: string, source: string): unknown {
  try {
    return parseYaml(text);
  } catch (err) {
    throw new SchemaLoadError(`Cannot parse YAML in ${source}: ${getErrorMessage(err)}`);
  }
}

/** Validate one table document and convert it to a well-formed Table */
export function parseTableDocument(data: unknown, source = '<input>'): Table {
  if (!validateTableDocument(data)) {
    throw invalid(source, toIssues(validateTableDocument.errors));
  }
  const table = tableFromDocument(data);
  assertWellFormedTable(table);
  return table;
}

/** One-table-per-document YAML text */
export function parseTableYaml(text: string, source = '<input>'): Table {
  return parseTableDocument(parseYamlText(text, source), source);
}

/** Single-file YAML text with a top-level `tables:` list */
export function parseSchemaYaml(text: string, source = '<input>'): Schema {
  const data = parseYamlText(text, source);
  if (!validateSchemaDocument(data)) {
    throw invalid(source, toIssues(validateSchemaDocument.errors));
  }
  return collectTables(
    data.tables.map((doc, i) => ({ table: parseTableDocument(doc, `${source}#tables[${i}]`), source }))
  );
}

function collectTables(entries: readonly { table: Table; source: string }[]): Schema {
  const origin = new Map<string, string>();
  for (const { table, source } of entries) {
    const previous = origin.get(table.name);
    if (previous !== undefined) {
      throw new SchemaLoadError(`Duplicate table "${table.name}" in ${previous} and ${source}`);
    }
    origin.set(table.name, source);
  }
  return createSchema(entries.map(e => e.table));
}

/**
 * Load the declared schema from a YAML file or a directory of YAML files.
 */
export async function loadSchema(path: string): Promise<Schema> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch {
    throw new SchemaLoadError(`Schema path does not exist: ${path}`);
  }

  if (!isDirectory) {
    return parseSchemaYaml(await readText(path), path);
  }

  const files = (await readdir(path)).filter(f => YAML_EXTENSIONS.has(extname(f))).sort();
  const entries: { table: Table; source: string }[] = [];
  for (const file of files) {
    const filePath = join(path, file);
    entries.push({ table: parseTableYaml(await readText(filePath), filePath), source: filePath });
  }
  return collectTables(entries);
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new SchemaLoadError(`Cannot read ${path}: ${getErrorMessage(err)}`);
  }
}

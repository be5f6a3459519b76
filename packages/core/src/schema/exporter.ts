import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'yaml';
import type { Schema, Table } from '../types/schema';
import { tableToDocument } from './document';

export { tableToDocument };

/** One table as a YAML document the loader reads back unchanged */
export function exportTableYaml(table: Table): string {
  return stringify(tableToDocument(table));
}

/**
 * Write each table to `<dir>/<table>.yaml`, in table-name order.
 * Returns the written paths.
 */
export async function exportSchemaToDirectory(schema: Schema, dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const name of Object.keys(schema.tables).sort()) {
    const table = schema.tables[name];
    if (!table) continue;
    const path = join(dir, `${name}.yaml`);
    await writeFile(path, exportTableYaml(table), 'utf-8');
    written.push(path);
  }
  return written;
}

/**
 * Schema commands: validate, diff, generate, export, check.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Command } from 'commander';
import {
  CodegenError,
  ConfigError,
  diffSchemas,
  emptySchema,
  exportSchemaToDirectory,
  generateMigration,
  loadSchema,
  maxVersion,
  parseMigrationsDir,
  validateSchema,
  type Change,
} from '@lakeshift/core';
import type { CliContext, GlobalOptions } from '../context';

type OnlineOptions = { online?: boolean };

type GenerateCommandOptions = OnlineOptions & {
  allowDestructive?: boolean;
  output?: string;
  nextVersion?: boolean;
};

/** Lowercase words joined by underscores, safe for a migration filename */
export function slugify(description: string): string {
  const slug = description
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'migration';
}

export function describeChange(change: Change): string {
  const prefix = change.isUnsupported ? '[UNSUPPORTED] ' : change.isDestructive ? '[DESTRUCTIVE] ' : '';
  return `${prefix}${change.kind}: ${change.tableName}`;
}

/** Declared schema versus the live one (online) or an empty one (offline) */
async function computeChanges(ctx: CliContext, global: GlobalOptions, online: boolean): Promise<Change[]> {
  if (!online) {
    const declared = await loadSchema(ctx.path(ctx.config(global).schemaDir));
    return diffSchemas(emptySchema(), declared);
  }
  const config = ctx.dbConfig(global);
  const declared = await loadSchema(ctx.path(config.schemaDir));
  return diffSchemas(await ctx.introspect(config), declared);
}

export function registerSchemaCommands(program: Command, ctx: CliContext): void {
  const globals = () => program.opts<GlobalOptions>();
  const { logger } = ctx;

  program
    .command('validate')
    .description('Load and validate the declared schema files')
    .action(async () => {
      const config = ctx.config(globals());
      const schema = await loadSchema(ctx.path(config.schemaDir));
      const names = Object.keys(schema.tables).sort();

      logger.info(`Validated ${names.length} table(s):`);
      logger.list(names.map(name => `${name} (${schema.tables[name]?.columns.length ?? 0} columns)`));
    });

  program
    .command('diff')
    .description('Show changes between the declared schema and the database')
    .option('--online', 'Compare against the live database instead of an empty schema', false)
    .action(async (options: OnlineOptions) => {
      const online = options.online ?? false;
      const changes = await computeChanges(ctx, globals(), online);

      if (changes.length === 0) {
        logger.info('No changes detected');
        return;
      }

      logger.info(`Found ${changes.length} change(s) (${online ? 'online' : 'offline'} mode):`);
      logger.list(changes.map(describeChange));
    });

  program
    .command('generate')
    .description('Generate a migration file from the schema diff')
    .argument('<description>', 'What the migration does')
    .option('--online', 'Compare against the live database instead of an empty schema', false)
    .option('--allow-destructive', 'Allow DROP TABLE, DROP COLUMN and other destructive changes', false)
    .option('-o, --output <file>', 'Write the migration to this file instead of stdout')
    .option('--next-version', 'Write V<next>__<description>.sql into the migrations directory', false)
    .action(async (description: string, options: GenerateCommandOptions) => {
      if (options.output && options.nextVersion) {
        throw new ConfigError('Use either --output or --next-version, not both');
      }

      const changes = await computeChanges(ctx, globals(), options.online ?? false);
      if (changes.length === 0) {
        logger.info('No changes to generate');
        return;
      }

      const destructive = changes.filter(c => c.isDestructive);
      if (destructive.length > 0 && !options.allowDestructive) {
        throw new CodegenError(
          'Destructive changes detected. Use --allow-destructive to proceed: ' +
            destructive.map(c => `${c.kind}: ${c.tableName}`).join(', ')
        );
      }

      const sql = generateMigration(changes, description, { now: ctx.now });

      let target: string | undefined;
      if (options.output) {
        target = ctx.path(options.output);
      } else if (options.nextVersion) {
        const dir = ctx.path(ctx.config(globals()).migrationsDir);
        const version = maxVersion(await parseMigrationsDir(dir)) + 1;
        target = join(dir, `V${version}__${slugify(description)}.sql`);
      }

      if (!target) {
        logger.info(sql);
        return;
      }

      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, sql, 'utf-8');
      logger.info(`Wrote ${target} (${changes.length} change(s))`);
    });

  program
    .command('export')
    .description('Write the live tables to YAML schema files')
    .requiredOption('-o, --output <dir>', 'Directory for the exported files')
    .action(async (options: { output: string }) => {
      const schema = await ctx.introspect(ctx.dbConfig(globals()));
      const dir = ctx.path(options.output);
      const written = await exportSchemaToDirectory(schema, dir);

      logger.info(`Exported ${written.length} table(s) to ${dir}`);
      logger.list(written);
    });

  program
    .command('check')
    .description('Check that the database satisfies the declared schema')
    .action(async () => {
      const config = ctx.dbConfig(globals());
      const declared = await loadSchema(ctx.path(config.schemaDir));
      const actual = await ctx.introspect(config);
      const result = validateSchema(declared, actual);

      if (result.ok) {
        logger.info(`Database matches the declared schema (${Object.keys(declared.tables).length} table(s))`);
        return;
      }

      logger.error(`Found ${result.issues.length} schema issue(s):`);
      for (const issue of result.issues) {
        logger.error(`${issue.kind}: ${issue.message}`);
      }
      ctx.exitCode = 1;
    });
}

/**
 * Migration commands: status, plan, run.
 */

import type { Command } from 'commander';
import {
  MigrationExecutionError,
  MigrationRunner,
  getErrorMessage,
  migrationLabel,
  parseMigrationsDir,
  splitSqlStatements,
  type MigrationExecutor,
  type SqlClient,
} from '@lakeshift/core';
import type { CliContext, GlobalOptions } from '../context';

/**
 * Executes a migration one statement at a time, since the SQL endpoint
 * accepts a single statement per call.
 */
export function statementExecutor(client: SqlClient): MigrationExecutor {
  return async (sql, version) => {
    const statements = splitSqlStatements(sql);
    for (const [index, statement] of statements.entries()) {
      try {
        await client.execute(statement);
      } catch (err) {
        throw new MigrationExecutionError(
          version,
          `Statement ${index + 1} of ${statements.length} in V${version} failed: ${getErrorMessage(err)}`,
          err
        );
      }
    }
  };
}

export function registerMigrationCommands(program: Command, ctx: CliContext): void {
  const globals = () => program.opts<GlobalOptions>();
  const { logger } = ctx;

  program
    .command('status')
    .description('Show applied, failed and pending migrations')
    .action(async () => {
      const config = ctx.dbConfig(globals());
      const dir = ctx.path(config.migrationsDir);
      const migrations = await parseMigrationsDir(dir);

      if (migrations.length === 0) {
        logger.info(`No migrations found in ${dir}`);
        return;
      }

      const applied = await ctx.withClient(config, client => ctx.stateStore(client, config).listApplied());
      const recorded = new Map(applied.map(a => [a.version, a]));

      let failed = 0;
      let done = 0;
      logger.info(`Migrations in ${dir}:`);
      for (const migration of migrations) {
        const record = recorded.get(migration.version);
        let state = 'pending';
        if (record && !record.success) {
          state = 'failed';
          failed++;
        } else if (record) {
          state = 'applied';
          done++;
        }
        logger.info(`  V${migration.version}: ${migration.name} [${state}]`);
      }

      const pending = migrations.length - done - failed;
      logger.info('');
      logger.info(
        `Total: ${migrations.length} migration(s) (${done + failed} applied, ${pending} pending` +
          (failed > 0 ? `, ${failed} failed)` : ')')
      );
    });

  program
    .command('plan')
    .description('Show pending migrations without running them')
    .action(async () => {
      const config = ctx.dbConfig(globals());
      const dir = ctx.path(config.migrationsDir);
      const migrations = await parseMigrationsDir(dir);

      if (migrations.length === 0) {
        logger.info(`No migrations found in ${dir}`);
        return;
      }

      const pending = await ctx.withClient(config, client =>
        new MigrationRunner({
          stateStore: ctx.stateStore(client, config),
          executor: statementExecutor(client),
          catalog: config.catalog,
          schema: config.schema,
          logger,
        }).plan(migrations)
      );

      if (pending.length === 0) {
        logger.info('No pending migrations');
        return;
      }

      logger.info(`Pending migrations (${pending.length}):`);
      logger.list(pending.map(migrationLabel));
    });

  program
    .command('run')
    .description('Apply pending migrations in version order')
    .option('--dry-run', 'List what would run without executing anything', false)
    .action(async (options: { dryRun?: boolean }) => {
      const config = ctx.dbConfig(globals());
      const migrations = await parseMigrationsDir(ctx.path(config.migrationsDir));

      const result = await ctx.withClient(config, client =>
        new MigrationRunner({
          stateStore: ctx.stateStore(client, config),
          executor: statementExecutor(client),
          catalog: config.catalog,
          schema: config.schema,
          logger,
        }).apply(migrations, { dryRun: options.dryRun ?? false })
      );

      if (result.dryRun) {
        if (result.pending.length > 0) logger.info('Dry run: no migrations executed');
        return;
      }
      if (result.applied.length > 0) {
        logger.info(`Successfully applied ${result.applied.length} migration(s)`);
      }
    });
}

/**
 * lakeshift CLI - declarative schema migrations from the command line.
 *
 * Provides commands for:
 * - `validate`, `diff`, `generate`, `export`, `check` - declared schema work
 * - `status`, `plan`, `run` - versioned migration files against the ledger
 */

import { Command, CommanderError } from 'commander';
import { ConfigError, getErrorMessage } from '@lakeshift/core';
import { CliContext, type CliDeps } from './context';
import { registerSchemaCommands } from './commands/schema';
import { registerMigrationCommands } from './commands/migrations';

export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

/**
 * Creates the commander program with every command registered against `ctx`.
 *
 * @example
 * ```typescript
 * const ctx = new CliContext({ env: process.env });
 * await createCLI(ctx).parseAsync(['node', 'lakeshift', 'diff']);
 * ```
 */
export function createCLI(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('lakeshift')
    .version('0.1.0')
    .description('Declarative schema migrations for lakehouse catalogs')
    .option('--catalog <name>', 'Target catalog (LAKESHIFT_CATALOG)')
    .option('--schema <name>', 'Target schema (LAKESHIFT_SCHEMA)')
    .option('--schema-dir <path>', 'Declared schema file or directory (LAKESHIFT_SCHEMA_DIR)')
    .option('--migrations-dir <path>', 'Migration files directory (LAKESHIFT_MIGRATIONS_DIR)')
    .option('--state-table <name>', 'Ledger table name (LAKESHIFT_STATE_TABLE)')
    // Inherited by every subcommand registered below
    .exitOverride()
    .configureOutput({
      writeOut: text => ctx.logger.info(text.trimEnd()),
      writeErr: text => ctx.logger.error(text.replace(/^error: /, '').trimEnd()),
    });

  registerSchemaCommands(program, ctx);
  registerMigrationCommands(program, ctx);

  return program;
}

/**
 * Run one invocation and return its exit code: 0 on success, 2 for
 * configuration problems, 1 for everything else.
 */
export async function runCLI(args: readonly string[], deps: CliDeps): Promise<number> {
  const ctx = new CliContext(deps);
  const program = createCLI(ctx);

  try {
    await program.parseAsync([...args], { from: 'user' });
    return ctx.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    ctx.logger.error(getErrorMessage(err));
    return err instanceof ConfigError ? EXIT_CONFIG : EXIT_FAILURE;
  }
}

export { CliContext, type CliDeps, type GlobalOptions } from './context';
export { slugify, describeChange } from './commands/schema';
export { statementExecutor } from './commands/migrations';

/**
 * CLI Commands Registry
 *
 * Registers the rankctl subcommands with the root program.
 *
 * @module cli/commands
 */

import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import type { AwardCommandOptions } from './award.js';
import { handleError, parseLimitArg, parseUserIdArg, resolveConfig, shouldUseColor, withRuntime, type GlobalOptions } from '../utils.js';

function intOption(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

function globals(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Registers all subcommands with the program
 */
export function registerCommands(program: Command): void {
  program
    .option('--db <path>', 'SQLite database path (default: RANKING_DB_PATH)')
    .option('--catalog <dir>', 'Catalog directory with ranks/achievements/names YAML')
    .option('--json', 'Output result as JSON')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals<GlobalOptions>();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ rankctl migrate
  $ rankctl award 42 confession_approved
  $ rankctl award 42 confession_liked --like-count 25 --target-id 7
  $ rankctl rank 42 --json
  $ rankctl leaderboard monthly --limit 5
  $ rankctl reconcile
`
    );

  program
    .command('migrate')
    .description('Apply pending database migrations')
    .action(async (_options: object, command: Command) => {
      const opts = globals(command);
      try {
        const { migrateCommand } = await import('./migrate.js');
        migrateCommand(resolveConfig(opts).database.path, opts);
      } catch (error) {
        handleError(error, opts.json);
      }
    });

  program
    .command('award')
    .description('Report an activity for a user')
    .argument('<userId>', 'Numeric user id')
    .argument('<activity>', 'Activity type, e.g. confession_approved')
    .option('--like-count <n>', 'Likes on the target confession', intOption)
    .option('--comment-length <n>', 'Comment length in characters', intOption)
    .option('--consecutive-days <n>', 'Streak length for consecutive_days_bonus', intOption)
    .option('--target-id <id>', 'Confession or comment id', intOption)
    .option('--target-kind <kind>', 'confession | comment', 'confession')
    .option('--description <text>', 'Ledger description')
    .action(async (userId: string, activity: string, _options: object, command: Command) => {
      const opts = globals(command);
      try {
        const { awardCommand } = await import('./award.js');
        const ok = await withRuntime(opts, (runtime) =>
          awardCommand(runtime, parseUserIdArg(userId), activity, command.optsWithGlobals<AwardCommandOptions>())
        );
        if (!ok) process.exitCode = 1;
      } catch (error) {
        handleError(error, opts.json);
      }
    });

  program
    .command('rank')
    .description('Show rank, points and progress for a user')
    .argument('<userId>', 'Numeric user id')
    .action(async (userId: string, _options: object, command: Command) => {
      const opts = globals(command);
      try {
        const { rankCommand } = await import('./rank.js');
        const summary = await withRuntime(opts, (runtime) =>
          rankCommand(runtime, parseUserIdArg(userId), opts)
        );
        if (!summary) process.exitCode = 1;
      } catch (error) {
        handleError(error, opts.json);
      }
    });

  program
    .command('leaderboard')
    .description('Show an anonymised leaderboard')
    .argument('[window]', 'weekly | monthly | all_time', 'all_time')
    .option('-l, --limit <n>', 'Number of entries', '10')
    .action(async (window: string, options: { limit: string }, command: Command) => {
      const opts = globals(command);
      try {
        const { leaderboardCommand } = await import('./leaderboard.js');
        await withRuntime(opts, (runtime) =>
          leaderboardCommand(runtime, window, { ...opts, limit: parseLimitArg(options.limit) })
        );
      } catch (error) {
        handleError(error, opts.json);
      }
    });

  program
    .command('achievements')
    .description("List a user's achievements, newest first")
    .argument('<userId>', 'Numeric user id')
    .option('-l, --limit <n>', 'Number of achievements', '20')
    .action(async (userId: string, options: { limit: string }, command: Command) => {
      const opts = globals(command);
      try {
        const { achievementsCommand } = await import('./achievements.js');
        await withRuntime(opts, (runtime) =>
          achievementsCommand(runtime, parseUserIdArg(userId), { ...opts, limit: parseLimitArg(options.limit) })
        );
      } catch (error) {
        handleError(error, opts.json);
      }
    });

  program
    .command('reconcile')
    .description('Check aggregates against the ledger (alert-only)')
    .action(async (_options: object, command: Command) => {
      const opts = globals(command);
      try {
        const { reconcileCommand } = await import('./reconcile.js');
        await withRuntime(opts, (runtime) => reconcileCommand(runtime, opts));
      } catch (error) {
        handleError(error, opts.json);
      }
    });
}

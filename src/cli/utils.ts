/**
 * CLI helpers shared by the rankctl commands
 *
 * @module cli/utils
 */

import chalk from 'chalk';
import pino from 'pino';
import { loadConfig, type AppConfig } from '../config.js';
import { CatalogError, RankingError, ValidationError, errorMessage } from '../packages/core/domain/index.js';
import { openRankingRuntime, type RankingRuntime } from '../services/ranking/index.js';

/**
 * Options every command accepts (set on the root program)
 */
export type GlobalOptions = {
  db?: string;
  catalog?: string;
  json?: boolean;
  color?: boolean;
};

/**
 * Colour is off for --no-color, NO_COLOR, TERM=dumb and non-TTY output
 */
export function shouldUseColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['TERM'] === 'dumb') return false;
  return Boolean(process.stdout.isTTY);
}

/**
 * Print a JSON document to stdout
 */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Parse a positional user id argument.
 *
 * @throws ValidationError for anything but a positive integer
 */
export function parseUserIdArg(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`User id must be a positive integer, got "${value}"`, 'userId');
  }
  const userId = Number(value);
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new ValidationError(`User id must be a positive integer, got "${value}"`, 'userId');
  }
  return userId;
}

export function parseLimitArg(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Limit must be a positive integer, got "${value}"`, 'limit');
  }
  return Number(value);
}

/**
 * Configuration from the environment with command-line overrides applied
 */
export function resolveConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = loadConfig(env);
  return {
    ...config,
    database: { ...config.database, path: options.db ?? config.database.path },
    catalogDir: options.catalog ?? config.catalogDir,
  };
}

/**
 * Open the runtime, run `fn`, and always close it again. The CLI logs only
 * errors so that command output stays readable.
 */
export async function withRuntime<T>(
  options: GlobalOptions,
  fn: (runtime: RankingRuntime) => Promise<T>
): Promise<T> {
  const config = resolveConfig(options);
  const runtime = await openRankingRuntime(config, {
    logger: pino({ name: 'rankctl', level: 'error' }),
  });
  try {
    return await fn(runtime);
  } finally {
    await runtime.close();
  }
}

/**
 * Report an error and set a failing exit code.
 */
export function handleError(error: unknown, json = false): void {
  const code = error instanceof RankingError ? error.code : 'UNEXPECTED';
  const message = errorMessage(error);

  if (json) {
    printJson({
      success: false,
      error: {
        message,
        code,
        ...(error instanceof CatalogError ? { details: error.details } : {}),
      },
    });
  } else if (error instanceof CatalogError) {
    console.error(chalk.red(error.format()));
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }

  process.exitCode = 1;
}

/**
 * Reconcile Command - rankctl reconcile
 *
 * Runs the alert-only consistency checks. Exits non-zero on divergence.
 *
 * @module cli/commands/reconcile
 */

import chalk from 'chalk';
import type { RankingComponents, ReconciliationResult } from '../../services/ranking/index.js';
import { printJson } from '../utils.js';

export interface ReconcileCommandOptions {
  json?: boolean;
}

export async function reconcileCommand(
  runtime: Pick<RankingComponents, 'reconciliation'>,
  options: ReconcileCommandOptions
): Promise<ReconciliationResult> {
  const result = await runtime.reconciliation.reconcile();

  if (options.json) {
    printJson(result);
  } else {
    for (const check of result.checks) {
      const icon = check.status === 'passed' ? chalk.green('✓') : chalk.red('✗');
      const details = Object.entries(check.details)
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
      console.log(`${icon} ${check.name} ${chalk.dim(details)}`);
    }
    for (const divergence of result.divergences) {
      console.log(chalk.yellow(`  ! ${divergence}`));
    }
  }

  if (result.status !== 'passed') {
    process.exitCode = 1;
  }
  return result;
}

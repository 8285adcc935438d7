/**
 * Rank Command - rankctl rank <userId>
 *
 * @module cli/commands/rank
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { RankingComponents, RankSummary } from '../../services/ranking/index.js';
import { printJson } from '../utils.js';

export interface RankCommandOptions {
  json?: boolean;
}

const BAR_WIDTH = 20;

export function progressBar(percent: number, width = BAR_WIDTH): string {
  const filled = Math.round((Math.min(100, Math.max(0, percent)) / 100) * width);
  return `${'█'.repeat(filled)}${'░'.repeat(width - filled)}`;
}

function displaySummary(summary: RankSummary): void {
  const table = new Table({
    style: { head: [], border: [] },
    colWidths: [20, 40],
  });

  table.push(
    [chalk.bold('Rank:'), `${summary.rank.emoji} ${chalk.cyan(summary.rank.name)}`],
    [chalk.bold('Points:'), String(summary.totalPoints)],
    [chalk.bold('This week:'), String(summary.weeklyPoints)],
    [chalk.bold('This month:'), String(summary.monthlyPoints)],
    [chalk.bold('Streak:'), `${summary.consecutiveActiveDays} days`],
    [chalk.bold('Achievements:'), String(summary.achievementCount)],
    [chalk.bold('Highest rank:'), `${summary.highestRank.emoji} ${summary.highestRank.name}`]
  );

  if (summary.nextRank) {
    table.push(
      [chalk.bold('Next:'), `${summary.nextRank.emoji} ${summary.nextRank.name} (${summary.pointsToNext} to go)`],
      [chalk.bold('Progress:'), `${progressBar(summary.progressPercent)} ${summary.progressPercent}%`]
    );
  } else {
    table.push([chalk.bold('Next:'), chalk.yellow('Top rank reached')]);
  }

  console.log();
  console.log(chalk.bold(`User ${summary.userId}`));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(table.toString());
}

export async function rankCommand(
  runtime: Pick<RankingComponents, 'service'>,
  userId: number,
  options: RankCommandOptions
): Promise<RankSummary | null> {
  const summary = await runtime.service.getUserRank(userId);

  if (options.json) {
    printJson(summary ? { success: true, summary } : { success: false, error: { message: `No ranking data for user ${userId}`, code: 'NOT_FOUND' } });
    return summary;
  }

  if (!summary) {
    console.error(chalk.yellow(`No ranking data for user ${userId}`));
    return null;
  }

  displaySummary(summary);
  return summary;
}

/**
 * Leaderboard Command - rankctl leaderboard [window]
 *
 * @module cli/commands/leaderboard
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { parseLeaderboardWindow, type LeaderboardEntry } from '../../packages/core/domain/index.js';
import type { RankingComponents } from '../../services/ranking/index.js';
import { printJson } from '../utils.js';

export interface LeaderboardCommandOptions {
  json?: boolean;
  limit: number;
}

const MEDALS = ['🥇', '🥈', '🥉'];

export async function leaderboardCommand(
  runtime: Pick<RankingComponents, 'service'>,
  window: string,
  options: LeaderboardCommandOptions
): Promise<LeaderboardEntry[]> {
  // Unknown windows throw here instead of yielding an empty board
  const parsed = parseLeaderboardWindow(window);
  const entries = await runtime.service.getLeaderboard(parsed, options.limit);

  if (options.json) {
    printJson({ success: true, window: parsed, entries });
    return entries;
  }

  if (entries.length === 0) {
    console.log(chalk.dim(`No ${parsed} leaderboard entries yet`));
    return entries;
  }

  const table = new Table({
    head: ['#', 'Name', 'Points', 'Rank'],
    style: { head: ['cyan'] },
  });

  for (const entry of entries) {
    table.push([
      MEDALS[entry.position - 1] ?? String(entry.position),
      entry.displayName,
      String(entry.points),
      `${entry.rankEmoji} ${entry.rankName}`,
    ]);
  }

  console.log(table.toString());
  return entries;
}

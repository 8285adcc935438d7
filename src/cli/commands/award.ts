/**
 * Award Command - rankctl award <userId> <activity>
 *
 * Reports one activity for a user, as a collaborator would, and prints the
 * resulting rank.
 *
 * @module cli/commands/award
 */

import chalk from 'chalk';
import type { ActivityContext } from '../../packages/core/domain/index.js';
import type { RankingComponents } from '../../services/ranking/index.js';
import { printJson } from '../utils.js';

export type AwardCommandOptions = {
  json?: boolean;
  likeCount?: number;
  commentLength?: number;
  consecutiveDays?: number;
  targetId?: number;
  targetKind?: string;
  description?: string;
};

export async function awardCommand(
  runtime: Pick<RankingComponents, 'service'>,
  userId: number,
  activity: string,
  options: AwardCommandOptions
): Promise<boolean> {
  const context: ActivityContext = {};
  if (options.likeCount !== undefined) context.likeCount = options.likeCount;
  if (options.commentLength !== undefined) context.commentLength = options.commentLength;
  if (options.consecutiveDays !== undefined) context.consecutiveDays = options.consecutiveDays;

  const result = await runtime.service.awardPoints(userId, activity, {
    context,
    ...(options.targetId !== undefined
      ? { reference: { targetId: options.targetId, targetKind: options.targetKind ?? 'confession' } }
      : {}),
    ...(options.description !== undefined ? { description: options.description } : {}),
  });
  await runtime.service.flushNotifications();

  const summary = result.ok ? await runtime.service.getUserRank(userId) : null;

  if (options.json) {
    printJson({
      success: result.ok,
      userId,
      activity,
      pointsDelta: result.pointsDelta,
      totalPoints: summary?.totalPoints ?? null,
      rank: summary ? summary.rank.name : null,
    });
    return result.ok;
  }

  if (!result.ok) {
    console.error(chalk.red(`Award rejected: ${activity} for user ${userId} (see log for the reason)`));
    return false;
  }

  const sign = result.pointsDelta >= 0 ? '+' : '';
  console.log(`${chalk.green('✓')} ${activity} ${chalk.bold(`${sign}${result.pointsDelta}`)} for user ${userId}`);
  if (summary) {
    console.log(`  ${summary.rank.emoji} ${summary.rank.name} · ${summary.totalPoints} points`);
  }
  return true;
}

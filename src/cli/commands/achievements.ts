/**
 * Achievements Command - rankctl achievements <userId>
 *
 * @module cli/commands/achievements
 */

import chalk from 'chalk';
import type { RankingComponents, UserAchievement } from '../../services/ranking/index.js';
import { printJson } from '../utils.js';

export interface AchievementsCommandOptions {
  json?: boolean;
  limit: number;
}

export async function achievementsCommand(
  runtime: Pick<RankingComponents, 'service'>,
  userId: number,
  options: AchievementsCommandOptions
): Promise<UserAchievement[]> {
  const achievements = await runtime.service.getUserAchievements(userId, options.limit);

  if (options.json) {
    printJson({ success: true, userId, achievements });
    return achievements;
  }

  if (achievements.length === 0) {
    console.log(chalk.dim(`User ${userId} has no achievements yet`));
    return achievements;
  }

  for (const achievement of achievements) {
    const title = `${achievement.emoji} ${achievement.name}`;
    console.log(
      `${achievement.isSpecial ? chalk.magenta(title) : chalk.bold(title)} ${chalk.green(`+${achievement.pointsAwarded}`)}`
    );
    console.log(`   ${achievement.description} ${chalk.dim(achievement.grantedAt)}`);
  }
  return achievements;
}

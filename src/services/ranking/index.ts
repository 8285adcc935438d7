export { PointLedger, type PointLedgerOptions, type RecordActivityInput, type RecordedActivity } from './PointLedger.js';
export { RankEngine, type RankEngineOptions, type RankEvaluation } from './RankEngine.js';
export { AchievementEngine, type AchievementEngineOptions, type GrantedAchievement } from './AchievementEngine.js';
export { LeaderboardAggregator, type LeaderboardAggregatorOptions } from './LeaderboardAggregator.js';
export {
  RankingService,
  type AwardOptions,
  type AwardResult,
  type RankSummary,
  type RankingServiceOptions,
  type UserAchievement,
} from './RankingService.js';
export {
  RankingReconciliation,
  type ReconciliationCheck,
  type ReconciliationResult,
  type ReconciliationStatus,
  type RankingReconciliationOptions,
} from './RankingReconciliation.js';
export {
  createRankingService,
  openRankingRuntime,
  type CreateRankingServiceOptions,
  type RankingComponents,
  type RankingRuntime,
} from './factory.js';

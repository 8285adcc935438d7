/**
 * Ranking Event Interface
 *
 * Fire-and-forget notifications for the transport layer. The engine does not
 * know how (or whether) they reach the user; listener failures are logged and
 * never affect the award that triggered them.
 *
 * @module packages/core/ports/ranking-events
 */

export interface RankUpEvent {
  userId: number;
  rankName: string;
  rankEmoji: string;
}

export interface AchievementGrantedEvent {
  userId: number;
  name: string;
  description: string;
  points: number;
}

export interface RankingListener {
  onRankUp?(event: RankUpEvent): void | Promise<void>;
  onAchievementGranted?(event: AchievementGrantedEvent): void | Promise<void>;
}

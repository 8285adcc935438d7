/**
 * rankctl command tests
 *
 * Commands run against an in-memory service; output is captured from
 * console.log and checked in --json form.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { awardCommand } from '../../../src/cli/commands/award.js';
import { rankCommand, progressBar } from '../../../src/cli/commands/rank.js';
import { leaderboardCommand } from '../../../src/cli/commands/leaderboard.js';
import { achievementsCommand } from '../../../src/cli/commands/achievements.js';
import { reconcileCommand } from '../../../src/cli/commands/reconcile.js';
import { handleError, parseLimitArg, parseUserIdArg, resolveConfig, shouldUseColor } from '../../../src/cli/utils.js';
import { CatalogError, ValidationError } from '../../../src/packages/core/domain/index.js';
import { buildService, scriptedRandom, type TestService } from '../helpers.js';

let h: TestService;
let output: string[];

function lastJson(): unknown {
  const last = output[output.length - 1];
  if (last === undefined) throw new Error('nothing printed');
  return JSON.parse(last);
}

beforeEach(async () => {
  h = await buildService({ achievements: 'default', random: scriptedRandom([0]) });
  output = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    output.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  h.db.close();
  process.exitCode = undefined;
});

describe('award', () => {
  it('prints the result and the new total', async () => {
    const ok = await awardCommand(h, 1, 'comment_posted', { json: true, targetId: 4 });

    expect(ok).toBe(true);
    expect(lastJson()).toEqual({
      success: true,
      userId: 1,
      activity: 'comment_posted',
      pointsDelta: 5,
      totalPoints: 25,
      rank: 'New Confessor',
    });
    const entry = (await h.store.listTransactions(1, 10)).find((t) => t.activityType === 'comment_posted');
    expect(entry?.reference).toEqual({ targetId: 4, targetKind: 'confession' });
  });

  it('passes context options through to pricing', async () => {
    await awardCommand(h, 1, 'quality_comment', { json: true, commentLength: 250 });
    expect(lastJson()).toMatchObject({ pointsDelta: 30 });
  });

  it('reports a rejected activity', async () => {
    const ok = await awardCommand(h, 1, 'made_up', { json: true });

    expect(ok).toBe(false);
    expect(lastJson()).toEqual({
      success: false,
      userId: 1,
      activity: 'made_up',
      pointsDelta: 0,
      totalPoints: null,
      rank: null,
    });
  });
});

describe('rank', () => {
  it('prints the summary as JSON', async () => {
    await h.service.awardPoints(3, 'confession_featured');

    const summary = await rankCommand(h, 3, { json: true });

    expect(summary?.rank.name).toBe('First Timer');
    expect(lastJson()).toMatchObject({
      success: true,
      summary: { userId: 3, totalPoints: 100, pointsToNext: 50, progressPercent: 50 },
    });
  });

  it('reports unknown users', async () => {
    expect(await rankCommand(h, 77, { json: true })).toBeNull();
    expect(lastJson()).toEqual({
      success: false,
      error: { message: 'No ranking data for user 77', code: 'NOT_FOUND' },
    });
  });

  it('renders a table for humans', async () => {
    await h.service.awardPoints(3, 'confession_featured');
    await rankCommand(h, 3, {});
    expect(output.some((line) => line.includes('First Timer'))).toBe(true);
  });
});

describe('progressBar', () => {
  it('fills in proportion to the percentage', () => {
    expect(progressBar(50, 10)).toBe('█████░░░░░');
    expect(progressBar(0, 4)).toBe('░░░░');
    expect(progressBar(150, 4)).toBe('████');
  });
});

describe('leaderboard', () => {
  it('prints anonymised entries', async () => {
    await h.service.awardPoints(1, 'reaction_given');
    await h.service.awardPoints(2, 'comment_posted');

    await leaderboardCommand(h, 'all_time', { json: true, limit: 10 });

    expect(lastJson()).toEqual({
      success: true,
      window: 'all_time',
      entries: [
        { position: 1, displayName: 'Mysterious Confessor', points: 25, rankName: 'New Confessor', rankEmoji: '🆕' },
        { position: 2, displayName: 'Mysterious Confessor', points: 1, rankName: 'New Confessor', rankEmoji: '🆕' },
      ],
    });
  });

  it('rejects an unknown window', async () => {
    await expect(leaderboardCommand(h, 'daily', { limit: 10 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('achievements', () => {
  it('lists granted achievements', async () => {
    await h.service.awardPoints(1, 'comment_posted');

    await achievementsCommand(h, 1, { json: true, limit: 20 });

    expect(lastJson()).toMatchObject({
      success: true,
      userId: 1,
      achievements: [{ achievementId: 'first_comment', name: 'First Comment', pointsAwarded: 20 }],
    });
  });
});

describe('reconcile', () => {
  it('leaves the exit code alone when everything matches', async () => {
    await h.service.awardPoints(1, 'comment_posted');

    const result = await reconcileCommand(h, { json: true });

    expect(result.status).toBe('passed');
    expect(process.exitCode).toBeUndefined();
  });

  it('sets a failing exit code on divergence', async () => {
    await h.service.awardPoints(1, 'comment_posted');
    h.db.prepare('UPDATE user_ranking_state SET total_points = 999 WHERE user_id = 1').run();

    await reconcileCommand(h, {});

    expect(process.exitCode).toBe(1);
    expect(
      output.some((line) => line.includes('Ledger total mismatch for user 1: total_points=999, ledger=25'))
    ).toBe(true);
  });
});

describe('utils', () => {
  it('parses user ids', () => {
    expect(parseUserIdArg('42')).toBe(42);
    expect(() => parseUserIdArg('0')).toThrow(ValidationError);
    expect(() => parseUserIdArg('-1')).toThrow(ValidationError);
    expect(() => parseUserIdArg('abc')).toThrow(ValidationError);
  });

  it('parses limits', () => {
    expect(parseLimitArg('5')).toBe(5);
    expect(() => parseLimitArg('5.5')).toThrow(ValidationError);
  });

  it('applies --db and --catalog over the environment', () => {
    const config = resolveConfig(
      { db: '/tmp/override.db', catalog: '/tmp/catalog' },
      { RANKING_DB_PATH: '/tmp/env.db' }
    );
    expect(config.database.path).toBe('/tmp/override.db');
    expect(config.catalogDir).toBe('/tmp/catalog');
  });

  it('turns colour off for NO_COLOR and dumb terminals', () => {
    expect(shouldUseColor({ NO_COLOR: '1' })).toBe(false);
    expect(shouldUseColor({ TERM: 'dumb' })).toBe(false);
  });

  it('prints a JSON error envelope', () => {
    handleError(new CatalogError('Invalid ranks.yaml', ['ranks.0.id: Required']), true);

    expect(process.exitCode).toBe(1);
    expect(lastJson()).toEqual({
      success: false,
      error: { message: 'Invalid ranks.yaml', code: 'CATALOG', details: ['ranks.0.id: Required'] },
    });
  });

  it('labels unknown errors', () => {
    handleError(new Error('boom'), true);
    expect(lastJson()).toEqual({ success: false, error: { message: 'boom', code: 'UNEXPECTED' } });
  });
});

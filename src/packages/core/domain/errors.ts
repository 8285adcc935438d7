/**
 * Ranking Error Taxonomy
 *
 * - ValidationError: rejected input, raised before any write
 * - LedgerError: storage failure while appending to the ledger
 * - ConsistencyError: duplicate achievement grant caught by the unique index
 * - CatalogError: invalid rank/achievement seed data (fatal at start-up)
 *
 * @module packages/core/domain/errors
 */

export enum RankingErrorCode {
  VALIDATION = 'VALIDATION',
  LEDGER = 'LEDGER',
  CONSISTENCY = 'CONSISTENCY',
  CATALOG = 'CATALOG',
}

export class RankingError extends Error {
  constructor(
    message: string,
    public readonly code: RankingErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RankingError';
  }
}

export class ValidationError extends RankingError {
  constructor(message: string, public readonly field?: string) {
    super(message, RankingErrorCode.VALIDATION);
    this.name = 'ValidationError';
  }
}

export class LedgerError extends RankingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, RankingErrorCode.LEDGER, options);
    this.name = 'LedgerError';
  }
}

export class ConsistencyError extends RankingError {
  constructor(
    message: string,
    public readonly userId: number,
    public readonly achievementId: string
  ) {
    super(message, RankingErrorCode.CONSISTENCY);
    this.name = 'ConsistencyError';
  }
}

export class CatalogError extends RankingError {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message, RankingErrorCode.CATALOG);
    this.name = 'CatalogError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    for (const detail of this.details) {
      lines.push(`  - ${detail}`);
    }
    return lines.join('\n');
  }
}

/**
 * Message of an unknown thrown value, for log fields.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

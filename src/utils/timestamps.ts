/**
 * Canonical timestamps for ledger rows.
 *
 * Stored values use SQLite's `datetime('now')` format: `YYYY-MM-DD HH:MM:SS`
 * in UTC. Do NOT mix in ISO 8601 strings: comparing a space (0x20) against
 * 'T' (0x54) breaks chronological ordering.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * `YYYY-MM-DD HH:MM:SS` for the given instant (default: now).
 */
export function sqliteTimestamp(date?: Date): string {
  return (date ?? new Date())
    .toISOString()
    .replace('T', ' ')
    .replace(/\.\d+Z$/, '');
}

/**
 * UTC calendar day `YYYY-MM-DD` of a Date or a stored timestamp.
 */
export function utcDay(value: Date | string): string {
  if (typeof value === 'string') return value.slice(0, 10);
  return value.toISOString().slice(0, 10);
}

/**
 * The UTC calendar day before the given instant or stored timestamp.
 */
export function previousUtcDay(value: Date | string): string {
  const date = typeof value === 'string' ? new Date(`${utcDay(value)}T00:00:00Z`) : value;
  return utcDay(new Date(date.getTime() - 24 * 60 * 60 * 1000));
}

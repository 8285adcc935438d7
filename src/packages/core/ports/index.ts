/**
 * Core Ports
 *
 * Boundaries between the ranking engines and their adapters.
 */

export * from './ranking-store.js';
export * from './ranking-events.js';

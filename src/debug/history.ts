/**
 * Debug Module - Log History
 *
 * @module debug/history
 */

import { type LogEntry, logHistory } from './config.js';

/**
 * Log history filter
 */
export interface LogHistoryFilter {
  level?: string;
  module?: string;
  last?: number;
}

/**
 * Get log history for debugging.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  if (filter.level) {
    const level = filter.level.toUpperCase();
    history = history.filter((h) => h.level === level);
  }

  if (filter.module) {
    const m = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(m));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

/**
 * Clear log history.
 */
export function clearLogHistory(): void {
  logHistory.length = 0;
}

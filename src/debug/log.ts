/**
 * Debug Module - Core Logging Interface
 *
 * Provides structured logging with level filtering and history tracking.
 *
 * @module debug/log
 */

import { getRuntimeConfig } from '../config/runtime.js';
import {
  LOG_LEVELS,
  type LogLevelValue,
  currentLogLevel,
  enabledModules,
  disabledModules,
  logHistory,
} from './config.js';

// ============================================================================
// Internal Helpers
// ============================================================================

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

/**
 * Check if logging is enabled for a module at a level.
 */
function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < currentLogLevel) return false;

  const moduleLower = module.toLowerCase();

  if (enabledModules.size > 0 && !enabledModules.has(moduleLower)) {
    return false;
  }

  if (disabledModules.has(moduleLower)) {
    return false;
  }

  return true;
}

/**
 * Format a log message with timestamp and module tag.
 */
function formatMessage(module: string, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][${module}] ${message}`;
}

/**
 * Store a log entry in history, dropping the oldest past the configured limit.
 */
export function storeLog(level: string, module: string, message: string, data?: unknown): void {
  logHistory.push({
    time: Date.now(),
    perfTime: performance.now(),
    level,
    module,
    message,
    data,
  });

  const maxHistory = getRuntimeConfig().debug.logHistory.maxLogHistoryEntries;
  while (logHistory.length > maxHistory) {
    logHistory.shift();
  }
}

function emit(method: ConsoleMethod, level: string, module: string, message: string, data?: unknown): void {
  const formatted = formatMessage(module, message);
  storeLog(level, module, message, data);
  if (data !== undefined) {
    console[method](formatted, data);
  } else {
    console[method](formatted);
  }
}

// ============================================================================
// Logging Interface
// ============================================================================

/**
 * Main logging interface.
 */
export const log = {
  /**
   * Debug level logging (most verbose).
   */
  debug(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.DEBUG)) return;
    emit('debug', 'DEBUG', module, message, data);
  },

  /**
   * Verbose level logging (detailed operational info).
   */
  verbose(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.VERBOSE)) return;
    emit('log', 'VERBOSE', module, message, data);
  },

  info(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.INFO)) return;
    emit('log', 'INFO', module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.WARN)) return;
    emit('warn', 'WARN', module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.ERROR)) return;
    emit('error', 'ERROR', module, message, data);
  },

  /**
   * Always log regardless of level (for critical messages).
   */
  always(module: string, message: string, data?: unknown): void {
    emit('log', 'ALWAYS', module, message, data);
  },
};

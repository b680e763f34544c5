/**
 * Debug Config Schema
 *
 * Configuration for the debug module: log history limits, default log
 * level, and trace categories.
 *
 * @module config/schema/debug
 */

// =============================================================================
// Log History Config
// =============================================================================

export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

/** Default log history configuration */
export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Log Level Config
// =============================================================================

export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: string;
}

/** Default log level configuration */
export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Trace Config
// =============================================================================

/** Available trace categories */
export type TraceCategorySchema =
  | 'loader'
  | 'embed'
  | 'attn'
  | 'ffn'
  | 'logits'
  | 'sample'
  | 'all';

export interface TraceConfigSchema {
  /** Enable tracing (default: false) */
  enabled: boolean;
  /** Trace categories to enable (default: all) */
  categories: TraceCategorySchema[];
  /** Filter to specific block indices (null = all blocks) */
  layers: number[] | null;
  /** Maximum generation steps to trace (0 = unlimited) */
  maxDecodeSteps: number;
}

/** Default trace configuration */
export const DEFAULT_TRACE_CONFIG: TraceConfigSchema = {
  enabled: false,
  categories: ['all'],
  layers: null,
  maxDecodeSteps: 0,
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
  trace: TraceConfigSchema;
}

/** Default debug configuration */
export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

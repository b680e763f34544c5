/**
 * Debug Module - Configuration and State Management
 *
 * Manages log levels, trace categories, and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';

// ============================================================================
// Types and Constants
// ============================================================================

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/**
 * Trace categories
 */
export const TRACE_CATEGORIES = [
  'loader',   // Checkpoint and config loading
  'embed',    // Token + positional embedding
  'attn',     // Attention
  'ffn',      // Feed-forward
  'logits',   // Final norm + LM head
  'sample',   // Token sampling
] as const;

export type TraceCategory = (typeof TRACE_CATEGORIES)[number];

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

// ============================================================================
// Global State
// ============================================================================

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export const enabledModules = new Set<string>();
export const disabledModules = new Set<string>();
export const logHistory: LogEntry[] = [];

export const enabledTraceCategories = new Set<TraceCategory>();
export let traceLayerFilter: number[] = [];  // Empty = all blocks
export let traceDecodeStep = 0;
export let traceMaxDecodeSteps = 0;  // 0 = unlimited

function isTraceCategory(value: string): value is TraceCategory {
  return TRACE_CATEGORIES.some((cat) => cat === value);
}

// ============================================================================
// Configuration Functions
// ============================================================================

const LEVEL_MAP: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  currentLogLevel = LEVEL_MAP[level.toLowerCase()] ?? LOG_LEVELS.INFO;
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LOG_LEVELS)) {
    if (value === currentLogLevel) return name.toLowerCase();
  }
  return 'info';
}

/**
 * Set trace categories.
 *
 * @param categories - Comma-separated categories, 'all', false to disable, or array
 *   Examples:
 *   - 'attn,sample' - enable attention and sampling
 *   - 'all' - enable all categories
 *   - 'all,-ffn' - all except feed-forward
 *   - false - disable all tracing
 */
export function setTrace(
  categories: string | readonly string[] | false,
  options?: { layers?: number[]; maxDecodeSteps?: number }
): void {
  enabledTraceCategories.clear();
  if (categories === false) {
    return;
  }

  const catArray = typeof categories === 'string'
    ? categories.split(',').map(s => s.trim())
    : categories;

  if (catArray.includes('all')) {
    for (const cat of TRACE_CATEGORIES) {
      enabledTraceCategories.add(cat);
    }
  }

  // Inclusions, and exclusions prefixed with -
  for (const cat of catArray) {
    if (cat.startsWith('-')) {
      const exclude = cat.slice(1);
      if (isTraceCategory(exclude)) enabledTraceCategories.delete(exclude);
    } else if (isTraceCategory(cat)) {
      enabledTraceCategories.add(cat);
    }
  }

  if (options?.layers) {
    traceLayerFilter = options.layers;
  }
  if (options?.maxDecodeSteps !== undefined) {
    traceMaxDecodeSteps = options.maxDecodeSteps;
  }
}

/**
 * Get enabled trace categories.
 */
export function getTrace(): TraceCategory[] {
  return [...enabledTraceCategories];
}

/**
 * Check if a trace category is enabled.
 */
export function isTraceEnabled(category: TraceCategory, layerIdx?: number): boolean {
  if (!enabledTraceCategories.has(category)) return false;

  if (layerIdx !== undefined && traceLayerFilter.length > 0) {
    if (!traceLayerFilter.includes(layerIdx)) return false;
  }

  if (traceMaxDecodeSteps > 0 && traceDecodeStep > traceMaxDecodeSteps) {
    return false;
  }

  return true;
}

/**
 * Increment decode step counter (call after each generation step).
 */
export function incrementDecodeStep(): number {
  return ++traceDecodeStep;
}

/**
 * Reset decode step counter (call at start of generation).
 */
export function resetDecodeStep(): void {
  traceDecodeStep = 0;
}

/**
 * Apply the debug section of a runtime config.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);

  if (config.trace.enabled) {
    const categories = config.trace.categories.length
      ? config.trace.categories
      : ['all'];
    traceLayerFilter = [];
    setTrace(categories, {
      layers: config.trace.layers ?? undefined,
      maxDecodeSteps: config.trace.maxDecodeSteps,
    });
  } else {
    setTrace(false);
  }
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  enabledModules.clear();
  for (const m of modules) enabledModules.add(m.toLowerCase());
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  for (const m of modules) disabledModules.add(m.toLowerCase());
}

/**
 * Clear module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}

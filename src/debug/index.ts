/**
 * Debug Module - Unified Logging and Tracing
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Trace Categories (what to show when tracing)
 *   loader  - checkpoint and config loading
 *   embed   - embedding layer
 *   attn    - attention computation
 *   ffn     - feed-forward network
 *   logits  - final norm + LM head
 *   sample  - token sampling
 *   all     - everything
 *
 * ## Usage
 *   import { log, trace, setLogLevel, setTrace } from '../debug/index.js';
 *
 *   log.info('Model', 'Initialized');
 *   trace.attn(0, 'scores T=8');
 *
 *   setLogLevel('verbose');
 *   setTrace('attn,sample');
 *   setTrace('all,-ffn');
 *   setTrace(false);
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  type LogLevel,
  type LogLevelValue,
  type TraceCategory,
  type LogEntry,
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  isTraceEnabled,
  incrementDecodeStep,
  resetDecodeStep,
  applyDebugConfig,
  enableModules,
  disableModules,
  resetModuleFilters,
} from './config.js';

export { log } from './log.js';
export { trace } from './trace.js';
export { getLogHistory, clearLogHistory, type LogHistoryFilter } from './history.js';

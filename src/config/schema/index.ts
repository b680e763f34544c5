/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - create*: Factories merging overrides over defaults
 *
 * @module config/schema
 */

export {
  type ModelConfigSchema,
  DEFAULT_MODEL_CONFIG,
  FFN_EXPANSION,
  validateModelConfig,
  createModelConfig,
  headSizeOf,
} from './model.schema.js';

export {
  type GenerationConfigSchema,
  DEFAULT_GENERATION_CONFIG,
} from './generation.schema.js';

export {
  type TrainingConfigSchema,
  DEFAULT_TRAINING_CONFIG,
} from './training.schema.js';

export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type TraceCategorySchema,
  type TraceConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  type DeepPartial,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
  mergeDefined,
} from './runtime.schema.js';

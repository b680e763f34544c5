/**
 * Runtime Config Schema
 *
 * Master configuration composing every domain config. Individual schemas
 * stay importable for subsystems that only need their own domain; this
 * master schema is for:
 * - Loading a full config file (CLI --config)
 * - Debugging/logging full config state (CLI --dump-config)
 *
 * @module config/schema/runtime
 */

import type { ModelConfigSchema } from './model.schema.js';
import type { GenerationConfigSchema } from './generation.schema.js';
import type { TrainingConfigSchema } from './training.schema.js';
import type { DebugConfigSchema } from './debug.schema.js';

import { DEFAULT_MODEL_CONFIG } from './model.schema.js';
import { DEFAULT_GENERATION_CONFIG } from './generation.schema.js';
import { DEFAULT_TRAINING_CONFIG } from './training.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Architecture used when a model is initialized from scratch */
  model: ModelConfigSchema;

  /** Sampling loop defaults */
  generation: GenerationConfigSchema;

  /** Batch windowing and loss estimation */
  training: TrainingConfigSchema;

  /** Logging and tracing */
  debug: DebugConfigSchema;
}

/** Deep partial type for overrides */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[] | null
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type RuntimeConfigOverrides = DeepPartial<RuntimeConfigSchema>;

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  model: DEFAULT_MODEL_CONFIG,
  generation: DEFAULT_GENERATION_CONFIG,
  training: DEFAULT_TRAINING_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Overlay the defined fields of `overrides` on a copy of `base`.
 * Fields set to undefined keep the base value.
 */
export function mergeDefined<T extends object>(base: T, overrides?: Partial<T>): T {
  const out = { ...base };
  if (!overrides) return out;
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Create a runtime configuration with optional overrides.
 *
 * Merges one level deep per domain (two for debug), so a partial section
 * keeps the defaults of the fields it leaves out.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   debug: { logLevel: { defaultLogLevel: 'verbose' } },
 * });
 * ```
 */
export function createRuntimeConfig(overrides: RuntimeConfigOverrides = {}): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  const debug = overrides.debug ?? {};
  return {
    model: mergeDefined(base.model, overrides.model),
    generation: mergeDefined(base.generation, overrides.generation),
    training: mergeDefined(base.training, overrides.training),
    debug: {
      logHistory: mergeDefined(base.debug.logHistory, debug.logHistory),
      logLevel: mergeDefined(base.debug.logLevel, debug.logLevel),
      trace: mergeDefined(base.debug.trace, debug.trace),
    },
  };
}

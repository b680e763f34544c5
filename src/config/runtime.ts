/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current process.
 * Call setRuntimeConfig() early (before building models) to apply overrides.
 *
 * @module config/runtime
 */

import type { RuntimeConfigOverrides, RuntimeConfigSchema } from './schema/index.js';
import { createRuntimeConfig } from './schema/index.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig(overrides);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  return runtimeConfig;
}

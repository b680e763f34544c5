/**
 * Config Module Index
 *
 * Central export for config-as-code architecture.
 *
 * @module config
 */

// Schema types
export * from './schema/index.js';

// Runtime registry
export {
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
} from './runtime.js';

// Preset and file loader
export {
  type ModelPresetSchema,
  type LoadedConfig,
  parseRuntimeOverrides,
  listPresets,
  getPreset,
  resolvePreset,
  resolveConfig,
  loadConfigFile,
  dumpConfig,
} from './loader.js';

/**
 * Config Loader
 *
 * Model presets (JSON files under presets/models) and runtime config files.
 * A config file is a partial RuntimeConfigSchema plus an optional
 * `"preset"` whose model section is applied beneath the file's own.
 *
 * @module config/loader
 */

import { readdirSync, readFileSync, existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { join } from 'path';

import { ConfigError } from '../errors/model-error.js';
import {
  type ModelConfigSchema,
  type GenerationConfigSchema,
  type TrainingConfigSchema,
  type TraceCategorySchema,
  type TraceConfigSchema,
  type RuntimeConfigOverrides,
  type RuntimeConfigSchema,
  createRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
} from './schema/index.js';

// =============================================================================
// Types
// =============================================================================

export interface ModelPresetSchema {
  id: string;
  description: string;
  model: Partial<ModelConfigSchema>;
}

export interface LoadedConfig {
  /** Validated runtime config, merged with defaults */
  runtime: RuntimeConfigSchema;
  /** Preset applied beneath the file's model section, if any */
  preset: string | null;
  /** Path the config was read from */
  source: string;
}

// =============================================================================
// Field Readers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(
  raw: Record<string, unknown>,
  key: string,
  path: string,
  allowed: readonly string[]
): Record<string, unknown> | null {
  const value = raw[key];
  if (value === undefined) return null;
  if (!isRecord(value)) {
    throw new ConfigError(`${path}.${key} must be an object`);
  }
  const known = new Set<string>(allowed);
  for (const field of Object.keys(value)) {
    if (!known.has(field)) {
      throw new ConfigError(`Unknown config field "${path}.${key}.${field}"`);
    }
  }
  return value;
}

function readNumber(section: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${path}.${key} must be a finite number`);
  }
  return value;
}

function readNullableNumber(
  section: Record<string, unknown>,
  key: string,
  path: string
): number | null | undefined {
  if (section[key] === null) return null;
  return readNumber(section, key, path);
}

function readBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path}.${key} must be a string`);
  }
  return value;
}

const TRACE_CATEGORY_NAMES: readonly TraceCategorySchema[] = [
  'loader', 'embed', 'attn', 'ffn', 'logits', 'sample', 'all',
];

function isTraceCategory(value: unknown): value is TraceCategorySchema {
  return TRACE_CATEGORY_NAMES.some((name) => name === value);
}

// =============================================================================
// Section Parsers
// =============================================================================

const MODEL_KEYS: readonly (keyof ModelConfigSchema)[] = [
  'vocabSize', 'contextLength', 'modelDim', 'numBlocks', 'numHeads',
  'dropout', 'layerNormEps', 'initStd',
];

const TRAINING_KEYS: readonly (keyof TrainingConfigSchema)[] = [
  'batchSize', 'evalBatches', 'trainSplit', 'seed',
];

function parseModel(section: Record<string, unknown>, path: string): Partial<ModelConfigSchema> {
  const model: Partial<ModelConfigSchema> = {};
  for (const key of MODEL_KEYS) {
    const value = readNumber(section, key, path);
    if (value !== undefined) model[key] = value;
  }
  return model;
}

function parseGeneration(section: Record<string, unknown>, path: string): Partial<GenerationConfigSchema> {
  const generation: Partial<GenerationConfigSchema> = {};
  const maxNewTokens = readNumber(section, 'maxNewTokens', path);
  if (maxNewTokens !== undefined) generation.maxNewTokens = maxNewTokens;
  const seed = readNullableNumber(section, 'seed', path);
  if (seed !== undefined) generation.seed = seed;
  return generation;
}

function parseTraining(section: Record<string, unknown>, path: string): Partial<TrainingConfigSchema> {
  const training: Partial<TrainingConfigSchema> = {};
  for (const key of TRAINING_KEYS) {
    const value = readNumber(section, key, path);
    if (value !== undefined) training[key] = value;
  }
  return training;
}

function parseTrace(section: Record<string, unknown>, path: string): Partial<TraceConfigSchema> {
  const trace: Partial<TraceConfigSchema> = {};
  const enabled = readBoolean(section, 'enabled', path);
  if (enabled !== undefined) trace.enabled = enabled;
  const maxDecodeSteps = readNumber(section, 'maxDecodeSteps', path);
  if (maxDecodeSteps !== undefined) trace.maxDecodeSteps = maxDecodeSteps;

  const categories = section.categories;
  if (categories !== undefined) {
    if (!Array.isArray(categories) || !categories.every(isTraceCategory)) {
      throw new ConfigError(
        `${path}.categories must be an array of: ${TRACE_CATEGORY_NAMES.join(', ')}`
      );
    }
    trace.categories = categories;
  }

  const layers = section.layers;
  if (layers === null) {
    trace.layers = null;
  } else if (layers !== undefined) {
    if (!Array.isArray(layers) || !layers.every((n): n is number => Number.isInteger(n))) {
      throw new ConfigError(`${path}.layers must be an array of block indices or null`);
    }
    trace.layers = layers;
  }
  return trace;
}

/**
 * Validate an untyped JSON value and convert it to runtime overrides.
 * Unknown sections or fields are rejected rather than ignored.
 */
export function parseRuntimeOverrides(raw: unknown, path = 'config'): RuntimeConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`${path} must be a JSON object`);
  }
  const sections = new Set(['preset', ...Object.keys(DEFAULT_RUNTIME_CONFIG)]);
  for (const key of Object.keys(raw)) {
    if (!sections.has(key)) {
      throw new ConfigError(`Unknown config section "${path}.${key}"`);
    }
  }

  const overrides: RuntimeConfigOverrides = {};

  const model = readSection(raw, 'model', path, MODEL_KEYS);
  if (model) overrides.model = parseModel(model, `${path}.model`);

  const generation = readSection(raw, 'generation', path, ['maxNewTokens', 'seed']);
  if (generation) overrides.generation = parseGeneration(generation, `${path}.generation`);

  const training = readSection(raw, 'training', path, TRAINING_KEYS);
  if (training) overrides.training = parseTraining(training, `${path}.training`);

  const debug = readSection(raw, 'debug', path, ['logHistory', 'logLevel', 'trace']);
  if (debug) {
    const debugPath = `${path}.debug`;
    overrides.debug = {};
    const logHistory = readSection(debug, 'logHistory', debugPath, ['maxLogHistoryEntries']);
    if (logHistory) {
      overrides.debug.logHistory = {
        maxLogHistoryEntries: readNumber(logHistory, 'maxLogHistoryEntries', `${debugPath}.logHistory`),
      };
    }
    const logLevel = readSection(debug, 'logLevel', debugPath, ['defaultLogLevel']);
    if (logLevel) {
      overrides.debug.logLevel = {
        defaultLogLevel: readString(logLevel, 'defaultLogLevel', `${debugPath}.logLevel`),
      };
    }
    const trace = readSection(debug, 'trace', debugPath, ['enabled', 'categories', 'layers', 'maxDecodeSteps']);
    if (trace) overrides.debug.trace = parseTrace(trace, `${debugPath}.trace`);
  }

  return overrides;
}

// =============================================================================
// Preset Registry
// =============================================================================

const PRESET_DIR = fileURLToPath(new URL('./presets/models/', import.meta.url));

function parsePreset(raw: unknown, file: string): ModelPresetSchema {
  if (!isRecord(raw)) {
    throw new ConfigError(`Preset ${file} must be a JSON object`);
  }
  const id = readString(raw, 'id', file);
  const description = readString(raw, 'description', file) ?? '';
  const model = readSection(raw, 'model', file, MODEL_KEYS);
  if (!id || !model) {
    throw new ConfigError(`Preset ${file} needs "id" and "model"`);
  }
  return { id, description, model: parseModel(model, `${file}.model`) };
}

/**
 * List all available preset IDs.
 */
export function listPresets(): string[] {
  if (!existsSync(PRESET_DIR)) return [];
  return readdirSync(PRESET_DIR)
    .filter((name) => name.endsWith('.json'))
    .map((name) => name.slice(0, -'.json'.length))
    .sort();
}

/**
 * Get a preset by ID.
 */
export function getPreset(id: string): ModelPresetSchema | null {
  if (!listPresets().includes(id)) return null;
  const file = join(PRESET_DIR, `${id}.json`);
  return parsePreset(JSON.parse(readFileSync(file, 'utf-8')), `${id}.json`);
}

/**
 * Get a preset by ID, throwing for unknown IDs.
 */
export function resolvePreset(id: string): ModelPresetSchema {
  const preset = getPreset(id);
  if (!preset) {
    throw new ConfigError(`Unknown preset: ${id}`);
  }
  return preset;
}

// =============================================================================
// Config Files
// =============================================================================

/**
 * Resolve untyped config JSON (optionally naming a preset) into a runtime config.
 */
export function resolveConfig(raw: unknown, path = 'config'): { runtime: RuntimeConfigSchema; preset: string | null } {
  const overrides = parseRuntimeOverrides(raw, path);
  const presetId = isRecord(raw) ? readString(raw, 'preset', path) ?? null : null;
  if (presetId) {
    const preset = resolvePreset(presetId);
    overrides.model = { ...preset.model, ...overrides.model };
  }
  return { runtime: createRuntimeConfig(overrides), preset: presetId };
}

/**
 * Load and validate a runtime config file.
 */
export async function loadConfigFile(path: string): Promise<LoadedConfig> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${path} is not valid JSON: ${reason}`);
  }
  const { runtime, preset } = resolveConfig(raw, path);
  return { runtime, preset, source: path };
}

/**
 * Format a runtime config for display.
 */
export function dumpConfig(config: RuntimeConfigSchema): string {
  return JSON.stringify(config, null, 2);
}

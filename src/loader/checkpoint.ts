/**
 * Checkpoint serialization.
 *
 * A checkpoint is one JSON document holding the model config, the
 * optional vocabulary and every named parameter tensor:
 *
 *   {
 *     "format": "glyphwright-checkpoint",
 *     "version": 1,
 *     "config": { ...ModelConfigSchema },
 *     "vocabulary": { alphabet, oovPolicy, unknownSymbol } | null,
 *     "tensors": { "<name>": { "shape": [..], "data": [..] } }
 *   }
 *
 * @module loader/checkpoint
 */

import { readFile, writeFile } from 'fs/promises';

import {
  type ModelConfigSchema,
  createModelConfig,
} from '../config/schema/index.js';
import { log, trace } from '../debug/index.js';
import { CheckpointError, ConfigError } from '../errors/model-error.js';
import { GPTModel } from '../inference/model.js';
import { CharVocabulary } from '../inference/tokenizers/char.js';
import type { CharVocabularyJSON, OovPolicy } from '../inference/tokenizers/types.js';
import { type Tensor, createTensor } from '../tensor/tensor.js';

// ============================================================================
// Types
// ============================================================================

export const CHECKPOINT_FORMAT = 'glyphwright-checkpoint';
export const CHECKPOINT_VERSION = 1;

export interface SerializedTensor {
  shape: number[];
  data: number[];
}

export interface CheckpointDocument {
  format: typeof CHECKPOINT_FORMAT;
  version: typeof CHECKPOINT_VERSION;
  config: ModelConfigSchema;
  vocabulary: CharVocabularyJSON | null;
  tensors: Record<string, SerializedTensor>;
}

export interface Checkpoint {
  config: Readonly<ModelConfigSchema>;
  vocabulary: CharVocabulary | null;
  parameters: Map<string, Tensor>;
}

export interface LoadedCheckpoint {
  model: GPTModel;
  vocabulary: CharVocabulary | null;
}

// ============================================================================
// Validation Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isOovPolicy(value: unknown): value is OovPolicy {
  return value === 'drop' || value === 'reject' || value === 'unknown';
}

const CONFIG_KEYS: readonly (keyof ModelConfigSchema)[] = [
  'vocabSize', 'contextLength', 'modelDim', 'numBlocks', 'numHeads',
  'dropout', 'layerNormEps', 'initStd',
];

function parseConfig(raw: unknown): Readonly<ModelConfigSchema> {
  if (!isRecord(raw)) {
    throw new CheckpointError('Checkpoint "config" must be an object');
  }
  const config: Partial<ModelConfigSchema> = {};
  for (const key of CONFIG_KEYS) {
    const value = raw[key];
    if (typeof value !== 'number') {
      throw new CheckpointError(`Checkpoint config.${key} must be a number`);
    }
    config[key] = value;
  }
  try {
    return createModelConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new CheckpointError(`Checkpoint config is invalid: ${err.message}`);
    }
    throw err;
  }
}

function parseVocabulary(raw: unknown): CharVocabulary | null {
  if (raw === null || raw === undefined) return null;
  if (!isRecord(raw)) {
    throw new CheckpointError('Checkpoint "vocabulary" must be an object or null');
  }
  const { alphabet, oovPolicy, unknownSymbol } = raw;
  if (!Array.isArray(alphabet) || !alphabet.every((c): c is string => typeof c === 'string')) {
    throw new CheckpointError('Checkpoint vocabulary.alphabet must be an array of strings');
  }
  if (!isOovPolicy(oovPolicy)) {
    throw new CheckpointError(`Checkpoint vocabulary.oovPolicy is invalid: ${String(oovPolicy)}`);
  }
  if (typeof unknownSymbol !== 'string') {
    throw new CheckpointError('Checkpoint vocabulary.unknownSymbol must be a string');
  }
  try {
    return CharVocabulary.fromJSON({ alphabet, oovPolicy, unknownSymbol });
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new CheckpointError(`Checkpoint vocabulary is invalid: ${err.message}`);
    }
    throw err;
  }
}

function parseTensors(raw: unknown): Map<string, Tensor> {
  if (!isRecord(raw)) {
    throw new CheckpointError('Checkpoint "tensors" must be an object');
  }
  const tensors = new Map<string, Tensor>();
  for (const [name, entry] of Object.entries(raw)) {
    const shape = isRecord(entry) ? entry.shape : undefined;
    const data = isRecord(entry) ? entry.data : undefined;
    if (!isNumberArray(shape) || !isNumberArray(data)) {
      throw new CheckpointError(`Checkpoint tensor "${name}" needs numeric "shape" and "data" arrays`);
    }
    const size = shape.reduce((a, b) => a * b, 1);
    if (!shape.every((d) => Number.isInteger(d) && d >= 0) || size !== data.length) {
      throw new CheckpointError(
        `Checkpoint tensor "${name}": ${data.length} values do not fill shape [${shape.join(', ')}]`
      );
    }
    tensors.set(name, createTensor(Float32Array.from(data), shape, name));
  }
  return tensors;
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Build the JSON-ready checkpoint document.
 */
export function serializeCheckpoint(checkpoint: Checkpoint): CheckpointDocument {
  const tensors: Record<string, SerializedTensor> = {};
  for (const [name, tensor] of checkpoint.parameters) {
    tensors[name] = { shape: [...tensor.shape], data: Array.from(tensor.data) };
  }
  return {
    format: CHECKPOINT_FORMAT,
    version: CHECKPOINT_VERSION,
    config: { ...checkpoint.config },
    vocabulary: checkpoint.vocabulary ? checkpoint.vocabulary.toJSON() : null,
    tensors,
  };
}

/**
 * Validate an untyped document and rebuild its parts.
 */
export function deserializeCheckpoint(raw: unknown): Checkpoint {
  if (!isRecord(raw)) {
    throw new CheckpointError('Checkpoint must be a JSON object');
  }
  if (raw.format !== CHECKPOINT_FORMAT) {
    throw new CheckpointError(`Unrecognized checkpoint format: ${String(raw.format)}`);
  }
  if (raw.version !== CHECKPOINT_VERSION) {
    throw new CheckpointError(`Unsupported checkpoint version: ${String(raw.version)}`);
  }

  const config = parseConfig(raw.config);
  const vocabulary = parseVocabulary(raw.vocabulary);
  if (vocabulary && vocabulary.vocabSize !== config.vocabSize) {
    throw new CheckpointError(
      `Checkpoint vocabulary has ${vocabulary.vocabSize} symbols but config.vocabSize is ${config.vocabSize}`
    );
  }
  return { config, vocabulary, parameters: parseTensors(raw.tensors) };
}

/**
 * Build a model from a checkpoint and load its parameters.
 */
export function restoreModel(checkpoint: Checkpoint): GPTModel {
  const model = new GPTModel(checkpoint.config);
  model.loadStateDict(checkpoint.parameters);
  return model;
}

// ============================================================================
// File I/O
// ============================================================================

export async function saveCheckpoint(
  path: string,
  model: GPTModel,
  vocabulary: CharVocabulary | null = null
): Promise<void> {
  const doc = serializeCheckpoint({
    config: model.config,
    vocabulary,
    parameters: model.stateDict(),
  });
  await writeFile(path, JSON.stringify(doc), 'utf-8');
  log.info('Checkpoint', `Saved ${Object.keys(doc.tensors).length} tensors to ${path}`);
}

export async function loadCheckpoint(path: string): Promise<LoadedCheckpoint> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CheckpointError(`Checkpoint ${path} is not valid JSON: ${reason}`);
  }
  const checkpoint = deserializeCheckpoint(raw);
  trace.loader(`checkpoint ${path}: ${checkpoint.parameters.size} tensors`);
  const model = restoreModel(checkpoint);
  log.info('Checkpoint', `Loaded ${path} (${model.parameterCount()} parameters)`);
  return { model, vocabulary: checkpoint.vocabulary };
}

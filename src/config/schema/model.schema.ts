/**
 * Model Config Schema
 *
 * Architecture hyperparameters for the character-level GPT. A resolved
 * ModelConfigSchema is frozen and shared read-only by every component of
 * one model instance.
 *
 * @module config/schema/model
 */

import { ConfigError } from '../../errors/model-error.js';

// =============================================================================
// Model Architecture
// =============================================================================

export interface ModelConfigSchema {
  /** Size of the closed character alphabet */
  vocabSize: number;

  /** Maximum tokens the model conditions on in one forward pass */
  contextLength: number;

  /** Embedding / residual stream width (default: 384) */
  modelDim: number;

  /** Number of stacked transformer blocks (default: 6) */
  numBlocks: number;

  /** Attention heads per block; must divide modelDim (default: 6) */
  numHeads: number;

  /** Dropout probability applied in train mode (default: 0.2) */
  dropout: number;

  /** LayerNorm epsilon (default: 1e-5) */
  layerNormEps: number;

  /** Standard deviation of the normal weight initializer (default: 0.02) */
  initStd: number;
}

/** Default model configuration (vocabSize is normally taken from the vocabulary) */
export const DEFAULT_MODEL_CONFIG: ModelConfigSchema = {
  vocabSize: 65,
  contextLength: 256,
  modelDim: 384,
  numBlocks: 6,
  numHeads: 6,
  dropout: 0.2,
  layerNormEps: 1e-5,
  initStd: 0.02,
};

/** Expansion factor of the feed-forward hidden layer */
export const FFN_EXPANSION = 4;

// =============================================================================
// Validation
// =============================================================================

function assertPositiveInt(name: keyof ModelConfigSchema, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`ModelConfig.${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Throw ConfigError unless the config describes a constructible model.
 */
export function validateModelConfig(config: ModelConfigSchema): void {
  assertPositiveInt('vocabSize', config.vocabSize);
  assertPositiveInt('contextLength', config.contextLength);
  assertPositiveInt('modelDim', config.modelDim);
  assertPositiveInt('numBlocks', config.numBlocks);
  assertPositiveInt('numHeads', config.numHeads);

  if (config.modelDim % config.numHeads !== 0) {
    throw new ConfigError(
      `ModelConfig.modelDim (${config.modelDim}) must be divisible by numHeads (${config.numHeads})`
    );
  }
  if (!(config.dropout >= 0 && config.dropout < 1)) {
    throw new ConfigError(`ModelConfig.dropout must be in [0, 1), got ${config.dropout}`);
  }
  if (!(config.layerNormEps > 0)) {
    throw new ConfigError(`ModelConfig.layerNormEps must be > 0, got ${config.layerNormEps}`);
  }
  if (!(config.initStd >= 0) || !Number.isFinite(config.initStd)) {
    throw new ConfigError(`ModelConfig.initStd must be a finite value >= 0, got ${config.initStd}`);
  }
}

/**
 * Merge overrides over the defaults, validate, and freeze.
 *
 * @example
 * ```typescript
 * const config = createModelConfig({ vocabSize: 4, contextLength: 8, modelDim: 8, numBlocks: 1, numHeads: 2 });
 * ```
 */
export function createModelConfig(
  overrides: Partial<ModelConfigSchema> = {}
): Readonly<ModelConfigSchema> {
  const config: ModelConfigSchema = { ...DEFAULT_MODEL_CONFIG, ...overrides };
  validateModelConfig(config);
  return Object.freeze(config);
}

/**
 * Width of each attention head.
 */
export function headSizeOf(config: ModelConfigSchema): number {
  return config.modelDim / config.numHeads;
}

/**
 * GPT Model
 *
 * Character-level decoder-only transformer:
 *
 *   indices (B, T)
 *     → token + position embeddings       (B, T, modelDim)
 *     → numBlocks × TransformerBlock       (B, T, modelDim)
 *     → final LayerNorm → LM head          (B, T, vocabSize)
 *
 * Parameters are drawn once from a seeded generator at construction, so a
 * (config, seed) pair fixes the weights. Forward passes never write them;
 * loadStateDict() is the only mutation point.
 *
 * @module inference/model
 */

import {
  type ModelConfigSchema,
  createModelConfig,
} from '../config/schema/index.js';
import { log } from '../debug/index.js';
import { ConfigError, ShapeError } from '../errors/model-error.js';
import { SeededRandom } from '../tensor/random.js';
import {
  type IndexTensor,
  type Tensor,
  cloneTensor,
  formatShape,
  shapeSize,
} from '../tensor/tensor.js';
import { Embeddings } from './pipeline/embed.js';
import { TransformerBlock } from './pipeline/layer.js';
import { LogitsHead } from './pipeline/logits.js';
import {
  type ForwardContext,
  type ParameterOwner,
  evalContext,
  paramName,
} from './pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export interface GPTModelOptions {
  /** Seed for parameter initialization (default: 1337) */
  seed?: number;
}

/**
 * Anything that maps (B, T) indices to (B, T, vocabSize) logits.
 * The generator depends on this rather than on GPTModel.
 */
export interface LanguageModel {
  readonly config: Readonly<Pick<ModelConfigSchema, 'vocabSize' | 'contextLength'>>;
  forward(indices: IndexTensor, ctx?: ForwardContext): Tensor;
}

export type StateDict = Map<string, Tensor>;

const DEFAULT_INIT_SEED = 1337;

// ============================================================================
// Model
// ============================================================================

export class GPTModel implements LanguageModel, ParameterOwner {
  readonly config: Readonly<ModelConfigSchema>;
  readonly embeddings: Embeddings;
  readonly blocks: readonly TransformerBlock[];
  readonly head: LogitsHead;

  constructor(config: Partial<ModelConfigSchema>, options: GPTModelOptions = {}) {
    this.config = createModelConfig(config);
    const random = new SeededRandom(options.seed ?? DEFAULT_INIT_SEED);

    this.embeddings = new Embeddings(this.config, random);
    const blocks: TransformerBlock[] = [];
    for (let i = 0; i < this.config.numBlocks; i++) {
      blocks.push(new TransformerBlock(this.config, i, random));
    }
    this.blocks = blocks;
    this.head = new LogitsHead(this.config, random);

    log.verbose('Model', `Initialized ${this.config.numBlocks} blocks, ${this.parameterCount()} parameters`);
  }

  /**
   * Logits for every position: (B, T) → (B, T, vocabSize).
   * Defaults to eval mode, where the result is deterministic.
   */
  forward(indices: IndexTensor, ctx: ForwardContext = evalContext()): Tensor {
    let x = this.embeddings.forward(indices);
    for (const block of this.blocks) {
      x = block.forward(x, ctx);
    }
    return this.head.forward(x);
  }

  /**
   * Live parameter tensors keyed by their checkpoint names.
   */
  namedParameters(prefix = ''): Map<string, Tensor> {
    const params = new Map<string, Tensor>();
    const add = (entries: Map<string, Tensor>): void => {
      for (const [name, tensor] of entries) {
        params.set(paramName(prefix, name), tensor);
      }
    };
    add(this.embeddings.namedParameters());
    this.blocks.forEach((block, i) => add(block.namedParameters(`blocks.${i}`)));
    add(this.head.namedParameters());
    return params;
  }

  /**
   * Copies of every parameter, keyed by name.
   */
  stateDict(): StateDict {
    const state: StateDict = new Map();
    for (const [name, tensor] of this.namedParameters()) {
      state.set(name, cloneTensor(tensor, name));
    }
    return state;
  }

  /**
   * Copy values from a state dict into this model's parameters.
   * Every parameter must be present with a matching shape and no extra
   * names are accepted; nothing is written unless the whole dict checks out.
   */
  loadStateDict(state: ReadonlyMap<string, Tensor>): void {
    const params = this.namedParameters();

    for (const name of state.keys()) {
      if (!params.has(name)) {
        throw new ConfigError(`loadStateDict: unexpected parameter "${name}"`);
      }
    }
    for (const [name, target] of params) {
      const source = state.get(name);
      if (!source) {
        throw new ConfigError(`loadStateDict: missing parameter "${name}"`);
      }
      const sameShape = source.shape.length === target.shape.length &&
        source.shape.every((d, i) => d === target.shape[i]);
      if (!sameShape || source.data.length !== target.data.length) {
        throw new ShapeError(
          `loadStateDict: "${name}" has shape ${formatShape(source.shape)}, expected ${formatShape(target.shape)}`
        );
      }
    }

    for (const [name, target] of params) {
      const source = state.get(name);
      if (source) target.data.set(source.data);
    }
    log.verbose('Model', `Loaded ${params.size} parameter tensors`);
  }

  parameterCount(): number {
    let total = 0;
    for (const tensor of this.namedParameters().values()) {
      total += shapeSize(tensor.shape);
    }
    return total;
  }
}

/**
 * Embedding layer - token lookup plus learned absolute positions.
 *
 * (B, T) indices → (B, T, modelDim), where row (b, t) is
 * tokenTable[indices[b, t]] + positionTable[t].
 *
 * @module inference/pipeline/embed
 */

import type { ModelConfigSchema } from '../../config/schema/index.js';
import { trace } from '../../debug/index.js';
import { IndexError, ShapeError } from '../../errors/model-error.js';
import { initNormal } from '../../tensor/init.js';
import type { SeededRandom } from '../../tensor/random.js';
import {
  type IndexTensor,
  type Tensor,
  assertIndexTensor,
  createTensor,
  formatShape,
} from '../../tensor/tensor.js';
import { type ParameterOwner } from './types.js';

export class Embeddings implements ParameterOwner {
  readonly vocabSize: number;
  readonly contextLength: number;
  readonly modelDim: number;
  /** [vocabSize, modelDim] */
  readonly tokenTable: Tensor;
  /** [contextLength, modelDim] */
  readonly positionTable: Tensor;

  constructor(config: Readonly<ModelConfigSchema>, random: SeededRandom) {
    this.vocabSize = config.vocabSize;
    this.contextLength = config.contextLength;
    this.modelDim = config.modelDim;
    this.tokenTable = initNormal([config.vocabSize, config.modelDim], config.initStd, random, 'token_embedding');
    this.positionTable = initNormal([config.contextLength, config.modelDim], config.initStd, random, 'position_embedding');
  }

  forward(indices: IndexTensor): Tensor {
    assertIndexTensor(indices, 'Embeddings');
    const [B, T] = indices.shape;
    if (T === 0 || T > this.contextLength) {
      throw new ShapeError(
        `Embeddings: sequence length ${T} outside [1, ${this.contextLength}] for input ${formatShape(indices.shape)}`
      );
    }

    const dim = this.modelDim;
    const tok = this.tokenTable.data;
    const pos = this.positionTable.data;
    const out = new Float32Array(B * T * dim);

    for (let b = 0; b < B; b++) {
      for (let t = 0; t < T; t++) {
        const id = indices.data[b * T + t];
        if (id < 0 || id >= this.vocabSize) {
          throw new IndexError(
            `Embeddings: token index ${id} at (${b}, ${t}) outside [0, ${this.vocabSize})`
          );
        }
        const outBase = (b * T + t) * dim;
        const tokBase = id * dim;
        const posBase = t * dim;
        for (let d = 0; d < dim; d++) {
          out[outBase + d] = tok[tokBase + d] + pos[posBase + d];
        }
      }
    }

    trace.embed(`B=${B} T=${T} dim=${dim}`);
    return createTensor(out, [B, T, dim], 'embeddings');
  }

  namedParameters(): Map<string, Tensor> {
    return new Map([
      ['token_embedding.weight', this.tokenTable],
      ['position_embedding.weight', this.positionTable],
    ]);
  }
}

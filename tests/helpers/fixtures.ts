import type { ModelConfigSchema } from '../../src/config/schema/index.js';
import type { LanguageModel } from '../../src/inference/model.js';
import { initNormal } from '../../src/tensor/init.js';
import { SeededRandom } from '../../src/tensor/random.js';
import { type IndexTensor, type Tensor, createTensor } from '../../src/tensor/tensor.js';

/** vocab 4, ctx 8, dim 8, 1 block, 2 heads */
export const MICRO_CONFIG: Partial<ModelConfigSchema> = {
  vocabSize: 4,
  contextLength: 8,
  modelDim: 8,
  numBlocks: 1,
  numHeads: 2,
};

/**
 * Random whose next() always returns the same value.
 */
export class FixedRandom extends SeededRandom {
  private readonly value: number;

  constructor(value: number) {
    super(0);
    this.value = value;
  }

  override next(): number {
    return this.value;
  }
}

export function randomInput(shape: readonly number[], seed: number): Tensor {
  return initNormal(shape, 1, new SeededRandom(seed), 'input');
}

/**
 * Model whose logits put all mass on (token + 1) % vocabSize at every
 * position. Records a copy of every view it receives.
 */
export class CountingModel implements LanguageModel {
  readonly config: { vocabSize: number; contextLength: number };
  readonly views: number[][][] = [];

  constructor(vocabSize: number, contextLength: number) {
    this.config = { vocabSize, contextLength };
  }

  forward(indices: IndexTensor): Tensor {
    const [B, T] = indices.shape;
    const V = this.config.vocabSize;
    const rows: number[][] = [];
    const data = new Float32Array(B * T * V).fill(-Infinity);
    for (let b = 0; b < B; b++) {
      rows.push(Array.from(indices.data.subarray(b * T, (b + 1) * T)));
      for (let t = 0; t < T; t++) {
        const next = (indices.data[b * T + t] + 1) % V;
        data[(b * T + t) * V + next] = 0;
      }
    }
    this.views.push(rows);
    return createTensor(data, [B, T, V], 'logits');
  }
}

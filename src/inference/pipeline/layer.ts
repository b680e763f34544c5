/**
 * Transformer block (attention + FFN).
 *
 * Pre-norm residual composition:
 *
 *   x = x + MultiHeadSelfAttention(LayerNorm_1(x))
 *   x = x + FeedForward(LayerNorm_2(x))
 *
 * Output shape equals input shape, so blocks stack freely.
 *
 * @module inference/pipeline/layer
 */

import { type ModelConfigSchema, headSizeOf } from '../../config/schema/index.js';
import { ShapeError } from '../../errors/model-error.js';
import { add } from '../../tensor/ops.js';
import type { SeededRandom } from '../../tensor/random.js';
import { type Tensor, formatShape } from '../../tensor/tensor.js';
import { MultiHeadSelfAttention } from './attention/index.js';
import { FeedForward } from './ffn/index.js';
import { LayerNorm } from './norm.js';
import { type ForwardContext, type ParameterOwner, type Transform, paramName } from './types.js';

export class TransformerBlock implements Transform, ParameterOwner {
  readonly layerIdx: number;
  readonly modelDim: number;
  readonly ln1: LayerNorm;
  readonly attn: MultiHeadSelfAttention;
  readonly ln2: LayerNorm;
  readonly ffn: FeedForward;

  constructor(config: Readonly<ModelConfigSchema>, layerIdx: number, random: SeededRandom) {
    const { modelDim, numHeads, contextLength, dropout, initStd, layerNormEps } = config;
    this.layerIdx = layerIdx;
    this.modelDim = modelDim;
    this.ln1 = new LayerNorm(modelDim, layerNormEps, `L${layerIdx}.ln1`);
    this.attn = new MultiHeadSelfAttention({
      layerIdx,
      modelDim,
      numHeads,
      headSize: headSizeOf(config),
      contextLength,
      dropout,
      initStd,
    }, random);
    this.ln2 = new LayerNorm(modelDim, layerNormEps, `L${layerIdx}.ln2`);
    this.ffn = new FeedForward({ layerIdx, modelDim, dropout, initStd }, random);
  }

  forward(x: Tensor, ctx: ForwardContext): Tensor {
    if (x.shape.length !== 3 || x.shape[2] !== this.modelDim) {
      throw new ShapeError(
        `TransformerBlock L${this.layerIdx}: expected (B, T, ${this.modelDim}), got ${formatShape(x.shape)}`
      );
    }
    const afterAttn = add(x, this.attn.forward(this.ln1.forward(x), ctx), `L${this.layerIdx}.resid1`);
    return add(afterAttn, this.ffn.forward(this.ln2.forward(afterAttn), ctx), `L${this.layerIdx}.resid2`);
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    return new Map([
      ...this.ln1.namedParameters(paramName(prefix, 'ln1')),
      ...this.attn.namedParameters(paramName(prefix, 'attn')),
      ...this.ln2.namedParameters(paramName(prefix, 'ln2')),
      ...this.ffn.namedParameters(paramName(prefix, 'ffn')),
    ]);
  }
}

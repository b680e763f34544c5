/**
 * Multi-Head Self-Attention
 *
 * numHeads independent heads run on the same input; their outputs are
 * concatenated along the feature axis (head h fills columns
 * [h·headSize, (h+1)·headSize)), projected back to modelDim with bias,
 * and passed through dropout.
 *
 * Input (B, T, modelDim) → output (B, T, modelDim).
 *
 * @module inference/pipeline/attention/multi-head
 */

import { trace } from '../../../debug/index.js';
import { concatLastAxis } from '../../../tensor/ops.js';
import type { SeededRandom } from '../../../tensor/random.js';
import { type Tensor, formatShape } from '../../../tensor/tensor.js';
import { Dropout } from '../dropout.js';
import { LinearProjection } from '../linear.js';
import { type ForwardContext, type ParameterOwner, type Transform, paramName } from '../types.js';
import { SingleHeadAttention } from './head.js';
import { type AttentionConfig, assertAttentionInput } from './types.js';

export class MultiHeadSelfAttention implements Transform, ParameterOwner {
  readonly config: AttentionConfig;
  readonly heads: readonly SingleHeadAttention[];
  readonly proj: LinearProjection;
  readonly dropout: Dropout;

  constructor(config: AttentionConfig, random: SeededRandom) {
    this.config = config;
    const { layerIdx, modelDim, numHeads, headSize, contextLength, initStd } = config;

    const heads: SingleHeadAttention[] = [];
    for (let h = 0; h < numHeads; h++) {
      heads.push(new SingleHeadAttention(
        { modelDim, headSize, contextLength, initStd },
        random,
        `L${layerIdx}.head${h}`
      ));
    }
    this.heads = heads;
    this.proj = new LinearProjection(modelDim, modelDim, random, {
      bias: true,
      initStd,
      label: `L${layerIdx}.attn_proj`,
    });
    this.dropout = new Dropout(config.dropout);
  }

  /**
   * Per-head outputs before concatenation, each (B, T, headSize).
   */
  headOutputs(x: Tensor): Tensor[] {
    assertAttentionInput(x, this.config.modelDim, this.config.contextLength, 'MultiHeadSelfAttention');
    return this.heads.map((head) => head.forward(x));
  }

  forward(x: Tensor, ctx: ForwardContext): Tensor {
    const { layerIdx, numHeads, headSize } = this.config;
    const concatenated = concatLastAxis(this.headOutputs(x), `L${layerIdx}.attn_concat`);
    trace.attn(layerIdx, `heads=${numHeads} headSize=${headSize} in=${formatShape(x.shape)}`);
    return this.dropout.forward(this.proj.forward(concatenated), ctx);
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    const params = new Map<string, Tensor>();
    this.heads.forEach((head, h) => {
      for (const [name, tensor] of head.namedParameters(paramName(prefix, `heads.${h}`))) {
        params.set(name, tensor);
      }
    });
    for (const [name, tensor] of this.proj.namedParameters(paramName(prefix, 'proj'))) {
      params.set(name, tensor);
    }
    return params;
  }
}

/**
 * Single-Head Attention
 *
 * Causal scaled dot-product attention for one head:
 *
 *   weights = softmax(mask(Q · Kᵗ / √headSize))
 *   output  = weights · V
 *
 * Input (B, T, modelDim) → output (B, T, headSize).
 *
 * @module inference/pipeline/attention/head
 */

import { softmaxRowInPlace } from '../../../tensor/ops.js';
import type { SeededRandom } from '../../../tensor/random.js';
import { type Tensor, createTensor } from '../../../tensor/tensor.js';
import { LinearProjection } from '../linear.js';
import { type ParameterOwner, type Transform, paramName } from '../types.js';
import { assertAttentionInput, createCausalMask } from './types.js';

export interface HeadConfig {
  modelDim: number;
  headSize: number;
  contextLength: number;
  initStd: number;
}

export class SingleHeadAttention implements Transform, ParameterOwner {
  readonly config: HeadConfig;
  readonly key: LinearProjection;
  readonly query: LinearProjection;
  readonly value: LinearProjection;

  constructor(config: HeadConfig, random: SeededRandom, label = 'head') {
    this.config = config;
    const { modelDim, headSize, initStd } = config;
    this.key = new LinearProjection(modelDim, headSize, random, { bias: false, initStd, label: `${label}.key` });
    this.query = new LinearProjection(modelDim, headSize, random, { bias: false, initStd, label: `${label}.query` });
    this.value = new LinearProjection(modelDim, headSize, random, { bias: false, initStd, label: `${label}.value` });
  }

  /**
   * Post-softmax attention weights, shape (B, T, T).
   * Masked (future) entries are exactly 0.
   */
  attentionWeights(x: Tensor): Tensor {
    const { modelDim, headSize, contextLength } = this.config;
    assertAttentionInput(x, modelDim, contextLength, 'SingleHeadAttention');
    const [B, T] = x.shape;

    const k = this.key.forward(x).data;
    const q = this.query.forward(x).data;
    const mask = createCausalMask(T);
    const scale = 1 / Math.sqrt(headSize);
    const scores = new Float32Array(B * T * T);

    for (let b = 0; b < B; b++) {
      const rowBase = b * T;
      const sBase = b * T * T;
      for (let i = 0; i < T; i++) {
        const qBase = (rowBase + i) * headSize;
        for (let j = 0; j < T; j++) {
          if (!mask[i * T + j]) {
            scores[sBase + i * T + j] = -Infinity;
            continue;
          }
          const kBase = (rowBase + j) * headSize;
          let sum = 0;
          for (let d = 0; d < headSize; d++) {
            sum += q[qBase + d] * k[kBase + d];
          }
          scores[sBase + i * T + j] = sum * scale;
        }
        softmaxRowInPlace(scores, sBase + i * T, T);
      }
    }

    return createTensor(scores, [B, T, T], 'attn_weights');
  }

  forward(x: Tensor): Tensor {
    const weights = this.attentionWeights(x).data;
    const v = this.value.forward(x).data;
    const [B, T] = x.shape;
    const { headSize } = this.config;
    const out = new Float32Array(B * T * headSize);

    for (let b = 0; b < B; b++) {
      const sBase = b * T * T;
      for (let i = 0; i < T; i++) {
        const outBase = (b * T + i) * headSize;
        // weights beyond j = i are zero
        for (let j = 0; j <= i; j++) {
          const w = weights[sBase + i * T + j];
          const vBase = (b * T + j) * headSize;
          for (let d = 0; d < headSize; d++) {
            out[outBase + d] += w * v[vBase + d];
          }
        }
      }
    }

    return createTensor(out, [B, T, headSize], 'head_out');
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    return new Map([
      ...this.query.namedParameters(paramName(prefix, 'query')),
      ...this.key.namedParameters(paramName(prefix, 'key')),
      ...this.value.namedParameters(paramName(prefix, 'value')),
    ]);
  }
}

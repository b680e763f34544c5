/**
 * Position-wise Feed-Forward Network
 *
 * Linear(modelDim → 4·modelDim) → ReLU → Linear(4·modelDim → modelDim) → dropout.
 * Each position is transformed independently; no mixing across T.
 *
 * @module inference/pipeline/ffn/feed-forward
 */

import { FFN_EXPANSION } from '../../../config/schema/index.js';
import { trace } from '../../../debug/index.js';
import { relu } from '../../../tensor/ops.js';
import type { SeededRandom } from '../../../tensor/random.js';
import { type Tensor, formatShape } from '../../../tensor/tensor.js';
import { Dropout } from '../dropout.js';
import { LinearProjection } from '../linear.js';
import { type ForwardContext, type ParameterOwner, type Transform, paramName } from '../types.js';

export interface FeedForwardConfig {
  layerIdx: number;
  modelDim: number;
  dropout: number;
  initStd: number;
}

export class FeedForward implements Transform, ParameterOwner {
  readonly layerIdx: number;
  readonly hiddenDim: number;
  readonly fc1: LinearProjection;
  readonly fc2: LinearProjection;
  readonly dropout: Dropout;

  constructor(config: FeedForwardConfig, random: SeededRandom) {
    const { layerIdx, modelDim, initStd } = config;
    this.layerIdx = layerIdx;
    this.hiddenDim = FFN_EXPANSION * modelDim;
    this.fc1 = new LinearProjection(modelDim, this.hiddenDim, random, {
      bias: true,
      initStd,
      label: `L${layerIdx}.ffn_fc1`,
    });
    this.fc2 = new LinearProjection(this.hiddenDim, modelDim, random, {
      bias: true,
      initStd,
      label: `L${layerIdx}.ffn_fc2`,
    });
    this.dropout = new Dropout(config.dropout);
  }

  forward(x: Tensor, ctx: ForwardContext): Tensor {
    const hidden = relu(this.fc1.forward(x), `L${this.layerIdx}.ffn_act`);
    trace.ffn(this.layerIdx, `in=${formatShape(x.shape)} hidden=${this.hiddenDim}`);
    return this.dropout.forward(this.fc2.forward(hidden), ctx);
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    return new Map([
      ...this.fc1.namedParameters(paramName(prefix, 'fc1')),
      ...this.fc2.namedParameters(paramName(prefix, 'fc2')),
    ]);
  }
}

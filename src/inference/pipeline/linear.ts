/**
 * Linear Projection
 *
 * Affine map over the trailing axis. Bias-free projections derive the
 * per-head query/key/value vectors; biased ones serve the attention output
 * projection, the feed-forward layers and the LM head.
 *
 * @module inference/pipeline/linear
 */

import { initNormal, initZeros } from '../../tensor/init.js';
import { linear } from '../../tensor/ops.js';
import type { SeededRandom } from '../../tensor/random.js';
import type { Tensor } from '../../tensor/tensor.js';
import { type ParameterOwner, type Transform, paramName } from './types.js';

export interface LinearOptions {
  bias: boolean;
  initStd: number;
  label?: string;
}

export class LinearProjection implements Transform, ParameterOwner {
  readonly inDim: number;
  readonly outDim: number;
  /** [outDim, inDim] */
  readonly weight: Tensor;
  readonly bias: Tensor | null;
  readonly label: string;

  constructor(inDim: number, outDim: number, random: SeededRandom, options: LinearOptions) {
    this.inDim = inDim;
    this.outDim = outDim;
    this.label = options.label ?? 'linear';
    this.weight = initNormal([outDim, inDim], options.initStd, random, `${this.label}.weight`);
    this.bias = options.bias ? initZeros([outDim], `${this.label}.bias`) : null;
  }

  forward(x: Tensor): Tensor {
    return linear(x, this.weight, this.bias, this.label);
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    const params = new Map<string, Tensor>([[paramName(prefix, 'weight'), this.weight]]);
    if (this.bias) {
      params.set(paramName(prefix, 'bias'), this.bias);
    }
    return params;
  }
}

/**
 * Layer Normalization
 *
 * @module inference/pipeline/norm
 */

import { initOnes, initZeros } from '../../tensor/init.js';
import { layerNormCPU } from '../../tensor/ops.js';
import type { Tensor } from '../../tensor/tensor.js';
import { type ParameterOwner, type Transform, paramName } from './types.js';

export class LayerNorm implements Transform, ParameterOwner {
  readonly dim: number;
  readonly eps: number;
  /** Scale, initialized to 1 */
  readonly weight: Tensor;
  /** Shift, initialized to 0 */
  readonly bias: Tensor;
  readonly label: string;

  constructor(dim: number, eps: number, label = 'layer_norm') {
    this.dim = dim;
    this.eps = eps;
    this.label = label;
    this.weight = initOnes([dim], `${label}.weight`);
    this.bias = initZeros([dim], `${label}.bias`);
  }

  forward(x: Tensor): Tensor {
    return layerNormCPU(x, this.weight, this.bias, this.eps, this.label);
  }

  namedParameters(prefix: string): Map<string, Tensor> {
    return new Map([
      [paramName(prefix, 'weight'), this.weight],
      [paramName(prefix, 'bias'), this.bias],
    ]);
  }
}

/**
 * Dropout
 *
 * Inverted dropout: in train mode each element is zeroed with probability
 * p and survivors are scaled by 1 / (1 - p). In eval mode, or with p = 0,
 * the input tensor itself is returned.
 *
 * @module inference/pipeline/dropout
 */

import { createTensor, type Tensor } from '../../tensor/tensor.js';
import type { ForwardContext, Transform } from './types.js';

export class Dropout implements Transform {
  readonly p: number;

  constructor(p: number) {
    this.p = p;
  }

  forward(x: Tensor, ctx: ForwardContext): Tensor {
    if (ctx.mode !== 'train' || this.p === 0) {
      return x;
    }

    const scale = 1 / (1 - this.p);
    const out = new Float32Array(x.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = ctx.random.next() < this.p ? 0 : x.data[i] * scale;
    }
    return createTensor(out, x.shape, x.label);
  }
}

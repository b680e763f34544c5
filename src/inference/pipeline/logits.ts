/**
 * Logits computation - final layer norm and LM head projection.
 *
 * (B, T, modelDim) → (B, T, vocabSize). The output is unnormalized; the
 * sampler and the loss apply their own softmax.
 *
 * @module inference/pipeline/logits
 */

import type { ModelConfigSchema } from '../../config/schema/index.js';
import { trace } from '../../debug/index.js';
import type { SeededRandom } from '../../tensor/random.js';
import { type Tensor, formatShape } from '../../tensor/tensor.js';
import { LinearProjection } from './linear.js';
import { LayerNorm } from './norm.js';
import { type ParameterOwner } from './types.js';

export class LogitsHead implements ParameterOwner {
  readonly finalNorm: LayerNorm;
  readonly lmHead: LinearProjection;

  constructor(config: Readonly<ModelConfigSchema>, random: SeededRandom) {
    this.finalNorm = new LayerNorm(config.modelDim, config.layerNormEps, 'ln_f');
    this.lmHead = new LinearProjection(config.modelDim, config.vocabSize, random, {
      bias: true,
      initStd: config.initStd,
      label: 'lm_head',
    });
  }

  forward(x: Tensor): Tensor {
    const logits = this.lmHead.forward(this.finalNorm.forward(x));
    trace.logits(`out=${formatShape(logits.shape)}`);
    return logits;
  }

  namedParameters(): Map<string, Tensor> {
    return new Map([
      ...this.finalNorm.namedParameters('ln_f'),
      ...this.lmHead.namedParameters('lm_head'),
    ]);
  }
}

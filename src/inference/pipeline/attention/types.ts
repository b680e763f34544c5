/**
 * Attention Types and Utilities
 *
 * Shared configuration and the causal mask used by every attention head.
 *
 * @module inference/pipeline/attention/types
 */

import { ShapeError } from '../../../errors/model-error.js';
import { type Tensor, formatShape } from '../../../tensor/tensor.js';

/**
 * Attention configuration for one block.
 */
export interface AttentionConfig {
  /** Block index, used for trace tags */
  layerIdx: number;
  modelDim: number;
  numHeads: number;
  headSize: number;
  contextLength: number;
  dropout: number;
  initStd: number;
}

/**
 * Build a T×T causal mask: entry [i][j] is 1 when query position i may
 * attend to key position j (j <= i), 0 otherwise. Generated per call for
 * the call's own T rather than precomputed for a fixed size.
 */
export function createCausalMask(T: number): Uint8Array {
  const mask = new Uint8Array(T * T);
  for (let i = 0; i < T; i++) {
    for (let j = 0; j <= i; j++) {
      mask[i * T + j] = 1;
    }
  }
  return mask;
}

/**
 * Check an attention input is (B, T, modelDim) with 1 <= T <= contextLength.
 */
export function assertAttentionInput(
  x: Tensor,
  modelDim: number,
  contextLength: number,
  operation: string
): void {
  if (x.shape.length !== 3 || x.shape[2] !== modelDim) {
    throw new ShapeError(
      `${operation}: expected (B, T, ${modelDim}), got ${formatShape(x.shape)}`
    );
  }
  const T = x.shape[1];
  if (T === 0 || T > contextLength) {
    throw new ShapeError(
      `${operation}: sequence length ${T} outside [1, ${contextLength}]`
    );
  }
}

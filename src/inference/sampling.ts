/**
 * Token sampling from logits.
 *
 * Plain multinomial sampling: softmax over the vocabulary, then one
 * uniform draw per row walked against the cumulative distribution.
 *
 * @module inference/sampling
 */

import { NumericalError, ShapeError } from '../errors/model-error.js';
import { softmax } from '../tensor/ops.js';
import type { SeededRandom } from '../tensor/random.js';
import { type Tensor, formatShape } from '../tensor/tensor.js';

export interface LogitStats {
  min: number;
  max: number;
  nanCount: number;
  infCount: number;
}

/**
 * Row-wise softmax of (B, vocabSize) logits.
 */
export function probabilities(logits: Tensor): Tensor {
  if (logits.shape.length !== 2) {
    throw new ShapeError(`probabilities: expected (B, vocabSize), got ${formatShape(logits.shape)}`);
  }
  return softmax(logits, 'probs');
}

/**
 * Draw one index from a single probability row.
 */
export function sampleCategorical(
  probs: Float32Array,
  random: SeededRandom,
  start = 0,
  length = probs.length - start
): number {
  let total = 0;
  for (let i = 0; i < length; i++) {
    const p = probs[start + i];
    if (!Number.isFinite(p) || p < 0) {
      throw new NumericalError(`sampleCategorical: probability ${p} at index ${i} is not a finite non-negative value`);
    }
    total += p;
  }
  if (!(total > 0)) {
    throw new NumericalError('sampleCategorical: probabilities sum to 0');
  }

  const u = random.next() * total;
  let cumulative = 0;
  for (let i = 0; i < length; i++) {
    cumulative += probs[start + i];
    if (u < cumulative) return i;
  }
  return length - 1;
}

/**
 * Sample one token per row of (B, vocabSize) logits.
 */
export function sampleFromLogits(logits: Tensor, random: SeededRandom): number[] {
  const probs = probabilities(logits);
  const [B, V] = probs.shape;
  const tokens: number[] = [];
  for (let b = 0; b < B; b++) {
    tokens.push(sampleCategorical(probs.data, random, b * V, V));
  }
  return tokens;
}

/**
 * Summary statistics of a logits buffer, for trace output.
 */
export function logitStats(logits: Float32Array): LogitStats {
  let min = Infinity;
  let max = -Infinity;
  let nanCount = 0;
  let infCount = 0;
  for (const v of logits) {
    if (Number.isNaN(v)) {
      nanCount++;
    } else if (!Number.isFinite(v)) {
      infCount++;
    } else {
      if (v < min) min = v;
      if (v > max) max = v;
    }
  }
  return { min, max, nanCount, infCount };
}

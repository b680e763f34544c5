/**
 * Cross-entropy loss over next-token logits.
 *
 * @module training/loss
 */

import type { TrainingConfigSchema } from '../config/schema/index.js';
import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { ConfigError, IndexError, ShapeError } from '../errors/model-error.js';
import type { LanguageModel } from '../inference/model.js';
import { evalContext } from '../inference/pipeline/types.js';
import { SeededRandom } from '../tensor/random.js';
import { type IndexTensor, type Tensor, assertIndexTensor, formatShape } from '../tensor/tensor.js';
import { type TokenStream, getBatch } from './datasets/index.js';

/**
 * Mean over B·T positions of logsumexp(row) - row[target].
 *
 * @param logits - (B, T, vocabSize)
 * @param targets - (B, T)
 */
export function crossEntropyLoss(logits: Tensor, targets: IndexTensor): number {
  if (logits.shape.length !== 3) {
    throw new ShapeError(`crossEntropyLoss: expected (B, T, vocabSize) logits, got ${formatShape(logits.shape)}`);
  }
  const [B, T, V] = logits.shape;
  assertIndexTensor(targets, 'crossEntropyLoss');
  if (targets.shape[0] !== B || targets.shape[1] !== T) {
    throw new ShapeError(
      `crossEntropyLoss: targets ${formatShape(targets.shape)} do not match logits ${formatShape(logits.shape)}`
    );
  }
  const rows = B * T;
  if (rows === 0) {
    throw new ShapeError('crossEntropyLoss: no positions to score');
  }

  let total = 0;
  for (let r = 0; r < rows; r++) {
    const target = targets.data[r];
    if (target < 0 || target >= V) {
      throw new IndexError(`crossEntropyLoss: target ${target} at position ${r} outside [0, ${V})`);
    }
    const base = r * V;
    let max = -Infinity;
    for (let v = 0; v < V; v++) {
      if (logits.data[base + v] > max) max = logits.data[base + v];
    }
    let sumExp = 0;
    for (let v = 0; v < V; v++) {
      sumExp += Math.exp(logits.data[base + v] - max);
    }
    total += max + Math.log(sumExp) - logits.data[base + target];
  }
  return total / rows;
}

export interface EstimateLossOptions extends Partial<Pick<TrainingConfigSchema, 'batchSize' | 'evalBatches'>> {
  random?: SeededRandom;
}

/**
 * Average eval-mode loss over randomly drawn batches of a token stream.
 */
export function estimateLoss(
  model: LanguageModel,
  tokens: TokenStream,
  options: EstimateLossOptions = {}
): number {
  const defaults = getRuntimeConfig().training;
  const batchSize = options.batchSize ?? defaults.batchSize;
  const evalBatches = options.evalBatches ?? defaults.evalBatches;
  const random = options.random ?? new SeededRandom(defaults.seed);
  if (!Number.isInteger(evalBatches) || evalBatches < 1) {
    throw new ConfigError(`estimateLoss: evalBatches must be a positive integer, got ${evalBatches}`);
  }
  const ctx = evalContext();

  let total = 0;
  for (let i = 0; i < evalBatches; i++) {
    const batch = getBatch(tokens, batchSize, model.config.contextLength, random);
    total += crossEntropyLoss(model.forward(batch.context, ctx), batch.target);
  }
  const loss = total / evalBatches;
  log.verbose('Loss', `Estimated loss ${loss.toFixed(4)} over ${evalBatches} batches of ${batchSize}`);
  return loss;
}

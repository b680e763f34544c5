/**
 * Token batch windowing.
 *
 * A batch is `batchSize` windows cut at random offsets from one token
 * stream; the target window is the context window shifted left by one.
 *
 * @module training/datasets/token-batch
 */

import { ConfigError, ShapeError } from '../../errors/model-error.js';
import type { SeededRandom } from '../../tensor/random.js';
import type { IndexTensor } from '../../tensor/tensor.js';

export interface TokenBatch {
  /** (batchSize, contextLength) */
  context: IndexTensor;
  /** (batchSize, contextLength), context shifted by one position */
  target: IndexTensor;
  /** Start offset of each window in the source stream */
  offsets: number[];
}

export type TokenStream = ArrayLike<number>;

function toInt32(tokens: TokenStream): Int32Array {
  return tokens instanceof Int32Array ? tokens : Int32Array.from(tokens);
}

/**
 * Split a token stream into leading train and trailing validation parts.
 */
export function splitTokens(
  tokens: TokenStream,
  trainSplit: number
): { train: Int32Array; validation: Int32Array } {
  if (!(trainSplit > 0 && trainSplit <= 1)) {
    throw new ConfigError(`splitTokens: trainSplit must be in (0, 1], got ${trainSplit}`);
  }
  const all = toInt32(tokens);
  const cut = Math.floor(all.length * trainSplit);
  return {
    train: all.subarray(0, cut),
    validation: all.subarray(cut),
  };
}

/**
 * Draw a batch of (context, target) windows.
 * Offsets are uniform over [0, length - contextLength - 1].
 */
export function getBatch(
  tokens: TokenStream,
  batchSize: number,
  contextLength: number,
  random: SeededRandom
): TokenBatch {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigError(`getBatch: batchSize must be a positive integer, got ${batchSize}`);
  }
  if (!Number.isInteger(contextLength) || contextLength < 1) {
    throw new ConfigError(`getBatch: contextLength must be a positive integer, got ${contextLength}`);
  }
  const data = toInt32(tokens);
  const maxOffset = data.length - contextLength - 1;
  if (maxOffset < 0) {
    throw new ShapeError(
      `getBatch: ${data.length} tokens cannot fill a window of ${contextLength} plus one target`
    );
  }

  const context = new Int32Array(batchSize * contextLength);
  const target = new Int32Array(batchSize * contextLength);
  const offsets: number[] = [];
  for (let b = 0; b < batchSize; b++) {
    const offset = random.nextInt(maxOffset + 1);
    offsets.push(offset);
    context.set(data.subarray(offset, offset + contextLength), b * contextLength);
    target.set(data.subarray(offset + 1, offset + contextLength + 1), b * contextLength);
  }

  return {
    context: { data: context, shape: [batchSize, contextLength] },
    target: { data: target, shape: [batchSize, contextLength] },
    offsets,
  };
}

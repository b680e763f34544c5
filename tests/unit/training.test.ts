import { describe, expect, it } from 'vitest';

import { ConfigError, IndexError, ShapeError } from '../../src/errors/model-error.js';
import { GPTModel } from '../../src/inference/model.js';
import { SeededRandom } from '../../src/tensor/random.js';
import { createIndexTensor, createTensor, indexRows } from '../../src/tensor/tensor.js';
import { crossEntropyLoss, estimateLoss, getBatch, splitTokens } from '../../src/training/index.js';
import { FixedRandom, MICRO_CONFIG } from '../helpers/fixtures.js';

describe('crossEntropyLoss', () => {
  it('is log(vocabSize) for uniform logits', () => {
    const logits = createTensor(new Float32Array(2 * 3 * 4), [2, 3, 4]);
    const targets = createIndexTensor([[0, 1, 2], [3, 2, 1]]);
    expect(crossEntropyLoss(logits, targets)).toBeCloseTo(Math.log(4), 10);
  });

  it('rejects targets whose data does not fill their shape', () => {
    const logits = createTensor(new Float32Array(1 * 2 * 4), [1, 2, 4]);
    expect(() => crossEntropyLoss(logits, { data: Int32Array.from([0]), shape: [1, 2] })).toThrow(ShapeError);
  });

  it('averages per-position losses', () => {
    // Position 0: target logit dominates, loss = log(1 + e^-10)
    // Position 1: uniform over 2, loss = log 2
    const logits = createTensor(Float32Array.from([10, 0, 0, 0]), [1, 2, 2]);
    const targets = createIndexTensor([[0, 1]]);
    const expected = (Math.log(1 + Math.exp(-10)) + Math.log(2)) / 2;
    expect(crossEntropyLoss(logits, targets)).toBeCloseTo(expected, 10);
  });

  it('checks shapes and target range', () => {
    const logits = createTensor(new Float32Array(6), [1, 2, 3]);
    expect(() => crossEntropyLoss(logits, createIndexTensor([[0, 1, 2]]))).toThrow(ShapeError);
    expect(() => crossEntropyLoss(logits, createIndexTensor([[0, 3]]))).toThrow(IndexError);
  });
});

describe('getBatch', () => {
  const tokens = Int32Array.from([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);

  it('cuts context and shifted target windows', () => {
    // maxOffset = 10 - 3 - 1 = 6; floor(0.5 * 7) = 3
    const batch = getBatch(tokens, 2, 3, new FixedRandom(0.5));
    expect(batch.offsets).toEqual([3, 3]);
    expect(indexRows(batch.context)).toEqual([[3, 4, 5], [3, 4, 5]]);
    expect(indexRows(batch.target)).toEqual([[4, 5, 6], [4, 5, 6]]);
  });

  it('keeps offsets in range', () => {
    const batch = getBatch(tokens, 50, 4, new SeededRandom(3));
    expect(batch.context.shape).toEqual([50, 4]);
    for (const offset of batch.offsets) {
      expect(offset).toBeGreaterThanOrEqual(0);
      expect(offset).toBeLessThanOrEqual(5);
    }
  });

  it('rejects data shorter than one window plus a target', () => {
    expect(() => getBatch([0, 1, 2], 1, 3, new SeededRandom(1))).toThrow(ShapeError);
  });

  it('rejects non-positive sizes', () => {
    expect(() => getBatch(tokens, 0, 3, new SeededRandom(1))).toThrow(ConfigError);
  });
});

describe('splitTokens', () => {
  it('splits at floor(length * trainSplit)', () => {
    const { train, validation } = splitTokens([0, 1, 2, 3, 4, 5, 6, 7, 8, 9], 0.9);
    expect(Array.from(train)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(Array.from(validation)).toEqual([9]);
  });

  it('rejects a split outside (0, 1]', () => {
    expect(() => splitTokens([0, 1], 0)).toThrow(ConfigError);
  });
});

describe('estimateLoss', () => {
  it('is deterministic for a given random stream', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 1 });
    const tokens = Array.from({ length: 64 }, (_, i) => i % 4);
    const a = estimateLoss(model, tokens, { batchSize: 4, evalBatches: 2, random: new SeededRandom(5) });
    const b = estimateLoss(model, tokens, { batchSize: 4, evalBatches: 2, random: new SeededRandom(5) });
    expect(a).toBe(b);
    // Freshly initialized weights are near uniform over the 4 symbols
    expect(a).toBeGreaterThan(1);
    expect(a).toBeLessThan(2);
  });
});

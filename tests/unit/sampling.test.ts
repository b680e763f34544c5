import { describe, expect, it } from 'vitest';

import { NumericalError, ShapeError } from '../../src/errors/model-error.js';
import {
  logitStats,
  probabilities,
  sampleCategorical,
  sampleFromLogits,
} from '../../src/inference/sampling.js';
import { SeededRandom } from '../../src/tensor/random.js';
import { createTensor } from '../../src/tensor/tensor.js';
import { FixedRandom } from '../helpers/fixtures.js';

describe('sampleCategorical', () => {
  const probs = Float32Array.from([0.25, 0.25, 0.5]);

  it('walks the cumulative distribution with one uniform draw', () => {
    expect(sampleCategorical(probs, new FixedRandom(0.1))).toBe(0);
    expect(sampleCategorical(probs, new FixedRandom(0.3))).toBe(1);
    expect(sampleCategorical(probs, new FixedRandom(0.74))).toBe(2);
  });

  it('never picks a zero-probability index', () => {
    const p = Float32Array.from([0, 1, 0]);
    expect(sampleCategorical(p, new FixedRandom(0))).toBe(1);
    expect(sampleCategorical(p, new FixedRandom(0.999))).toBe(1);
  });

  it('samples a sub-row by offset', () => {
    const rows = Float32Array.from([1, 0, 0, 0, 0, 1]);
    expect(sampleCategorical(rows, new FixedRandom(0.5), 3, 3)).toBe(2);
  });

  it('raises NumericalError on NaN or an all-zero row', () => {
    expect(() => sampleCategorical(Float32Array.from([NaN, 1]), new FixedRandom(0.5))).toThrow(NumericalError);
    expect(() => sampleCategorical(Float32Array.from([0, 0]), new FixedRandom(0.5))).toThrow(NumericalError);
  });
});

describe('sampleFromLogits', () => {
  it('draws one token per row', () => {
    const logits = createTensor(Float32Array.from([0, -Infinity, -Infinity, -Infinity, -Infinity, 0]), [2, 3]);
    expect(sampleFromLogits(logits, new FixedRandom(0.5))).toEqual([0, 2]);
  });

  it('raises NumericalError for non-finite logits', () => {
    const logits = createTensor(Float32Array.from([Infinity, 0]), [1, 2]);
    expect(() => sampleFromLogits(logits, new FixedRandom(0.5))).toThrow(NumericalError);
  });

  it('requires 2D logits', () => {
    expect(() => probabilities(createTensor(Float32Array.from([0, 0]), [2]))).toThrow(ShapeError);
  });
});

describe('logitStats', () => {
  it('counts non-finite values separately', () => {
    expect(logitStats(Float32Array.from([1, -2, NaN, Infinity]))).toEqual({
      min: -2,
      max: 1,
      nanCount: 1,
      infCount: 1,
    });
  });
});

describe('sampling distribution', () => {
  it('draws tokens in proportion to their probabilities', () => {
    const logits = createTensor(Float32Array.from([0, Math.log(3)]), [1, 2]);
    const random = new SeededRandom(2024);
    const draws = 20000;
    let ones = 0;
    for (let i = 0; i < draws; i++) {
      ones += sampleFromLogits(logits, random)[0];
    }
    expect(ones / draws).toBeGreaterThan(0.73);
    expect(ones / draws).toBeLessThan(0.77);
  });
});

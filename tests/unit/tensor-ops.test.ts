import { describe, expect, it } from 'vitest';

import { ConfigError, ShapeError } from '../../src/errors/model-error.js';
import {
  add,
  concatLastAxis,
  lastPosition,
  layerNormCPU,
  linear,
  matmulCPU,
  relu,
  softmax,
} from '../../src/tensor/ops.js';
import { SeededRandom } from '../../src/tensor/random.js';
import {
  assertIndexTensor,
  createIndexTensor,
  createTensor,
  filled,
  indexRows,
} from '../../src/tensor/tensor.js';

const t = (values: number[], shape: number[]) => createTensor(Float32Array.from(values), shape);

describe('tensor/tensor', () => {
  it('rejects data that does not fill the shape', () => {
    expect(() => t([1, 2, 3], [2, 2])).toThrow(ShapeError);
  });

  it('freezes the shape', () => {
    const x = t([1, 2], [2]);
    expect(Object.isFrozen(x.shape)).toBe(true);
  });

  it('builds index tensors from equal rows', () => {
    const idx = createIndexTensor([[0, 1, 2], [3, 2, 1]]);
    expect(idx.shape).toEqual([2, 3]);
    expect(Array.from(idx.data)).toEqual([0, 1, 2, 3, 2, 1]);
    expect(indexRows(idx)).toEqual([[0, 1, 2], [3, 2, 1]]);
  });

  it('rejects ragged and empty index rows', () => {
    expect(() => createIndexTensor([[0, 1], [2]])).toThrow(ShapeError);
    expect(() => createIndexTensor([])).toThrow(ShapeError);
  });

  it('checks that index data fills its shape', () => {
    expect(() => assertIndexTensor({ data: new Int32Array(5), shape: [2, 3] }, 'op')).toThrow(
      'op: 5 indices do not fill shape (2, 3)'
    );
    expect(() => assertIndexTensor(createIndexTensor([[1, 2]]), 'op')).not.toThrow();
  });
});

describe('tensor/random', () => {
  it('repeats the same stream for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    expect([a.next(), a.next(), a.next()]).toEqual([b.next(), b.next(), b.next()]);
  });

  it('rejects seeds outside the int32 range', () => {
    expect(() => new SeededRandom(4294967296)).toThrow(ConfigError);
    expect(() => new SeededRandom(2147483648)).toThrow(ConfigError);
    expect(() => new SeededRandom(1.5)).toThrow(ConfigError);
    expect(new SeededRandom(-2147483648).seed).toBe(-2147483648);
  });
});

describe('tensor/ops', () => {
  it('matmulCPU multiplies against a [N, K] weight', () => {
    const out = matmulCPU(Float32Array.from([1, 2]), Float32Array.from([3, 4, 5, 6]), 1, 2, 2);
    expect(Array.from(out)).toEqual([11, 17]);
  });

  it('linear applies weight and bias over the last axis', () => {
    const x = t([1, 2], [1, 2]);
    const w = t([1, 0, 0, 1, 1, 1], [3, 2]);
    const b = t([0.5, 0, -1], [3]);
    const y = linear(x, w, b);
    expect(y.shape).toEqual([1, 3]);
    expect(Array.from(y.data)).toEqual([1.5, 2, 2]);
  });

  it('linear rejects a mismatched trailing dimension', () => {
    expect(() => linear(t([1, 2, 3], [1, 3]), t([1, 0, 0, 1], [2, 2]), null)).toThrow(ShapeError);
  });

  it('add requires identical shapes', () => {
    expect(Array.from(add(t([1, 2], [2]), t([3, 4], [2])).data)).toEqual([4, 6]);
    expect(() => add(t([1, 2], [2]), t([1, 2], [1, 2]))).toThrow(ShapeError);
  });

  it('relu clamps negatives to zero', () => {
    expect(Array.from(relu(t([-1, 0, 2], [3])).data)).toEqual([0, 0, 2]);
  });

  it('softmax gives exact zeros for -Infinity entries', () => {
    const p = softmax(t([0, -Infinity, 0], [1, 3]));
    expect(Array.from(p.data)).toEqual([0.5, 0, 0.5]);
  });

  it('softmax rows sum to one', () => {
    const p = softmax(t([1, 2, 3, -4, 0, 4], [2, 3]));
    expect(p.data[0] + p.data[1] + p.data[2]).toBeCloseTo(1, 6);
    expect(p.data[3] + p.data[4] + p.data[5]).toBeCloseTo(1, 6);
  });

  it('layerNormCPU normalizes each row with the biased variance', () => {
    const x = t([1, 2, 3, 4], [1, 4]);
    const y = layerNormCPU(x, filled([4], 1), filled([4], 0), 0);
    const expected = [-1.3416408, -0.4472136, 0.4472136, 1.3416408];
    expected.forEach((v, i) => expect(y.data[i]).toBeCloseTo(v, 5));
  });

  it('concatLastAxis places parts side by side', () => {
    const out = concatLastAxis([t([1, 2], [2, 1]), t([3, 4, 5, 6], [2, 2])]);
    expect(out.shape).toEqual([2, 3]);
    expect(Array.from(out.data)).toEqual([1, 3, 4, 2, 5, 6]);
  });

  it('lastPosition extracts the final time step', () => {
    const out = lastPosition(t([0, 1, 2, 3, 4, 5], [1, 3, 2]));
    expect(out.shape).toEqual([1, 2]);
    expect(Array.from(out.data)).toEqual([4, 5]);
  });

  it('leaves inputs untouched', () => {
    const x = t([1, -2, 3], [1, 3]);
    relu(x);
    softmax(x);
    expect(Array.from(x.data)).toEqual([1, -2, 3]);
  });
});

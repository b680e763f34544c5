/**
 * Parameter initializers.
 *
 * @module tensor/init
 */

import type { SeededRandom } from './random.js';
import { type Tensor, createTensor, filled, shapeSize } from './tensor.js';

/**
 * Normal(0, std) weights drawn from `random` in row-major order.
 */
export function initNormal(
  shape: readonly number[],
  std: number,
  random: SeededRandom,
  label?: string
): Tensor {
  const data = new Float32Array(shapeSize(shape));
  for (let i = 0; i < data.length; i++) {
    data[i] = random.nextGaussian() * std;
  }
  return createTensor(data, shape, label);
}

export function initZeros(shape: readonly number[], label?: string): Tensor {
  return filled(shape, 0, label);
}

export function initOnes(shape: readonly number[], label?: string): Tensor {
  return filled(shape, 1, label);
}

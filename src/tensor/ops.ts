/**
 * CPU kernels.
 *
 * Reference implementations of the dense operations the transformer is
 * built from. Every kernel treats its inputs as read-only and returns a
 * freshly allocated tensor.
 *
 * @module tensor/ops
 */

import { ShapeError } from '../errors/model-error.js';
import {
  type Tensor,
  assertLastDim,
  createTensor,
  formatShape,
  shapeSize,
} from './tensor.js';

// ============================================================================
// Raw Float32Array kernels
// ============================================================================

/**
 * CPU matmul against a row-layout weight.
 *
 * Computes: output = input @ weight^T
 * Input: [M, K], Weight: [N, K], Output: [M, N]
 */
export function matmulCPU(
  input: Float32Array,
  weight: Float32Array,
  M: number,
  N: number,
  K: number
): Float32Array {
  const result = new Float32Array(M * N);
  for (let m = 0; m < M; m++) {
    const inBase = m * K;
    for (let n = 0; n < N; n++) {
      const wBase = n * K;
      let sum = 0;
      for (let k = 0; k < K; k++) {
        sum += input[inBase + k] * weight[wBase + k];
      }
      result[m * N + n] = sum;
    }
  }
  return result;
}

/**
 * Numerically stable softmax over one row, in place.
 *
 * Subtracts the row max before exponentiating. Entries equal to -Infinity
 * come out as exactly 0. A row that is entirely -Infinity is left as NaN
 * for the caller to detect.
 */
export function softmaxRowInPlace(data: Float32Array, start: number, length: number): void {
  let maxVal = -Infinity;
  for (let i = 0; i < length; i++) {
    const v = data[start + i];
    if (v > maxVal) maxVal = v;
  }

  let sum = 0;
  for (let i = 0; i < length; i++) {
    const e = Math.exp(data[start + i] - maxVal);
    data[start + i] = e;
    sum += e;
  }

  for (let i = 0; i < length; i++) {
    data[start + i] /= sum;
  }
}

// ============================================================================
// Tensor kernels
// ============================================================================

/**
 * Affine map over the trailing axis: y = x @ W^T (+ b).
 *
 * @param weight - [out, in]
 * @param bias - [out] or null
 */
export function linear(x: Tensor, weight: Tensor, bias: Tensor | null, label?: string): Tensor {
  if (weight.shape.length !== 2) {
    throw new ShapeError(`${label ?? 'linear'}: weight must be 2D, got ${formatShape(weight.shape)}`);
  }
  const [outDim, inDim] = weight.shape;
  assertLastDim(x, inDim, label ?? 'linear');
  if (bias && bias.data.length !== outDim) {
    throw new ShapeError(`${label ?? 'linear'}: bias ${formatShape(bias.shape)} does not match ${outDim} outputs`);
  }

  const rows = x.data.length / inDim;
  const out = matmulCPU(x.data, weight.data, rows, outDim, inDim);
  if (bias) {
    for (let r = 0; r < rows; r++) {
      const base = r * outDim;
      for (let j = 0; j < outDim; j++) {
        out[base + j] += bias.data[j];
      }
    }
  }

  return createTensor(out, [...x.shape.slice(0, -1), outDim], label);
}

/**
 * Element-wise sum of two same-shape tensors (residual add).
 */
export function add(a: Tensor, b: Tensor, label?: string): Tensor {
  if (a.shape.length !== b.shape.length || a.shape.some((d, i) => d !== b.shape[i])) {
    throw new ShapeError(`add: shape mismatch ${formatShape(a.shape)} vs ${formatShape(b.shape)}`);
  }
  const out = new Float32Array(a.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = a.data[i] + b.data[i];
  }
  return createTensor(out, a.shape, label);
}

export function relu(x: Tensor, label?: string): Tensor {
  const out = new Float32Array(x.data.length);
  for (let i = 0; i < out.length; i++) {
    const v = x.data[i];
    out[i] = v > 0 ? v : 0;
  }
  return createTensor(out, x.shape, label);
}

/**
 * LayerNorm over the trailing axis.
 *
 * Computes: y = (x - mean) / sqrt(var + eps) * weight + bias
 * with the biased variance of each row.
 */
export function layerNormCPU(
  x: Tensor,
  weight: Tensor,
  bias: Tensor,
  eps: number,
  label?: string
): Tensor {
  const dim = weight.data.length;
  assertLastDim(x, dim, label ?? 'layerNorm');
  const rows = x.data.length / dim;
  const out = new Float32Array(x.data.length);

  for (let r = 0; r < rows; r++) {
    const base = r * dim;
    let mean = 0;
    for (let i = 0; i < dim; i++) mean += x.data[base + i];
    mean /= dim;

    let variance = 0;
    for (let i = 0; i < dim; i++) {
      const d = x.data[base + i] - mean;
      variance += d * d;
    }
    variance /= dim;

    const inv = 1 / Math.sqrt(variance + eps);
    for (let i = 0; i < dim; i++) {
      out[base + i] = (x.data[base + i] - mean) * inv * weight.data[i] + bias.data[i];
    }
  }

  return createTensor(out, x.shape, label);
}

/**
 * Softmax over the trailing axis.
 */
export function softmax(x: Tensor, label?: string): Tensor {
  const cols = x.shape[x.shape.length - 1];
  const out = x.data.slice();
  const rows = cols === 0 ? 0 : out.length / cols;
  for (let r = 0; r < rows; r++) {
    softmaxRowInPlace(out, r * cols, cols);
  }
  return createTensor(out, x.shape, label);
}

/**
 * Concatenate same-prefix tensors along the trailing axis.
 */
export function concatLastAxis(parts: readonly Tensor[], label?: string): Tensor {
  if (parts.length === 0) {
    throw new ShapeError('concatLastAxis: nothing to concatenate');
  }
  const prefix = parts[0].shape.slice(0, -1);
  const rows = shapeSize(prefix);
  for (const part of parts) {
    const partPrefix = part.shape.slice(0, -1);
    if (partPrefix.length !== prefix.length || partPrefix.some((d, i) => d !== prefix[i])) {
      throw new ShapeError(
        `concatLastAxis: ${formatShape(part.shape)} does not share prefix ${formatShape(prefix)}`
      );
    }
  }

  const widths = parts.map((p) => p.shape[p.shape.length - 1]);
  const total = widths.reduce((a, b) => a + b, 0);
  const out = new Float32Array(rows * total);

  for (let r = 0; r < rows; r++) {
    let offset = r * total;
    for (let p = 0; p < parts.length; p++) {
      const w = widths[p];
      out.set(parts[p].data.subarray(r * w, (r + 1) * w), offset);
      offset += w;
    }
  }

  return createTensor(out, [...prefix, total], label);
}

/**
 * Extract the last time step of a (B, T, C) tensor as (B, C).
 */
export function lastPosition(x: Tensor, label?: string): Tensor {
  if (x.shape.length !== 3) {
    throw new ShapeError(`lastPosition: expected 3D tensor, got ${formatShape(x.shape)}`);
  }
  const [B, T, C] = x.shape;
  if (T === 0) {
    throw new ShapeError('lastPosition: sequence axis is empty');
  }
  const out = new Float32Array(B * C);
  for (let b = 0; b < B; b++) {
    const src = (b * T + (T - 1)) * C;
    out.set(x.data.subarray(src, src + C), b * C);
  }
  return createTensor(out, [B, C], label);
}

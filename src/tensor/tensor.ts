/**
 * Tensor Abstraction
 *
 * A Float32Array with explicit, frozen shape metadata. Every kernel
 * allocates its output; a tensor is never written after it is produced.
 *
 * @module tensor/tensor
 */

import { IndexError, ShapeError } from '../errors/model-error.js';

/**
 * A dense row-major float tensor.
 */
export interface Tensor {
  readonly data: Float32Array;
  readonly shape: readonly number[];
  readonly label?: string;
}

/**
 * A (B, T) tensor of token indices.
 */
export interface IndexTensor {
  readonly data: Int32Array;
  readonly shape: readonly [number, number];
}

/**
 * Number of elements described by a shape.
 */
export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

export function formatShape(shape: readonly number[]): string {
  return `(${shape.join(', ')})`;
}

/**
 * Create a tensor from data with an explicit shape.
 */
export function createTensor(
  data: Float32Array,
  shape: readonly number[],
  label?: string
): Tensor {
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new ShapeError(`createTensor: invalid dimension ${dim} in ${formatShape(shape)}`);
    }
  }
  if (data.length !== shapeSize(shape)) {
    throw new ShapeError(
      `createTensor: ${data.length} values do not fill shape ${formatShape(shape)}` +
      (label ? ` (${label})` : '')
    );
  }
  return {
    data,
    shape: Object.freeze([...shape]),
    label,
  };
}

export function zeros(shape: readonly number[], label?: string): Tensor {
  return createTensor(new Float32Array(shapeSize(shape)), shape, label);
}

export function filled(shape: readonly number[], value: number, label?: string): Tensor {
  return createTensor(new Float32Array(shapeSize(shape)).fill(value), shape, label);
}

/**
 * Copy a tensor's data so the result shares nothing with the source.
 */
export function cloneTensor(tensor: Tensor, label = tensor.label): Tensor {
  return createTensor(tensor.data.slice(), tensor.shape, label);
}

/**
 * Build a (B, T) index tensor from equal-length rows.
 */
export function createIndexTensor(rows: readonly (readonly number[])[]): IndexTensor {
  if (rows.length === 0) {
    throw new ShapeError('createIndexTensor: at least one row is required');
  }
  const T = rows[0].length;
  const data = new Int32Array(rows.length * T);
  rows.forEach((row, b) => {
    if (row.length !== T) {
      throw new ShapeError(`createIndexTensor: row ${b} has length ${row.length}, expected ${T}`);
    }
    for (let t = 0; t < T; t++) {
      if (!Number.isInteger(row[t])) {
        throw new ShapeError(`createIndexTensor: row ${b} position ${t} is not an integer (${row[t]})`);
      }
      if (row[t] !== (row[t] | 0)) {
        throw new IndexError(`createIndexTensor: row ${b} position ${t} does not fit in int32 (${row[t]})`);
      }
      data[b * T + t] = row[t];
    }
  });
  return { data, shape: [rows.length, T] };
}

/**
 * Split an index tensor back into plain rows.
 */
export function indexRows(tensor: IndexTensor): number[][] {
  const [B, T] = tensor.shape;
  const rows: number[][] = [];
  for (let b = 0; b < B; b++) {
    rows.push(Array.from(tensor.data.subarray(b * T, (b + 1) * T)));
  }
  return rows;
}

/**
 * Assert an index tensor is 2D with exactly B·T entries.
 */
export function assertIndexTensor(tensor: IndexTensor, operation: string): void {
  const [B, T] = tensor.shape;
  if (tensor.shape.length !== 2 || tensor.data.length !== B * T) {
    throw new ShapeError(
      `${operation}: ${tensor.data.length} indices do not fill shape ${formatShape(tensor.shape)}`
    );
  }
}

/**
 * Assert the trailing dimension, leaving leading dimensions free.
 */
export function assertLastDim(tensor: Tensor, size: number, operation: string): void {
  const rank = tensor.shape.length;
  if (rank === 0 || tensor.shape[rank - 1] !== size) {
    throw new ShapeError(
      `${operation}: expected trailing dimension ${size}, got ${formatShape(tensor.shape)}` +
      (tensor.label ? ` (${tensor.label})` : '')
    );
  }
}

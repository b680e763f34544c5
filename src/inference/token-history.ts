/**
 * Token History - append-only generation buffer with a bounded view.
 *
 * Storage for every row is allocated once at its final length
 * (promptLength + newTokens). The model only ever sees the most recent
 * `windowSize` tokens of each row; the full history is kept for output.
 *
 * @module inference/token-history
 */

import { ShapeError } from '../errors/model-error.js';
import { type IndexTensor, assertIndexTensor, formatShape } from '../tensor/tensor.js';

export class TokenHistory {
  readonly batchSize: number;
  /** Final length of each row */
  readonly capacity: number;
  private readonly data: Int32Array;
  private len: number;

  constructor(context: IndexTensor, newTokens: number) {
    assertIndexTensor(context, 'TokenHistory');
    const [B, T] = context.shape;
    if (B < 1 || T < 1) {
      throw new ShapeError(`TokenHistory: context must be non-empty, got ${formatShape(context.shape)}`);
    }
    this.batchSize = B;
    this.capacity = T + newTokens;
    this.data = new Int32Array(B * this.capacity);
    for (let b = 0; b < B; b++) {
      this.data.set(context.data.subarray(b * T, (b + 1) * T), b * this.capacity);
    }
    this.len = T;
  }

  get length(): number {
    return this.len;
  }

  /**
   * The last min(length, windowSize) tokens of every row.
   * With a single row this is a subarray of the history, not a copy.
   */
  view(windowSize: number): IndexTensor {
    const width = Math.min(this.len, windowSize);
    const start = this.len - width;
    if (this.batchSize === 1) {
      return { data: this.data.subarray(start, this.len), shape: [1, width] };
    }
    const out = new Int32Array(this.batchSize * width);
    for (let b = 0; b < this.batchSize; b++) {
      const rowStart = b * this.capacity + start;
      out.set(this.data.subarray(rowStart, rowStart + width), b * width);
    }
    return { data: out, shape: [this.batchSize, width] };
  }

  /**
   * Append one token to every row.
   */
  append(tokens: readonly number[]): void {
    if (tokens.length !== this.batchSize) {
      throw new ShapeError(`TokenHistory.append: got ${tokens.length} tokens for ${this.batchSize} rows`);
    }
    if (this.len >= this.capacity) {
      throw new ShapeError(`TokenHistory.append: history is full at ${this.capacity} tokens`);
    }
    for (let b = 0; b < this.batchSize; b++) {
      this.data[b * this.capacity + this.len] = tokens[b];
    }
    this.len++;
  }

  /**
   * Copy of the tokens written so far, shape (B, length).
   */
  toIndexTensor(): IndexTensor {
    const out = new Int32Array(this.batchSize * this.len);
    for (let b = 0; b < this.batchSize; b++) {
      const rowStart = b * this.capacity;
      out.set(this.data.subarray(rowStart, rowStart + this.len), b * this.len);
    }
    return { data: out, shape: [this.batchSize, this.len] };
  }
}

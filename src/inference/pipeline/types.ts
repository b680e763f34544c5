/**
 * Pipeline Types
 *
 * The shared contract every component of the model follows: a transform
 * holding its own parameters, applied to an input tensor under an explicit
 * execution context.
 *
 * @module inference/pipeline/types
 */

import { SeededRandom } from '../../tensor/random.js';
import type { Tensor } from '../../tensor/tensor.js';

/**
 * 'train' enables dropout; 'eval' makes every transform deterministic.
 */
export type ExecutionMode = 'train' | 'eval';

/**
 * Per-call execution context. Passed into every forward call instead of
 * living as mutable module state.
 */
export interface ForwardContext {
  readonly mode: ExecutionMode;
  /** Source of dropout masks; untouched in eval mode */
  readonly random: SeededRandom;
}

/**
 * A parameterized tensor-to-tensor transform.
 */
export interface Transform {
  forward(x: Tensor, ctx: ForwardContext): Tensor;
}

/**
 * A component that owns named parameters.
 */
export interface ParameterOwner {
  /** Parameters keyed by dot-path name under `prefix`; tensors are the live ones */
  namedParameters(prefix: string): Map<string, Tensor>;
}

export function evalContext(): ForwardContext {
  return { mode: 'eval', random: new SeededRandom(0) };
}

export function trainContext(seed: number | SeededRandom): ForwardContext {
  const random = typeof seed === 'number' ? new SeededRandom(seed) : seed;
  return { mode: 'train', random };
}

/**
 * Join a parameter prefix and name with a dot.
 */
export function paramName(prefix: string, name: string): string {
  return prefix ? `${prefix}.${name}` : name;
}

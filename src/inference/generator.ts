/**
 * Generation Logic
 *
 * Autoregressive sampling loop: forward the bounded view in eval mode,
 * take last-position logits, sample one token per row, append, repeat.
 * No KV cache; every step re-runs the full view.
 *
 * @module inference/generator
 */

import { getRuntimeConfig } from '../config/runtime.js';
import {
  incrementDecodeStep,
  isTraceEnabled,
  log,
  resetDecodeStep,
  trace,
} from '../debug/index.js';
import { ConfigError, ShapeError } from '../errors/model-error.js';
import { lastPosition } from '../tensor/ops.js';
import { SeededRandom } from '../tensor/random.js';
import { type IndexTensor, assertIndexTensor, formatShape } from '../tensor/tensor.js';
import type { LanguageModel } from './model.js';
import { evalContext } from './pipeline/types.js';
import { logitStats, sampleFromLogits } from './sampling.js';
import { TokenHistory } from './token-history.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Fixes the sampler stream; ignored when `random` is given */
  seed?: number;
  /** Explicit sampler stream */
  random?: SeededRandom;
  /**
   * Observes each step after its tokens are appended.
   * `viewLength` is the number of positions the model saw.
   */
  onStep?: (step: number, viewLength: number, tokens: readonly number[]) => void;
}

// ============================================================================
// Helpers
// ============================================================================

function resolveRandom(options: GenerateOptions): SeededRandom {
  if (options.random) return options.random;
  if (options.seed !== undefined) return new SeededRandom(options.seed);
  const seed = getRuntimeConfig().generation.seed;
  return seed === null ? SeededRandom.fromClock() : new SeededRandom(seed);
}

function resolveNewTokens(newTokens: number | undefined): number {
  const count = newTokens ?? getRuntimeConfig().generation.maxNewTokens;
  if (!Number.isInteger(count) || count < 0) {
    throw new ConfigError(`generate: newTokens must be a non-negative integer, got ${count}`);
  }
  return count;
}

function assertContext(context: IndexTensor): void {
  assertIndexTensor(context, 'generate');
  const [B, T] = context.shape;
  if (B < 1 || T < 1) {
    throw new ShapeError(`generate: starting context must be non-empty, got ${formatShape(context.shape)}`);
  }
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Yield the tokens sampled at each step, one per row.
 * The model's parameters are never modified.
 */
export function* streamTokens(
  model: LanguageModel,
  context: IndexTensor,
  newTokens?: number,
  options: GenerateOptions = {}
): Generator<number[], IndexTensor, void> {
  assertContext(context);
  const count = resolveNewTokens(newTokens);
  const random = resolveRandom(options);
  const history = new TokenHistory(context, count);
  const ctx = evalContext();
  const { contextLength } = model.config;

  log.debug('Generator', `Generating ${count} tokens from ${formatShape(context.shape)}, seed=${random.seed}`);
  resetDecodeStep();

  for (let step = 0; step < count; step++) {
    const view = history.view(contextLength);
    const logits = lastPosition(model.forward(view, ctx), 'last_logits');
    if (isTraceEnabled('sample')) {
      trace.sample(`step=${step} view=${view.shape[1]}`, logitStats(logits.data));
    }

    const tokens = sampleFromLogits(logits, random);
    history.append(tokens);
    incrementDecodeStep();
    options.onStep?.(step, view.shape[1], tokens);
    yield tokens;
  }

  return history.toIndexTensor();
}

/**
 * Extend each row of `context` by `newTokens` sampled tokens.
 *
 * @returns (B, T0 + newTokens); the first T0 columns equal the context
 *
 * @example
 * ```typescript
 * const out = generate(model, createIndexTensor([[0]]), 100, { seed: 42 });
 * ```
 */
export function generate(
  model: LanguageModel,
  context: IndexTensor,
  newTokens?: number,
  options: GenerateOptions = {}
): IndexTensor {
  const stream = streamTokens(model, context, newTokens, options);
  let result = stream.next();
  while (!result.done) {
    result = stream.next();
  }
  return result.value;
}

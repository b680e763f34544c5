/**
 * Generation Config Schema
 *
 * Defaults for the autoregressive sampling loop. Sampling is plain
 * multinomial over the softmax of the last-position logits.
 *
 * @module config/schema/generation
 */

export interface GenerationConfigSchema {
  /** Tokens generated when the caller does not pass a count (default: 500) */
  maxNewTokens: number;

  /** Seed for the sampler; null draws one from the clock per request */
  seed: number | null;
}

/** Default generation configuration */
export const DEFAULT_GENERATION_CONFIG: GenerationConfigSchema = {
  maxNewTokens: 500,
  seed: null,
};

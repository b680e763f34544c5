/**
 * Attention Module - Re-exports
 *
 * @module inference/pipeline/attention
 */

export {
  type AttentionConfig,
  createCausalMask,
  assertAttentionInput,
} from './types.js';

export { SingleHeadAttention, type HeadConfig } from './head.js';
export { MultiHeadSelfAttention } from './multi-head.js';

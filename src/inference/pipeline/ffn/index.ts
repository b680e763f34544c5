/**
 * FFN Module - Re-exports
 *
 * @module inference/pipeline/ffn
 */

export { FeedForward, type FeedForwardConfig } from './feed-forward.js';

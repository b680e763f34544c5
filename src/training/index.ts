/**
 * Training collaborators: loss and batch windowing.
 *
 * @module training
 */

export { crossEntropyLoss, estimateLoss, type EstimateLossOptions } from './loss.js';
export { splitTokens, getBatch, type TokenBatch, type TokenStream } from './datasets/index.js';

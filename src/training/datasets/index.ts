export { splitTokens, getBatch, type TokenBatch, type TokenStream } from './token-batch.js';

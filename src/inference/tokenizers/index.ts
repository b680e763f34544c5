/**
 * Tokenizers - Re-exports
 *
 * @module inference/tokenizers
 */

export { CharVocabulary } from './char.js';
export type { OovPolicy, CharVocabularyOptions, CharVocabularyJSON } from './types.js';

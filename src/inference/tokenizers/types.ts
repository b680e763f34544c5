/**
 * Tokenizer Types
 *
 * @module inference/tokenizers/types
 */

/**
 * What encode() does with a character outside the alphabet.
 * - drop: skip it
 * - reject: throw IndexError
 * - unknown: map it to a reserved symbol appended to the alphabet
 */
export type OovPolicy = 'drop' | 'reject' | 'unknown';

export interface CharVocabularyOptions {
  /** Default: 'drop' */
  oovPolicy?: OovPolicy;
  /** Reserved symbol for the 'unknown' policy (default: U+FFFD) */
  unknownSymbol?: string;
}

/** Persisted form of a CharVocabulary */
export interface CharVocabularyJSON {
  /** Alphabet without the reserved unknown symbol */
  alphabet: string[];
  oovPolicy: OovPolicy;
  unknownSymbol: string;
}

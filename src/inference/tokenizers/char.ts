/**
 * Character Vocabulary
 *
 * Bidirectional mapping between a closed character alphabet and token
 * indices [0, vocabSize). Characters are Unicode code points; a corpus
 * alphabet is sorted by code point.
 *
 * @module inference/tokenizers/char
 */

import { ConfigError, IndexError } from '../../errors/model-error.js';
import type { CharVocabularyJSON, CharVocabularyOptions, OovPolicy } from './types.js';

const DEFAULT_UNKNOWN_SYMBOL = '�';
const OOV_POLICIES: readonly OovPolicy[] = ['drop', 'reject', 'unknown'];

function isSingleCodePoint(value: string): boolean {
  return [...value].length === 1;
}

function compareCodePoints(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);
}

export class CharVocabulary {
  readonly oovPolicy: OovPolicy;
  readonly unknownSymbol: string;
  private readonly alphabet: readonly string[];
  private readonly itos: readonly string[];
  private readonly stoi: Map<string, number>;

  private constructor(alphabet: readonly string[], options: CharVocabularyOptions) {
    this.oovPolicy = options.oovPolicy ?? 'drop';
    this.unknownSymbol = options.unknownSymbol ?? DEFAULT_UNKNOWN_SYMBOL;

    if (!OOV_POLICIES.includes(this.oovPolicy)) {
      throw new ConfigError(`CharVocabulary: unknown OOV policy "${this.oovPolicy}"`);
    }
    if (alphabet.length === 0) {
      throw new ConfigError('CharVocabulary: alphabet is empty');
    }

    const stoi = new Map<string, number>();
    alphabet.forEach((ch, i) => {
      if (!isSingleCodePoint(ch)) {
        throw new ConfigError(`CharVocabulary: alphabet entry ${JSON.stringify(ch)} is not a single character`);
      }
      if (stoi.has(ch)) {
        throw new ConfigError(`CharVocabulary: duplicate character ${JSON.stringify(ch)}`);
      }
      stoi.set(ch, i);
    });

    const itos = [...alphabet];
    if (this.oovPolicy === 'unknown') {
      if (!isSingleCodePoint(this.unknownSymbol)) {
        throw new ConfigError('CharVocabulary: unknownSymbol must be a single character');
      }
      if (stoi.has(this.unknownSymbol)) {
        throw new ConfigError(
          `CharVocabulary: unknown symbol ${JSON.stringify(this.unknownSymbol)} is already in the alphabet`
        );
      }
      stoi.set(this.unknownSymbol, itos.length);
      itos.push(this.unknownSymbol);
    }

    this.alphabet = Object.freeze([...alphabet]);
    this.itos = Object.freeze(itos);
    this.stoi = stoi;
  }

  /**
   * Vocabulary over an explicit alphabet, in the given order.
   */
  static fromAlphabet(chars: string | readonly string[], options: CharVocabularyOptions = {}): CharVocabulary {
    const alphabet = typeof chars === 'string' ? [...chars] : chars;
    return new CharVocabulary(alphabet, options);
  }

  /**
   * Vocabulary over the unique characters of a corpus, sorted by code point.
   */
  static fromText(text: string, options: CharVocabularyOptions = {}): CharVocabulary {
    const alphabet = [...new Set(text)].sort(compareCodePoints);
    return new CharVocabulary(alphabet, options);
  }

  static fromJSON(json: CharVocabularyJSON): CharVocabulary {
    return new CharVocabulary(json.alphabet, {
      oovPolicy: json.oovPolicy,
      unknownSymbol: json.unknownSymbol,
    });
  }

  /** Includes the reserved unknown symbol under the 'unknown' policy */
  get vocabSize(): number {
    return this.itos.length;
  }

  indexToChar(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.itos.length) {
      throw new IndexError(`CharVocabulary: index ${index} outside [0, ${this.itos.length})`);
    }
    return this.itos[index];
  }

  charToIndex(ch: string): number | null {
    return this.stoi.get(ch) ?? null;
  }

  encode(text: string): number[] {
    const ids: number[] = [];
    for (const ch of text) {
      const id = this.stoi.get(ch);
      if (id !== undefined) {
        ids.push(id);
        continue;
      }
      switch (this.oovPolicy) {
        case 'drop':
          break;
        case 'reject':
          throw new IndexError(`CharVocabulary: character ${JSON.stringify(ch)} is not in the alphabet`);
        case 'unknown':
          ids.push(this.itos.length - 1);
          break;
      }
    }
    return ids;
  }

  decode(indices: ArrayLike<number>): string {
    let text = '';
    for (let i = 0; i < indices.length; i++) {
      text += this.indexToChar(indices[i]);
    }
    return text;
  }

  toJSON(): CharVocabularyJSON {
    return {
      alphabet: [...this.alphabet],
      oovPolicy: this.oovPolicy,
      unknownSymbol: this.unknownSymbol,
    };
  }
}

import { describe, expect, it } from 'vitest';

import { ConfigError, IndexError } from '../../src/errors/model-error.js';
import { CharVocabulary } from '../../src/inference/tokenizers/index.js';

describe('CharVocabulary', () => {
  it('sorts a corpus alphabet by code point', () => {
    const vocab = CharVocabulary.fromText('hello world');
    expect(vocab.vocabSize).toBe(8);
    expect(vocab.toJSON().alphabet).toEqual([' ', 'd', 'e', 'h', 'l', 'o', 'r', 'w']);
  });

  it('encodes and decodes', () => {
    const vocab = CharVocabulary.fromAlphabet('abc');
    expect(vocab.encode('cab')).toEqual([2, 0, 1]);
    expect(vocab.decode([1, 1, 0])).toBe('bba');
    expect(vocab.charToIndex('b')).toBe(1);
    expect(vocab.charToIndex('z')).toBeNull();
    expect(vocab.indexToChar(2)).toBe('c');
  });

  it('drops unknown characters by default', () => {
    expect(CharVocabulary.fromAlphabet('ab').encode('axb!')).toEqual([0, 1]);
  });

  it('rejects unknown characters under the reject policy', () => {
    const vocab = CharVocabulary.fromAlphabet('ab', { oovPolicy: 'reject' });
    expect(() => vocab.encode('abc')).toThrow('character "c" is not in the alphabet');
  });

  it('maps unknown characters to a reserved symbol under the unknown policy', () => {
    const vocab = CharVocabulary.fromAlphabet('ab', { oovPolicy: 'unknown' });
    expect(vocab.vocabSize).toBe(3);
    expect(vocab.encode('azb')).toEqual([0, 2, 1]);
    expect(vocab.decode([2])).toBe('�');
  });

  it('throws IndexError when decoding out-of-range indices', () => {
    const vocab = CharVocabulary.fromAlphabet('ab');
    expect(() => vocab.decode([2])).toThrow(IndexError);
    expect(() => vocab.decode([-1])).toThrow(IndexError);
  });

  it('rejects duplicate or empty alphabets', () => {
    expect(() => CharVocabulary.fromAlphabet('aba')).toThrow(ConfigError);
    expect(() => CharVocabulary.fromAlphabet('')).toThrow(ConfigError);
    expect(() => CharVocabulary.fromAlphabet(['ab'])).toThrow(ConfigError);
  });

  it('treats astral characters as single symbols', () => {
    const vocab = CharVocabulary.fromText('a😀');
    expect(vocab.vocabSize).toBe(2);
    expect(vocab.encode('😀a')).toEqual([1, 0]);
  });

  it('round-trips through JSON', () => {
    const vocab = CharVocabulary.fromAlphabet('xyz', { oovPolicy: 'unknown', unknownSymbol: '?' });
    const restored = CharVocabulary.fromJSON(vocab.toJSON());
    expect(restored.toJSON()).toEqual({ alphabet: ['x', 'y', 'z'], oovPolicy: 'unknown', unknownSymbol: '?' });
    expect(restored.encode('x!')).toEqual([0, 3]);
  });
});

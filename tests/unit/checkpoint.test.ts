import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { setLogLevel } from '../../src/debug/index.js';
import { CheckpointError } from '../../src/errors/model-error.js';
import { GPTModel } from '../../src/inference/model.js';
import { CharVocabulary } from '../../src/inference/tokenizers/index.js';
import {
  deserializeCheckpoint,
  loadCheckpoint,
  restoreModel,
  saveCheckpoint,
  serializeCheckpoint,
} from '../../src/loader/index.js';
import { createIndexTensor } from '../../src/tensor/tensor.js';
import { MICRO_CONFIG } from '../helpers/fixtures.js';

function documentFor(model: GPTModel, vocabulary: CharVocabulary | null = null): unknown {
  const doc = serializeCheckpoint({ config: model.config, vocabulary, parameters: model.stateDict() });
  return JSON.parse(JSON.stringify(doc));
}

describe('checkpoint serialization', () => {
  it('restores a model that computes identical logits', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 4 });
    const checkpoint = deserializeCheckpoint(documentFor(model, CharVocabulary.fromAlphabet('abcd')));
    const restored = restoreModel(checkpoint);

    const input = createIndexTensor([[0, 3, 2, 1]]);
    expect(Array.from(restored.forward(input).data)).toEqual(Array.from(model.forward(input).data));
    expect(checkpoint.vocabulary?.encode('dab')).toEqual([3, 0, 1]);
    expect(checkpoint.config).toEqual(model.config);
  });

  it('writes the document header', () => {
    const doc = serializeCheckpoint({
      config: new GPTModel(MICRO_CONFIG).config,
      vocabulary: null,
      parameters: new Map(),
    });
    expect(doc.format).toBe('glyphwright-checkpoint');
    expect(doc.version).toBe(1);
    expect(doc.vocabulary).toBeNull();
  });

  it('rejects an unknown format or version', () => {
    expect(() => deserializeCheckpoint({ format: 'other' })).toThrow('Unrecognized checkpoint format: other');
    expect(() => deserializeCheckpoint({ format: 'glyphwright-checkpoint', version: 2 })).toThrow(
      'Unsupported checkpoint version: 2'
    );
  });

  it('rejects tensors whose data does not fill their shape', () => {
    const model = new GPTModel(MICRO_CONFIG);
    const doc = serializeCheckpoint({ config: model.config, vocabulary: null, parameters: model.stateDict() });
    doc.tensors['ln_f.bias'] = { shape: [8], data: [0, 0] };
    expect(() => deserializeCheckpoint(doc)).toThrow(CheckpointError);
  });

  it('rejects a vocabulary that does not match vocabSize', () => {
    const model = new GPTModel(MICRO_CONFIG);
    expect(() => deserializeCheckpoint(documentFor(model, CharVocabulary.fromAlphabet('abc')))).toThrow(
      'Checkpoint vocabulary has 3 symbols but config.vocabSize is 4'
    );
  });

  it('rejects an invalid config', () => {
    const model = new GPTModel(MICRO_CONFIG);
    const doc = serializeCheckpoint({ config: model.config, vocabulary: null, parameters: new Map() });
    doc.config = { ...doc.config, numHeads: 3 };
    expect(() => deserializeCheckpoint(doc)).toThrow(CheckpointError);
  });
});

describe('checkpoint files', () => {
  let dir = '';

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await mkdtemp(join(tmpdir(), 'glyphwright-'));
  });

  afterEach(async () => {
    setLogLevel('info');
    await rm(dir, { recursive: true, force: true });
  });

  it('saves and loads a model with its vocabulary', async () => {
    const path = join(dir, 'model.json');
    const model = new GPTModel(MICRO_CONFIG, { seed: 8 });
    await saveCheckpoint(path, model, CharVocabulary.fromAlphabet('wxyz'));

    const loaded = await loadCheckpoint(path);
    const input = createIndexTensor([[1, 2]]);
    expect(Array.from(loaded.model.forward(input).data)).toEqual(Array.from(model.forward(input).data));
    expect(loaded.vocabulary?.decode([3, 0])).toBe('zw');
  });

  it('reports malformed JSON as a CheckpointError', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json', 'utf-8');
    await expect(loadCheckpoint(path)).rejects.toThrow(CheckpointError);
  });
});

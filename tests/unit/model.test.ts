import { describe, expect, it } from 'vitest';

import { ConfigError, IndexError, ShapeError } from '../../src/errors/model-error.js';
import { describeExport, EXPORT_SIGNATURE } from '../../src/inference/export-signature.js';
import { generate } from '../../src/inference/generator.js';
import { GPTModel } from '../../src/inference/model.js';
import { Dropout } from '../../src/inference/pipeline/dropout.js';
import { TransformerBlock } from '../../src/inference/pipeline/layer.js';
import { evalContext, trainContext } from '../../src/inference/pipeline/types.js';
import { createModelConfig } from '../../src/config/schema/index.js';
import { add } from '../../src/tensor/ops.js';
import { SeededRandom } from '../../src/tensor/random.js';
import { createIndexTensor, createTensor, filled } from '../../src/tensor/tensor.js';
import { MICRO_CONFIG, randomInput } from '../helpers/fixtures.js';

describe('GPTModel', () => {
  it('runs the end-to-end micro example', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 0 });
    const logits = model.forward(createIndexTensor([[0, 1, 2]]));
    expect(logits.shape).toEqual([1, 3, 4]);

    const out = generate(model, createIndexTensor([[0, 1, 2]]), 2, { seed: 0 });
    expect(out.shape).toEqual([1, 5]);
    expect(Array.from(out.data.subarray(0, 3))).toEqual([0, 1, 2]);
    for (const token of out.data) {
      expect(token).toBeGreaterThanOrEqual(0);
      expect(token).toBeLessThan(4);
    }
  });

  it('rejects modelDim not divisible by numHeads', () => {
    expect(() => new GPTModel({ ...MICRO_CONFIG, modelDim: 10, numHeads: 3 })).toThrow(
      'ModelConfig.modelDim (10) must be divisible by numHeads (3)'
    );
    expect(() => createModelConfig({ modelDim: 10, numHeads: 3 })).toThrow(ConfigError);
  });

  it('rejects dropout outside [0, 1)', () => {
    expect(() => new GPTModel({ ...MICRO_CONFIG, dropout: 1 })).toThrow(ConfigError);
  });

  it('is deterministic in eval mode', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 5 });
    const input = createIndexTensor([[3, 1, 0, 2]]);
    expect(Array.from(model.forward(input).data)).toEqual(Array.from(model.forward(input).data));
  });

  it('derives identical parameters from the same seed', () => {
    const a = new GPTModel(MICRO_CONFIG, { seed: 9 });
    const b = new GPTModel(MICRO_CONFIG, { seed: 9 });
    const c = new GPTModel(MICRO_CONFIG, { seed: 10 });
    const input = createIndexTensor([[0, 1, 2]]);
    expect(Array.from(a.forward(input).data)).toEqual(Array.from(b.forward(input).data));
    expect(Array.from(a.forward(input).data)).not.toEqual(Array.from(c.forward(input).data));
  });

  it('applies dropout only in train mode', () => {
    const model = new GPTModel({ ...MICRO_CONFIG, dropout: 0.5 }, { seed: 5 });
    const input = createIndexTensor([[0, 1, 2, 3]]);
    const evalOut = Array.from(model.forward(input, evalContext()).data);
    const trainOut = Array.from(model.forward(input, trainContext(1)).data);
    expect(trainOut).not.toEqual(evalOut);
  });

  it('is causal: later tokens do not change earlier logits', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 2 });
    const a = model.forward(createIndexTensor([[0, 1, 2, 3]]));
    const b = model.forward(createIndexTensor([[0, 1, 2, 0]]));
    const prefix = 3 * 4;
    expect(Array.from(b.data.subarray(0, prefix))).toEqual(Array.from(a.data.subarray(0, prefix)));
    expect(Array.from(b.data.subarray(prefix))).not.toEqual(Array.from(a.data.subarray(prefix)));
  });

  it('processes batch rows independently', () => {
    const model = new GPTModel(MICRO_CONFIG, { seed: 2 });
    const single = model.forward(createIndexTensor([[1, 2, 3]]));
    const batch = model.forward(createIndexTensor([[0, 0, 0], [1, 2, 3]]));
    expect(Array.from(batch.data.subarray(12))).toEqual(Array.from(single.data));
  });

  it('rejects sequences longer than the context length or empty', () => {
    const model = new GPTModel(MICRO_CONFIG);
    expect(() => model.forward(createIndexTensor([[0, 1, 2, 3, 0, 1, 2, 3, 0]]))).toThrow(ShapeError);
    expect(() => model.forward({ data: new Int32Array(0), shape: [1, 0] })).toThrow(ShapeError);
  });

  it('rejects token indices outside the vocabulary', () => {
    const model = new GPTModel(MICRO_CONFIG);
    expect(() => model.forward(createIndexTensor([[0, 4]]))).toThrow(IndexError);
    expect(() => model.forward(createIndexTensor([[-1]]))).toThrow(IndexError);
  });

  it('rejects indices that do not fit in int32 instead of wrapping them', () => {
    expect(() => createIndexTensor([[4294967297]])).toThrow(IndexError);
    expect(() => createIndexTensor([[0, -2147483649]])).toThrow(IndexError);
  });

  it('rejects index tensors whose data does not fill their shape', () => {
    const model = new GPTModel(MICRO_CONFIG);
    const short = { data: new Int32Array(1), shape: [1, 3] as const };
    expect(() => model.forward(short)).toThrow(ShapeError);
    expect(() => generate(model, short, 1, { seed: 1 })).toThrow(ShapeError);
  });

  it('counts parameters', () => {
    expect(new GPTModel(MICRO_CONFIG).parameterCount()).toBe(996);
  });
});

describe('TransformerBlock', () => {
  it('preserves the input shape', () => {
    const config = createModelConfig(MICRO_CONFIG);
    const block = new TransformerBlock(config, 0, new SeededRandom(1));
    const out = block.forward(randomInput([2, 5, 8], 4), evalContext());
    expect(out.shape).toEqual([2, 5, 8]);
  });

  it('rejects a mismatched feature width', () => {
    const config = createModelConfig(MICRO_CONFIG);
    const block = new TransformerBlock(config, 0, new SeededRandom(1));
    expect(() => block.forward(randomInput([1, 2, 4], 4), evalContext())).toThrow(ShapeError);
  });

  it('normalizes each sub-layer input and adds the raw residual', () => {
    const config = createModelConfig(MICRO_CONFIG);
    const block = new TransformerBlock(config, 0, new SeededRandom(1));
    block.ln1.weight.data.forEach((_, i, w) => { w[i] = 0.5 + 0.25 * i; });
    block.ln1.bias.data.fill(0.1);
    block.ln2.weight.data.forEach((_, i, w) => { w[i] = 2 - 0.2 * i; });
    block.ln2.bias.data.fill(-0.3);

    const x = randomInput([2, 5, 8], 9);
    const ctx = evalContext();
    const h = add(x, block.attn.forward(block.ln1.forward(x), ctx));
    const expected = add(h, block.ffn.forward(block.ln2.forward(h), ctx));

    expect(Array.from(block.forward(x, ctx).data)).toEqual(Array.from(expected.data));
  });
});

describe('Dropout', () => {
  it('returns the input itself in eval mode', () => {
    const x = filled([10], 1);
    expect(new Dropout(0.5).forward(x, evalContext())).toBe(x);
  });

  it('zeroes or rescales every element in train mode', () => {
    const out = new Dropout(0.5).forward(filled([1000], 1), trainContext(7));
    const zeros = Array.from(out.data).filter((v) => v === 0).length;
    expect(Array.from(out.data).every((v) => v === 0 || v === 2)).toBe(true);
    expect(zeros).toBeGreaterThan(0);
    expect(zeros).toBeLessThan(1000);
  });

  it('is the identity with p = 0', () => {
    const x = createTensor(Float32Array.from([1, 2]), [2]);
    expect(new Dropout(0).forward(x, trainContext(1))).toBe(x);
  });
});

describe('state dict', () => {
  it('uses the documented parameter names', () => {
    const names = [...new GPTModel(MICRO_CONFIG).stateDict().keys()];
    expect(names).toEqual([
      'token_embedding.weight',
      'position_embedding.weight',
      'blocks.0.ln1.weight',
      'blocks.0.ln1.bias',
      'blocks.0.attn.heads.0.query.weight',
      'blocks.0.attn.heads.0.key.weight',
      'blocks.0.attn.heads.0.value.weight',
      'blocks.0.attn.heads.1.query.weight',
      'blocks.0.attn.heads.1.key.weight',
      'blocks.0.attn.heads.1.value.weight',
      'blocks.0.attn.proj.weight',
      'blocks.0.attn.proj.bias',
      'blocks.0.ln2.weight',
      'blocks.0.ln2.bias',
      'blocks.0.ffn.fc1.weight',
      'blocks.0.ffn.fc1.bias',
      'blocks.0.ffn.fc2.weight',
      'blocks.0.ffn.fc2.bias',
      'ln_f.weight',
      'ln_f.bias',
      'lm_head.weight',
      'lm_head.bias',
    ]);
  });

  it('returns copies', () => {
    const model = new GPTModel(MICRO_CONFIG);
    const state = model.stateDict();
    state.get('ln_f.weight')?.data.fill(7);
    expect(model.stateDict().get('ln_f.weight')?.data[0]).toBe(1);
  });

  it('loads parameters from another model', () => {
    const source = new GPTModel(MICRO_CONFIG, { seed: 1 });
    const target = new GPTModel(MICRO_CONFIG, { seed: 2 });
    target.loadStateDict(source.stateDict());
    const input = createIndexTensor([[2, 3, 1]]);
    expect(Array.from(target.forward(input).data)).toEqual(Array.from(source.forward(input).data));
  });

  it('rejects missing, unexpected and mis-shaped entries', () => {
    const model = new GPTModel(MICRO_CONFIG);

    const missing = model.stateDict();
    missing.delete('lm_head.bias');
    expect(() => model.loadStateDict(missing)).toThrow('missing parameter "lm_head.bias"');

    const extra = model.stateDict();
    extra.set('extra.weight', filled([1], 0));
    expect(() => model.loadStateDict(extra)).toThrow(ConfigError);

    const misshaped = model.stateDict();
    misshaped.set('ln_f.weight', filled([4], 1));
    expect(() => model.loadStateDict(misshaped)).toThrow(ShapeError);
  });
});

describe('export signature', () => {
  it('names the context input and logits output', () => {
    const config = createModelConfig(MICRO_CONFIG);
    const description = describeExport(config);
    expect(EXPORT_SIGNATURE.input).toBe('context');
    expect(description.inputs).toEqual([{ name: 'context', dtype: 'int32', dims: ['batch', 'sequence'] }]);
    expect(description.outputs).toEqual([{ name: 'logits', dtype: 'float32', dims: ['batch', 'sequence', 4] }]);
    expect(description.dynamicAxes).toEqual(['batch', 'sequence']);
    expect(description.maxSequenceLength).toBe(8);
  });
});

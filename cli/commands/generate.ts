/**
 * generate - sample text from a checkpoint or a freshly seeded model.
 *
 * @module cli/commands/generate
 */

import type { RuntimeConfigSchema } from '../../src/config/index.js';
import { log } from '../../src/debug/index.js';
import { ConfigError } from '../../src/errors/model-error.js';
import { generate } from '../../src/inference/generator.js';
import { GPTModel } from '../../src/inference/model.js';
import type { CharVocabulary } from '../../src/inference/tokenizers/index.js';
import { loadCheckpoint } from '../../src/loader/index.js';
import { createIndexTensor, indexRows } from '../../src/tensor/tensor.js';
import { corpusVocabulary } from '../helpers/runtime.js';
import type { CLIOptions } from '../helpers/types.js';

async function resolveModel(
  opts: CLIOptions,
  runtime: RuntimeConfigSchema
): Promise<{ model: GPTModel; vocabulary: CharVocabulary }> {
  if (opts.checkpoint) {
    const loaded = await loadCheckpoint(opts.checkpoint);
    const vocabulary = loaded.vocabulary ?? (opts.corpus ? await corpusVocabulary(opts.corpus) : null);
    if (!vocabulary) {
      throw new ConfigError(`Checkpoint ${opts.checkpoint} has no vocabulary; pass --corpus`);
    }
    return { model: loaded.model, vocabulary };
  }

  if (!opts.corpus) {
    throw new ConfigError('generate requires --checkpoint or --corpus');
  }
  const vocabulary = await corpusVocabulary(opts.corpus);
  const model = new GPTModel(
    { ...runtime.model, vocabSize: vocabulary.vocabSize },
    { seed: runtime.training.seed }
  );
  log.info('Generate', `Untrained model with ${model.parameterCount()} parameters (seed ${runtime.training.seed})`);
  return { model, vocabulary };
}

/**
 * @returns prompt followed by the generated continuation
 */
export async function runGenerate(opts: CLIOptions, runtime: RuntimeConfigSchema): Promise<string> {
  const { model, vocabulary } = await resolveModel(opts, runtime);

  const prompt = vocabulary.encode(opts.prompt);
  // An empty prompt starts from token 0
  const context = createIndexTensor([prompt.length ? prompt : [0]]);
  const out = generate(model, context, runtime.generation.maxNewTokens);

  const [row] = indexRows(out);
  const generated = prompt.length ? row : row.slice(1);
  return vocabulary.decode(generated);
}

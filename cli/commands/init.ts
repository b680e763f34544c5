/**
 * init - write a randomly initialized checkpoint for a corpus alphabet.
 *
 * @module cli/commands/init
 */

import type { RuntimeConfigSchema } from '../../src/config/index.js';
import { GPTModel } from '../../src/inference/model.js';
import { saveCheckpoint } from '../../src/loader/index.js';
import { corpusVocabulary, requireOption } from '../helpers/runtime.js';
import type { CLIOptions } from '../helpers/types.js';

export async function runInit(opts: CLIOptions, runtime: RuntimeConfigSchema): Promise<string> {
  const corpus = requireOption(opts.corpus, '--corpus', 'init');
  const output = requireOption(opts.output, '--output', 'init');

  const vocabulary = await corpusVocabulary(corpus);
  const model = new GPTModel(
    { ...runtime.model, vocabSize: vocabulary.vocabSize },
    { seed: runtime.training.seed }
  );
  await saveCheckpoint(output, model, vocabulary);
  return output;
}

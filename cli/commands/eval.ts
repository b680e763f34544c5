/**
 * eval - train/validation loss of a checkpoint over a corpus.
 *
 * @module cli/commands/eval
 */

import type { RuntimeConfigSchema } from '../../src/config/index.js';
import { CharVocabulary } from '../../src/inference/tokenizers/index.js';
import { loadCheckpoint } from '../../src/loader/index.js';
import { SeededRandom } from '../../src/tensor/random.js';
import { estimateLoss, splitTokens } from '../../src/training/index.js';
import { readCorpus, requireOption } from '../helpers/runtime.js';
import type { CLIOptions } from '../helpers/types.js';

export interface EvalResult {
  train: number;
  validation: number;
}

export async function runEval(opts: CLIOptions, runtime: RuntimeConfigSchema): Promise<EvalResult> {
  const checkpoint = requireOption(opts.checkpoint, '--checkpoint', 'eval');
  const corpus = requireOption(opts.corpus, '--corpus', 'eval');

  const { model, vocabulary } = await loadCheckpoint(checkpoint);
  const text = await readCorpus(corpus);
  const tokens = (vocabulary ?? CharVocabulary.fromText(text)).encode(text);
  const { train, validation } = splitTokens(tokens, runtime.training.trainSplit);

  const random = new SeededRandom(runtime.training.seed);
  return {
    train: estimateLoss(model, train, { random }),
    validation: estimateLoss(model, validation, { random }),
  };
}

#!/usr/bin/env node
/**
 * glyphwright CLI - generate, init, eval
 *
 * Usage:
 *   npx tsx cli/index.ts generate --checkpoint model.json --prompt "To be" --tokens 200
 *   npx tsx cli/index.ts init --corpus input.txt --output model.json --preset tiny
 *   npx tsx cli/index.ts eval --checkpoint model.json --corpus input.txt
 *   npx tsx cli/index.ts --dump-config --config run.json
 */

import { dumpConfig, listPresets } from '../src/config/index.js';
import { log } from '../src/debug/index.js';
import { isModelError } from '../src/errors/model-error.js';
import { parseArgs } from './args/index.js';
import { runEval, runGenerate, runInit } from './commands/index.js';
import { applyLogging, resolveRuntime } from './helpers/runtime.js';

function printHelp(): void {
  console.log(`
glyphwright - character-level GPT

Commands:
  generate                  Sample text (default)
  init                      Write a randomly initialized checkpoint
  eval                      Train/validation loss of a checkpoint

Options:
  --checkpoint <path>       Checkpoint to load
  --corpus <path>           Text whose alphabet defines the vocabulary
  --output, -o <path>       Where init writes the checkpoint
  --prompt, -p <text>       Starting text for generate
  --tokens, -t <n>          Tokens to generate (default: generation.maxNewTokens)
  --seed <n>                Seed for initialization, sampling and batching
  --config, -c <path>       Runtime config file (JSON)
  --preset <id>             Model preset (${listPresets().join(', ')})
  --dump-config             Print resolved config and exit
  --list-presets            List model presets and exit
  --verbose, -v             Verbose logs
  --quiet, -q               No logs
  --trace [categories]      Trace categories, e.g. attn,sample or all,-ffn
  --help, -h                Show this help
`);
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    printHelp();
    return 0;
  }

  if (opts.listPresets) {
    for (const id of listPresets()) {
      console.log(id);
    }
    return 0;
  }

  const runtime = await resolveRuntime(opts);
  applyLogging(opts, runtime);

  if (opts.dumpConfig) {
    console.log(dumpConfig(runtime));
    return 0;
  }

  switch (opts.command) {
    case 'generate': {
      const text = await runGenerate(opts, runtime);
      process.stdout.write(text + '\n');
      break;
    }
    case 'init': {
      const path = await runInit(opts, runtime);
      log.always('CLI', `Wrote ${path}`);
      break;
    }
    case 'eval': {
      const result = await runEval(opts, runtime);
      log.always('CLI', `train loss ${result.train.toFixed(4)}, val loss ${result.validation.toFixed(4)}`);
      break;
    }
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    const prefix = isModelError(err) ? `[${err.code}] ` : '';
    console.error(`${prefix}${message}`);
    process.exitCode = 1;
  }
);

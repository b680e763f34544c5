/**
 * Runtime config resolution for CLI commands.
 *
 * Precedence (lowest first): defaults → config file → --preset → flags.
 *
 * @module cli/helpers/runtime
 */

import { readFile } from 'fs/promises';

import {
  type RuntimeConfigSchema,
  loadConfigFile,
  mergeDefined,
  resolveConfig,
  resolvePreset,
  setRuntimeConfig,
} from '../../src/config/index.js';
import { applyDebugConfig, log, setLogLevel, setTrace } from '../../src/debug/index.js';
import { ConfigError } from '../../src/errors/model-error.js';
import { CharVocabulary } from '../../src/inference/tokenizers/index.js';
import type { CLIOptions } from './types.js';

export async function resolveRuntime(opts: CLIOptions): Promise<RuntimeConfigSchema> {
  const base = opts.config
    ? (await loadConfigFile(opts.config)).runtime
    : resolveConfig({}).runtime;

  const model = opts.preset
    ? mergeDefined(base.model, resolvePreset(opts.preset).model)
    : base.model;

  const runtime: RuntimeConfigSchema = {
    ...base,
    model,
    generation: mergeDefined(base.generation, {
      maxNewTokens: opts.tokens ?? undefined,
      seed: opts.seed ?? undefined,
    }),
    training: mergeDefined(base.training, { seed: opts.seed ?? undefined }),
  };
  return setRuntimeConfig(runtime);
}

/**
 * Apply the debug section, then the --verbose / --quiet / --trace flags.
 */
export function applyLogging(opts: CLIOptions, runtime: RuntimeConfigSchema): void {
  applyDebugConfig(runtime.debug);
  if (opts.verbose) setLogLevel('verbose');
  if (opts.quiet) setLogLevel('silent');
  if (opts.trace) setTrace(opts.trace);
}

export function requireOption(value: string | null, flag: string, command: string): string {
  if (!value) {
    throw new ConfigError(`${command} requires ${flag}`);
  }
  return value;
}

export async function readCorpus(path: string): Promise<string> {
  const text = await readFile(path, 'utf-8');
  log.verbose('CLI', `Read ${text.length} characters from ${path}`);
  return text;
}

export async function corpusVocabulary(path: string): Promise<CharVocabulary> {
  return CharVocabulary.fromText(await readCorpus(path));
}

/**
 * CLI argument parsing.
 *
 * @module cli/args
 */

import { ConfigError } from '../../src/errors/model-error.js';
import { MAX_SEED, MIN_SEED, isSeed } from '../../src/tensor/random.js';
import type { CLIOptions, Command } from '../helpers/types.js';

const COMMANDS: readonly Command[] = ['generate', 'init', 'eval'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function takeValue(tokens: string[], flag: string): string {
  const value = tokens.shift();
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

function takeInt(tokens: string[], flag: string): number {
  const raw = takeValue(tokens, flag);
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

function takeSeed(tokens: string[], flag: string): number {
  const value = takeInt(tokens, flag);
  if (!isSeed(value)) {
    throw new ConfigError(`${flag} must be in [${MIN_SEED}, ${MAX_SEED}], got ${value}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CLIOptions {
  const opts: CLIOptions = {
    command: 'generate',
    config: null,
    preset: null,
    checkpoint: null,
    corpus: null,
    output: null,
    prompt: '',
    tokens: null,
    seed: null,
    verbose: false,
    quiet: false,
    trace: null,
    dumpConfig: false,
    listPresets: false,
    help: false,
  };

  const tokens = [...argv];
  let positionalIndex = 0;

  while (tokens.length) {
    const arg = tokens.shift();
    if (arg === undefined) break;
    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--config':
      case '-c':
        opts.config = takeValue(tokens, arg);
        break;
      case '--preset':
        opts.preset = takeValue(tokens, arg);
        break;
      case '--dump-config':
        opts.dumpConfig = true;
        break;
      case '--list-presets':
        opts.listPresets = true;
        break;
      case '--checkpoint':
        opts.checkpoint = takeValue(tokens, arg);
        break;
      case '--corpus':
        opts.corpus = takeValue(tokens, arg);
        break;
      case '--output':
      case '-o':
        opts.output = takeValue(tokens, arg);
        break;
      case '--prompt':
      case '-p':
        opts.prompt = tokens.shift() ?? '';
        break;
      case '--tokens':
      case '-t':
        opts.tokens = takeInt(tokens, arg);
        break;
      case '--seed':
        opts.seed = takeSeed(tokens, arg);
        break;
      case '--verbose':
      case '-v':
        opts.verbose = true;
        break;
      case '--quiet':
      case '-q':
        opts.quiet = true;
        break;
      case '--trace':
        // Bare --trace means all categories
        opts.trace = tokens.length && !tokens[0].startsWith('-') ? takeValue(tokens, arg) : 'all';
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (positionalIndex === 0 && isCommand(arg)) {
          opts.command = arg;
        } else {
          throw new ConfigError(`Unexpected argument: ${arg}`);
        }
        positionalIndex++;
        break;
    }
  }

  return opts;
}

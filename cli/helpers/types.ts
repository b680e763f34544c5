/**
 * CLI Types
 *
 * @module cli/helpers/types
 */

export type Command = 'generate' | 'init' | 'eval';

export interface CLIOptions {
  command: Command;
  /** Runtime config file (JSON) */
  config: string | null;
  /** Model preset applied beneath the config file's model section */
  preset: string | null;
  checkpoint: string | null;
  corpus: string | null;
  output: string | null;
  prompt: string;
  tokens: number | null;
  seed: number | null;
  verbose: boolean;
  quiet: boolean;
  /** Trace categories, e.g. 'attn,sample' or 'all,-ffn' */
  trace: string | null;
  dumpConfig: boolean;
  listPresets: boolean;
  help: boolean;
}

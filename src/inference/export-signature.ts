/**
 * Export signature consumed by an external interchange exporter.
 *
 * The model is exported with the token index matrix as its only input and
 * the per-position logits as its only output; batch and sequence are the
 * only dynamic axes.
 *
 * @module inference/export-signature
 */

import type { ModelConfigSchema } from '../config/schema/index.js';

export type ExportDType = 'int32' | 'float32';
export type ExportDim = 'batch' | 'sequence' | number;

export interface ExportTensorSpec {
  name: string;
  dtype: ExportDType;
  dims: readonly ExportDim[];
}

export interface ExportDescription {
  inputs: readonly ExportTensorSpec[];
  outputs: readonly ExportTensorSpec[];
  /** Axis names that may vary between calls */
  dynamicAxes: readonly string[];
  /** Upper bound on the sequence axis */
  maxSequenceLength: number;
  /** Flat parameter names, in state dict order */
  parameterNames: readonly string[];
}

export const EXPORT_SIGNATURE = {
  input: 'context',
  output: 'logits',
  dynamicAxes: ['batch', 'sequence'],
} as const;

/**
 * Describe the exported graph for a model configuration.
 */
export function describeExport(
  config: Readonly<ModelConfigSchema>,
  parameterNames: readonly string[] = []
): ExportDescription {
  return {
    inputs: [
      { name: EXPORT_SIGNATURE.input, dtype: 'int32', dims: ['batch', 'sequence'] },
    ],
    outputs: [
      { name: EXPORT_SIGNATURE.output, dtype: 'float32', dims: ['batch', 'sequence', config.vocabSize] },
    ],
    dynamicAxes: [...EXPORT_SIGNATURE.dynamicAxes],
    maxSequenceLength: config.contextLength,
    parameterNames: [...parameterNames],
  };
}

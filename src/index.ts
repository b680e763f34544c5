/**
 * glyphwright - character-level GPT on the CPU
 *
 * @module glyphwright
 */

// Configuration
export * from './config/index.js';

// Errors
export {
  ERROR_CODES,
  type ErrorCode,
  ModelError,
  ConfigError,
  ShapeError,
  IndexError,
  NumericalError,
  CheckpointError,
  isModelError,
} from './errors/model-error.js';

// Logging and tracing
export * from './debug/index.js';

// Tensors
export {
  type Tensor,
  type IndexTensor,
  createTensor,
  createIndexTensor,
  indexRows,
  zeros,
  cloneTensor,
  shapeSize,
  formatShape,
  assertIndexTensor,
} from './tensor/tensor.js';
export { SeededRandom } from './tensor/random.js';
export { softmax, lastPosition } from './tensor/ops.js';

// Model components
export {
  type ExecutionMode,
  type ForwardContext,
  type Transform,
  type ParameterOwner,
  evalContext,
  trainContext,
} from './inference/pipeline/types.js';
export { LinearProjection } from './inference/pipeline/linear.js';
export { LayerNorm } from './inference/pipeline/norm.js';
export { Dropout } from './inference/pipeline/dropout.js';
export {
  SingleHeadAttention,
  MultiHeadSelfAttention,
  createCausalMask,
} from './inference/pipeline/attention/index.js';
export { FeedForward } from './inference/pipeline/ffn/index.js';
export { TransformerBlock } from './inference/pipeline/layer.js';
export { Embeddings } from './inference/pipeline/embed.js';
export { LogitsHead } from './inference/pipeline/logits.js';
export {
  GPTModel,
  type GPTModelOptions,
  type LanguageModel,
  type StateDict,
} from './inference/model.js';

// Generation
export {
  probabilities,
  sampleCategorical,
  sampleFromLogits,
  logitStats,
  type LogitStats,
} from './inference/sampling.js';
export { TokenHistory } from './inference/token-history.js';
export { generate, streamTokens, type GenerateOptions } from './inference/generator.js';
export {
  EXPORT_SIGNATURE,
  describeExport,
  type ExportDescription,
  type ExportTensorSpec,
} from './inference/export-signature.js';

// Vocabulary
export * from './inference/tokenizers/index.js';

// Training collaborators
export * from './training/index.js';

// Checkpoints
export * from './loader/index.js';

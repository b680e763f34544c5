/**
 * Loader - Re-exports
 *
 * @module loader
 */

export {
  CHECKPOINT_FORMAT,
  CHECKPOINT_VERSION,
  type SerializedTensor,
  type CheckpointDocument,
  type Checkpoint,
  type LoadedCheckpoint,
  serializeCheckpoint,
  deserializeCheckpoint,
  restoreModel,
  saveCheckpoint,
  loadCheckpoint,
} from './checkpoint.js';

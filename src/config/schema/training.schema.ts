/**
 * Training Config Schema
 *
 * Settings for batch windowing and loss estimation consumed by an external
 * training driver.
 *
 * @module config/schema/training
 */

export interface TrainingConfigSchema {
  /** Windows drawn per batch (default: 32) */
  batchSize: number;

  /** Batches averaged by estimateLoss (default: 10) */
  evalBatches: number;

  /** Fraction of the token stream used for training; the rest is validation (default: 0.9) */
  trainSplit: number;

  /** Seed for window sampling and dropout masks (default: 1337) */
  seed: number;
}

/** Default training configuration */
export const DEFAULT_TRAINING_CONFIG: TrainingConfigSchema = {
  batchSize: 32,
  evalBatches: 10,
  trainSplit: 0.9,
  seed: 1337,
};

/**
 * Model Errors
 *
 * Error taxonomy for the transformer core. Every error is a local,
 * synchronous contract violation surfaced to the immediate caller; the core
 * never retries or recovers from one.
 *
 * @module errors/model-error
 */

export const ERROR_CODES = {
  CONFIG_INVALID: 'GLYPH_CONFIG_INVALID',
  SHAPE_MISMATCH: 'GLYPH_SHAPE_MISMATCH',
  INDEX_OUT_OF_RANGE: 'GLYPH_INDEX_OUT_OF_RANGE',
  NUMERICAL_INSTABILITY: 'GLYPH_NUMERICAL_INSTABILITY',
  CHECKPOINT_INVALID: 'GLYPH_CHECKPOINT_INVALID',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for every error thrown by the core.
 */
export class ModelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ModelError';
    this.code = code;
  }
}

/** Invalid model or runtime configuration (e.g. modelDim not divisible by numHeads). */
export class ConfigError extends ModelError {
  constructor(message: string) {
    super(ERROR_CODES.CONFIG_INVALID, message);
    this.name = 'ConfigError';
  }
}

/** A tensor whose rank or dimensions violate an operation's contract. */
export class ShapeError extends ModelError {
  constructor(message: string) {
    super(ERROR_CODES.SHAPE_MISMATCH, message);
    this.name = 'ShapeError';
  }
}

/** A token or position index outside its valid range. */
export class IndexError extends ModelError {
  constructor(message: string) {
    super(ERROR_CODES.INDEX_OUT_OF_RANGE, message);
    this.name = 'IndexError';
  }
}

/** NaN/Inf reaching a point where a finite distribution is required. */
export class NumericalError extends ModelError {
  constructor(message: string) {
    super(ERROR_CODES.NUMERICAL_INSTABILITY, message);
    this.name = 'NumericalError';
  }
}

/** A checkpoint document that is malformed or does not match the model. */
export class CheckpointError extends ModelError {
  constructor(message: string) {
    super(ERROR_CODES.CHECKPOINT_INVALID, message);
    this.name = 'CheckpointError';
  }
}

export function isModelError(err: unknown, code?: ErrorCode): err is ModelError {
  if (!(err instanceof ModelError)) return false;
  return code === undefined || err.code === code;
}

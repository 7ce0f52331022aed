/**
 * Throwable carrier for a tagged error once it leaves outcome-threaded code
 */

import type { ErrorType } from './types.mjs';

/**
 * Thrown where a `Failure` outcome reaches plain code (a host function or an
 * explicit unwrap). The message is the tagged error's message, unchanged.
 */
export class BlockError extends Error {
  constructor(
    public readonly error: ErrorType,
    public readonly level = 0
  ) {
    super(error.message);
    this.name = 'BlockError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get tag(): ErrorType['tag'] {
    return this.error.tag;
  }
}

export const isBlockError = (value: unknown): value is BlockError =>
  value instanceof BlockError;

/**
 * @blockwise/functional-errors
 *
 * Tagged error taxonomy shared by every blockwise operation, plus the
 * throwable carrier used at the boundary to plain code.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  ErrorType,
  InvalidArgumentError,
  EmptyInputError,
  CallableFailureError,
  ErrorContext
} from './types.mjs';

// ============================================================================
// Type Guards & Error Constructors
// ============================================================================

export {
  isInvalidArgumentError,
  isEmptyInputError,
  isCallableFailureError,
  isErrorType,
  createInvalidArgumentError,
  createEmptyInputError,
  createCallableFailureError
} from './types.mjs';

// ============================================================================
// Handlers
// ============================================================================

export { withContext, toLoggableFormat, messageOf } from './handlers.mjs';

export { BlockError, isBlockError } from './block-error.mjs';

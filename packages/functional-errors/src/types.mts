/**
 * @module types
 * @description Error taxonomy for sequence operations and block invocation,
 * modelled as tagged unions for type-safe handling.
 * @since 2025-01-13
 *
 * @remarks
 * Errors are plain immutable values. They travel inside `Failure` outcomes
 * and are only turned into a thrown `BlockError` at the boundary to plain
 * code. Each variant carries a discriminant `tag` for narrowing.
 *
 * @example
 * ```typescript
 * import { ErrorType, isEmptyInputError } from '@blockwise/functional-errors';
 *
 * function describe(error: ErrorType): string {
 *   if (isEmptyInputError(error)) {
 *     return `nothing to ${error.operation}`;
 *   }
 *   return error.message;
 * }
 * ```
 *
 * @packageDocumentation
 */

/**
 * Context information that can be attached to any error
 * @since 2025-01-13
 */
export type ErrorContext = Record<string, unknown>;

/**
 * Every error an operation or an invoked callable can fail with.
 *
 * @category Core Types
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * function categorize(error: ErrorType): string {
 *   switch (error.tag) {
 *     case 'invalid-argument':
 *       return `bad ${error.argument}`;
 *     case 'empty-input':
 *       return `${error.operation} needs input`;
 *     case 'callable-failure':
 *       return `${error.origin} failed`;
 *   }
 * }
 * ```
 */
export type ErrorType =
  | InvalidArgumentError
  | EmptyInputError
  | CallableFailureError;

/**
 * Malformed size, count, index or keyword argument.
 *
 * @category Error Types
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * const error: InvalidArgumentError = {
 *   tag: 'invalid-argument',
 *   message: 'slice size must be equal to or greater than 1',
 *   argument: 'size'
 * };
 * ```
 */
export interface InvalidArgumentError {
  /** Discriminator for type narrowing */
  readonly tag: 'invalid-argument';
  /** Human-readable error message */
  readonly message: string;
  /** Name of the offending parameter */
  readonly argument: string;
  /** Optional context information */
  readonly context?: ErrorContext;
}

/**
 * An aggregate (reduce, max, min) was asked for on an empty sequence
 * with no seed or default.
 *
 * @category Error Types
 * @since 2025-01-13
 */
export interface EmptyInputError {
  /** Discriminator for type narrowing */
  readonly tag: 'empty-input';
  /** Human-readable error message */
  readonly message: string;
  /** Operation that received the empty sequence */
  readonly operation: string;
  /** Optional context information */
  readonly context?: ErrorContext;
}

/**
 * The invoked callable itself failed. The message is the one the callable
 * raised, copied verbatim.
 *
 * @category Error Types
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * const error: CallableFailureError = {
 *   tag: 'callable-failure',
 *   message: 'boom',
 *   origin: 'block(item)',
 *   cause: new Error('boom')
 * };
 * ```
 */
export interface CallableFailureError {
  /** Discriminator for type narrowing */
  readonly tag: 'callable-failure';
  /** Message raised by the callable */
  readonly message: string;
  /** Description of the callable the failure originated in */
  readonly origin: string;
  /** The thrown value, when the failure came from a throw */
  readonly cause?: unknown;
  /** Optional context information */
  readonly context?: ErrorContext;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Creates a type guard that checks if an error has a specific tag
 *
 * @internal
 */
function createTagTypeGuard<T extends ErrorType>(tag: T['tag']) {
  return (error: unknown): error is T =>
    typeof error === 'object' &&
    error !== null &&
    'tag' in error &&
    error.tag === tag;
}

/**
 * Type guard for InvalidArgumentError
 *
 * @category Type Guards
 * @since 2025-01-13
 */
export const isInvalidArgumentError =
  createTagTypeGuard<InvalidArgumentError>('invalid-argument');

/**
 * Type guard for EmptyInputError
 *
 * @category Type Guards
 * @since 2025-01-13
 */
export const isEmptyInputError =
  createTagTypeGuard<EmptyInputError>('empty-input');

/**
 * Type guard for CallableFailureError
 *
 * @category Type Guards
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * if (isCallableFailureError(error)) {
 *   console.error(`${error.origin}: ${error.message}`);
 * }
 * ```
 */
export const isCallableFailureError =
  createTagTypeGuard<CallableFailureError>('callable-failure');

/**
 * Type guard for any member of the taxonomy
 *
 * @category Type Guards
 * @since 2025-01-13
 */
export const isErrorType = (error: unknown): error is ErrorType =>
  isInvalidArgumentError(error) ||
  isEmptyInputError(error) ||
  isCallableFailureError(error);

// ============================================================================
// Error Constructors
// ============================================================================

/**
 * Creates an invalid-argument error
 *
 * @category Error Constructors
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * createInvalidArgumentError('chunk size must be equal to or greater than 1', 'size');
 * ```
 */
export const createInvalidArgumentError = (
  message: string,
  argument: string,
  context?: ErrorContext
): InvalidArgumentError => ({
  tag: 'invalid-argument',
  message,
  argument,
  context
});

/**
 * Creates an empty-input error
 *
 * @category Error Constructors
 * @since 2025-01-13
 */
export const createEmptyInputError = (
  message: string,
  operation: string,
  context?: ErrorContext
): EmptyInputError => ({
  tag: 'empty-input',
  message,
  operation,
  context
});

/**
 * Creates a callable-failure error
 *
 * @category Error Constructors
 * @since 2025-01-13
 */
export const createCallableFailureError = (
  message: string,
  origin: string,
  cause?: unknown,
  context?: ErrorContext
): CallableFailureError => ({
  tag: 'callable-failure',
  message,
  origin,
  cause,
  context
});

/**
 * Error handlers and transformers
 * Pure functions over the error taxonomy
 */

import type { ErrorContext, ErrorType } from './types.mjs';

/**
 * Add context to an error
 *
 * @example
 * ```typescript
 * const error = createEmptyInputError('Reduce of empty list with no initial value', 'reduce');
 * const withInput = withContext({ length: 0 })(error);
 * ```
 */
export const withContext = <E extends ErrorType,>(
  context: ErrorContext
) => (
  error: E
): E => ({
  ...error,
  context: {
    ...error.context,
    ...context
  }
});

/**
 * Transform error into a loggable format
 * Pure function - consumer decides how to use the result
 *
 * @example
 * ```typescript
 * logger.debug('block failed', toLoggableFormat(error, { includeContext: true }));
 * ```
 */
export const toLoggableFormat = <E extends ErrorType>(
  error: E,
  options?: { includeContext?: boolean; includeTimestamp?: boolean }
): Record<string, unknown> => ({
  tag: error.tag,
  message: error.message,
  ...detailOf(error),
  ...(options?.includeContext && error.context ? { context: error.context } : {}),
  ...(options?.includeTimestamp ? { timestamp: new Date().toISOString() } : {})
});

const detailOf = (error: ErrorType): Record<string, string> => {
  switch (error.tag) {
    case 'invalid-argument':
      return { argument: error.argument };
    case 'empty-input':
      return { operation: error.operation };
    case 'callable-failure':
      return { origin: error.origin };
  }
};

/**
 * Extract the message of any thrown value, verbatim.
 *
 * Errors give their `message`, strings are used as-is, anything else is
 * stringified.
 *
 * @example
 * ```typescript
 * messageOf(new Error('boom')); // => 'boom'
 * messageOf('boom');            // => 'boom'
 * messageOf(42);                // => '42'
 * ```
 */
export const messageOf = (thrown: unknown): string => {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  if (typeof thrown === 'string') {
    return thrown;
  }
  if (
    typeof thrown === 'object' &&
    thrown !== null &&
    'message' in thrown &&
    typeof thrown.message === 'string'
  ) {
    return thrown.message;
  }
  return String(thrown);
};

import { describe, it, expect } from 'vitest';
import { withContext, toLoggableFormat, messageOf } from './handlers.mjs';
import { BlockError, isBlockError } from './block-error.mjs';
import {
  createCallableFailureError,
  createEmptyInputError,
  createInvalidArgumentError
} from './types.mjs';

describe('withContext', () => {
  it('should merge new context over existing context', () => {
    const error = createInvalidArgumentError('bad', 'size', { size: 0 });
    const result = withContext({ operation: 'chunk' })(error);

    expect(result.context).toEqual({ size: 0, operation: 'chunk' });
    expect(error.context).toEqual({ size: 0 });
  });
});

describe('toLoggableFormat', () => {
  it('should include the variant-specific field', () => {
    expect(toLoggableFormat(createEmptyInputError('empty', 'min'))).toEqual({
      tag: 'empty-input',
      message: 'empty',
      operation: 'min'
    });
    expect(toLoggableFormat(createCallableFailureError('boom', 'square'))).toEqual({
      tag: 'callable-failure',
      message: 'boom',
      origin: 'square'
    });
  });

  it('should include context only when asked', () => {
    const error = createInvalidArgumentError('bad', 'size', { size: -1 });

    expect(toLoggableFormat(error)).not.toHaveProperty('context');
    expect(toLoggableFormat(error, { includeContext: true }).context).toEqual({ size: -1 });
  });
});

describe('messageOf', () => {
  it('should copy messages verbatim', () => {
    expect(messageOf(new TypeError('not a number'))).toBe('not a number');
    expect(messageOf('plain string')).toBe('plain string');
    expect(messageOf({ message: 'shaped like an error' })).toBe('shaped like an error');
    expect(messageOf(42)).toBe('42');
  });
});

describe('BlockError', () => {
  it('should carry the tagged error and its level', () => {
    const tagged = createCallableFailureError('boom', 'block(item)');
    const error = new BlockError(tagged, 2);

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('boom');
    expect(error.name).toBe('BlockError');
    expect(error.tag).toBe('callable-failure');
    expect(error.level).toBe(2);
    expect(isBlockError(error)).toBe(true);
    expect(isBlockError(new Error('boom'))).toBe(false);
  });
});

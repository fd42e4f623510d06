import { describe, expect, it } from 'vitest';
import { SnakeError, isSnakeError } from './snake-error.js';
import type { SnakeErrorCode } from './snake-error.js';

describe('SnakeError', () => {
  it('extends Error', () => {
    const error = new SnakeError('INVALID_CONFIG', 'width must be positive');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SnakeError);
  });

  it('has correct name, code, and message', () => {
    const error = new SnakeError('DIMENSION_MISMATCH', 'width must be even');
    expect(error.name).toBe('SnakeError');
    expect(error.code).toBe('DIMENSION_MISMATCH');
    expect(error.message).toBe('width must be even');
  });

  it('supports optional context', () => {
    const error = new SnakeError('INVALID_CONFIG', 'bad height', { height: 0 });
    expect(error.context).toEqual({ height: 0 });
  });

  it('context is undefined when not provided', () => {
    const error = new SnakeError('INVARIANT_VIOLATION', 'bad sub-position');
    expect(error.context).toBeUndefined();
  });

  it('supports all error codes', () => {
    const codes: SnakeErrorCode[] = ['INVALID_CONFIG', 'DIMENSION_MISMATCH', 'INVARIANT_VIOLATION'];
    for (const code of codes) {
      const error = new SnakeError(code, 'test');
      expect(error.code).toBe(code);
    }
  });
});

describe('isSnakeError', () => {
  it('narrows by class', () => {
    expect(isSnakeError(new SnakeError('INVALID_CONFIG', 'bad width'))).toBe(true);
    expect(isSnakeError(new Error('plain'))).toBe(false);
    expect(isSnakeError('INVALID_CONFIG')).toBe(false);
  });

  it('narrows by code when one is given', () => {
    const error = new SnakeError('DIMENSION_MISMATCH', 'width must be even', { width: 3 });
    expect(isSnakeError(error, 'DIMENSION_MISMATCH')).toBe(true);
    expect(isSnakeError(error, 'INVALID_CONFIG')).toBe(false);
  });
});

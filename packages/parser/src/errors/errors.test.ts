import { describe, it, expect } from 'vitest';
import {
  CallflowError,
  CallflowErrorCode,
  LexError,
  TruncatedLiteralError,
  UnreadableInputError,
  ConfigError,
  isCallflowError,
  getErrorMessage,
  getErrorStack,
} from './index.js';

describe('CallflowError', () => {
  it('should create error with defaults', () => {
    const error = new CallflowError('Test error', CallflowErrorCode.INVALID_INPUT);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe(CallflowErrorCode.INVALID_INPUT);
    expect(error.context).toBeUndefined();
    expect(error.severity).toBe('medium');
    expect(error.recoverable).toBe(true);
    expect(error.name).toBe('CallflowError');
  });

  it('should serialize to JSON', () => {
    const error = new UnreadableInputError('missing.go');

    expect(error.toJSON()).toEqual({
      error: 'Cannot open missing.go',
      code: 'UNREADABLE_INPUT',
      severity: 'medium',
      recoverable: true,
      context: { path: 'missing.go' },
    });
  });
});

describe('scanner errors', () => {
  it('should describe the offending character', () => {
    const error = new LexError('€', 12, 'main.go');

    expect(error.message).toBe('Unexpected character "€" on line 12 in main.go');
    expect(error.code).toBe(CallflowErrorCode.LEX_ERROR);
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({ character: '€', line: 12, source: 'main.go' });
    expect(error).toBeInstanceOf(CallflowError);
  });

  it('should carry the partial text of a truncated literal', () => {
    const error = new TruncatedLiteralError('comment', ' unfinished', 4, 'util.go');

    expect(error.message).toBe('Unterminated comment starting on line 4 in util.go');
    expect(error.partial).toBe(' unfinished');
    expect(error.severity).toBe('low');
  });
});

describe('helpers', () => {
  it('should recognize callflow errors', () => {
    expect(isCallflowError(new ConfigError('bad'))).toBe(true);
    expect(isCallflowError(new Error('plain'))).toBe(false);
  });

  it('should extract messages and stacks from unknown values', () => {
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorStack(42)).toBeUndefined();
  });
});

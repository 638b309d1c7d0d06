/**
 * Tests for typed exception classes
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  InvalidArgumentError,
  NarrowPackError,
  PackerFinishedError,
  SourceExhaustedError,
  UnsupportedWidthError,
  ValueOutOfRangeError,
  hasErrorCode,
  isErrorCode,
  isNarrowPackError,
} from '../errors.js';

describe('NarrowPackError base class', () => {
  it('should be an instance of Error', () => {
    const error = new NarrowPackError('Test error', 'TEST_ERROR');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NarrowPackError');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_ERROR');
  });

  it('should default to the UNKNOWN code', () => {
    expect(new NarrowPackError('Test error').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should capture stack trace', () => {
    const error = new NarrowPackError('Test error');
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('NarrowPackError');
  });

  it('should carry optional details and suggestion', () => {
    const error = new NarrowPackError('Bad chunk', 'TEST_ERROR', { chunk: 4 }, 'Re-read the chunk');
    expect(error.details).toEqual({ chunk: 4 });
    expect(error.suggestion).toBe('Re-read the chunk');
  });

  it('should format a log context', () => {
    const error = new NarrowPackError('Bad chunk', 'TEST_ERROR', { chunk: 4 });
    expect(error.toLogContext()).toEqual({
      name: 'NarrowPackError',
      message: 'Bad chunk',
      code: 'TEST_ERROR',
      details: { chunk: 4 },
      timestamp: error.timestamp,
    });
  });

  it('should format a detailed string', () => {
    const error = new NarrowPackError('Bad chunk', 'TEST_ERROR', { chunk: 4, name: 'levels' }, 'Re-read the chunk');
    expect(error.toDetailedString()).toBe(
      '[TEST_ERROR] Bad chunk\n  Details: chunk=4, name="levels"\n  Suggestion: Re-read the chunk'
    );
  });
});

describe('UnsupportedWidthError', () => {
  it('should extend NarrowPackError with the width', () => {
    const error = UnsupportedWidthError.forWidth(12);
    expect(error).toBeInstanceOf(NarrowPackError);
    expect(error.name).toBe('UnsupportedWidthError');
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_WIDTH);
    expect(error.width).toBe(12);
    expect(error.message).toBe('Unsupported bit width: 12 (supported: 0-8)');
    expect(error.details).toEqual({ width: 12, min: 0, max: 8 });
  });

  it('should accept a custom message', () => {
    expect(new UnsupportedWidthError(9, 'too wide').message).toBe('too wide');
  });
});

describe('codec errors', () => {
  it('should use distinct codes', () => {
    expect(new ValueOutOfRangeError(8, 3).code).toBe(ErrorCode.VALUE_OUT_OF_RANGE);
    expect(new PackerFinishedError(3).code).toBe(ErrorCode.PACKER_FINISHED);
    expect(new SourceExhaustedError(3, 0, 0).code).toBe(ErrorCode.SOURCE_EXHAUSTED);
  });

  it('should set their names', () => {
    expect(new ValueOutOfRangeError(8, 3).name).toBe('ValueOutOfRangeError');
    expect(new PackerFinishedError(3).name).toBe('PackerFinishedError');
    expect(new SourceExhaustedError(3, 0, 0).name).toBe('SourceExhaustedError');
  });

  it('should describe an invalid argument with its value', () => {
    const error = new InvalidArgumentError('value count', -2, 'an integer >= 0');
    expect(error).toBeInstanceOf(NarrowPackError);
    expect(error.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(error.name).toBe('InvalidArgumentError');
    expect(error.message).toBe('Invalid value count: -2 (expected an integer >= 0)');
    expect(error.details).toEqual({ argument: 'value count', value: -2 });
  });

  it('should describe write after finish', () => {
    expect(new PackerFinishedError(5).message).toBe('Cannot write to a 5-bit packer after finish()');
  });
});

describe('ErrorCode', () => {
  it('should hold only codes that some error carries', () => {
    expect(Object.values(ErrorCode)).toEqual([
      'UNKNOWN',
      'INVALID_ARGUMENT',
      'UNSUPPORTED_WIDTH',
      'VALUE_OUT_OF_RANGE',
      'PACKER_FINISHED',
      'SOURCE_EXHAUSTED',
    ]);
    expect(isErrorCode('INTERNAL_ERROR')).toBe(false);
  });
});

describe('error utilities', () => {
  it('isErrorCode should recognise known codes only', () => {
    expect(isErrorCode('SOURCE_EXHAUSTED')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });

  it('isNarrowPackError should separate library errors', () => {
    expect(isNarrowPackError(new PackerFinishedError(1))).toBe(true);
    expect(isNarrowPackError(new Error('plain'))).toBe(false);
    expect(isNarrowPackError('text')).toBe(false);
  });

  it('hasErrorCode should match on code', () => {
    const error = new SourceExhaustedError(2, 4, 1);
    expect(hasErrorCode(error, ErrorCode.SOURCE_EXHAUSTED)).toBe(true);
    expect(hasErrorCode(error, ErrorCode.PACKER_FINISHED)).toBe(false);
    expect(hasErrorCode(new Error('plain'), ErrorCode.SOURCE_EXHAUSTED)).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';
import { SnapshotError, errorMessage, errorType, httpStatusFor, isSnapshotError } from './errors';

describe('SnapshotError', () => {
  it('serializes its code, message and details', () => {
    const error = new SnapshotError('PARSE_ERROR', 'Invalid VTT format', { filename: 'call.vtt' });

    expect(error.toJSON()).toEqual({
      error: 'PARSE_ERROR',
      message: 'Invalid VTT format',
      details: { filename: 'call.vtt' },
    });
    expect(error.name).toBe('SnapshotError');
    expect(isSnapshotError(error)).toBe(true);
    expect(isSnapshotError(new Error('plain'))).toBe(false);
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('socket hang up');
    expect(new SnapshotError('API_ERROR', 'LLM sampling failed', {}, { cause }).cause).toBe(cause);
  });
});

describe('httpStatusFor', () => {
  it('maps each code to a status', () => {
    expect(httpStatusFor('INVALID_INPUT')).toBe(400);
    expect(httpStatusFor('RESOURCE_NOT_FOUND')).toBe(404);
    expect(httpStatusFor('PARSE_ERROR')).toBe(422);
    expect(httpStatusFor('RATE_LIMIT')).toBe(429);
    expect(httpStatusFor('INTERNAL_ERROR')).toBe(500);
    expect(httpStatusFor('API_ERROR')).toBe(502);
    expect(httpStatusFor('TIMEOUT')).toBe(504);
  });
});

describe('error helpers', () => {
  it('describe thrown values', () => {
    expect(errorMessage(new TypeError('bad'))).toBe('bad');
    expect(errorMessage('oops')).toBe('Unknown error');
    expect(errorType(new TypeError('bad'))).toBe('TypeError');
    expect(errorType(42)).toBe('number');
  });
});

import { describe, it, expect } from 'vitest';
import { getErrorMessage, toError } from '../src/utils/error-utils.js';

describe('Error utilities', () => {
  it('should read messages from errors and other thrown values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain string')).toBe('plain string');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('should wrap thrown values into errors', () => {
    const original = new TypeError('bad type');

    expect(toError(original)).toBe(original);
    expect(toError('text')).toBeInstanceOf(Error);
    expect(toError('text').message).toBe('text');
  });
});

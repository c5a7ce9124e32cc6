/**
 * Tests for the error message helpers
 *
 * Thrown values reach the capture layer from browsers, sinks and test
 * bodies, so anything may arrive here.
 */

import { describe, it, expect } from 'vitest';
import { extractErrorMessage, toError } from '../../../src/lib/error-message.js';

describe('extractErrorMessage', () => {
  describe('Error instances', () => {
    it('should use the message', () => {
      expect(extractErrorMessage(new TypeError('Cannot read properties of null'))).toBe(
        'Cannot read properties of null'
      );
    });

    it('should fall back to the name when the message is empty', () => {
      const error = new Error('');
      error.name = 'TimeoutError';
      expect(extractErrorMessage(error)).toBe('TimeoutError');
    });

    it('should return "Unknown Error" when message and name are empty', () => {
      const error = new Error('');
      error.name = '';
      expect(extractErrorMessage(error)).toBe('Unknown Error');
    });
  });

  describe('strings', () => {
    it('should return strings as is', () => {
      expect(extractErrorMessage('net::ERR_CONNECTION_REFUSED')).toBe(
        'net::ERR_CONNECTION_REFUSED'
      );
    });
  });

  describe('error-like objects', () => {
    it('should prefer .message, then .error, then .reason', () => {
      expect(extractErrorMessage({ message: 'm', error: 'e', reason: 'r' })).toBe('m');
      expect(extractErrorMessage({ error: 'e', reason: 'r' })).toBe('e');
      expect(extractErrorMessage({ reason: 'r' })).toBe('r');
    });

    it('should stringify other objects', () => {
      expect(extractErrorMessage({ code: 'ECONNRESET', errno: -104 })).toBe(
        '{"code":"ECONNRESET","errno":-104}'
      );
    });

    it('should ignore a non-string message', () => {
      expect(extractErrorMessage({ message: 500 })).toBe('{"message":500}');
    });

    it('should describe an empty object', () => {
      expect(extractErrorMessage({})).toBe('Unknown error object: empty');
    });

    it('should survive circular references', () => {
      const error: Record<string, unknown> = { kind: 'loop' };
      error.self = error;

      expect(extractErrorMessage(error)).toBe('Non-serializable error: [object Object]');
    });
  });

  describe('primitives', () => {
    it('should convert with String()', () => {
      expect(extractErrorMessage(null)).toBe('null');
      expect(extractErrorMessage(undefined)).toBe('undefined');
      expect(extractErrorMessage(404)).toBe('404');
      expect(extractErrorMessage(false)).toBe('false');
    });
  });
});

describe('toError', () => {
  it('should return Error instances unchanged', () => {
    const error = new RangeError('out of range');

    expect(toError(error)).toBe(error);
  });

  it('should wrap other values with their extracted message', () => {
    const wrapped = toError({ reason: 'socket hang up' });

    expect(wrapped).toBeInstanceOf(Error);
    expect(wrapped.message).toBe('socket hang up');
  });
});

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ErrorClassifier, ErrorType, describeTransportError } from './error-classifier.js';

describe('ErrorClassifier', () => {
  const classifier = new ErrorClassifier();

  describe('classify', () => {
    it('should classify authentication errors', () => {
      expect(classifier.classify(new Error('Authentication failed'))).toBe(ErrorType.AUTHENTICATION);
      expect(classifier.classify(new Error('Invalid credentials'))).toBe(ErrorType.AUTHENTICATION);
      expect(classifier.classify(new Error('[AUTHENTICATIONFAILED] Invalid login'))).toBe(ErrorType.AUTHENTICATION);
    });

    it('should classify rate limit errors', () => {
      expect(classifier.classify(new Error('429 Too many requests'))).toBe(ErrorType.RATE_LIMIT);
      expect(classifier.classify(new Error('[OVERQUOTA] Quota exceeded'))).toBe(ErrorType.RATE_LIMIT);
    });

    it('should classify timeouts before network errors', () => {
      expect(classifier.classify(new Error('Connection timeout'))).toBe(ErrorType.TIMEOUT);
      expect(classifier.classify(new Error('connect ETIMEDOUT 10.0.0.1:993'))).toBe(ErrorType.TIMEOUT);
    });

    it('should classify network errors', () => {
      expect(classifier.classify(new Error('connect ECONNREFUSED 127.0.0.1:993'))).toBe(ErrorType.NETWORK);
      expect(classifier.classify(new Error('getaddrinfo ENOTFOUND imap.example.com'))).toBe(ErrorType.NETWORK);
      expect(classifier.classify(new Error('Socket closed unexpectedly'))).toBe(ErrorType.NETWORK);
    });

    it('should classify server errors', () => {
      expect(classifier.classify(new Error('503 Service Unavailable'))).toBe(ErrorType.SERVER_ERROR);
    });

    it('should fall back to unknown', () => {
      expect(classifier.classify(new Error('Something odd'))).toBe(ErrorType.UNKNOWN);
    });

    it('should classify every error into a defined type', () => {
      const types = Object.values(ErrorType);
      fc.assert(
        fc.property(fc.string(), (message) => {
          expect(types).toContain(classifier.classify(new Error(message)));
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('describe', () => {
    it('should prefix the detail with a readable message', () => {
      expect(classifier.describe(new Error('connect ECONNREFUSED 127.0.0.1:993')))
        .toBe('Could not reach the server (connect ECONNREFUSED 127.0.0.1:993)');
    });

    it('should omit an empty detail', () => {
      expect(classifier.describe(new Error(''))).toBe('Unexpected error');
    });

    it('should accept values that are not errors', () => {
      expect(classifier.describe('boom')).toBe('Unexpected error (boom)');
    });
  });

  it('should give a user message for every type', () => {
    expect(classifier.getUserMessage(ErrorType.AUTHENTICATION)).toBe('Authentication failed, check the username and password');
    expect(classifier.getUserMessage(ErrorType.TIMEOUT)).toBe('The server did not respond in time');
  });

  it('should share a default classifier', () => {
    expect(describeTransportError(new Error('Connection timeout'))).toBe('The server did not respond in time (Connection timeout)');
  });
});

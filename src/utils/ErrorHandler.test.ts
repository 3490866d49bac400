/**
 * Tests for the error taxonomy and retrying error handler
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  ErrorHandler,
  ApplicationError,
  ErrorCategory,
  ErrorSeverity,
  contractViolation,
  isApplicationError
} from './ErrorHandler';

const context = {
  operation: 'fetchEntity',
  component: 'TestComponent',
  timestamp: new Date('2026-01-01T00:00:00.000Z')
};

describe('ErrorHandler', () => {
  let sleep: Mock<[number], Promise<void>>;
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    sleep = vi.fn<[number], Promise<void>>().mockResolvedValue(undefined);
    errorHandler = new ErrorHandler({ sleep, random: () => 0 });
  });

  describe('ApplicationError', () => {
    it('should treat network errors as retryable', () => {
      const error = new ApplicationError('socket closed', 'NETWORK_ERROR', ErrorCategory.NETWORK, ErrorSeverity.MEDIUM, context);

      expect(error.isRetryable).toBe(true);
      expect(error.userMessage).toBe('Holdings source could not be reached. Please try again.');
    });

    it('should not retry contract violations', () => {
      const error = contractViolation('Holdings must be a mapping', 'aggregate', 'HoldingsAggregator');

      expect(isApplicationError(error)).toBe(true);
      expect(error.code).toBe('CONTRACT_VIOLATION');
      expect(error.category).toBe(ErrorCategory.CONTRACT);
      expect(error.isRetryable).toBe(false);
      expect(error.toJSON()).toMatchObject({
        code: 'CONTRACT_VIOLATION',
        category: 'contract',
        severity: 'high',
        message: 'Holdings must be a mapping'
      });
    });
  });

  describe('handleError', () => {
    it('should return the result of a successful operation', async () => {
      const operation = vi.fn().mockResolvedValue('ok');

      const result = await errorHandler.handleError(operation, context);

      expect(result).toEqual({ success: true, result: 'ok', attempts: 1 });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry retryable errors with exponential backoff', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new Error('network timeout'))
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockResolvedValue('ok');

      const result = await errorHandler.handleError(operation, context, { maxAttempts: 3, backoffMs: 100 });

      expect(result).toEqual({ success: true, result: 'ok', attempts: 3 });
      expect(sleep.mock.calls).toEqual([[100], [200]]);
    });

    it('should fail fast for non-retryable errors', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('invalid payload'));

      const result = await errorHandler.handleError(operation, context, { maxAttempts: 5, backoffMs: 100 });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
      if (!result.success) {
        expect(result.error.category).toBe(ErrorCategory.VALIDATION);
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should stop after the configured number of attempts', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('service unavailable'));

      const result = await errorHandler.handleError(operation, context, { maxAttempts: 2, backoffMs: 10 });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(2);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should cap backoff at the policy maximum', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('network down'));

      await errorHandler.handleError(operation, context, { maxAttempts: 4, backoffMs: 1000, maxBackoffMs: 1500 });

      expect(sleep.mock.calls).toEqual([[1000], [1500], [1500]]);
    });

    it('should count errors by category and code', async () => {
      await errorHandler.handleError(() => Promise.reject(new Error('boom')), context, { maxAttempts: 1, backoffMs: 1 });
      await errorHandler.handleError(() => Promise.reject(new Error('boom')), context, { maxAttempts: 1, backoffMs: 1 });

      expect(errorHandler.getErrorMetrics().get('system:UNKNOWN_ERROR')?.count).toBe(2);
    });

    it('should pass application errors through unchanged', () => {
      const original = contractViolation('bad', 'layout', 'OverlapLayoutEngine');

      expect(errorHandler.wrapError(original, context)).toBe(original);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AppError, InsufficientDataError, mapError, sanitizeForLogging } from '../errors/index.js';

function namedError(name: string, message: string, status?: number): Error {
  const error = new Error(message);
  error.name = name;
  return Object.assign(error, { status });
}

describe('mapError', () => {
  describe('AppError passthrough', () => {
    it('should return AppError as-is', () => {
      const original = AppError.validation('test error');
      expect(mapError(original)).toBe(original);
    });

    it('should keep subclasses intact', () => {
      const original = new InsufficientDataError(3, 1);
      const result = mapError(original);

      expect(result).toBe(original);
      expect(result).toBeInstanceOf(InsufficientDataError);
      expect(result.httpStatus).toBe(422);
      expect(result.safeMessage).toBe('At least 3 products are required for comparison, found 1.');
    });
  });

  describe('Zod validation errors', () => {
    it('should map ZodError to VALIDATION with issue paths', () => {
      const result = z.object({ limit: z.number().max(100) }).safeParse({ limit: 500 });
      expect(result.success).toBe(false);
      if (result.success) return;

      const appError = mapError(result.error);
      expect(appError.category).toBe('VALIDATION');
      expect(appError.code).toBe('VALIDATION_REQUEST_INVALID');
      expect(appError.httpStatus).toBe(400);
      expect(appError.safeMessage.startsWith('limit: ')).toBe(true);
      expect(appError.details?.issues).toHaveLength(1);
    });
  });

  describe('OpenAI errors', () => {
    it('should map RateLimitError to LLM_RATE_LIMIT', () => {
      const result = mapError(namedError('RateLimitError', 'Rate limit exceeded', 429));
      expect(result.code).toBe('LLM_RATE_LIMIT');
      expect(result.httpStatus).toBe(429);
    });

    it('should map APIConnectionTimeoutError to LLM_TIMEOUT', () => {
      const result = mapError(namedError('APIConnectionTimeoutError', 'Request timed out.'));
      expect(result.code).toBe('LLM_TIMEOUT');
      expect(result.httpStatus).toBe(504);
      expect(result.safeMessage).toBe('Model took too long to respond. Please retry.');
    });

    it('should map APIConnectionError by its message', () => {
      expect(mapError(namedError('APIConnectionError', 'Request timed out after 60000ms')).code).toBe('LLM_TIMEOUT');
      expect(mapError(namedError('APIConnectionError', 'Connection error.')).code).toBe('LLM_API_ERROR');
    });

    it('should map authentication failures to LLM_AUTH_FAILED', () => {
      expect(mapError(namedError('AuthenticationError', 'Incorrect API key', 401)).code).toBe('LLM_AUTH_FAILED');
      expect(mapError(namedError('PermissionDeniedError', 'Denied', 403)).code).toBe('LLM_AUTH_FAILED');
    });

    it('should map BadRequestError to LLM_BAD_REQUEST', () => {
      const result = mapError(namedError('BadRequestError', 'max_tokens is too large', 400));
      expect(result.code).toBe('LLM_BAD_REQUEST');
      expect(result.details).toEqual({ originalMessage: 'max_tokens is too large' });
    });

    it('should map server errors to LLM_API_ERROR', () => {
      const result = mapError(namedError('InternalServerError', 'Bad gateway', 502));
      expect(result.code).toBe('LLM_API_ERROR');
      expect(result.httpStatus).toBe(503);
    });
  });

  describe('other errors', () => {
    it('should map abort errors to TIMEOUT_REQUEST', () => {
      const result = mapError(namedError('AbortError', 'This operation was aborted'));
      expect(result.category).toBe('TIMEOUT');
      expect(result.code).toBe('TIMEOUT_REQUEST');
    });

    it('should map generic errors to INTERNAL_ERROR', () => {
      const result = mapError(new Error('Something broke'));
      expect(result.code).toBe('INTERNAL_ERROR');
      expect(result.httpStatus).toBe(500);
      expect(result.details).toEqual({ originalMessage: 'Something broke' });
    });

    it('should map non-Error values', () => {
      expect(mapError('plain string').details).toEqual({ originalMessage: 'plain string' });
      expect(mapError(42).details).toEqual({ originalMessage: 'Unknown error' });
    });
  });
});

describe('AppError.toPayload', () => {
  it('should include details and the request id when present', () => {
    const payload = AppError.notFound('Product not found: 9', { productId: '9' }).toPayload('req-1');

    expect(payload).toEqual({
      error: {
        category: 'NOT_FOUND',
        code: 'NOT_FOUND',
        message: 'Product not found: 9',
        details: { productId: '9' },
      },
      requestId: 'req-1',
    });
  });

  it('should omit empty details', () => {
    expect(AppError.comparisonUnavailable().toPayload()).toEqual({
      error: {
        category: 'COMPARISON',
        code: 'COMPARISON_UNAVAILABLE',
        message: 'Failed to generate product comparison.',
      },
    });
  });
});

describe('sanitizeForLogging', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(
      sanitizeForLogging({
        apiKey: 'test-secret',
        nested: { authorization: 'Bearer test-secret', model: 'gpt-4o-mini' },
        count: 3,
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      nested: { authorization: '[REDACTED]', model: 'gpt-4o-mini' },
      count: 3,
    });
  });

  it('should truncate long strings', () => {
    const result = sanitizeForLogging({ body: 'x'.repeat(600) });
    expect(result?.body).toBe(`${'x'.repeat(500)}...[truncated]`);
  });
});

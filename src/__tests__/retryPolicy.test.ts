import { describe, it, expect } from 'vitest';
import { AppError } from '../errors/index.js';
import { isGenerationRetryable } from '../generation/retryPolicy.js';

function openAiError(name: string, status?: number): Error {
  const error = new Error(`${name} raised`);
  error.name = name;
  return Object.assign(error, { status });
}

describe('isGenerationRetryable', () => {
  it('should not retry credential or request errors', () => {
    expect(isGenerationRetryable(AppError.llmAuth())).toBe(false);
    expect(isGenerationRetryable(AppError.llmBadRequest('bad'))).toBe(false);
    expect(isGenerationRetryable(openAiError('AuthenticationError', 401))).toBe(false);
    expect(isGenerationRetryable(openAiError('BadRequestError', 400))).toBe(false);
  });

  it('should not retry when no generator is configured', () => {
    expect(isGenerationRetryable(AppError.llmUnavailable())).toBe(false);
  });

  it('should retry rate limits, server errors and timeouts', () => {
    expect(isGenerationRetryable(openAiError('RateLimitError', 429))).toBe(true);
    expect(isGenerationRetryable(openAiError('InternalServerError', 500))).toBe(true);
    expect(isGenerationRetryable(openAiError('APIConnectionTimeoutError'))).toBe(true);
  });

  it('should retry unrecognised errors', () => {
    expect(isGenerationRetryable(new Error('socket hang up'))).toBe(true);
    expect(isGenerationRetryable('string failure')).toBe(true);
  });
});

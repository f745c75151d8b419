import { mapError } from '../errors/mapError.js';

/**
 * Determines if a failed generation call is worth another attempt.
 *
 * Retryable errors:
 * - Rate limit errors (429)
 * - Server errors (5xx), connection errors
 * - Timeout errors
 * - Anything not recognised as an LLM error
 *
 * Non-retryable errors:
 * - Authentication / permission errors
 * - Bad request errors
 * - Missing generator configuration
 *
 * @param error - The error to check
 * @returns true if the error should trigger a retry
 */
export function isGenerationRetryable(error: unknown): boolean {
  const appError = mapError(error);

  switch (appError.code) {
    case 'LLM_AUTH_FAILED':
    case 'LLM_BAD_REQUEST':
    case 'LLM_UNAVAILABLE':
    case 'VALIDATION_REQUEST_INVALID':
      return false;
    default:
      return true;
  }
}

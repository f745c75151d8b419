import { z } from 'zod';
import { AppError } from './AppError.js';

type SdkError = Error & {
  status?: number;
  code?: string;
  type?: string;
};

/** Class names thrown by the openai SDK */
const SDK_ERROR_NAMES = new Set([
  'APIError',
  'BadRequestError',
  'AuthenticationError',
  'PermissionDeniedError',
  'NotFoundError',
  'ConflictError',
  'UnprocessableEntityError',
  'RateLimitError',
  'InternalServerError',
  'APIConnectionError',
  'APIUserAbortError',
  'APIConnectionTimeoutError',
]);

const ABORT_NAMES = new Set(['AbortError', 'TimeoutError']);
const ABORT_CODES = new Set(['ABORT_ERR', 'ERR_ABORTED']);

function isSdkError(error: unknown): error is SdkError {
  return error instanceof Error && SDK_ERROR_NAMES.has(error.name);
}

function isAbortError(error: Error): boolean {
  if (ABORT_NAMES.has(error.name)) return true;
  return 'code' in error && typeof error.code === 'string' && ABORT_CODES.has(error.code);
}

/**
 * Normalize anything thrown into an AppError. AppErrors pass through untouched;
 * zod failures become VALIDATION, openai SDK failures land in the LLM category,
 * aborts become TIMEOUT and everything else is INTERNAL.
 */
export function mapError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof z.ZodError) {
    const issues = error.issues.map(({ path, message, code }) => ({ path, message, code }));
    const summary = issues.map(({ path, message }) => `${path.join('.')}: ${message}`).join(', ');
    return AppError.validation(summary, { issues }, error);
  }

  if (!(error instanceof Error)) {
    return AppError.internal(typeof error === 'string' ? error : 'Unknown error');
  }

  if (isSdkError(error)) {
    const { status, code, type } = error;

    if (status === 429 || error.name === 'RateLimitError') {
      return AppError.llmRateLimit(error);
    }

    // APIConnectionTimeoutError is the SDK's timeout class
    if (error.name === 'APIConnectionTimeoutError') {
      return AppError.llmTimeout(undefined, error);
    }

    if (error.name === 'APIConnectionError') {
      return /time(d)? ?out/i.test(error.message)
        ? AppError.llmTimeout(undefined, error)
        : AppError.llm('Connection to OpenAI failed', { code }, error);
    }

    if (error.name === 'AuthenticationError' || error.name === 'PermissionDeniedError' || status === 401 || status === 403) {
      return AppError.llmAuth(error);
    }

    if (status === 400 || error.name === 'BadRequestError') {
      return AppError.llmBadRequest(error.message, error);
    }

    if (error.name === 'InternalServerError' || (status !== undefined && status >= 500)) {
      return AppError.llm('OpenAI service error', { status, code }, error);
    }

    return AppError.llm(error.message, { status, code, type }, error);
  }

  if (isAbortError(error)) {
    return AppError.timeout('request', 0, error);
  }

  return AppError.internal(error.message, error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const REDACTED_KEY_PARTS = ['token', 'secret', 'password', 'apikey', 'api_key', 'authorization'];
const MAX_LOGGED_STRING = 500;

/**
 * Copy of `details` fit for a log line: credential-looking keys are redacted
 * and long strings truncated, recursing into nested objects.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  return Object.fromEntries(
    Object.entries(details).map(([key, value]): [string, unknown] => {
      const lowered = key.toLowerCase();
      if (REDACTED_KEY_PARTS.some((part) => lowered.includes(part))) return [key, '[REDACTED]'];
      if (typeof value === 'string' && value.length > MAX_LOGGED_STRING) {
        return [key, `${value.slice(0, MAX_LOGGED_STRING)}...[truncated]`];
      }
      if (isRecord(value)) return [key, sanitizeForLogging(value)];
      return [key, value];
    })
  );
}

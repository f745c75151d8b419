/** Coarse grouping used for logging and for deciding which details reach clients */
export type ErrorCategory =
  | 'LLM'
  | 'CATALOG'
  | 'COMPARISON'
  | 'STORE'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'INTERNAL';

/** Stable machine-readable codes, prefixed with their category */
export type ErrorCode =
  | 'LLM_API_ERROR'
  | 'LLM_RATE_LIMIT'
  | 'LLM_AUTH_FAILED'
  | 'LLM_BAD_REQUEST'
  | 'LLM_TIMEOUT'
  | 'LLM_UNAVAILABLE'
  | 'CATALOG_INVALID'
  | 'COMPARISON_INSUFFICIENT_DATA'
  | 'COMPARISON_CRITERIA_FAILED'
  | 'COMPARISON_UNAVAILABLE'
  | 'STORE_WRITE_FAILED'
  | 'VALIDATION_REQUEST_INVALID'
  | 'NOT_FOUND'
  | 'TIMEOUT_REQUEST'
  | 'INTERNAL_ERROR';

export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  /** Message that is safe to show to API clients and CLI users */
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/** JSON body of an error response */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

type Extras = Pick<AppErrorOptions, 'details' | 'cause'>;

/**
 * Base class for every error the service raises on purpose. The `Error.message`
 * is always the safe message; internal detail travels in `details` and `cause`.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor({ category, code, httpStatus, safeMessage, details, cause }: AppErrorOptions) {
    super(safeMessage);
    this.name = 'AppError';
    this.category = category;
    this.code = code;
    this.httpStatus = httpStatus;
    this.safeMessage = safeMessage;
    this.details = details;
    this.cause = cause;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static create(
    category: ErrorCategory,
    code: ErrorCode,
    httpStatus: number,
    safeMessage: string,
    extras: Extras = {}
  ): AppError {
    return new AppError({ category, code, httpStatus, safeMessage, ...extras });
  }

  toPayload(requestId?: string): ErrorPayload {
    const { category, code, safeMessage: message, details } = this;
    return {
      error: {
        category,
        code,
        message,
        ...(details && Object.keys(details).length > 0 ? { details } : {}),
      },
      ...(requestId ? { requestId } : {}),
    };
  }

  /** Client input failed validation; the message is shown as-is */
  static validation(message: string, details?: Record<string, unknown>, cause?: Error): AppError {
    return AppError.create('VALIDATION', 'VALIDATION_REQUEST_INVALID', 400, message, { details, cause });
  }

  static notFound(message: string, details?: Record<string, unknown>): AppError {
    return AppError.create('NOT_FOUND', 'NOT_FOUND', 404, message, { details });
  }

  static llm(message: string, details?: Record<string, unknown>, cause?: Error): AppError {
    return AppError.create(
      'LLM',
      'LLM_API_ERROR',
      503,
      'The text generation service is temporarily unavailable. Please try again later.',
      { details: { originalMessage: message, ...details }, cause }
    );
  }

  static llmRateLimit(cause?: Error): AppError {
    return AppError.create(
      'LLM',
      'LLM_RATE_LIMIT',
      429,
      'The text generation service is currently busy. Please try again in a moment.',
      { cause }
    );
  }

  static llmAuth(cause?: Error): AppError {
    return AppError.create('LLM', 'LLM_AUTH_FAILED', 502, 'The text generation service rejected the configured credentials.', {
      cause,
    });
  }

  static llmBadRequest(message: string, cause?: Error): AppError {
    return AppError.create('LLM', 'LLM_BAD_REQUEST', 502, 'The text generation service rejected the request.', {
      details: { originalMessage: message },
      cause,
    });
  }

  /** The SDK gave up waiting on the model (APIConnectionTimeoutError) */
  static llmTimeout(details?: { elapsedMs?: number; timeoutMs?: number }, cause?: Error): AppError {
    return AppError.create('LLM', 'LLM_TIMEOUT', 504, 'Model took too long to respond. Please retry.', { details, cause });
  }

  /** OPENAI_API_KEY is missing and mock mode was not requested */
  static llmUnavailable(): AppError {
    return AppError.create(
      'LLM',
      'LLM_UNAVAILABLE',
      503,
      'No text generation backend is configured. Set OPENAI_API_KEY or use mock mode.'
    );
  }

  static catalogInvalid(filePath: string, message: string, cause?: Error): AppError {
    return AppError.create('CATALOG', 'CATALOG_INVALID', 500, 'The product catalog could not be read.', {
      details: { filePath, originalMessage: message },
      cause,
    });
  }

  static comparisonUnavailable(): AppError {
    return AppError.create('COMPARISON', 'COMPARISON_UNAVAILABLE', 500, 'Failed to generate product comparison.');
  }

  static storeWrite(target: string, message: string, cause?: Error): AppError {
    return AppError.create('STORE', 'STORE_WRITE_FAILED', 500, 'Failed to persist the comparison document.', {
      details: { target, originalMessage: message },
      cause,
    });
  }

  static timeout(operation: string, timeoutMs: number, cause?: Error): AppError {
    return AppError.create('TIMEOUT', 'TIMEOUT_REQUEST', 504, 'The request took too long to complete. Please try again.', {
      details: { operation, timeoutMs },
      cause,
    });
  }

  /** Catch-all; the original message stays in `details` for logs only */
  static internal(message: string, cause?: Error): AppError {
    return AppError.create('INTERNAL', 'INTERNAL_ERROR', 500, 'An unexpected error occurred. Please try again later.', {
      details: { originalMessage: message },
      cause,
    });
  }
}

/**
 * The catalog holds fewer products than a comparison needs.
 */
export class InsufficientDataError extends AppError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super({
      category: 'COMPARISON',
      code: 'COMPARISON_INSUFFICIENT_DATA',
      httpStatus: 422,
      safeMessage: `At least ${required} products are required for comparison, found ${available}.`,
      details: { required, available },
    });
    this.name = 'InsufficientDataError';
    this.required = required;
    this.available = available;
  }
}

/**
 * The model did not return the expected number of comparison criteria.
 */
export class CriteriaGenerationError extends AppError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number, cause?: Error) {
    super({
      category: 'COMPARISON',
      code: 'COMPARISON_CRITERIA_FAILED',
      httpStatus: 502,
      safeMessage: `Expected ${expected} comparison criteria, received ${received}.`,
      details: { expected, received },
      cause,
    });
    this.name = 'CriteriaGenerationError';
    this.expected = expected;
    this.received = received;
  }
}

export {
  AppError,
  InsufficientDataError,
  CriteriaGenerationError,
  type ErrorCategory,
  type ErrorCode,
  type ErrorPayload,
  type AppErrorOptions,
} from './AppError.js';
export { mapError, sanitizeForLogging } from './mapError.js';

/**
 * Uniform error responses for all routes.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { mapError, sanitizeForLogging } from '../errors/index.js';
import type { ErrorCategory, ErrorPayload } from '../errors/index.js';

/**
 * Categories whose details describe the request itself and are safe to return.
 * Other details (file paths, upstream messages) are only returned in debug mode.
 */
const PUBLIC_DETAIL_CATEGORIES: ReadonlySet<ErrorCategory> = new Set(['VALIDATION', 'NOT_FOUND', 'COMPARISON']);

export interface ErrorReplyOptions {
  /** Include internal error details in the response and log */
  debug?: boolean;
}

/**
 * Map any thrown value to an AppError, log it and send its payload.
 */
export function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  options: ErrorReplyOptions = {}
): FastifyReply {
  const appError = mapError(error);

  const logPayload: Record<string, unknown> = {
    category: appError.category,
    code: appError.code,
    requestId: request.id,
    httpStatus: appError.httpStatus,
  };

  if (options.debug && appError.details) {
    logPayload.details = sanitizeForLogging(appError.details);
  }

  if (appError.httpStatus < 500) {
    request.log.warn(logPayload, 'Request error');
  } else {
    request.log.error(logPayload, 'Request error');
  }

  const payload: ErrorPayload = appError.toPayload(request.id);
  if (!options.debug && !PUBLIC_DETAIL_CATEGORIES.has(appError.category)) {
    delete payload.error.details;
  }

  return reply.status(appError.httpStatus).send(payload);
}

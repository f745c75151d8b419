import type { Logger } from 'pino';
import { comparisonDocumentSchema, type ComparisonDocument } from '../compare/compareTypes.js';

/**
 * Validate a persisted document. Anything that does not match the schema is
 * reported and treated as missing so it gets regenerated.
 */
export function parseComparisonDocument(raw: unknown, source: string, logger: Logger): ComparisonDocument | null {
  const result = comparisonDocumentSchema.safeParse(raw);
  if (!result.success) {
    logger.warn({
      source,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    }, 'Persisted comparison is invalid, ignoring it');
    return null;
  }
  return result.data;
}

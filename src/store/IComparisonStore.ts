import type { ComparisonDocument } from '../compare/compareTypes.js';

/**
 * Persistence for the single comparison document.
 *
 * Reads and writes are whole-document. Concurrent writers are not coordinated:
 * callers must ensure only one generation is in flight per deployment.
 */
export interface IComparisonStore {
  /**
   * Returns the persisted document, or null when absent, unreadable or invalid.
   */
  load(): Promise<ComparisonDocument | null>;

  /**
   * Replaces the persisted document. Either the full document is written or nothing is.
   */
  save(document: ComparisonDocument): Promise<void>;

  close(): Promise<void>;
}

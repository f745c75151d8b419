import pino, { type Logger } from 'pino';
import type { ComparisonDocument } from '../compare/compareTypes.js';
import { readJsonFile, writeJsonFileAtomic } from '../catalog/jsonFile.js';
import { AppError } from '../errors/AppError.js';
import type { IComparisonStore } from './IComparisonStore.js';
import { parseComparisonDocument } from './parseComparisonDocument.js';

export interface FileComparisonStoreOptions {
  filePath: string;
  logger?: Logger;
}

/**
 * Stores the comparison as a pretty-printed JSON file, replaced via temp file + rename.
 */
export class FileComparisonStore implements IComparisonStore {
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: FileComparisonStoreOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? pino({ name: 'FileComparisonStore' });
  }

  async load(): Promise<ComparisonDocument | null> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      this.logger.warn({
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      }, 'Persisted comparison is unreadable, ignoring it');
      return null;
    }

    if (raw === null) {
      return null;
    }
    return parseComparisonDocument(raw, this.filePath, this.logger);
  }

  async save(document: ComparisonDocument): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, document);
    } catch (error) {
      throw AppError.storeWrite(
        this.filePath,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }
    this.logger.info({ filePath: this.filePath }, 'Comparison saved');
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }
}

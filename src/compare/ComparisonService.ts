import pino, { type Logger } from 'pino';
import type { CatalogReader } from '../catalog/CatalogReader.js';
import { mapError } from '../errors/mapError.js';
import { selectGenerator, type TextGenerators } from '../generation/createTextGenerators.js';
import { NO_BACKOFF, type RetryBackoff } from '../generation/retry.js';
import type { IComparisonStore } from '../store/IComparisonStore.js';
import type { ComparisonDocument } from './compareTypes.js';
import { runComparisonPipeline } from './comparisonPipeline.js';

export interface ComparisonServiceOptions {
  reader: CatalogReader;
  store: IComparisonStore;
  generators: TextGenerators;
  /** Retries per generation call after the first attempt (default 2) */
  retries?: number;
  backoff?: RetryBackoff;
  logger?: Logger;
  now?: () => Date;
}

export interface GetOrGenerateOptions {
  /** Regenerate even when a persisted document exists */
  forceRefresh?: boolean;
  useMock?: boolean;
}

/**
 * Serves the persisted comparison, generating it on first use or on refresh.
 *
 * Only one generation should run at a time per deployment. This is not
 * enforced here; the last writer wins.
 */
export class ComparisonService {
  private readonly reader: CatalogReader;
  private readonly store: IComparisonStore;
  private readonly generators: TextGenerators;
  private readonly retries: number;
  private readonly backoff: RetryBackoff;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ComparisonServiceOptions) {
    this.reader = options.reader;
    this.store = options.store;
    this.generators = options.generators;
    this.retries = options.retries ?? 2;
    this.backoff = options.backoff ?? NO_BACKOFF;
    this.logger = options.logger ?? pino({ name: 'ComparisonService' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the persisted document unless `forceRefresh` is set or none exists,
   * in which case the pipeline runs and its result replaces the stored one.
   *
   * @throws AppError subclasses on structural failure; nothing is persisted then
   */
  async getOrGenerate(options: GetOrGenerateOptions = {}): Promise<ComparisonDocument> {
    const { forceRefresh = false, useMock = false } = options;

    if (!forceRefresh) {
      const existing = await this.store.load();
      if (existing) {
        this.logger.debug('Returning persisted comparison');
        return existing;
      }
    }

    const generator = selectGenerator(this.generators, useMock);
    const catalog = await this.reader.loadProducts();

    this.logger.info({ forceRefresh, useMock, catalogSize: catalog.length }, 'Generating comparison');

    const document = await runComparisonPipeline(catalog, {
      generator,
      retries: this.retries,
      backoff: this.backoff,
      logger: this.logger,
      now: this.now,
    });

    await this.store.save(document);
    return document;
  }

  /**
   * Like getOrGenerate, but failures are logged and reported as null.
   */
  async compareProducts(options: { useMock?: boolean; refresh?: boolean } = {}): Promise<ComparisonDocument | null> {
    try {
      return await this.getOrGenerate({ forceRefresh: options.refresh, useMock: options.useMock });
    } catch (error) {
      const appError = mapError(error);
      this.logger.error({
        code: appError.code,
        message: appError.message,
      }, 'Comparison failed');
      return null;
    }
  }
}

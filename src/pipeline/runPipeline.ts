import pino, { type Logger } from 'pino';
import { JsonCatalogReader } from '../catalog/CatalogReader.js';
import { ComparisonService, type ComparisonDocument } from '../compare/index.js';
import type { Config } from '../config.js';
import { ContentGenerator } from '../content/ContentGenerator.js';
import { enrichCatalog, type EnrichCatalogResult } from '../content/enrichCatalog.js';
import { AppError } from '../errors/AppError.js';
import { selectGenerator, type TextGenerators } from '../generation/createTextGenerators.js';
import type { IComparisonStore } from '../store/IComparisonStore.js';

export interface PipelineOptions {
  config: Config;
  generators: TextGenerators;
  store: IComparisonStore;
  useMock?: boolean;
  /** Keep the existing processed catalog and only rebuild the comparison */
  skipEnrichment?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface PipelineResult {
  /** Null when enrichment was skipped */
  enrichment: EnrichCatalogResult | null;
  /** Null when the comparison could not be generated */
  comparison: ComparisonDocument | null;
}

/**
 * Enrich the scraped catalog, then regenerate the comparison from it.
 *
 * A missing scraped catalog or an unavailable generator stops the run before
 * anything is written. A failed comparison is logged and reported as null so
 * the enriched catalog is still kept.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, generators, useMock = false } = options;
  const logger = options.logger ?? pino({ name: 'pipeline' });

  let enrichment: EnrichCatalogResult | null = null;

  if (options.skipEnrichment) {
    logger.info('Skipping enrichment step');
  } else {
    const generator = selectGenerator(generators, useMock);
    enrichment = await enrichCatalog({
      reader: new JsonCatalogReader({ paths: [config.paths.scrapedProducts], logger }),
      contentGenerator: new ContentGenerator({
        generator,
        retries: config.generation.maxRetries,
        backoff: config.generation.backoff,
        logger,
      }),
      outputPath: config.paths.processedProducts,
      logger,
    });

    if (enrichment.products.length === 0) {
      throw AppError.notFound('No scraped products found, cannot run the pipeline', {
        path: config.paths.scrapedProducts,
      });
    }
    logger.info({
      enriched: enrichment.enriched,
      skipped: enrichment.skipped,
      failed: enrichment.failed,
    }, 'Enrichment step finished');
  }

  const service = new ComparisonService({
    reader: new JsonCatalogReader({
      paths: [config.paths.processedProducts, config.paths.scrapedProducts],
      logger,
    }),
    store: options.store,
    generators,
    retries: config.generation.maxRetries,
    backoff: config.generation.backoff,
    logger,
    now: options.now,
  });

  const comparison = await service.compareProducts({ useMock, refresh: true });
  if (comparison) {
    logger.info({ overallWinnerSlot: comparison.overallWinnerSlot }, 'Comparison step finished');
  } else {
    logger.warn('Comparison step failed, keeping the enriched catalog');
  }

  return { enrichment, comparison };
}

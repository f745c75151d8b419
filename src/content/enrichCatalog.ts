import pino, { type Logger } from 'pino';
import { JsonCatalogReader, type CatalogReader } from '../catalog/CatalogReader.js';
import { writeJsonFileAtomic } from '../catalog/jsonFile.js';
import { isEnriched, type Product } from '../catalog/productTypes.js';
import { AppError, mapError } from '../errors/index.js';
import type { ContentGenerator } from './ContentGenerator.js';

export interface EnrichCatalogOptions {
  reader: CatalogReader;
  contentGenerator: ContentGenerator;
  /** Where the processed catalog is written; nothing is written when omitted */
  outputPath?: string;
  /**
   * Only enrich this product. It is merged into the document already at
   * `outputPath`, so products enriched by earlier runs keep their copy.
   */
  productId?: string;
  logger?: Logger;
}

export interface EnrichCatalogResult {
  products: Product[];
  enriched: number;
  skipped: number;
  failed: number;
}

function emptyResult(): EnrichCatalogResult {
  return { products: [], enriched: 0, skipped: 0, failed: 0 };
}

/**
 * Run every catalog product through the content generator.
 *
 * Products are processed one at a time. A product that fails keeps its original
 * fields and the batch continues. The processed catalog is written in one
 * atomic replace once the whole batch is done.
 */
export async function enrichCatalog(options: EnrichCatalogOptions): Promise<EnrichCatalogResult> {
  const logger = options.logger ?? pino({ name: 'enrichCatalog' });
  const catalog = await options.reader.loadProducts();

  if (options.productId !== undefined) {
    return enrichSingleProduct(catalog, options.productId, options, logger);
  }

  if (catalog.length === 0) {
    logger.warn('Catalog is empty, nothing to enrich');
    return emptyResult();
  }

  const result = emptyResult();

  for (const [index, product] of catalog.entries()) {
    if (!isEnriched(product)) {
      logger.info({ productId: product.id, position: index + 1, total: catalog.length }, 'Processing product');
    }
    result.products.push(await enrichOne(product, options.contentGenerator, result, logger));
  }

  if (options.outputPath) {
    await writeJsonFileAtomic(options.outputPath, result.products);
    logger.info({ outputPath: options.outputPath, count: result.products.length }, 'Saved processed products');
  }

  return result;
}

async function enrichOne(
  product: Product,
  contentGenerator: ContentGenerator,
  result: EnrichCatalogResult,
  logger: Logger
): Promise<Product> {
  if (isEnriched(product)) {
    result.skipped++;
    return product;
  }

  try {
    const enriched = await contentGenerator.enrich(product);
    result.enriched++;
    return enriched;
  } catch (error) {
    const appError = mapError(error);
    logger.error({ productId: product.id, code: appError.code, error: appError.message }, 'Failed to enrich product');
    result.failed++;
    return product;
  }
}

/**
 * The existing output document is the base: the target replaces its entry
 * there, or is appended. Without an output document the input catalog is the
 * base. Nothing is written when the target could not be enriched.
 */
async function enrichSingleProduct(
  catalog: Product[],
  productId: string,
  options: EnrichCatalogOptions,
  logger: Logger
): Promise<EnrichCatalogResult> {
  const product = catalog.find((p) => p.id === productId);
  if (!product) {
    throw AppError.notFound(`Product with ID '${productId}' not found`, { productId });
  }

  const existing = options.outputPath
    ? await new JsonCatalogReader({ paths: [options.outputPath], logger }).loadProducts()
    : [];

  const result = emptyResult();
  logger.info({ productId }, 'Processing product');
  const updated = await enrichOne(product, options.contentGenerator, result, logger);

  const base = existing.length > 0 ? existing : catalog;
  const position = base.findIndex((p) => p.id === productId);
  result.products = position === -1
    ? [...base, updated]
    : base.map((p, index) => (index === position ? updated : p));

  if (result.failed > 0) {
    logger.warn({ productId }, 'Product was not enriched, output left unchanged');
    return result;
  }

  if (options.outputPath) {
    await writeJsonFileAtomic(options.outputPath, result.products);
    logger.info({ outputPath: options.outputPath, productId }, 'Merged product into processed catalog');
  }

  return result;
}

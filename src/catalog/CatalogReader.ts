import pino, { type Logger } from 'pino';
import { AppError } from '../errors/AppError.js';
import { productSchema, type Product } from './productTypes.js';
import { readJsonFile } from './jsonFile.js';

export interface CatalogReader {
  loadProducts(): Promise<Product[]>;
}

export interface JsonCatalogReaderOptions {
  /**
   * Candidate catalog files in order of preference. The first one that exists
   * is read, e.g. processed data first and raw scraped data as a fallback.
   */
  paths: string[];
  logger?: Logger;
}

/**
 * Reads the product catalog from a JSON array on disk.
 *
 * A missing file is not an error: the reader falls through to the next
 * candidate and returns an empty catalog when none exists. A file that exists
 * but is not a JSON array throws `CATALOG_INVALID`. Individual entries that do
 * not look like products are skipped.
 */
export class JsonCatalogReader implements CatalogReader {
  private readonly paths: string[];
  private readonly logger: Logger;

  constructor(options: JsonCatalogReaderOptions) {
    this.paths = options.paths;
    this.logger = options.logger ?? pino({ name: 'JsonCatalogReader' });
  }

  async loadProducts(): Promise<Product[]> {
    for (const filePath of this.paths) {
      let raw: unknown;
      try {
        raw = await readJsonFile(filePath);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw AppError.catalogInvalid(filePath, message, error instanceof Error ? error : undefined);
      }

      if (raw === null) {
        continue;
      }

      if (!Array.isArray(raw)) {
        throw AppError.catalogInvalid(filePath, 'Catalog file must contain a JSON array');
      }

      const products = this.parseEntries(raw, filePath);
      this.logger.info({ filePath, count: products.length }, 'Loaded product catalog');
      return products;
    }

    this.logger.warn({ paths: this.paths }, 'No product catalog found');
    return [];
  }

  private parseEntries(entries: unknown[], filePath: string): Product[] {
    const products: Product[] = [];
    entries.forEach((entry, index) => {
      const result = productSchema.safeParse(entry);
      if (result.success) {
        products.push(result.data);
      } else {
        this.logger.warn({
          filePath,
          index,
          issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }, 'Skipping malformed catalog entry');
      }
    });
    return products;
  }
}

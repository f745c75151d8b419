import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { JsonCatalogReader } from '../catalog/CatalogReader.js';
import { AppError } from '../errors/index.js';

const logger = pino({ level: 'silent' });

describe('JsonCatalogReader', () => {
  let dir: string;
  let processedPath: string;
  let scrapedPath: string;
  let reader: JsonCatalogReader;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'catalog-reader-'));
    processedPath = path.join(dir, 'processed_products.json');
    scrapedPath = path.join(dir, 'scraped_products.json');
    reader = new JsonCatalogReader({ paths: [processedPath, scrapedPath], logger });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return an empty catalog when no file exists', async () => {
    await expect(reader.loadProducts()).resolves.toEqual([]);
  });

  it('should prefer processed data over scraped data', async () => {
    await writeFile(scrapedPath, JSON.stringify([{ id: 's1', title: 'Scraped' }]), 'utf8');
    await writeFile(processedPath, JSON.stringify([{ id: 'p1', title: 'Processed' }]), 'utf8');

    const products = await reader.loadProducts();

    expect(products.map((p) => p.id)).toEqual(['p1']);
  });

  it('should fall back to scraped data and apply defaults', async () => {
    await writeFile(scrapedPath, JSON.stringify([{ id: 7, title: 'Lamp', rating: '4.1', price: '19.99' }]), 'utf8');

    const products = await reader.loadProducts();

    expect(products).toEqual([
      { id: '7', title: 'Lamp', description: '', features: [], rating: '4.1', price: '19.99' },
    ]);
  });

  it('should skip entries that are not products', async () => {
    await writeFile(scrapedPath, JSON.stringify([{ id: 'ok' }, { title: 'No id' }, { id: '' }, 'text']), 'utf8');

    const products = await reader.loadProducts();

    expect(products.map((p) => p.id)).toEqual(['ok']);
  });

  it('should reject a catalog that is not an array', async () => {
    await writeFile(scrapedPath, JSON.stringify({ products: [] }), 'utf8');

    const error = await reader.loadProducts().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: 'CATALOG_INVALID', httpStatus: 500 });
  });

  it('should reject a catalog that is not valid JSON', async () => {
    await writeFile(processedPath, '[{ broken', 'utf8');

    await expect(reader.loadProducts()).rejects.toMatchObject({ code: 'CATALOG_INVALID' });
  });
});

#!/usr/bin/env tsx
/**
 * Generate marketing copy (summary, tagline, highlights) for the scraped catalog.
 *
 * Usage:
 *   npm run enrich                          # Enrich every product with OpenAI
 *   npm run enrich -- --use-mock            # Deterministic copy, no API key needed
 *   npm run enrich -- --id 42               # Enrich a single product
 *   npm run enrich -- --input a.json --output b.json
 *
 * Reads SCRAPED_PRODUCTS_PATH and writes PROCESSED_PRODUCTS_PATH unless overridden.
 */

import pino from 'pino';
import { loadConfig } from '../src/config.js';
import { JsonCatalogReader } from '../src/catalog/CatalogReader.js';
import { ContentGenerator } from '../src/content/ContentGenerator.js';
import { enrichCatalog } from '../src/content/enrichCatalog.js';
import { createTextGenerators, selectGenerator } from '../src/generation/createTextGenerators.js';
import { mapError } from '../src/errors/index.js';

interface CliOptions {
  input?: string;
  output?: string;
  productId?: string;
  useMock: boolean;
  help: boolean;
}

function printUsage(): void {
  console.log('Usage: tsx scripts/enrich-products.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --input <path>    Catalog to read (default: SCRAPED_PRODUCTS_PATH)');
  console.log('  --output <path>   Where to write the enriched catalog (default: PROCESSED_PRODUCTS_PATH)');
  console.log('  --id <productId>  Only enrich this product');
  console.log('  --use-mock        Use the mock generator instead of OpenAI');
  console.log('  -h, --help        Show this help');
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { useMock: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = (): string => {
      const value = args[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      return value;
    };

    switch (arg) {
      case '--input':
        options.input = takeValue();
        break;
      case '--output':
        options.output = takeValue();
        break;
      case '--id':
        options.productId = takeValue();
        break;
      case '--use-mock':
        options.useMock = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    process.exit(2);
  }

  if (options.help) {
    printUsage();
    process.exit(0);
  }

  const config = loadConfig();
  const logger = pino({ name: 'enrich-products', level: config.debug ? 'debug' : 'info' });

  try {
    const generator = selectGenerator(createTextGenerators(config, logger), options.useMock);
    const inputPath = options.input ?? config.paths.scrapedProducts;
    const outputPath = options.output ?? config.paths.processedProducts;

    const result = await enrichCatalog({
      reader: new JsonCatalogReader({ paths: [inputPath], logger }),
      contentGenerator: new ContentGenerator({
        generator,
        retries: config.generation.maxRetries,
        backoff: config.generation.backoff,
        logger,
      }),
      outputPath,
      productId: options.productId,
      logger,
    });

    const written = options.productId !== undefined && result.failed > 0
      ? 'nothing written'
      : `${result.products.length} products written to ${outputPath}`;
    console.log(`Enriched ${result.enriched}, skipped ${result.skipped}, failed ${result.failed} (${written})`);
  } catch (error) {
    const appError = mapError(error);
    console.error(`\nError [${appError.code}]: ${appError.safeMessage}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

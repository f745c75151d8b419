#!/usr/bin/env tsx
/**
 * Generate (or print the persisted) comparison of the three top-rated products.
 *
 * Usage:
 *   npm run compare                      # Reuse the persisted comparison if there is one
 *   npm run compare -- --refresh         # Always regenerate
 *   npm run compare -- --use-mock        # Deterministic output, no API key needed
 */

import pino from 'pino';
import { loadConfig } from '../src/config.js';
import { JsonCatalogReader } from '../src/catalog/CatalogReader.js';
import { ComparisonService, type ComparisonDocument } from '../src/compare/index.js';
import { createTextGenerators } from '../src/generation/createTextGenerators.js';
import { createComparisonStore } from '../src/store/comparisonStoreFactory.js';

function printUsage(): void {
  console.log('Usage: tsx scripts/compare-products.ts [--use-mock] [--refresh]');
  console.log('');
  console.log('Options:');
  console.log('  --use-mock   Use the mock generator instead of OpenAI');
  console.log('  --refresh    Regenerate even if a comparison is already stored');
}

function printComparison(document: ComparisonDocument): void {
  console.log('\nProducts:');
  for (const product of document.products) {
    const rating = product.ratingValue === null ? 'not rated' : product.ratingValue.toString();
    console.log(`  [${product.slot}] ${product.title} (${rating})`);
  }

  console.log('\nCriteria:');
  for (const criterion of document.criteria) {
    const verdict = document.verdicts.find((v) => v.criterionIndex === criterion.index);
    const winner = verdict?.winnerSlot ? `Product ${verdict.winnerSlot}` : 'unresolved';
    console.log(`  ${criterion.index}. ${criterion.text} -> ${winner}`);
  }

  const winner = document.products.find((p) => p.slot === document.overallWinnerSlot);
  console.log(`\nOverall winner: [${document.overallWinnerSlot}] ${winner?.title ?? ''}`);
  if (document.degraded) {
    console.log('(degraded: no criterion could be resolved)');
  }
  console.log(`Generated at ${document.generatedAt}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config = loadConfig();
  const logger = pino({ name: 'compare-products', level: config.debug ? 'debug' : 'info' });
  const { store } = await createComparisonStore(config, logger);

  const service = new ComparisonService({
    reader: new JsonCatalogReader({
      paths: [config.paths.processedProducts, config.paths.scrapedProducts],
      logger,
    }),
    store,
    generators: createTextGenerators(config, logger),
    retries: config.generation.maxRetries,
    backoff: config.generation.backoff,
    logger,
  });

  try {
    const document = await service.compareProducts({
      useMock: args.includes('--use-mock'),
      refresh: args.includes('--refresh'),
    });

    if (!document) {
      console.error('\nComparison failed, see the log above for details.');
      process.exitCode = 1;
      return;
    }

    printComparison(document);
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

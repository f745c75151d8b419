#!/usr/bin/env tsx
/**
 * Enrich the scraped catalog, rebuild the comparison, and optionally start the API.
 *
 * Usage:
 *   npm run pipeline                        # Enrich + compare with OpenAI
 *   npm run pipeline -- --use-mock          # Same, with the mock generator
 *   npm run pipeline -- --skip-enrichment   # Only rebuild the comparison
 *   npm run pipeline -- --start-api         # Serve the results afterwards
 */

import pino from 'pino';
import { loadConfig } from '../src/config.js';
import { mapError } from '../src/errors/index.js';
import { createTextGenerators } from '../src/generation/createTextGenerators.js';
import { runPipeline } from '../src/pipeline/runPipeline.js';
import { startServer } from '../src/server.js';
import { createComparisonStore } from '../src/store/comparisonStoreFactory.js';

const FLAGS = ['--use-mock', '--skip-enrichment', '--start-api', '--help', '-h'];

function printUsage(): void {
  console.log('Usage: tsx scripts/run-pipeline.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --use-mock          Use the mock generator instead of OpenAI');
  console.log('  --skip-enrichment   Keep the processed catalog, only rebuild the comparison');
  console.log('  --start-api         Start the HTTP API once the pipeline has finished');
  console.log('  -h, --help          Show this help');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const unknown = args.find((arg) => !FLAGS.includes(arg));
  if (unknown !== undefined) {
    console.error(`Unknown argument: ${unknown}`);
    printUsage();
    process.exit(2);
  }

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config = loadConfig();
  const logger = pino({ name: 'pipeline', level: config.debug ? 'debug' : 'info' });
  const { store } = await createComparisonStore(config, logger);

  try {
    const result = await runPipeline({
      config,
      generators: createTextGenerators(config, logger),
      store,
      useMock: args.includes('--use-mock'),
      skipEnrichment: args.includes('--skip-enrichment'),
      logger,
    });

    if (result.enrichment) {
      console.log(
        `Enrichment: ${result.enrichment.enriched} enriched, ${result.enrichment.skipped} skipped, ` +
        `${result.enrichment.failed} failed`
      );
    }
    console.log(
      result.comparison
        ? `Comparison: overall winner is slot ${result.comparison.overallWinnerSlot}`
        : 'Comparison: failed, see the log above for details'
    );
  } catch (error) {
    const appError = mapError(error);
    console.error(`\nError [${appError.code}]: ${appError.safeMessage}`);
    process.exitCode = 1;
    return;
  } finally {
    await store.close();
  }

  if (args.includes('--start-api')) {
    await startServer();
  } else {
    console.log('Pipeline finished. Start the API with: npm start');
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

import Fastify from 'fastify';
import cors from '@fastify/cors';
import pino, { type Logger } from 'pino';
import { loadConfig, type Config } from './config.js';
import { JsonCatalogReader } from './catalog/CatalogReader.js';
import { ComparisonService } from './compare/index.js';
import { createTextGenerators, type TextGenerators } from './generation/createTextGenerators.js';
import { createComparisonStore } from './store/comparisonStoreFactory.js';
import type { IComparisonStore } from './store/IComparisonStore.js';
import { productRoutes } from './routes/productRoutes.js';
import { comparisonRoutes } from './routes/comparisonRoutes.js';

export interface ServerDependencies {
  /** Overrides the configured comparison store */
  store?: IComparisonStore;
  /** Overrides the generators built from the OpenAI settings */
  generators?: TextGenerators;
  now?: () => Date;
  /** Logger for the service components; its level also applies to request logs */
  logger?: Logger;
}

export async function buildServer(config: Config, deps: ServerDependencies = {}) {
  const logger = deps.logger ?? pino({ name: 'product-api', level: config.debug ? 'debug' : 'info' });

  const fastify = Fastify({
    logger: {
      level: logger.level,
    },
  });

  // Must be registered before routes so preflight requests are answered
  const allowAnyOrigin = config.cors.origins.includes('*');
  await fastify.register(cors, {
    origin: allowAnyOrigin
      ? true
      : (origin, callback) => {
          // No origin: curl, server-to-server
          if (!origin) {
            callback(null, true);
            return;
          }
          if (config.cors.origins.includes(origin)) {
            callback(null, true);
            return;
          }
          callback(new Error('Not allowed by CORS'), false);
        },
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  });

  const reader = new JsonCatalogReader({
    paths: [config.paths.processedProducts, config.paths.scrapedProducts],
    logger: logger.child({ component: 'JsonCatalogReader' }),
  });

  let store = deps.store;
  if (!store) {
    const created = await createComparisonStore(config, logger);
    store = created.store;
    fastify.log.info(`Comparison store initialized: ${created.type}`);
  }
  const comparisonStore = store;

  fastify.addHook('onClose', async () => {
    await comparisonStore.close();
  });

  const comparisonService = new ComparisonService({
    reader,
    store: comparisonStore,
    generators: deps.generators ?? createTextGenerators(config, logger),
    retries: config.generation.maxRetries,
    backoff: config.generation.backoff,
    logger: logger.child({ component: 'ComparisonService' }),
    now: deps.now,
  });

  await fastify.register(productRoutes, { reader, debug: config.debug });
  await fastify.register(comparisonRoutes, { comparisonService, debug: config.debug });

  return fastify;
}

export async function startServer() {
  const config = loadConfig();
  const fastify = await buildServer(config);

  try {
    await fastify.listen({
      port: config.port,
      host: config.host,
    });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}

import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { FileComparisonStore } from './FileComparisonStore.js';
import type { IComparisonStore } from './IComparisonStore.js';
import { RedisComparisonStore } from './RedisComparisonStore.js';

export interface ComparisonStoreFactoryResult {
  store: IComparisonStore;
  type: 'file' | 'redis';
}

/**
 * Build the configured comparison store. The redis backend is pinged first so a
 * bad REDIS_URL fails at startup rather than on the first request.
 */
export async function createComparisonStore(
  config: Pick<Config, 'comparisonStore' | 'paths'>,
  logger?: Logger
): Promise<ComparisonStoreFactoryResult> {
  const { type, redis } = config.comparisonStore;

  if (type === 'redis') {
    if (!redis.url) {
      throw new Error(
        'COMPARISON_STORE=redis requires REDIS_URL to be set. ' +
        'Example: REDIS_URL=redis://localhost:6379'
      );
    }

    const redisStore = new RedisComparisonStore({
      redisUrl: redis.url,
      key: redis.key,
      logger: logger?.child({ component: 'RedisComparisonStore' }),
    });

    const isConnected = await redisStore.ping();
    if (!isConnected) {
      await redisStore.close();
      throw new Error(
        `Failed to connect to Redis at ${redis.url}. ` +
        'Ensure Redis is running and the URL is correct.'
      );
    }

    logger?.info({ key: redis.key }, 'Using Redis comparison store');
    return { store: redisStore, type: 'redis' };
  }

  logger?.info({ filePath: config.paths.comparison }, 'Using file comparison store');
  return {
    store: new FileComparisonStore({
      filePath: config.paths.comparison,
      logger: logger?.child({ component: 'FileComparisonStore' }),
    }),
    type: 'file',
  };
}

import { Redis } from 'ioredis';
import pino, { type Logger } from 'pino';
import type { ComparisonDocument } from '../compare/compareTypes.js';
import { AppError } from '../errors/AppError.js';
import type { IComparisonStore } from './IComparisonStore.js';
import { parseComparisonDocument } from './parseComparisonDocument.js';

export interface RedisComparisonStoreOptions {
  redisUrl: string;
  key?: string;
  logger?: Logger;
}

/**
 * Stores the comparison under a single Redis key. A single SET replaces the
 * previous document.
 */
export class RedisComparisonStore implements IComparisonStore {
  private readonly redis: Redis;
  private readonly key: string;
  private readonly logger: Logger;

  constructor(options: RedisComparisonStoreOptions) {
    this.redis = new Redis(options.redisUrl, {
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.key = options.key ?? 'catalog:comparison';
    this.logger = options.logger ?? pino({ name: 'RedisComparisonStore' });

    this.redis.on('error', (err: Error) => {
      this.logger.error({ error: err.message }, 'Redis connection error');
    });
  }

  async load(): Promise<ComparisonDocument | null> {
    const raw = await this.redis.get(this.key);
    if (!raw) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (parseError) {
      this.logger.warn({
        key: this.key,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      }, 'Persisted comparison is unreadable, ignoring it');
      return null;
    }

    return parseComparisonDocument(parsed, this.key, this.logger);
  }

  async save(document: ComparisonDocument): Promise<void> {
    try {
      await this.redis.set(this.key, JSON.stringify(document));
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw AppError.storeWrite(this.key, cause?.message ?? String(error), cause);
    }
    this.logger.info({ key: this.key }, 'Comparison saved');
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.error({
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to disconnect from Redis');
    }
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch {
      return false;
    }
  }
}

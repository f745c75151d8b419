import { describe, it, expect, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import pino from 'pino';

vi.mock('ioredis', () => ({
  Redis: RedisMock,
}));

import { parseConfig } from '../config.js';
import { createComparisonStore } from '../store/comparisonStoreFactory.js';
import { FileComparisonStore } from '../store/FileComparisonStore.js';
import { RedisComparisonStore } from '../store/RedisComparisonStore.js';

const logger = pino({ level: 'silent' });

describe('createComparisonStore', () => {
  it('should create the file store by default', async () => {
    const result = await createComparisonStore(parseConfig({}), logger);

    expect(result.type).toBe('file');
    expect(result.store).toBeInstanceOf(FileComparisonStore);
  });

  it('should create the redis store when configured', async () => {
    const config = parseConfig({ COMPARISON_STORE: 'redis', REDIS_URL: 'redis://localhost:6379' });

    const result = await createComparisonStore(config, logger);

    expect(result.type).toBe('redis');
    expect(result.store).toBeInstanceOf(RedisComparisonStore);
    await result.store.close();
  });

  it('should refuse the redis store without a URL', async () => {
    const config = parseConfig({});

    await expect(
      createComparisonStore(
        { ...config, comparisonStore: { type: 'redis', redis: { url: undefined, key: 'catalog:comparison' } } },
        logger
      )
    ).rejects.toThrow('COMPARISON_STORE=redis requires REDIS_URL to be set.');
  });
});

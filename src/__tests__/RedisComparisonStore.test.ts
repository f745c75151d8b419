import { describe, it, expect, afterEach, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import pino from 'pino';
import type { ComparisonDocument } from '../compare/index.js';

vi.mock('ioredis', () => ({
  Redis: RedisMock,
}));

import { RedisComparisonStore } from '../store/RedisComparisonStore.js';

const logger = pino({ level: 'silent' });

const document: ComparisonDocument = {
  products: [
    { slot: 1, id: 'a', title: 'Alpha', rating: 5, ratingValue: 5 },
    { slot: 2, id: 'b', title: 'Bravo', rating: 4, ratingValue: 4 },
    { slot: 3, id: 'c', title: 'Charlie', rating: 'Not rated', ratingValue: null },
  ],
  criteria: [{ index: 1, text: 'Which is cheapest?' }],
  verdicts: [{ criterionIndex: 1, winnerSlot: null, rationale: 'No verdict could be generated for this criterion.' }],
  tally: [
    { slot: 1, wins: 0 },
    { slot: 2, wins: 0 },
    { slot: 3, wins: 0 },
  ],
  overallWinnerSlot: 1,
  degraded: true,
  generatedAt: '2026-02-01T12:00:00.000Z',
};

describe('RedisComparisonStore', () => {
  const stores: RedisComparisonStore[] = [];

  function createStore(key: string): RedisComparisonStore {
    const store = new RedisComparisonStore({ redisUrl: 'redis://localhost:6379', key, logger });
    stores.push(store);
    return store;
  }

  afterEach(async () => {
    await Promise.all(stores.splice(0).map((store) => store.close()));
  });

  it('should return null for a missing key', async () => {
    await expect(createStore('test:comparison:missing').load()).resolves.toBeNull();
  });

  it('should save and load a document', async () => {
    const store = createStore('test:comparison:roundtrip');

    await store.save(document);

    await expect(store.load()).resolves.toEqual(document);
  });

  it('should keep documents under different keys apart', async () => {
    await createStore('test:comparison:one').save(document);

    await expect(createStore('test:comparison:two').load()).resolves.toBeNull();
  });

  it('should answer ping', async () => {
    await expect(createStore('test:comparison:ping').ping()).resolves.toBe(true);
  });
});

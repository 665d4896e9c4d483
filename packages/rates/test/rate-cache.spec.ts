import { RateCache, CACHE_WRITE_LOCK_KEY, historicalRatesKey, latestRatesKey } from '../src/cache/rate-cache';
import { InMemoryKeyValueStore } from '../src/store/memory-store';
import { RatesMetrics } from '../src/metrics';

function recordingMetrics(): RatesMetrics & { lookups: string[]; skipped: string[] } {
  const lookups: string[] = [];
  const skipped: string[] = [];
  return {
    lookups,
    skipped,
    recordCacheLookup: (kind, hit) => {
      lookups.push(`${kind}:${hit ? 'hit' : 'miss'}`);
    },
    recordCacheWriteSkipped: (kind) => {
      skipped.push(kind);
    },
    recordUpstreamRequest: () => undefined,
    recordRefreshCycle: () => undefined,
  };
}

describe('RateCache', () => {
  const day = new Date(Date.UTC(2024, 4, 6));
  let store: InMemoryKeyValueStore;
  let metrics: ReturnType<typeof recordingMetrics>;
  let cache: RateCache;

  beforeEach(() => {
    store = new InMemoryKeyValueStore();
    metrics = recordingMetrics();
    cache = new RateCache(
      store,
      { latestTtlMs: 60_000, historicalTtlMs: 120_000, writeLockWaitMs: 50, lockRetryIntervalMs: 10 },
      metrics,
    );
  });

  it('derives keys from base and day', () => {
    expect(latestRatesKey('USD')).toBe('latest:USD');
    expect(historicalRatesKey(day, 'EUR')).toBe('historical:2024-05-06:EUR');
  });

  it('returns what was just written for latest rates', async () => {
    const timestamp = new Date('2024-05-10T00:00:00.000Z');
    await cache.setLatestRates('USD', { USD: 1, INR: 82.5, EUR: 0.9 }, timestamp);

    await expect(cache.getLatestRates('USD')).resolves.toEqual({
      rates: { USD: 1, INR: 82.5, EUR: 0.9 },
      timestamp,
    });
    expect(metrics.lookups).toEqual(['latest:hit']);
  });

  it('stores latest rates as {rates, timestamp} JSON', async () => {
    await cache.setLatestRates('GBP', { GBP: 1, JPY: 190.5 }, new Date('2024-05-10T00:00:00.000Z'));

    await expect(store.get('latest:GBP')).resolves.toBe(
      '{"rates":{"GBP":1,"JPY":190.5},"timestamp":"2024-05-10T00:00:00.000Z"}',
    );
  });

  it('stores historical rates as a flat map keyed by day', async () => {
    await cache.setHistoricalRates(day, 'EUR', { USD: 1.07, JPY: 167.2 });

    await expect(store.get('historical:2024-05-06:EUR')).resolves.toBe('{"USD":1.07,"JPY":167.2}');
    await expect(cache.getHistoricalRates(day, 'EUR')).resolves.toEqual({ USD: 1.07, JPY: 167.2 });
  });

  it('misses on an absent key', async () => {
    await expect(cache.getLatestRates('JPY')).resolves.toBeNull();
    await expect(cache.getHistoricalRates(day, 'JPY')).resolves.toBeNull();
    expect(metrics.lookups).toEqual(['latest:miss', 'historical:miss']);
  });

  it('treats malformed entries as misses', async () => {
    await store.set('latest:USD', 'not json', 60_000);
    await store.set('historical:2024-05-06:USD', '[1,2]', 60_000);
    await store.set('latest:EUR', '{"rates":{"USD":1.1},"timestamp":"yesterday"}', 60_000);

    await expect(cache.getLatestRates('USD')).resolves.toBeNull();
    await expect(cache.getHistoricalRates(day, 'USD')).resolves.toBeNull();
    await expect(cache.getLatestRates('EUR')).resolves.toBeNull();
  });

  it('treats store read errors as misses', async () => {
    jest.spyOn(store, 'get').mockRejectedValue(new Error('READONLY'));

    await expect(cache.getLatestRates('USD')).resolves.toBeNull();
    expect(metrics.lookups).toEqual(['latest:miss']);
  });

  it('skips the write while another writer holds the write lock', async () => {
    await store.setIfAbsent(CACHE_WRITE_LOCK_KEY, 'other-writer', 60_000);

    await expect(cache.setLatestRates('USD', { USD: 1 }, new Date())).resolves.toBeUndefined();

    await expect(store.get('latest:USD')).resolves.toBeNull();
    await expect(store.get(CACHE_WRITE_LOCK_KEY)).resolves.toBe('other-writer');
    expect(metrics.skipped).toEqual(['latest']);
  });

  it('releases the write lock after writing', async () => {
    await cache.setHistoricalRates(day, 'USD', { INR: 83.1 });

    expect(store.keys()).toEqual(['historical:2024-05-06:USD']);
  });

  it('swallows store write errors and still releases the lock', async () => {
    jest.spyOn(store, 'set').mockRejectedValue(new Error('OOM command not allowed'));

    await expect(cache.setHistoricalRates(day, 'USD', { INR: 83.1 })).resolves.toBeUndefined();
    expect(store.keys()).toEqual([]);
    expect(metrics.skipped).toEqual(['historical']);
  });

  it('applies the configured TTL', async () => {
    const shortLived = new RateCache(store, { latestTtlMs: 30, historicalTtlMs: 30 });
    await shortLived.setLatestRates('INR', { INR: 1, USD: 0.012 }, new Date());

    await new Promise((resolve) => setTimeout(resolve, 50));
    await expect(shortLived.getLatestRates('INR')).resolves.toBeNull();
  });
});

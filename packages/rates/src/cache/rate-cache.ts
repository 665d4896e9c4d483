import { Logger } from '@nestjs/common';
import {
  Currency,
  LatestRatesSnapshot,
  RateMap,
  formatCalendarDate,
} from '@fxrates/shared';
import { KeyValueStore } from '../store/key-value-store';
import { DistributedLock } from '../lock/distributed-lock';
import { CacheKind, RatesMetrics, noopMetrics } from '../metrics';
import { errorMessage } from '../errors';
import { withTimeout } from '../util/timing';
import { isRecord, toRateMap } from '../util/rate-map';

export const CACHE_WRITE_LOCK_KEY = 'cache_write_lock';

export interface RateCacheOptions {
  latestTtlMs: number;
  historicalTtlMs: number;
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
  writeLockTtlMs?: number;
  writeLockWaitMs?: number;
  lockRetryIntervalMs?: number;
}

interface StoredLatestRates {
  rates: RateMap;
  timestamp: string;
}

export function latestRatesKey(base: Currency): string {
  return `latest:${base}`;
}

export function historicalRatesKey(date: Date, base: Currency): string {
  return `historical:${formatCalendarDate(date)}:${base}`;
}

/**
 * Rate snapshots in the shared store. Reads take no lock and treat every
 * failure as a miss. Writes go through one named lock and are skipped,
 * never thrown, when the lock or the store is unavailable.
 */
export class RateCache {
  private readonly logger = new Logger(RateCache.name);
  private readonly readTimeoutMs: number;
  private readonly writeTimeoutMs: number;
  private readonly writeLockTtlMs: number;
  private readonly writeLockWaitMs: number;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: RateCacheOptions,
    private readonly metrics: RatesMetrics = noopMetrics,
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? 5_000;
    this.writeTimeoutMs = options.writeTimeoutMs ?? 10_000;
    this.writeLockTtlMs = options.writeLockTtlMs ?? 30_000;
    this.writeLockWaitMs = options.writeLockWaitMs ?? 10_000;
  }

  async getLatestRates(base: Currency): Promise<LatestRatesSnapshot | null> {
    const key = latestRatesKey(base);
    const raw = await this.read(key, 'latest');
    if (raw === null) {
      return null;
    }

    const parsed = parseJson(raw);
    if (!isRecord(parsed) || !isRecord(parsed.rates) || typeof parsed.timestamp !== 'string') {
      return this.corrupt(key, 'latest');
    }

    const timestamp = new Date(parsed.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      return this.corrupt(key, 'latest');
    }

    this.logger.debug(`Cache hit for key ${key}`);
    this.metrics.recordCacheLookup('latest', true);
    return { rates: toRateMap(parsed.rates), timestamp };
  }

  async setLatestRates(base: Currency, rates: RateMap, timestamp: Date): Promise<void> {
    const payload: StoredLatestRates = { rates, timestamp: timestamp.toISOString() };
    await this.write(latestRatesKey(base), JSON.stringify(payload), this.options.latestTtlMs, 'latest');
  }

  async getHistoricalRates(date: Date, base: Currency): Promise<RateMap | null> {
    const key = historicalRatesKey(date, base);
    const raw = await this.read(key, 'historical');
    if (raw === null) {
      return null;
    }

    const parsed = parseJson(raw);
    if (!isRecord(parsed)) {
      return this.corrupt(key, 'historical');
    }

    this.logger.debug(`Cache hit for key ${key}`);
    this.metrics.recordCacheLookup('historical', true);
    return toRateMap(parsed);
  }

  async setHistoricalRates(date: Date, base: Currency, rates: RateMap): Promise<void> {
    await this.write(
      historicalRatesKey(date, base),
      JSON.stringify(rates),
      this.options.historicalTtlMs,
      'historical',
    );
  }

  private async read(key: string, kind: CacheKind): Promise<string | null> {
    try {
      const raw = await withTimeout(this.store.get(key), this.readTimeoutMs, `cache read ${key}`);
      if (raw === null) {
        this.logger.debug(`Cache miss for key ${key}`);
        this.metrics.recordCacheLookup(kind, false);
      }
      return raw;
    } catch (error) {
      this.logger.warn(`Error reading ${key} from cache: ${errorMessage(error)}`);
      this.metrics.recordCacheLookup(kind, false);
      return null;
    }
  }

  private corrupt(key: string, kind: CacheKind): null {
    this.logger.warn(`Discarding malformed cache entry ${key}`);
    this.metrics.recordCacheLookup(kind, false);
    return null;
  }

  private async write(key: string, value: string, ttlMs: number, kind: CacheKind): Promise<void> {
    const lock = new DistributedLock(
      this.store,
      CACHE_WRITE_LOCK_KEY,
      this.writeLockTtlMs,
      this.options.lockRetryIntervalMs,
    );

    try {
      await lock.acquire(this.writeLockWaitMs);
    } catch (error) {
      this.logger.warn(`Skipping cache write for ${key}: ${errorMessage(error)}`);
      this.metrics.recordCacheWriteSkipped(kind);
      return;
    }

    try {
      await withTimeout(this.store.set(key, value, ttlMs), this.writeTimeoutMs, `cache write ${key}`);
      this.logger.log(`Cached ${key} with TTL ${ttlMs}ms`);
    } catch (error) {
      this.logger.warn(`Error writing ${key} to cache: ${errorMessage(error)}`);
      this.metrics.recordCacheWriteSkipped(kind);
    } finally {
      await lock.release().catch((error: unknown) => {
        this.logger.warn(`Error releasing ${CACHE_WRITE_LOCK_KEY}: ${errorMessage(error)}`);
      });
    }
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

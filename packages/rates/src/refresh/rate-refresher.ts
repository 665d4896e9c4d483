import { Logger } from '@nestjs/common';
import { Currency, SUPPORTED_CURRENCIES, otherCurrencies } from '@fxrates/shared';
import { KeyValueStore } from '../store/key-value-store';
import { DistributedLock } from '../lock/distributed-lock';
import { RateCache } from '../cache/rate-cache';
import { RateProviderClient } from '../providers/rate-provider.interface';
import { RatesMetrics, noopMetrics } from '../metrics';
import { errorMessage } from '../errors';

export const REFRESH_LOCK_KEY = 'exchange_rate_cache_refresh_lock';

export interface RateRefresherOptions {
  intervalMs: number;
  lockKey?: string;
  lockTtlMs?: number;
  lockWaitMs?: number;
  lockRetryIntervalMs?: number;
  currencies?: readonly Currency[];
}

export interface RefreshCycleResult {
  status: 'completed' | 'skipped';
  refreshed: Currency[];
  failed: Currency[];
}

/**
 * Keeps the latest-rate cache warm for every supported base.
 *
 * One cycle runs at start() and then once per interval. Across processes,
 * cycles are serialized by a distributed lock; within a process a tick that
 * lands while a cycle is running is dropped.
 */
export class RateRefresher {
  private readonly logger = new Logger(RateRefresher.name);
  private readonly lockKey: string;
  private readonly lockTtlMs: number;
  private readonly lockWaitMs: number;
  private readonly currencies: readonly Currency[];

  private timer: NodeJS.Timeout | undefined;
  private current: Promise<RefreshCycleResult> | undefined;
  private abort = new AbortController();

  constructor(
    private readonly store: KeyValueStore,
    private readonly client: RateProviderClient,
    private readonly cache: RateCache,
    private readonly options: RateRefresherOptions,
    private readonly metrics: RatesMetrics = noopMetrics,
  ) {
    this.lockKey = options.lockKey ?? REFRESH_LOCK_KEY;
    this.lockTtlMs = options.lockTtlMs ?? 2 * 60 * 1000;
    this.lockWaitMs = options.lockWaitMs ?? 15 * 1000;
    this.currencies = options.currencies ?? SUPPORTED_CURRENCIES;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.abort = new AbortController();
    this.logger.log(`Background refresh started, interval ${this.options.intervalMs}ms`);

    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    this.timer.unref();
  }

  /**
   * Stops scheduling, cancels in-flight upstream fetches and waits for the
   * running cycle to release its lock.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.abort.abort();

    if (this.current) {
      await this.current;
    }
    this.logger.log('Background refresh stopped');
  }

  async runCycle(): Promise<RefreshCycleResult> {
    const lock = new DistributedLock(this.store, this.lockKey, this.lockTtlMs, this.options.lockRetryIntervalMs);

    try {
      await lock.acquire(this.lockWaitMs, this.abort.signal);
    } catch (error) {
      if (this.abort.signal.aborted) {
        this.logger.log('Refresh cycle cancelled while waiting for the lock');
      } else {
        this.logger.warn(`Skipping refresh cycle, could not acquire ${this.lockKey}: ${errorMessage(error)}`);
      }
      return this.skipped();
    }

    try {
      if (this.abort.signal.aborted) {
        this.logger.log('Refresh cycle cancelled before it started');
        return this.skipped();
      }

      const result = await this.refreshAll();
      this.metrics.recordRefreshCycle('completed');
      return result;
    } finally {
      await lock.release().catch((error: unknown) => {
        this.logger.error(`Error releasing ${this.lockKey}: ${errorMessage(error)}`);
      });
    }
  }

  private skipped(): RefreshCycleResult {
    this.metrics.recordRefreshCycle('skipped');
    return { status: 'skipped', refreshed: [], failed: [] };
  }

  private tick(): void {
    if (this.current) {
      this.logger.debug('Previous refresh cycle still running, skipping tick');
      return;
    }

    this.current = this.runCycle()
      .catch((error: unknown): RefreshCycleResult => {
        this.logger.error(`Refresh cycle failed: ${errorMessage(error)}`);
        return { status: 'skipped', refreshed: [], failed: [] };
      })
      .finally(() => {
        this.current = undefined;
      });
  }

  private async refreshAll(): Promise<RefreshCycleResult> {
    const refreshed: Currency[] = [];
    const failed: Currency[] = [];

    for (const base of this.currencies) {
      if (this.abort.signal.aborted) {
        break;
      }

      const targets = otherCurrencies(base, this.currencies);
      if (targets.length === 0) {
        continue;
      }

      try {
        const { rates, timestamp } = await this.client.fetchLatestRates(base, targets, this.abort.signal);
        await this.cache.setLatestRates(base, { ...rates, [base]: 1 }, timestamp);
        refreshed.push(base);
        this.logger.log(`Cache refreshed for base ${base}`);
      } catch (error) {
        failed.push(base);
        this.logger.error(`Error refreshing cache for base ${base}: ${errorMessage(error)}`);
      }
    }

    return { status: 'completed', refreshed, failed };
  }
}

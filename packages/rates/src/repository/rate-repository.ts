import { Logger } from '@nestjs/common';
import {
  Currency,
  LatestRatesSnapshot,
  RateMap,
  SUPPORTED_CURRENCIES,
  TimeSeriesRates,
  eachDay,
  formatCalendarDate,
  otherCurrencies,
  parseCalendarDate,
} from '@fxrates/shared';
import { RateCache } from '../cache/rate-cache';
import { RateProviderClient } from '../providers/rate-provider.interface';
import { BackgroundTasks } from '../tasks/background-tasks';
import { UpstreamError, errorMessage } from '../errors';

export interface RateRepository {
  getLatestRates(base: Currency, target: Currency, signal?: AbortSignal): Promise<LatestRatesSnapshot>;

  /**
   * @returns `YYYY-MM-DD` -> rate of `target` against `base`; days without a rate are absent
   */
  getHistoricalRates(
    startDate: Date,
    endDate: Date,
    base: Currency,
    target: Currency,
    signal?: AbortSignal,
  ): Promise<Map<string, number>>;
}

/**
 * Read-through repository. The cache is consulted first; on a miss the
 * upstream provider is asked for every supported currency so the write-back
 * answers later requests for other targets too. Write-backs are detached
 * from the request.
 */
export class CachedRateRepository implements RateRepository {
  private readonly logger = new Logger(CachedRateRepository.name);

  constructor(
    private readonly client: RateProviderClient,
    private readonly cache: RateCache,
    private readonly tasks: BackgroundTasks,
    private readonly currencies: readonly Currency[] = SUPPORTED_CURRENCIES,
  ) {}

  async getLatestRates(base: Currency, target: Currency, signal?: AbortSignal): Promise<LatestRatesSnapshot> {
    const cached = await this.cache.getLatestRates(base);
    if (cached) {
      // A hit on base is trusted even when target is missing from the snapshot
      return { rates: pick(cached.rates, base, target), timestamp: cached.timestamp };
    }

    let fetched: LatestRatesSnapshot;
    try {
      fetched = await this.client.fetchLatestRates(base, otherCurrencies(base, this.currencies), signal);
    } catch (error) {
      throw asUpstreamError('failed to fetch latest rates from upstream', error);
    }

    const fullRates: RateMap = { ...fetched.rates, [base]: 1 };
    this.tasks.run(`cache latest ${base}`, () => this.cache.setLatestRates(base, fullRates, fetched.timestamp));

    if (fullRates[target] === undefined) {
      this.logger.warn(`Upstream did not return a rate for ${base} -> ${target}`);
    }

    return { rates: pick(fullRates, base, target), timestamp: fetched.timestamp };
  }

  async getHistoricalRates(
    startDate: Date,
    endDate: Date,
    base: Currency,
    target: Currency,
    signal?: AbortSignal,
  ): Promise<Map<string, number>> {
    const fromCache = await this.readHistoricalFromCache(startDate, endDate, base, target);
    if (fromCache) {
      return fromCache;
    }

    let series: TimeSeriesRates;
    try {
      series = await this.client.fetchTimeSeriesRates(
        startDate,
        endDate,
        base,
        otherCurrencies(base, this.currencies),
        signal,
      );
    } catch (error) {
      throw asUpstreamError('failed to fetch historical rates from upstream', error);
    }

    const result = new Map<string, number>();
    for (const [day, dayRates] of Object.entries(series.rates)) {
      const date = parseCalendarDate(day);
      if (!date) {
        this.logger.warn(`Skipping upstream rates for unparseable date "${day}"`);
        continue;
      }

      const rates: RateMap = {};
      for (const currency of this.currencies) {
        const rate = dayRates[currency];
        if (rate !== undefined) {
          rates[currency] = rate;
        }
      }

      const rate = rates[target];
      if (rate !== undefined) {
        result.set(formatCalendarDate(date), rate);
      }

      this.tasks.run(`cache historical ${day} ${base}`, () => this.cache.setHistoricalRates(date, base, rates));
    }

    return result;
  }

  /**
   * All-or-nothing: the first day missing from the cache discards what was
   * collected and returns null, so the whole range is fetched upstream.
   */
  private async readHistoricalFromCache(
    startDate: Date,
    endDate: Date,
    base: Currency,
    target: Currency,
  ): Promise<Map<string, number> | null> {
    const result = new Map<string, number>();

    for (const day of eachDay(startDate, endDate)) {
      const cached = await this.cache.getHistoricalRates(day, base);
      if (!cached) {
        return null;
      }

      const rate = cached[target];
      if (rate !== undefined) {
        result.set(formatCalendarDate(day), rate);
      }
    }

    return result;
  }
}

function pick(rates: RateMap, base: Currency, target: Currency): RateMap {
  const result: RateMap = {};
  const rate = rates[target];
  if (rate !== undefined) {
    result[target] = rate;
  }
  result[base] = 1;
  return result;
}

function asUpstreamError(message: string, error: unknown): UpstreamError {
  if (error instanceof UpstreamError) {
    return new UpstreamError(`${message}: ${error.message}`, error.status, { cause: error });
  }
  return new UpstreamError(`${message}: ${errorMessage(error)}`, undefined, { cause: error });
}

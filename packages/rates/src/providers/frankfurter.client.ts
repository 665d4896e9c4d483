import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { Logger } from '@nestjs/common';
import {
  Currency,
  LatestRatesSnapshot,
  TimeSeriesRates,
  formatCalendarDate,
  parseCalendarDate,
} from '@fxrates/shared';
import { RateProviderClient } from './rate-provider.interface';
import { RatesMetrics, UpstreamCall, noopMetrics } from '../metrics';
import { UpstreamError, errorMessage } from '../errors';
import { sleep } from '../util/timing';
import { isRecord, toRateMap } from '../util/rate-map';

export interface FrankfurterClientOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

type RetryableConfig = InternalAxiosRequestConfig & { retryCount?: number };

/**
 * Client for a Frankfurter-compatible rates API.
 * Transport failures are retried with exponential backoff; any HTTP answer
 * other than 2xx fails at once.
 */
export class FrankfurterClient implements RateProviderClient {
  name = 'frankfurter';
  private readonly logger = new Logger(FrankfurterClient.name);
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: FrankfurterClientOptions,
    private readonly metrics: RatesMetrics = noopMetrics,
  ) {
    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
    });

    // Exponential backoff on transport errors: base, 2x base, 4x base...
    this.client.interceptors.response.use(
      (response) => response,
      async (error: unknown) => {
        if (!axios.isAxiosError(error)) {
          return Promise.reject(error);
        }

        const config: RetryableConfig | undefined = error.config;
        if (!config || !this.shouldRetry(error, config)) {
          return Promise.reject(error);
        }

        const attempt = config.retryCount ?? 0;
        config.retryCount = attempt + 1;

        const delay = this.options.retryBaseDelayMs * 2 ** attempt;
        this.logger.warn(
          `Upstream request to ${config.url} failed (${error.code ?? error.message}), retry ${attempt + 1}/${this.options.maxRetries} in ${delay}ms`,
        );
        await sleep(delay);
        return this.client(config);
      },
    );
  }

  async fetchLatestRates(base: Currency, targets: Currency[], signal?: AbortSignal): Promise<LatestRatesSnapshot> {
    this.logger.log(`Fetching latest rates: base=${base} targets=${targets.join(',')}`);

    const body = await this.get('latest', '/latest', base, targets, signal);
    if (!isRecord(body.rates)) {
      throw this.failure('latest', 'upstream latest response has no rates object');
    }

    const date = typeof body.date === 'string' ? parseCalendarDate(body.date) : null;
    if (!date) {
      throw this.failure('latest', `upstream latest response has an invalid date: ${String(body.date)}`);
    }

    this.metrics.recordUpstreamRequest('latest', 'success');
    return { rates: toRateMap(body.rates), timestamp: date };
  }

  async fetchTimeSeriesRates(
    startDate: Date,
    endDate: Date,
    base: Currency,
    targets: Currency[],
    signal?: AbortSignal,
  ): Promise<TimeSeriesRates> {
    const start = formatCalendarDate(startDate);
    const end = formatCalendarDate(endDate);
    this.logger.log(`Fetching time series ${start}..${end}: base=${base} targets=${targets.join(',')}`);

    const body = await this.get('timeseries', `/${start}..${end}`, base, targets, signal);
    if (!isRecord(body.rates)) {
      throw this.failure('timeseries', 'upstream time series response has no rates object');
    }

    const rates: Record<string, Record<string, number>> = {};
    for (const [date, dayRates] of Object.entries(body.rates)) {
      if (!isRecord(dayRates)) {
        continue;
      }
      const day: Record<string, number> = {};
      for (const [code, rate] of Object.entries(dayRates)) {
        if (typeof rate === 'number') {
          day[code] = rate;
        }
      }
      rates[date] = day;
    }

    this.metrics.recordUpstreamRequest('timeseries', 'success');
    return {
      base: typeof body.base === 'string' ? body.base : base,
      startDate: typeof body.start_date === 'string' ? body.start_date : start,
      endDate: typeof body.end_date === 'string' ? body.end_date : end,
      rates,
    };
  }

  private async get(
    call: UpstreamCall,
    path: string,
    base: Currency,
    targets: Currency[],
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(path, {
        params: { from: base, to: targets.join(',') },
        signal,
      });
      data = response.data;
    } catch (error) {
      throw this.translate(call, error);
    }

    if (!isRecord(data)) {
      throw this.failure(call, `upstream ${call} response is not a JSON object`);
    }
    return data;
  }

  private shouldRetry(error: AxiosError, config: RetryableConfig): boolean {
    if (error.response || axios.isCancel(error) || config.signal?.aborted) {
      return false;
    }
    return (config.retryCount ?? 0) < this.options.maxRetries;
  }

  private translate(call: UpstreamCall, error: unknown): UpstreamError {
    if (axios.isAxiosError(error) && error.response) {
      return this.failure(call, `upstream ${call} request failed with HTTP status ${error.response.status}`, {
        status: error.response.status,
        cause: error,
      });
    }

    if (axios.isCancel(error)) {
      return this.failure(call, `upstream ${call} request was cancelled`, { cause: error });
    }

    return this.failure(call, `upstream ${call} request failed: ${errorMessage(error)}`, { cause: error });
  }

  private failure(call: UpstreamCall, message: string, extra: { status?: number; cause?: unknown } = {}): UpstreamError {
    this.logger.error(message);
    this.metrics.recordUpstreamRequest(call, 'failure');
    return new UpstreamError(message, extra.status, { cause: extra.cause });
  }
}

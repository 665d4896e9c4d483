import { Logger } from '@nestjs/common';
import {
  ConversionRequest,
  ConversionResult,
  Currency,
  HistoricalRatesResponse,
  ISO_DATE_FORMAT,
  LatestRatesResponse,
  SUPPORTED_CURRENCIES,
  addDays,
  eachDay,
  formatCalendarDate,
  isSupportedCurrency,
  normalizeCurrencyCode,
  parseCalendarDate,
  startOfUtcDay,
} from '@fxrates/shared';
import { RateRepository } from '../repository/rate-repository';
import { RateNotFoundError, RateValidationError } from '../errors';

export interface RateServiceOptions {
  historyDaysLimit: number;
  /** Layout of caller-supplied dates; responses and cache keys stay `YYYY-MM-DD` */
  dateFormat?: string;
  now?: () => Date;
}

/**
 * Validates requests and derives single rates and conversions from the repository
 */
export class RateService {
  private readonly logger = new Logger(RateService.name);
  private readonly now: () => Date;
  private readonly dateFormat: string;

  constructor(
    private readonly repository: RateRepository,
    private readonly options: RateServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.dateFormat = options.dateFormat ?? ISO_DATE_FORMAT;
  }

  getSupportedCurrencies(): Currency[] {
    return [...SUPPORTED_CURRENCIES];
  }

  validateCurrency(code: string): Currency {
    const normalized = normalizeCurrencyCode(code);
    if (!isSupportedCurrency(normalized)) {
      throw new RateValidationError(`currency not supported: ${normalized || '(empty)'}`);
    }
    return normalized;
  }

  /**
   * Accepts dates in the configured layout from `today - historyDaysLimit` up to today (UTC)
   */
  validateDate(value: string): Date {
    const date = parseCalendarDate(value, this.dateFormat);
    if (!date) {
      throw new RateValidationError(`invalid date format, expected ${this.dateFormat}`);
    }

    const today = startOfUtcDay(this.now());
    const oldest = addDays(today, -this.options.historyDaysLimit);
    if (date < oldest) {
      throw new RateValidationError(`requested date is older than ${this.options.historyDaysLimit} days`);
    }
    if (date > today) {
      throw new RateValidationError('historical date can not be in the future');
    }

    return date;
  }

  async getLatestRate(base: Currency, target: Currency, signal?: AbortSignal): Promise<{ rate: number; timestamp: Date }> {
    if (base === target) {
      return { rate: 1, timestamp: this.now() };
    }

    const { rates, timestamp } = await this.repository.getLatestRates(base, target, signal);
    const rate = rates[target];
    if (rate === undefined) {
      this.logger.warn(`Rate not found in repository result for ${base} -> ${target}`);
      throw new RateNotFoundError(`exchange rate not found for ${base} -> ${target}`);
    }

    return { rate, timestamp };
  }

  async getHistoricalRate(date: Date, base: Currency, target: Currency, signal?: AbortSignal): Promise<number> {
    if (base === target) {
      return 1;
    }

    const rates = await this.repository.getHistoricalRates(date, date, base, target, signal);
    const day = formatCalendarDate(date);
    const rate = rates.get(day);
    if (rate === undefined) {
      this.logger.warn(`Historical rate not found for ${base} -> ${target} on ${day}`);
      throw new RateNotFoundError(`exchange rate not found for ${base} -> ${target} on ${day}`);
    }

    return rate;
  }

  async getLatestRates(base: Currency, target: Currency, signal?: AbortSignal): Promise<LatestRatesResponse> {
    if (base === target) {
      return { base, rates: { [base]: 1 }, timestamp: toUnixSeconds(this.now()) };
    }

    const { rates, timestamp } = await this.repository.getLatestRates(base, target, signal);
    return {
      base,
      rates: { ...rates, [base]: 1 },
      timestamp: toUnixSeconds(timestamp),
    };
  }

  async getHistoricalRates(
    startDate: string,
    endDate: string,
    base: Currency,
    target: Currency,
    signal?: AbortSignal,
  ): Promise<HistoricalRatesResponse> {
    const start = this.validateDate(startDate);
    const end = this.validateDate(endDate);
    if (start > end) {
      throw new RateValidationError('startDate must not be after endDate');
    }

    const rates: Record<string, number> = {};
    if (base === target) {
      for (const day of eachDay(start, end)) {
        rates[formatCalendarDate(day)] = 1;
      }
      return { base, target, amount: 1, rates };
    }

    const byDay = await this.repository.getHistoricalRates(start, end, base, target, signal);
    for (const day of [...byDay.keys()].sort()) {
      const rate = byDay.get(day);
      if (rate !== undefined) {
        rates[day] = rate;
      }
    }

    return { base, target, amount: 1, rates };
  }

  async convert(request: ConversionRequest, signal?: AbortSignal): Promise<ConversionResult> {
    if (request.from === request.to) {
      throw new RateValidationError('from and to currencies cannot be the same for conversion');
    }
    if (!Number.isFinite(request.amount) || request.amount <= 0) {
      throw new RateValidationError('amount must be a positive number');
    }

    const rate = request.date
      ? await this.getHistoricalRate(request.date, request.from, request.to, signal)
      : (await this.getLatestRate(request.from, request.to, signal)).rate;

    return {
      from: request.from,
      to: request.to,
      amount: request.amount,
      convertedAmount: request.amount * rate,
      rate,
      ...(request.date ? { onDate: formatCalendarDate(request.date) } : {}),
    };
  }
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

import { Currency } from '../currency';

/**
 * Target currency -> rate, relative to some base currency
 */
export type RateMap = Partial<Record<Currency, number>>;

export interface LatestRatesSnapshot {
  rates: RateMap;
  timestamp: Date;
}

/**
 * Upstream time series: `YYYY-MM-DD` -> currency code -> rate.
 * Codes are left as strings; the provider may answer with currencies we do not quote.
 */
export interface TimeSeriesRates {
  base: string;
  startDate: string;
  endDate: string;
  rates: Record<string, Record<string, number>>;
}

export interface LatestRatesResponse {
  base: Currency;
  rates: RateMap;
  /** Unix seconds */
  timestamp: number;
}

export interface HistoricalRatesResponse {
  base: Currency;
  target: Currency;
  amount: number;
  /** `YYYY-MM-DD` -> rate, ascending by date */
  rates: Record<string, number>;
}

export interface ConversionRequest {
  from: Currency;
  to: Currency;
  amount: number;
  date?: Date;
}

export interface ConversionResult {
  from: Currency;
  to: Currency;
  amount: number;
  convertedAmount: number;
  rate: number;
  onDate?: string;
}

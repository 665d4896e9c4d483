import { Currency, LatestRatesSnapshot, TimeSeriesRates } from '@fxrates/shared';

export interface RateProviderClient {
  name: string;

  fetchLatestRates(base: Currency, targets: Currency[], signal?: AbortSignal): Promise<LatestRatesSnapshot>;

  fetchTimeSeriesRates(
    startDate: Date,
    endDate: Date,
    base: Currency,
    targets: Currency[],
    signal?: AbortSignal,
  ): Promise<TimeSeriesRates>;
}

import { RateMap, isSupportedCurrency } from '@fxrates/shared';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps supported currencies with numeric rates and drops everything else
 */
export function toRateMap(value: Record<string, unknown>): RateMap {
  const rates: RateMap = {};
  for (const [code, rate] of Object.entries(value)) {
    if (isSupportedCurrency(code) && typeof rate === 'number') {
      rates[code] = rate;
    }
  }
  return rates;
}

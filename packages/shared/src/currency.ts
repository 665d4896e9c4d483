/**
 * Currencies the service quotes. Every upstream fetch asks for the full set
 * so one cached snapshot per base answers any target.
 */
export const SUPPORTED_CURRENCIES = ['USD', 'INR', 'EUR', 'JPY', 'GBP'] as const;

export type Currency = (typeof SUPPORTED_CURRENCIES)[number];

const supported: ReadonlySet<string> = new Set(SUPPORTED_CURRENCIES);

export function isSupportedCurrency(code: string): code is Currency {
  return supported.has(code);
}

/**
 * Upper-cases and trims user input before it is checked against the set
 */
export function normalizeCurrencyCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * All supported currencies except `base`, in declaration order
 */
export function otherCurrencies(base: Currency, currencies: readonly Currency[] = SUPPORTED_CURRENCIES): Currency[] {
  return currencies.filter((currency) => currency !== base);
}

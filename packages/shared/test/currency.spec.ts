import { isSupportedCurrency, normalizeCurrencyCode, otherCurrencies } from '../src/currency';

describe('currencies', () => {
  it('recognises only the supported set', () => {
    expect(isSupportedCurrency('INR')).toBe(true);
    expect(isSupportedCurrency('inr')).toBe(false);
    expect(isSupportedCurrency('CHF')).toBe(false);
  });

  it('normalizes user input', () => {
    expect(normalizeCurrencyCode('  gbp ')).toBe('GBP');
  });

  it('lists the other currencies in declaration order', () => {
    expect(otherCurrencies('EUR')).toEqual(['USD', 'INR', 'JPY', 'GBP']);
    expect(otherCurrencies('USD', ['USD', 'JPY'])).toEqual(['JPY']);
  });
});

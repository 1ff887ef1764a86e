import type { Currency } from './enums';

/**
 * Read-only rate lookup: units of the base currency (SAR) per unit of the keyed currency.
 * Keyed by plain string so codes outside the Currency union can still be looked up.
 */
export type FxRateTable = Readonly<Record<string, number>>;

export const DEFAULT_FX_RATES: FxRateTable = Object.freeze({
  SAR: 1.0,
  USD: 3.75,
  EUR: 4.05,
} satisfies Record<Currency, number>);

export type CurrencyNormalizer = (amount: number, currency: Currency | string) => number;

/**
 * Build a normalizer over a fixed rate table.
 *
 * Codes missing from the table are treated as already in the base currency
 * (rate 1.0) instead of failing, so rows from older imports with odd
 * currency codes still load.
 */
export function createCurrencyNormalizer(rates: FxRateTable = DEFAULT_FX_RATES): CurrencyNormalizer {
  return (amount, currency) => amount * (rates[currency] ?? 1.0);
}

export const normalizeToBase: CurrencyNormalizer = createCurrencyNormalizer();

/** Amount in hundredths, rounded half away from zero for positive values. */
export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

/** Round a base-currency amount to whole hundredths. */
export const roundMoney = (amount: number): number => toMinorUnits(amount) / 100;

import { describe, it, expect } from 'vitest';
import { createCurrencyNormalizer, DEFAULT_FX_RATES, normalizeToBase } from '../src/domain/currency';

describe('Currency Normalizer', () => {
  it('should multiply by the fixed rate of each supported currency', () => {
    expect(normalizeToBase(100, 'SAR')).toBe(100);
    expect(normalizeToBase(100, 'USD')).toBe(375);
    expect(normalizeToBase(100, 'EUR')).toBe(405);
  });

  it('should treat unknown currency codes as already normalized', () => {
    expect(normalizeToBase(250, 'GBP')).toBe(250);
    expect(normalizeToBase(250, '')).toBe(250);
  });

  it('should use an injected rate table', () => {
    const normalize = createCurrencyNormalizer({ SAR: 1, USD: 4 });

    expect(normalize(10, 'USD')).toBe(40);
    // Missing from the injected table, so rate 1.0
    expect(normalize(10, 'EUR')).toBe(10);
  });

  it('should expose a frozen default rate table', () => {
    expect(DEFAULT_FX_RATES).toEqual({ SAR: 1.0, USD: 3.75, EUR: 4.05 });
    expect(Object.isFrozen(DEFAULT_FX_RATES)).toBe(true);
  });
});

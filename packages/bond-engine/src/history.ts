// Market-history helpers: realised volatility and repricing along a yield path

import type { EngineConfig } from './config.js';
import { InvalidInputError, assertFinite } from './errors.js';
import { price } from './pricing.js';
import type { BondVariant, YieldSpec } from './types.js';
import { solveYield } from './ytm.js';

export const TRADING_DAYS_PER_YEAR = 252;

export function logReturns(prices: readonly number[]): number[] {
  prices.forEach((p, i) => {
    if (!Number.isFinite(p) || p <= 0) {
      throw new InvalidInputError(`prices[${i}] must be a positive number (got ${p})`, 'prices');
    }
  });
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    returns.push(Math.log(prices[i] / prices[i - 1]));
  }
  return returns;
}

/**
 * Rolling annualised volatility of log returns (sample standard deviation).
 * Entry i covers the `window` returns ending at price i, so the first
 * `window` entries are null.
 */
export function historicalVolatility(
  prices: readonly number[],
  window = 30,
  periodsPerYear = TRADING_DAYS_PER_YEAR,
): (number | null)[] {
  if (!Number.isInteger(window) || window < 2) {
    throw new InvalidInputError(`window must be an integer >= 2 (got ${window})`, 'window');
  }
  if (!Number.isFinite(periodsPerYear) || periodsPerYear <= 0) {
    throw new InvalidInputError(`periodsPerYear must be positive (got ${periodsPerYear})`, 'periodsPerYear');
  }

  const returns = logReturns(prices);
  const annualise = Math.sqrt(periodsPerYear);

  return prices.map((_, i) => {
    if (i < window) return null;
    const slice = returns.slice(i - window, i);
    const mean = slice.reduce((s, r) => s + r, 0) / window;
    const variance = slice.reduce((s, r) => s + (r - mean) * (r - mean), 0) / (window - 1);
    return Math.sqrt(variance) * annualise;
  });
}

/** Price at each discount yield in `yields`, same order. */
export function priceYieldPath<S extends YieldSpec>(
  bond: BondVariant<S>,
  yields: readonly number[],
  basis?: S,
): number[] {
  return yields.map((y, i) => {
    assertFinite(y, `yields[${i}]`);
    return price(bond, bond.specAt(y, basis));
  });
}

/** Parallel change in the discount yield that brings the price to par. */
export function parYieldShift<S extends YieldSpec>(
  bond: BondVariant<S>,
  spec: S,
  config: Partial<EngineConfig> = {},
): number {
  const current = bond.discountBasis(spec);
  const parYield = solveYield(bond, bond.terms.faceValue, current, { basis: spec, config });
  return parYield - current;
}

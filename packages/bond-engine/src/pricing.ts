// Present value of a cash-flow schedule at a periodically compounded yield
//   P = sum( CF_t * (1 + y/f)^(-t*f) )

import { DomainError, InvalidInputError, assertFinite } from './errors.js';
import type { BondVariant, CashFlow, PriceResult, YieldSpec } from './types.js';

/** Per-period discount base 1 + y/f; throws when it is not positive. */
export function discountBase(annualYield: number, paymentsPerYear: number): number {
  assertFinite(annualYield, 'yield');
  const base = 1 + annualYield / paymentsPerYear;
  if (base <= 0) {
    throw new DomainError(
      `yield ${annualYield} gives a per-period discount base of ${base}; it must exceed ${-paymentsPerYear}`,
      base,
    );
  }
  return base;
}

export function discountFactor(annualYield: number, paymentsPerYear: number, timeYears: number): number {
  return Math.pow(discountBase(annualYield, paymentsPerYear), -timeYears * paymentsPerYear);
}

/**
 * Unchecked sum of discounted flows. May overflow to Infinity for a discount
 * base close to zero; the solvers rely on seeing that value.
 */
export function discountedSum(
  cashFlows: readonly CashFlow[],
  annualYield: number,
  paymentsPerYear: number,
): number {
  const base = discountBase(annualYield, paymentsPerYear);
  let pv = 0;
  for (const cf of cashFlows) {
    // zero coupons are skipped so a deep discount base never produces 0 * Infinity
    if (cf.amount === 0) continue;
    pv += cf.amount * Math.pow(base, -cf.timeYears * paymentsPerYear);
  }
  return pv;
}

export function presentValue(
  cashFlows: readonly CashFlow[],
  annualYield: number,
  paymentsPerYear: number,
): number {
  const pv = discountedSum(cashFlows, annualYield, paymentsPerYear);
  assertFinitePresentValue(pv, annualYield, paymentsPerYear);
  return pv;
}

function assertFinitePresentValue(pv: number, annualYield: number, paymentsPerYear: number): void {
  if (Number.isFinite(pv)) return;
  const base = 1 + annualYield / paymentsPerYear;
  throw new DomainError(`yield ${annualYield} gives a per-period discount base of ${base}; present value overflows`, base);
}

/**
 * dP/dy = -sum( t * CF_t * (1 + y/f)^(-t*f - 1) )
 */
export function presentValueDerivative(
  cashFlows: readonly CashFlow[],
  annualYield: number,
  paymentsPerYear: number,
): number {
  const base = discountBase(annualYield, paymentsPerYear);
  let dp = 0;
  for (const cf of cashFlows) {
    if (cf.amount === 0) continue;
    dp -= cf.timeYears * cf.amount * Math.pow(base, -cf.timeYears * paymentsPerYear - 1);
  }
  return dp;
}

/** Dirty (full) price of a bond at the given discounting basis. */
export function price<S extends YieldSpec>(bond: BondVariant<S>, spec: S): number {
  return presentValue(bond.buildCashFlows(spec), bond.discountBasis(spec), bond.terms.paymentsPerYear);
}

export function priceBond<S extends YieldSpec>(bond: BondVariant<S>, spec: S): PriceResult {
  const cashFlows = bond.buildCashFlows(spec);
  const discountYield = bond.discountBasis(spec);
  const dirtyPrice = presentValue(cashFlows, discountYield, bond.terms.paymentsPerYear);
  const accruedInterest = bond.accruedInterest(spec);

  return {
    dirtyPrice,
    cleanPrice: dirtyPrice - accruedInterest,
    accruedInterest,
    discountYield,
    cashFlows,
  };
}

export function assertPositivePrice(marketPrice: number, field = 'marketPrice'): void {
  assertFinite(marketPrice, field);
  if (marketPrice <= 0) {
    throw new InvalidInputError(`${field} must be positive (got ${marketPrice})`, field);
  }
}

// Cash-flow schedule generation from bond terms

import { DEFAULT_ENGINE_CONFIG } from './config.js';
import { InvalidInputError, assertFinite } from './errors.js';
import type { BondTerms, CashFlow, ResolvedTerms } from './types.js';

export function resolveTerms(
  terms: BondTerms,
  periodTolerance: number = DEFAULT_ENGINE_CONFIG.periodTolerance,
): ResolvedTerms {
  const { couponRate, faceValue, paymentsPerYear, yearsToMaturity } = terms;

  assertFinite(faceValue, 'faceValue');
  assertFinite(couponRate, 'couponRate');
  assertFinite(yearsToMaturity, 'yearsToMaturity');
  if (faceValue <= 0) {
    throw new InvalidInputError(`faceValue must be positive (got ${faceValue})`, 'faceValue');
  }
  if (couponRate < 0) {
    throw new InvalidInputError(`couponRate must not be negative (got ${couponRate})`, 'couponRate');
  }
  if (!Number.isInteger(paymentsPerYear) || paymentsPerYear < 1) {
    throw new InvalidInputError(
      `paymentsPerYear must be an integer >= 1 (got ${paymentsPerYear})`,
      'paymentsPerYear',
    );
  }
  if (yearsToMaturity <= 0) {
    throw new InvalidInputError(`yearsToMaturity must be positive (got ${yearsToMaturity})`, 'yearsToMaturity');
  }

  const stubConvention = terms.stubConvention ?? 'reject';
  const rawPeriods = yearsToMaturity * paymentsPerYear;
  const nearest = Math.round(rawPeriods);
  const whole = nearest >= 1 && Math.abs(rawPeriods - nearest) <= periodTolerance * rawPeriods;

  let periods: number;
  if (whole) {
    periods = nearest;
  } else if (stubConvention === 'short-first') {
    periods = Math.ceil(rawPeriods);
  } else {
    throw new InvalidInputError(
      `yearsToMaturity x paymentsPerYear = ${rawPeriods} is not a whole number of periods; ` +
        `use stubConvention 'short-first' to price a short first period`,
      'yearsToMaturity',
    );
  }

  return Object.freeze({ ...terms, stubConvention, periods, regular: whole });
}

export function couponAmount(terms: BondTerms): number {
  return (terms.couponRate * terms.faceValue) / terms.paymentsPerYear;
}

/**
 * Coupon dates are anchored on maturity and stepped back one period at a time,
 * so with a whole number of periods they fall at 1/f, 2/f, ..., T. With a short
 * first period the earliest date lands before 1/f and pays a full coupon.
 */
export function buildSchedule(terms: ResolvedTerms): readonly CashFlow[] {
  const { periods, paymentsPerYear, yearsToMaturity, faceValue } = terms;
  const coupon = couponAmount(terms);
  const flows: CashFlow[] = [];

  for (let i = 0; i < periods; i++) {
    const remaining = periods - 1 - i;
    // whole-period schedules use exact multiples of 1/f so t*f is an integer
    const timeYears = terms.regular
      ? (i + 1) / paymentsPerYear
      : yearsToMaturity - remaining / paymentsPerYear;
    const isMaturity = i === periods - 1;
    flows.push(Object.freeze({ timeYears, amount: coupon + (isMaturity ? faceValue : 0) }));
  }

  return Object.freeze(flows);
}

/** Coupon accrued since the (notional) previous coupon date; zero on a whole-period schedule. */
export function accruedInterest(terms: ResolvedTerms): number {
  if (terms.regular) return 0;
  const period = 1 / terms.paymentsPerYear;
  const timeToNextCoupon = terms.yearsToMaturity - (terms.periods - 1) * period;
  const timeSinceLastCoupon = period - timeToNextCoupon;
  return (timeSinceLastCoupon / period) * couponAmount(terms);
}


// Inflation indexation: index ratios and indexed cash flows

import { DomainError, InvalidInputError, assertFinite } from './errors.js';
import type { CashFlow, Indexation } from './types.js';

export const DEFAULT_INDEXATION_LAG_MONTHS = 3;

export function indexRatio(baseIndexLevel: number, currentIndexLevel: number): number {
  assertFinite(baseIndexLevel, 'baseIndexLevel');
  assertFinite(currentIndexLevel, 'currentIndexLevel');
  if (baseIndexLevel <= 0 || currentIndexLevel <= 0) {
    throw new DomainError(
      `index levels must be positive (base ${baseIndexLevel}, current ${currentIndexLevel})`,
      currentIndexLevel / baseIndexLevel,
    );
  }
  return currentIndexLevel / baseIndexLevel;
}

/**
 * Index ratio applied to a payment `timeYears` ahead, at a flat annual
 * inflation rate. `ratio` is the valuation-date ratio; the payment is fixed
 * from the index `lagMonths` before its date, so the projection runs for
 * `timeYears - lagMonths / 12`.
 */
export function indexRatioAt(ratio: number, inflation: number, timeYears: number, lagMonths = 0): number {
  assertFinite(inflation, 'inflationAccrual');
  if (1 + inflation <= 0) {
    throw new DomainError(`inflation accrual ${inflation} implies a non-positive index`, 1 + inflation);
  }
  return ratio * Math.pow(1 + inflation, timeYears - lagMonths / 12);
}

export function resolveIndexation(input: Partial<Indexation> & Pick<Indexation, 'baseIndexLevel' | 'currentIndexLevel'>): Indexation {
  const lagMonths = input.lagMonths ?? DEFAULT_INDEXATION_LAG_MONTHS;
  if (!Number.isInteger(lagMonths) || lagMonths < 0) {
    throw new InvalidInputError(`lagMonths must be a non-negative integer (got ${lagMonths})`, 'lagMonths');
  }
  // validates both levels
  indexRatio(input.baseIndexLevel, input.currentIndexLevel);
  return Object.freeze({
    baseIndexLevel: input.baseIndexLevel,
    currentIndexLevel: input.currentIndexLevel,
    lagMonths,
  });
}

/**
 * Scales every contractual flow by the index ratio applicable on its date.
 * Coupons become couponRate x indexedPrincipal(t) / f and the final flow
 * carries faceValue x indexRatio(T).
 */
export function indexCashFlows(
  schedule: readonly CashFlow[],
  ratio: number,
  inflation: number,
  lagMonths = 0,
): readonly CashFlow[] {
  return Object.freeze(
    schedule.map((cf) => Object.freeze({
      timeYears: cf.timeYears,
      amount: cf.amount * indexRatioAt(ratio, inflation, cf.timeYears, lagMonths),
    })),
  );
}

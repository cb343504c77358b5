// Bond variants: Nominal, Corporate (credit-spread overlay), InflationLinked (indexation)
// Each constructor fixes the kind-specific rules once; downstream code never branches on kind.

import { DEFAULT_ENGINE_CONFIG } from './config.js';
import { InvalidInputError, assertFinite } from './errors.js';
import { indexCashFlows, indexRatio, indexRatioAt, resolveIndexation } from './indexation.js';
import { accruedInterest, buildSchedule, resolveTerms } from './schedule.js';
import type {
  BondTerms,
  CorporateBond,
  CorporateYield,
  Indexation,
  InflationLinkedBond,
  InflationLinkedYield,
  NominalBond,
  NominalYield,
  RiskFactor,
} from './types.js';

export interface BondOptions {
  periodTolerance?: number;
}

function unsupportedFactor(kind: string, factor: RiskFactor): InvalidInputError {
  return new InvalidInputError(`${kind} bonds have no '${factor}' risk factor`, 'factor');
}

export function nominalBond(terms: BondTerms, options: BondOptions = {}): NominalBond {
  const resolved = resolveTerms(terms, options.periodTolerance ?? DEFAULT_ENGINE_CONFIG.periodTolerance);
  const schedule = buildSchedule(resolved);
  const accrued = accruedInterest(resolved);

  return Object.freeze({
    kind: 'Nominal',
    terms: resolved,
    schedule,
    factors: Object.freeze(['rate'] as const),
    buildCashFlows: () => schedule,
    discountBasis: (spec: NominalYield) => spec.yield,
    accruedInterest: () => accrued,
    shift(spec: NominalYield, factor: RiskFactor, delta: number): NominalYield {
      if (factor !== 'rate') throw unsupportedFactor('Nominal', factor);
      return { kind: 'Nominal', yield: spec.yield + delta };
    },
    specAt: (discountYield: number): NominalYield => ({ kind: 'Nominal', yield: discountYield }),
  } satisfies NominalBond);
}

/**
 * Corporate bond: discounted at treasuryBaseRate + creditSpread. Rate shocks
 * move the base rate, spread shocks the spread; each is held fixed while the
 * other moves.
 */
export function corporateBond(terms: BondTerms, options: BondOptions = {}): CorporateBond {
  const resolved = resolveTerms(terms, options.periodTolerance ?? DEFAULT_ENGINE_CONFIG.periodTolerance);
  const schedule = buildSchedule(resolved);
  const accrued = accruedInterest(resolved);

  return Object.freeze({
    kind: 'Corporate',
    terms: resolved,
    schedule,
    factors: Object.freeze(['rate', 'spread'] as const),
    buildCashFlows: () => schedule,
    discountBasis: (spec: CorporateYield) => spec.baseRate + spec.creditSpread,
    accruedInterest: () => accrued,
    shift(spec: CorporateYield, factor: RiskFactor, delta: number): CorporateYield {
      switch (factor) {
        case 'rate':
          return { ...spec, baseRate: spec.baseRate + delta };
        case 'spread':
          return { ...spec, creditSpread: spec.creditSpread + delta };
        default:
          throw unsupportedFactor('Corporate', factor);
      }
    },
    specAt(discountYield: number, basis?: CorporateYield): CorporateYield {
      const baseRate = basis?.baseRate ?? 0;
      return { kind: 'Corporate', baseRate, creditSpread: discountYield - baseRate };
    },
  } satisfies CorporateBond);
}

export interface InflationLinkedTerms extends BondTerms {
  readonly indexation: Partial<Indexation> & Pick<Indexation, 'baseIndexLevel' | 'currentIndexLevel'>;
}

/**
 * Inflation-linked bond. Flows are the contractual real schedule scaled by
 * indexRatio x (1 + inflationAccrual)^(t - lagMonths/12) and discounted at the
 * real yield.
 */
export function inflationLinkedBond(terms: InflationLinkedTerms, options: BondOptions = {}): InflationLinkedBond {
  const { indexation: rawIndexation, ...bondTerms } = terms;
  const resolved = resolveTerms(bondTerms, options.periodTolerance ?? DEFAULT_ENGINE_CONFIG.periodTolerance);
  const schedule = buildSchedule(resolved);
  const accrued = accruedInterest(resolved);
  const indexation = resolveIndexation(rawIndexation);
  const ratio = indexRatio(indexation.baseIndexLevel, indexation.currentIndexLevel);

  return Object.freeze({
    kind: 'InflationLinked',
    terms: resolved,
    schedule,
    indexation,
    indexRatio: ratio,
    factors: Object.freeze(['rate', 'inflation'] as const),
    buildCashFlows: (spec: InflationLinkedYield) =>
      indexCashFlows(schedule, ratio, spec.inflationAccrual, indexation.lagMonths),
    discountBasis: (spec: InflationLinkedYield) => spec.realYield,
    // accrued coupon is paid on today's indexed principal
    accruedInterest: () => accrued * ratio,
    indexedPrincipal(spec: InflationLinkedYield): number {
      return resolved.faceValue * indexRatioAt(ratio, spec.inflationAccrual, resolved.yearsToMaturity, indexation.lagMonths);
    },
    shift(spec: InflationLinkedYield, factor: RiskFactor, delta: number): InflationLinkedYield {
      switch (factor) {
        case 'rate':
          return { ...spec, realYield: spec.realYield + delta };
        case 'inflation':
          return { ...spec, inflationAccrual: spec.inflationAccrual + delta };
        default:
          throw unsupportedFactor('InflationLinked', factor);
      }
    },
    specAt(discountYield: number, basis?: InflationLinkedYield): InflationLinkedYield {
      const inflationAccrual = basis?.inflationAccrual ?? 0;
      assertFinite(inflationAccrual, 'inflationAccrual');
      return { kind: 'InflationLinked', realYield: discountYield, inflationAccrual };
    },
  } satisfies InflationLinkedBond);
}

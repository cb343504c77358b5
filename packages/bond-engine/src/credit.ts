// Credit-spread overlay analytics: spread conversions, implied spread, z-spread, default probability

import { resolveConfig, type EngineConfig } from './config.js';
import { ConvergenceError, InvalidInputError, assertFinite } from './errors.js';
import { assertPositivePrice, discountBase } from './pricing.js';
import { bisect } from './solver.js';
import type { BondVariant, CorporateBond, CurvePoint, YieldSpec } from './types.js';
import { solveYield } from './ytm.js';

export const BPS_PER_UNIT = 10_000;

export function spreadFromBps(bps: number): number {
  assertFinite(bps, 'creditSpreadBps');
  return bps / BPS_PER_UNIT;
}

export function spreadToBps(spread: number): number {
  return spread * BPS_PER_UNIT;
}

/**
 * Annual default probability implied by a spread under the
 * spread = PD x (1 - recovery) approximation.
 */
export function defaultProbability(creditSpread: number, recoveryRate = 0.4): number {
  assertFinite(creditSpread, 'creditSpread');
  assertFinite(recoveryRate, 'recoveryRate');
  if (recoveryRate < 0 || recoveryRate >= 1) {
    throw new InvalidInputError(`recoveryRate must be in [0, 1) (got ${recoveryRate})`, 'recoveryRate');
  }
  return creditSpread / (1 - recoveryRate);
}

/** Spread over `baseRate` that reprices the bond to `marketPrice`. */
export function solveImpliedSpread(
  bond: CorporateBond,
  marketPrice: number,
  baseRate: number,
  config: Partial<EngineConfig> = {},
): number {
  assertFinite(baseRate, 'baseRate');
  const basis = { kind: 'Corporate', baseRate, creditSpread: 0 } as const;
  const allIn = solveYield(bond, marketPrice, undefined, { basis, config });
  return allIn - baseRate;
}

/** Linear interpolation on a spot curve, flat beyond either end. */
export function interpolateCurve(curve: readonly CurvePoint[], tenor: number): number {
  if (curve.length === 0) {
    throw new InvalidInputError('benchmark curve must have at least one point', 'curve');
  }
  const sorted = [...curve].sort((a, b) => a.tenor - b.tenor);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (tenor <= first.tenor) return first.rate;
  if (tenor >= last.tenor) return last.rate;

  for (let i = 0; i < sorted.length - 1; i++) {
    const lo = sorted[i];
    const hi = sorted[i + 1];
    if (tenor >= lo.tenor && tenor <= hi.tenor) {
      const w = (tenor - lo.tenor) / (hi.tenor - lo.tenor);
      return lo.rate + w * (hi.rate - lo.rate);
    }
  }
  return last.rate;
}

function validateCurve(curve: readonly CurvePoint[]): void {
  if (curve.length === 0) {
    throw new InvalidInputError('benchmark curve must have at least one point', 'curve');
  }
  const tenors = new Set<number>();
  for (const point of curve) {
    assertFinite(point.tenor, 'curve.tenor');
    assertFinite(point.rate, 'curve.rate');
    if (point.tenor < 0) {
      throw new InvalidInputError(`curve tenor must not be negative (got ${point.tenor})`, 'curve');
    }
    if (tenors.has(point.tenor)) {
      throw new InvalidInputError(`duplicate curve tenor ${point.tenor}`, 'curve');
    }
    tenors.add(point.tenor);
  }
}

/**
 * Constant spread over the benchmark spot curve that reprices the bond's
 * cash flows to `marketPrice`, each flow discounted at r(t) + z with the
 * bond's own compounding frequency.
 */
export function zSpread<S extends YieldSpec>(
  bond: BondVariant<S>,
  marketPrice: number,
  curve: readonly CurvePoint[],
  basis?: S,
  config: Partial<EngineConfig> = {},
): number {
  const resolved = resolveConfig(config);
  assertPositivePrice(marketPrice);
  validateCurve(curve);

  const f = bond.terms.paymentsPerYear;
  const flows = bond.buildCashFlows(bond.specAt(0, basis)).map((cf) => ({
    ...cf,
    spot: interpolateCurve(curve, cf.timeYears),
  }));

  const objective = (z: number): number => {
    let pv = 0;
    for (const cf of flows) {
      const rate = cf.spot + z;
      // outside the discounting domain the flow is worth more than any price
      if (1 + rate / f <= 0) return Number.POSITIVE_INFINITY;
      pv += cf.amount * Math.pow(discountBase(rate, f), -cf.timeYears * f);
    }
    return pv - marketPrice;
  };

  const result = bisect(objective, resolved.zSpreadLower, resolved.zSpreadUpper, {
    residualTolerance: resolved.priceTolerance * bond.terms.faceValue,
    stepTolerance: resolved.yieldTolerance,
    maxIterations: resolved.maxBisectionIterations,
  });
  if (!result.converged) {
    throw new ConvergenceError(
      `z-spread for price ${marketPrice} not found in [${resolved.zSpreadLower}, ${resolved.zSpreadUpper}] (${result.reason})`,
      result.reason === 'no-bracket' ? 'no-bracket' : 'max-iterations',
      result.iterations,
      result.root,
    );
  }
  return result.root;
}

/**
 * Rate and factor sensitivities.
 *
 * Analytic (rate factor only), with DF_t = (1 + y/f)^(-t*f):
 *   ModifiedDuration = sum(t * CF_t * DF_t) / (P * (1 + y/f))
 *   Convexity        = sum(t * (t + 1/f) * CF_t * DF_t) / (P * (1 + y/f)^2)
 *
 * Finite difference, bumping the factor by +/- eps:
 *   Duration  = -(P+ - P-) / (2 * eps * P0)
 *   Convexity =  (P+ + P- - 2 * P0) / (eps^2 * P0)
 */

import { resolveConfig, type EngineConfig } from './config.js';
import { DomainError } from './errors.js';
import { discountBase, price } from './pricing.js';
import type { BondVariant, FactorSensitivity, RiskFactor, SensitivityResult, YieldSpec } from './types.js';

const ONE_BP = 1e-4;

interface RateMoments {
  price: number;
  macaulay: number;
  modified: number;
  convexity: number;
}

function analyticRateMoments<S extends YieldSpec>(bond: BondVariant<S>, spec: S): RateMoments {
  const f = bond.terms.paymentsPerYear;
  const y = bond.discountBasis(spec);
  const base = discountBase(y, f);

  let pv = 0;
  let timeWeighted = 0;
  let curvature = 0;
  for (const cf of bond.buildCashFlows(spec)) {
    if (cf.amount === 0) continue;
    const dcf = cf.amount * Math.pow(base, -cf.timeYears * f);
    pv += dcf;
    timeWeighted += cf.timeYears * dcf;
    curvature += cf.timeYears * (cf.timeYears + 1 / f) * dcf;
  }
  if (!Number.isFinite(pv)) {
    throw new DomainError(`yield ${y} gives a per-period discount base of ${base}; present value overflows`, base);
  }

  return {
    price: pv,
    macaulay: timeWeighted / pv,
    modified: timeWeighted / (pv * base),
    convexity: curvature / (pv * base * base),
  };
}

function centralDifference<S extends YieldSpec>(
  bond: BondVariant<S>,
  spec: S,
  factor: RiskFactor,
  eps: number,
): { p0: number; duration: number; convexity: number } {
  const p0 = price(bond, spec);
  const up = price(bond, bond.shift(spec, factor, eps));
  const down = price(bond, bond.shift(spec, factor, -eps));
  return {
    p0,
    duration: -(up - down) / (2 * eps * p0),
    convexity: (up + down - 2 * p0) / (eps * eps * p0),
  };
}

/** Duration and convexity along one risk factor of the bond's basis. */
export function factorSensitivity<S extends YieldSpec>(
  bond: BondVariant<S>,
  spec: S,
  factor: RiskFactor,
  config: Partial<EngineConfig> = {},
): FactorSensitivity {
  const resolved = resolveConfig(config);
  if (factor === 'rate' && resolved.sensitivityMethod === 'analytic') {
    const m = analyticRateMoments(bond, spec);
    return { factor, duration: m.modified, convexity: m.convexity };
  }
  const fd = centralDifference(bond, spec, factor, resolved.bumpSize);
  return { factor, duration: fd.duration, convexity: fd.convexity };
}

export function sensitivities<S extends YieldSpec>(
  bond: BondVariant<S>,
  spec: S,
  config: Partial<EngineConfig> = {},
): SensitivityResult {
  const resolved = resolveConfig(config);
  const analytic = analyticRateMoments(bond, spec);

  let modifiedDuration = analytic.modified;
  let convexity = analytic.convexity;
  if (resolved.sensitivityMethod === 'finite-difference') {
    const fd = centralDifference(bond, spec, 'rate', resolved.bumpSize);
    modifiedDuration = fd.duration;
    convexity = fd.convexity;
  }

  const result: SensitivityResult = {
    price: analytic.price,
    macaulayDuration: analytic.macaulay,
    modifiedDuration,
    convexity,
    dv01: modifiedDuration * analytic.price * ONE_BP,
  };

  // spread and inflation factors are always bumped
  if (bond.factors.includes('spread')) {
    const spread = centralDifference(bond, spec, 'spread', resolved.bumpSize);
    return { ...result, creditSpreadDuration: spread.duration };
  }
  if (bond.factors.includes('inflation')) {
    const inflation = centralDifference(bond, spec, 'inflation', resolved.bumpSize);
    return { ...result, inflationDuration: inflation.duration };
  }
  return result;
}

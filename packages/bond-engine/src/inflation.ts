// Breakeven inflation between nominal and inflation-linked yields

import { resolveConfig, type EngineConfig } from './config.js';
import { ConvergenceError, DomainError, assertFinite } from './errors.js';
import { discountBase, presentValue, price } from './pricing.js';
import { newtonRaphson } from './solver.js';
import type { InflationLinkedBond } from './types.js';

export type BreakevenMethod = 'simple' | 'fisher';

/** Fisher relation: (1 + nominal) = (1 + real)(1 + inflation). */
export function nominalFromReal(realYield: number, inflation: number): number {
  assertFinite(realYield, 'realYield');
  assertFinite(inflation, 'inflation');
  return (1 + realYield) * (1 + inflation) - 1;
}

export function breakevenInflation(
  nominalYield: number,
  realYield: number,
  method: BreakevenMethod = 'simple',
): number {
  assertFinite(nominalYield, 'nominalYield');
  assertFinite(realYield, 'realYield');
  if (method === 'simple') return nominalYield - realYield;

  if (1 + realYield <= 0) {
    throw new DomainError(`real yield ${realYield} leaves no positive growth factor`, 1 + realYield);
  }
  return (1 + nominalYield) / (1 + realYield) - 1;
}

export interface BreakevenSolution {
  readonly inflation: number;
  readonly iterations: number;
  readonly linkedValue: number;   // linked bond at the real yield, index held at today's ratio
}

/**
 * Flat inflation rate at which the linked bond's projected nominal flows,
 * discounted at the nominal yield, are worth what the bond is worth at its
 * real yield with the index held at today's ratio.
 */
export function solveBreakevenInflation(
  bond: InflationLinkedBond,
  nominalYield: number,
  realYield: number,
  config: Partial<EngineConfig> = {},
): BreakevenSolution {
  const resolved = resolveConfig(config);
  const f = bond.terms.paymentsPerYear;
  discountBase(nominalYield, f);

  const linkedValue = price(bond, { kind: 'InflationLinked', realYield, inflationAccrual: 0 });
  const projected = (inflation: number) =>
    bond.buildCashFlows({ kind: 'InflationLinked', realYield, inflationAccrual: inflation });

  const objective = (inflation: number) => presentValue(projected(inflation), nominalYield, f) - linkedValue;
  // d/dpi of CF(pi) = (t - lag) * CF(pi) / (1 + pi)
  const lagYears = bond.indexation.lagMonths / 12;
  const derivative = (inflation: number) => {
    let d = 0;
    for (const cf of projected(inflation)) {
      d += ((cf.timeYears - lagYears) * cf.amount * Math.pow(discountBase(nominalYield, f), -cf.timeYears * f)) / (1 + inflation);
    }
    return d;
  };

  const result = newtonRaphson(objective, derivative, breakevenInflation(nominalYield, realYield), {
    residualTolerance: resolved.priceTolerance * bond.terms.faceValue,
    stepTolerance: resolved.yieldTolerance,
    maxIterations: resolved.maxIterations,
    derivativeFloor: resolved.derivativeFloor,
    isAdmissible: (inflation) => Number.isFinite(inflation) && 1 + inflation > 0,
  });

  if (!result.converged) {
    throw new ConvergenceError(
      `breakeven inflation did not converge (${result.reason}) after ${result.iterations} iterations`,
      result.reason === 'residual' || result.reason === 'step' ? 'max-iterations' : result.reason,
      result.iterations,
      result.root,
    );
  }
  return { inflation: result.root, iterations: result.iterations, linkedValue };
}

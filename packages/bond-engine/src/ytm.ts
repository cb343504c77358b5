// Yield to maturity: invert the pricing function for an observed market price

import { resolveConfig, type EngineConfig } from './config.js';
import { ConvergenceError, assertFinite, type ConvergenceFailure } from './errors.js';
import { assertPositivePrice, discountedSum, presentValueDerivative } from './pricing.js';
import { bisect, newtonRaphson, type RootResult } from './solver.js';
import type { BondVariant, YieldSpec } from './types.js';

export interface SolveContext<S extends YieldSpec> {
  /** Supplies the non-yield parts of the basis (base rate, inflation accrual). */
  basis?: S;
  config?: Partial<EngineConfig>;
}

export interface YieldSolution {
  readonly yield: number;
  readonly iterations: number;
  readonly method: 'newton' | 'bisection';
  readonly residual: number;
}

export function solveYieldDetailed<S extends YieldSpec>(
  bond: BondVariant<S>,
  marketPrice: number,
  initialGuess?: number,
  context: SolveContext<S> = {},
): YieldSolution {
  const config = resolveConfig(context.config);
  assertPositivePrice(marketPrice);
  const guess = initialGuess ?? config.initialGuess;
  assertFinite(guess, 'initialGuess');

  const { paymentsPerYear: f, faceValue } = bond.terms;
  // flows do not depend on the discount yield, only on the rest of the basis
  const cashFlows = bond.buildCashFlows(bond.specAt(guess, context.basis));
  const residualTolerance = config.priceTolerance * faceValue;

  const objective = (y: number) => discountedSum(cashFlows, y, f) - marketPrice;
  const newton = newtonRaphson(objective, (y) => presentValueDerivative(cashFlows, y, f), guess, {
    residualTolerance,
    stepTolerance: config.yieldTolerance,
    maxIterations: config.maxIterations,
    derivativeFloor: config.derivativeFloor,
    isAdmissible: (y) => Number.isFinite(y) && 1 + y / f > 0,
  });
  if (newton.converged) {
    return { yield: newton.root, iterations: newton.iterations, method: 'newton', residual: newton.error };
  }

  if (config.solverFallback === 'none') {
    throw solveFailure(marketPrice, newton, newton);
  }

  const fallback = bisect(objective, -0.99 * f, config.maxYield, {
    residualTolerance,
    stepTolerance: config.yieldTolerance,
    maxIterations: config.maxBisectionIterations,
  });
  if (!fallback.converged) {
    throw solveFailure(marketPrice, newton, fallback);
  }
  return {
    yield: fallback.root,
    iterations: newton.iterations + fallback.iterations,
    method: 'bisection',
    residual: fallback.error,
  };
}

/**
 * Discount yield at which the bond prices to `marketPrice`. For Corporate bonds
 * that is the all-in yield; for InflationLinked bonds the real yield at the
 * basis' inflation accrual.
 */
export function solveYield<S extends YieldSpec>(
  bond: BondVariant<S>,
  marketPrice: number,
  initialGuess?: number,
  context: SolveContext<S> = {},
): number {
  return solveYieldDetailed(bond, marketPrice, initialGuess, context).yield;
}

function solveFailure(marketPrice: number, newton: RootResult, last: RootResult): ConvergenceError {
  const reason: ConvergenceFailure = last.reason === 'residual' || last.reason === 'step'
    ? 'max-iterations'
    : last.reason;
  const detail = last === newton
    ? `Newton stopped (${newton.reason}) after ${newton.iterations} iterations`
    : `Newton stopped (${newton.reason}); bisection stopped (${last.reason})`;
  return new ConvergenceError(
    `yield solve for price ${marketPrice} did not converge: ${detail}`,
    reason,
    newton.iterations + (last === newton ? 0 : last.iterations),
    last.root,
  );
}

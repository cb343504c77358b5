// Bond valuation and rate-sensitivity engine
// Pure, synchronous functions over immutable bond variants

export * from './types.js';

export { DEFAULT_ENGINE_CONFIG, resolveConfig } from './config.js';
export type { EngineConfig, SensitivityMethod, SolverFallback } from './config.js';

export {
  BondEngineError,
  InvalidInputError,
  DomainError,
  ConvergenceError,
  isBondEngineError,
} from './errors.js';
export type { BondErrorKind, ConvergenceFailure } from './errors.js';

export { nominalBond, corporateBond, inflationLinkedBond } from './bond.js';
export type { BondOptions, InflationLinkedTerms } from './bond.js';

export { resolveTerms, buildSchedule, accruedInterest, couponAmount } from './schedule.js';
export { discountBase, discountFactor, discountedSum, presentValue, presentValueDerivative, price, priceBond } from './pricing.js';
export { newtonRaphson, bisect } from './solver.js';
export type { RootResult, StopReason, NewtonOptions, BisectionOptions } from './solver.js';
export { solveYield, solveYieldDetailed } from './ytm.js';
export type { SolveContext, YieldSolution } from './ytm.js';
export { sensitivities, factorSensitivity } from './sensitivity.js';
export { runScenario, runSpreadRateGrid, validateShocks } from './scenario.js';
export type { ScenarioOptions } from './scenario.js';

export { indexRatio, indexRatioAt, indexCashFlows, DEFAULT_INDEXATION_LAG_MONTHS } from './indexation.js';
export { breakevenInflation, solveBreakevenInflation, nominalFromReal } from './inflation.js';
export type { BreakevenMethod, BreakevenSolution } from './inflation.js';
export {
  spreadFromBps,
  spreadToBps,
  defaultProbability,
  solveImpliedSpread,
  interpolateCurve,
  zSpread,
  BPS_PER_UNIT,
} from './credit.js';

export { historicalVolatility, logReturns, priceYieldPath, parYieldShift, TRADING_DAYS_PER_YEAR } from './history.js';

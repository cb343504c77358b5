// Scenario tables: linear, convexity-adjusted and exact repricing under shocks

import type { EngineConfig } from './config.js';
import { InvalidInputError } from './errors.js';
import { price } from './pricing.js';
import { factorSensitivity } from './sensitivity.js';
import type { BondVariant, CorporateBond, CorporateYield, GridRow, RiskFactor, ScenarioRow, YieldSpec } from './types.js';

export interface ScenarioOptions {
  /** Which part of the basis the shocks move (default 'rate'). */
  factor?: RiskFactor;
  config?: Partial<EngineConfig>;
}

export function validateShocks(shocks: readonly number[], field = 'shocks'): void {
  if (!Array.isArray(shocks) || shocks.length === 0) {
    throw new InvalidInputError(`${field} must be a non-empty list`, field);
  }
  shocks.forEach((shock, i) => {
    if (typeof shock !== 'number' || !Number.isFinite(shock)) {
      throw new InvalidInputError(`${field}[${i}] must be a finite number (got ${shock})`, field);
    }
  });
}

function approximate(
  basePrice: number,
  duration: number,
  convexity: number,
  shock: number,
): Pick<ScenarioRow, 'linearApproxPrice' | 'convexityApproxPrice'> {
  const linearApproxPrice = basePrice * (1 - duration * shock);
  return {
    linearApproxPrice,
    convexityApproxPrice: linearApproxPrice + 0.5 * convexity * shock * shock * basePrice,
  };
}

/**
 * One row per shock, in input order. Shocks are signed and in the same units
 * as the basis (0.01 = +100bp).
 */
export function runScenario<S extends YieldSpec>(
  bond: BondVariant<S>,
  baseSpec: S,
  shocks: readonly number[],
  options: ScenarioOptions = {},
): ScenarioRow[] {
  validateShocks(shocks);
  const factor = options.factor ?? 'rate';
  if (!bond.factors.includes(factor)) {
    throw new InvalidInputError(`${bond.kind} bonds cannot be shocked on '${factor}'`, 'factor');
  }

  const p0 = price(bond, baseSpec);
  const { duration, convexity } = factorSensitivity(bond, baseSpec, factor, options.config);

  return shocks.map((shock) => {
    const exactPrice = price(bond, bond.shift(baseSpec, factor, shock));
    return {
      shockAmount: shock,
      ...approximate(p0, duration, convexity, shock),
      exactPrice,
      percentChange: (exactPrice - p0) / p0,
    };
  });
}

/**
 * Rate x spread grid for a corporate bond, rate-major. Each exact price moves
 * base rate and spread together; the approximations use the combined shift.
 */
export function runSpreadRateGrid(
  bond: CorporateBond,
  baseSpec: CorporateYield,
  rateShocks: readonly number[],
  spreadShocks: readonly number[],
  config: Partial<EngineConfig> = {},
): GridRow[] {
  validateShocks(rateShocks, 'rateShocks');
  validateShocks(spreadShocks, 'spreadShocks');

  const p0 = price(bond, baseSpec);
  const { duration, convexity } = factorSensitivity(bond, baseSpec, 'rate', config);
  const rows: GridRow[] = [];

  for (const rateShock of rateShocks) {
    for (const spreadShock of spreadShocks) {
      const shocked = bond.shift(bond.shift(baseSpec, 'rate', rateShock), 'spread', spreadShock);
      const exactPrice = price(bond, shocked);
      const combined = rateShock + spreadShock;
      rows.push({
        rateShock,
        spreadShock,
        shockAmount: combined,
        ...approximate(p0, duration, convexity, combined),
        exactPrice,
        percentChange: (exactPrice - p0) / p0,
      });
    }
  }
  return rows;
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  discountFactor,
  parYieldShift,
  priceBond,
  priceYieldPath,
  sensitivities,
  solveYieldDetailed,
  spreadToBps,
} from "bond-engine";
import {
  BondPriceSchema,
  BondSensitivitySchema,
  BondYieldSchema,
  PriceYieldPathSchema,
} from "../schemas/fixed_income.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { engineConfig, type ToolContext } from "../context.js";
import { linkedBondFrom, withMarketBond, withPricedBond } from "../valuation.js";

export function registerFixedIncomeTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "bond_price",
    "Price a Nominal, Corporate (base rate + credit spread) or InflationLinked bond: dirty/clean price, accrued interest, discount yield, optional discounted cash flow schedule",
    BondPriceSchema.shape,
    async (params) => runTool("bond_price", ctx.log, () => {
      const { bond, include_cash_flows } = BondPriceSchema.parse(coerceNumbers(params));
      const priced = withPricedBond(bond, (variant, spec) => {
        const result = priceBond(variant, spec);
        const f = variant.terms.paymentsPerYear;
        return {
          type: bond.type,
          dirty_price: result.dirtyPrice,
          clean_price: result.cleanPrice,
          accrued_interest: result.accruedInterest,
          discount_yield: result.discountYield,
          periods: variant.terms.periods,
          cash_flows: include_cash_flows
            ? result.cashFlows.map((cf) => ({
                time_years: cf.timeYears,
                amount: cf.amount,
                present_value: cf.amount * discountFactor(result.discountYield, f, cf.timeYears),
              }))
            : undefined,
        };
      });

      if (bond.type === "InflationLinked") {
        const linked = linkedBondFrom(bond);
        return {
          ...priced,
          index_ratio: linked.indexRatio,
          lag_months: linked.indexation.lagMonths,
          indexed_principal: linked.indexedPrincipal({
            kind: "InflationLinked",
            realYield: bond.real_yield,
            inflationAccrual: bond.inflation_accrual,
          }),
        };
      }
      return priced;
    })
  );

  server.tool(
    "bond_yield",
    "Solve the discount yield that reprices a bond to a market price (Newton-Raphson with analytic derivative, bisection fallback). Corporate: all-in yield and implied spread over base_rate; InflationLinked: real yield",
    BondYieldSchema.shape,
    async (params) => runTool("bond_yield", ctx.log, () => {
      const { bond, market_price, initial_guess, fallback } = BondYieldSchema.parse(coerceNumbers(params));
      const config = engineConfig(ctx, { fallback });
      const solution = withMarketBond(bond, (variant, basis) =>
        solveYieldDetailed(variant, market_price, initial_guess, { basis, config })
      );
      const body = {
        type: bond.type,
        yield: solution.yield,
        method: solution.method,
        iterations: solution.iterations,
        residual: solution.residual,
      };
      if (bond.type === "Corporate") {
        return { ...body, credit_spread_bps: spreadToBps(solution.yield - bond.base_rate) };
      }
      return body;
    })
  );

  server.tool(
    "bond_sensitivities",
    "Macaulay and modified duration, convexity, DV01, and the parallel yield change that brings the bond to par. Corporate adds credit-spread duration; InflationLinked adds inflation duration",
    BondSensitivitySchema.shape,
    async (params) => runTool("bond_sensitivities", ctx.log, () => {
      const { bond, sensitivity_method, bump_size } = BondSensitivitySchema.parse(coerceNumbers(params));
      const config = engineConfig(ctx, { sensitivity_method, bump_size });
      return withPricedBond(bond, (variant, spec) => {
        const s = sensitivities(variant, spec, config);
        return {
          type: bond.type,
          price: s.price,
          macaulay_duration: s.macaulayDuration,
          modified_duration: s.modifiedDuration,
          convexity: s.convexity,
          dv01: s.dv01,
          credit_spread_duration: s.creditSpreadDuration,
          inflation_duration: s.inflationDuration,
          par_yield_shift: parYieldShift(variant, spec, config),
        };
      });
    })
  );

  server.tool(
    "price_yield_path",
    "Reprice a bond at each discount yield in a list (price/yield curve), holding base rate or inflation accrual fixed",
    PriceYieldPathSchema.shape,
    async (params) => runTool("price_yield_path", ctx.log, () => {
      const { bond, yields } = PriceYieldPathSchema.parse(coerceNumbers(params));
      const prices = withMarketBond(bond, (variant, basis) => priceYieldPath(variant, yields, basis));
      return {
        type: bond.type,
        points: yields.map((y, i) => ({ yield: y, price: prices[i] })),
      };
    })
  );
}

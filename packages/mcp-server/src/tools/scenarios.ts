import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { corporateBond, price, runScenario, runSpreadRateGrid, spreadFromBps, type ScenarioRow } from "bond-engine";
import { BondScenarioSchema, SpreadRateGridSchema } from "../schemas/scenarios.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { engineConfig, type ToolContext } from "../context.js";
import { toTerms, withPricedBond } from "../valuation.js";

function rowBody(row: ScenarioRow) {
  return {
    shock: row.shockAmount,
    linear_approx_price: row.linearApproxPrice,
    convexity_approx_price: row.convexityApproxPrice,
    exact_price: row.exactPrice,
    percent_change: row.percentChange,
  };
}

export function registerScenarioTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "bond_scenario",
    "Shock a bond's rate, credit spread or inflation assumption: per shock, duration-only and duration+convexity price estimates alongside the exact repriced value and percent change",
    BondScenarioSchema.shape,
    async (params) => runTool("bond_scenario", ctx.log, () => {
      const { bond, shocks, factor, sensitivity_method, bump_size } = BondScenarioSchema.parse(coerceNumbers(params));
      const config = engineConfig(ctx, { sensitivity_method, bump_size });
      return withPricedBond(bond, (variant, spec) => ({
        type: bond.type,
        factor,
        base_price: price(variant, spec),
        rows: runScenario(variant, spec, shocks, { factor, config }).map(rowBody),
      }));
    })
  );

  server.tool(
    "spread_rate_grid",
    "Corporate bond repricing grid over base-rate and credit-spread shocks (rate-major), with approximations from the combined shift",
    SpreadRateGridSchema.shape,
    async (params) => runTool("spread_rate_grid", ctx.log, () => {
      const { bond, rate_shocks, spread_shocks, sensitivity_method, bump_size } =
        SpreadRateGridSchema.parse(coerceNumbers(params));
      const config = engineConfig(ctx, { sensitivity_method, bump_size });
      const variant = corporateBond(toTerms(bond));
      const spec = {
        kind: "Corporate",
        baseRate: bond.base_rate,
        creditSpread: spreadFromBps(bond.credit_spread_bps),
      } as const;
      return {
        base_price: price(variant, spec),
        rows: runSpreadRateGrid(variant, spec, rate_shocks, spread_shocks, config).map((row) => ({
          rate_shock: row.rateShock,
          spread_shock: row.spreadShock,
          ...rowBody(row),
        })),
      };
    })
  );
}

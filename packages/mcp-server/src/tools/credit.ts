import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  corporateBond,
  defaultProbability,
  nominalBond,
  solveImpliedSpread,
  spreadFromBps,
  spreadToBps,
  zSpread,
} from "bond-engine";
import { CreditAnalyticsSchema } from "../schemas/credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { engineConfig, type ToolContext } from "../context.js";
import { toTerms } from "../valuation.js";

export function registerCreditTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "credit_analytics",
    "Credit-spread analytics: Z-spread over an interpolated spot curve, implied spread over a base rate from a market price, and annual default probability from a spread (spread / (1 - recovery))",
    CreditAnalyticsSchema.shape,
    async (params) => runTool("credit_analytics", ctx.log, () => {
      const { model } = CreditAnalyticsSchema.parse(coerceNumbers(params));
      const config = engineConfig(ctx);

      switch (model.type) {
        case "ZSpread": {
          const z = zSpread(nominalBond(toTerms(model)), model.market_price, model.curve, undefined, config);
          return { type: model.type, z_spread: z, z_spread_bps: spreadToBps(z) };
        }
        case "ImpliedSpread": {
          const spread = solveImpliedSpread(corporateBond(toTerms(model)), model.market_price, model.base_rate, config);
          return {
            type: model.type,
            credit_spread: spread,
            credit_spread_bps: spreadToBps(spread),
            all_in_yield: model.base_rate + spread,
          };
        }
        case "DefaultProbability": {
          const spread = spreadFromBps(model.credit_spread_bps);
          return {
            type: model.type,
            credit_spread: spread,
            recovery_rate: model.recovery_rate,
            default_probability: defaultProbability(spread, model.recovery_rate),
          };
        }
      }
    })
  );
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InvalidInputError, historicalVolatility } from "bond-engine";
import { BondPresetsSchema, HistoricalVolatilitySchema } from "../schemas/market.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import type { ToolContext } from "../context.js";
import { loadPresets } from "../presets.js";

export function registerMarketTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "historical_volatility",
    "Rolling annualised volatility of log returns from a price series (sample standard deviation x sqrt(periods per year)); entries before the first full window are null",
    HistoricalVolatilitySchema.shape,
    async (params) => runTool("historical_volatility", ctx.log, () => {
      const { prices, window, periods_per_year } = HistoricalVolatilitySchema.parse(coerceNumbers(params));
      const volatility = historicalVolatility(prices, window, periods_per_year);
      return {
        window,
        periods_per_year,
        volatility,
        latest: volatility[volatility.length - 1] ?? null,
      };
    })
  );

  server.tool(
    "bond_presets",
    "List named sample bonds (US Treasury, Alphabet corporate, UK Gilt, UK index-linked) usable as the `bond` input of the pricing, sensitivity and scenario tools",
    BondPresetsSchema.shape,
    async (params) => runTool("bond_presets", ctx.log, () => {
      const { name } = BondPresetsSchema.parse(params);
      const presets = loadPresets(ctx.presetsPath);
      if (name === undefined) return { presets };
      const preset = presets.find((p) => p.name === name);
      if (!preset) {
        throw new InvalidInputError(
          `Unknown preset "${name}". Available: ${presets.map((p) => p.name).join(", ")}`,
          "name"
        );
      }
      return preset;
    })
  );
}

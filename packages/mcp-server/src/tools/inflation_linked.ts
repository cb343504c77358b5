import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { breakevenInflation, InvalidInputError, nominalFromReal, solveBreakevenInflation } from "bond-engine";
import { BreakevenInflationSchema } from "../schemas/inflation_linked.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { engineConfig, type ToolContext } from "../context.js";
import { linkedBondFrom } from "../valuation.js";

export function registerInflationLinkedTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "breakeven_inflation",
    "Breakeven inflation between a nominal and a real yield: simple difference, Fisher relation, or solved against an inflation-linked bond's projected cash flows",
    BreakevenInflationSchema.shape,
    async (params) => runTool("breakeven_inflation", ctx.log, () => {
      const { nominal_yield, real_yield, method, bond } = BreakevenInflationSchema.parse(coerceNumbers(params));

      if (method !== "solved") {
        const inflation = breakevenInflation(nominal_yield, real_yield, method);
        return {
          method,
          breakeven_inflation: inflation,
          implied_nominal_yield: nominalFromReal(real_yield, inflation),
        };
      }

      if (bond === undefined) {
        throw new InvalidInputError("bond is required for the solved method", "bond");
      }
      const solution = solveBreakevenInflation(linkedBondFrom(bond), nominal_yield, real_yield, engineConfig(ctx));
      return {
        method,
        breakeven_inflation: solution.inflation,
        iterations: solution.iterations,
        linked_value: solution.linkedValue,
        simple_breakeven: breakevenInflation(nominal_yield, real_yield, "simple"),
      };
    })
  );
}

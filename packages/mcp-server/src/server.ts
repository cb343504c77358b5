import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { ToolContext } from "./context.js";
import { registerFixedIncomeTools } from "./tools/fixed_income.js";
import { registerScenarioTools } from "./tools/scenarios.js";
import { registerInflationLinkedTools } from "./tools/inflation_linked.js";
import { registerCreditTools } from "./tools/credit.js";
import { registerMarketTools } from "./tools/market.js";

export function createServer(config: ServerConfig, log: Logger): McpServer {
  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  const ctx: ToolContext = { engine: config.engine, log, presetsPath: config.presetsPath };

  registerFixedIncomeTools(server, ctx);
  registerScenarioTools(server, ctx);
  registerInflationLinkedTools(server, ctx);
  registerCreditTools(server, ctx);
  registerMarketTools(server, ctx);

  return server;
}

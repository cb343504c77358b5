#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { configFromEnv } from "./config.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";

const config = configFromEnv();
const log = createLogger(config.logLevel);
const server = createServer(config, log);

const transport = new StdioServerTransport();
await server.connect(transport);
log.info(`${config.name} ${config.version} listening on stdio`, { engine: config.engine });

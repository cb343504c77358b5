// Server configuration from environment (BOND_ENGINE_* / BOND_MCP_*)
// dotenv is loaded by the entry point before this is read

import { resolveConfig, type EngineConfig } from "bond-engine";
import type { LogLevel } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
  logLevel: LogLevel;
  /** Path to the preset bonds JSON; defaults to data/bond-presets.json in this package. */
  presetsPath?: string;
  /** Engine defaults applied to every tool call; per-call inputs override them. */
  engine: Partial<EngineConfig>;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number (got "${raw}")`);
  }
  return value;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = (env.BOND_MCP_LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`BOND_MCP_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${logLevel}")`);
  }

  const engine: Partial<EngineConfig> = {};
  const bumpSize = numberFromEnv(env, "BOND_ENGINE_BUMP_SIZE");
  if (bumpSize !== undefined) engine.bumpSize = bumpSize;
  const maxIterations = numberFromEnv(env, "BOND_ENGINE_MAX_ITERATIONS");
  if (maxIterations !== undefined) engine.maxIterations = maxIterations;
  const maxYield = numberFromEnv(env, "BOND_ENGINE_MAX_YIELD");
  if (maxYield !== undefined) engine.maxYield = maxYield;

  const method = env.BOND_ENGINE_SENSITIVITY_METHOD;
  if (method === "analytic" || method === "finite-difference") {
    engine.sensitivityMethod = method;
  } else if (method !== undefined && method !== "") {
    throw new Error(`BOND_ENGINE_SENSITIVITY_METHOD must be analytic or finite-difference (got "${method}")`);
  }

  const fallback = env.BOND_ENGINE_SOLVER_FALLBACK;
  if (fallback === "bisection" || fallback === "none") {
    engine.solverFallback = fallback;
  } else if (fallback !== undefined && fallback !== "") {
    throw new Error(`BOND_ENGINE_SOLVER_FALLBACK must be bisection or none (got "${fallback}")`);
  }

  // fail at startup rather than on the first tool call
  resolveConfig(engine);

  return {
    name: env.BOND_MCP_NAME ?? "bond-risk-mcp",
    version: "0.1.0",
    logLevel,
    presetsPath: env.BOND_MCP_PRESETS_PATH || undefined,
    engine,
  };
}

import type { EngineConfig } from "bond-engine";
import type { Logger } from "./logger.js";

/** Shared by every tool registration. */
export interface ToolContext {
  engine: Partial<EngineConfig>;
  log: Logger;
  presetsPath?: string;
}

interface EngineOverrides {
  sensitivity_method?: EngineConfig["sensitivityMethod"];
  bump_size?: number;
  fallback?: EngineConfig["solverFallback"];
}

/** Server-wide engine defaults with a tool call's overrides on top. */
export function engineConfig(ctx: ToolContext, overrides: EngineOverrides = {}): Partial<EngineConfig> {
  const config: Partial<EngineConfig> = { ...ctx.engine };
  if (overrides.sensitivity_method !== undefined) config.sensitivityMethod = overrides.sensitivity_method;
  if (overrides.bump_size !== undefined) config.bumpSize = overrides.bump_size;
  if (overrides.fallback !== undefined) config.solverFallback = overrides.fallback;
  return config;
}

import {
  ConvergenceError,
  DomainError,
  InvalidInputError,
  isBondEngineError,
  type BondEngineError,
} from "bond-engine";
import type { Logger } from "../logger.js";

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown): unknown {
  if (typeof obj === "string") {
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(coerceNumbers);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v);
    }
    return result;
  }
  return obj;
}

/** Error payload: message, error kind and whatever context the error carries. */
export function errorBody(err: BondEngineError): Record<string, unknown> {
  const body: Record<string, unknown> = { error: err.message, kind: err.kind };
  if (err instanceof InvalidInputError && err.field !== undefined) {
    body.field = err.field;
  } else if (err instanceof DomainError) {
    body.value = err.value;
  } else if (err instanceof ConvergenceError) {
    body.reason = err.reason;
    body.iterations = err.iterations;
    body.last_estimate = err.lastEstimate;
  }
  return body;
}

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    const body = isBondEngineError(result) ? errorBody(result) : { error: result.message };
    return {
      content: [{ type: "text" as const, text: JSON.stringify(body) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Runs a tool body. Engine errors become error results; anything else
 * (schema failures included) is logged and left for the SDK to report.
 */
export function runTool(tool: string, log: Logger, body: () => unknown): ToolResponse {
  log.debug(`call ${tool}`);
  try {
    return wrapResponse(body());
  } catch (err) {
    if (isBondEngineError(err)) {
      log.warn(`${tool} failed`, { kind: err.kind, error: err.message });
      return wrapResponse(err);
    }
    log.error(`${tool} failed`, { error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
}

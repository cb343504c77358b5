import { z } from "zod";
import { EngineOverridesShape, MarketBondSchema, PricedBondSchema } from "./common.js";

export const BondPriceSchema = z.object({
  bond: PricedBondSchema,
  include_cash_flows: z.boolean().default(false).describe("Return the discounted cash flow schedule"),
});

export const BondYieldSchema = z.object({
  bond: MarketBondSchema,
  market_price: z.coerce.number().positive().describe("Observed dirty price"),
  initial_guess: z.coerce.number().optional().describe("Starting yield for Newton-Raphson (default 0.05)"),
  fallback: z
    .enum(["bisection", "none"])
    .optional()
    .describe("What to do when Newton-Raphson fails (default bisection)"),
});

export const BondSensitivitySchema = z.object({
  bond: PricedBondSchema,
  ...EngineOverridesShape,
});

export const PriceYieldPathSchema = z.object({
  bond: MarketBondSchema,
  yields: z.array(z.coerce.number()).min(1).describe("Discount yields as decimals"),
});

import { z } from "zod";
import { CorporateBondSchema, EngineOverridesShape, PricedBondSchema, ShockListSchema } from "./common.js";

export const BondScenarioSchema = z.object({
  bond: PricedBondSchema,
  shocks: ShockListSchema,
  factor: z
    .enum(["rate", "spread", "inflation"])
    .default("rate")
    .describe("Part of the yield basis the shocks move"),
  ...EngineOverridesShape,
});

export const SpreadRateGridSchema = z.object({
  bond: CorporateBondSchema,
  rate_shocks: ShockListSchema.describe("Base-rate shocks as decimals"),
  spread_shocks: ShockListSchema.describe("Credit-spread shocks as decimals (0.005 = +50bp)"),
  ...EngineOverridesShape,
});

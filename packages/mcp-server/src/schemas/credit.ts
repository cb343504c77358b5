import { z } from "zod";
import { BondTermsShape } from "./common.js";

const CurvePointSchema = z.object({
  tenor: z.coerce.number().min(0).describe("Tenor in years"),
  rate: z.coerce.number().describe("Spot rate as decimal"),
});

export const CreditAnalyticsSchema = z.object({
  model: z
    .discriminatedUnion("type", [
      z.object({
        type: z.literal("ZSpread"),
        ...BondTermsShape,
        market_price: z.coerce.number().positive().describe("Observed dirty price"),
        curve: z.array(CurvePointSchema).min(1).describe("Benchmark spot curve"),
      }),
      z.object({
        type: z.literal("ImpliedSpread"),
        ...BondTermsShape,
        market_price: z.coerce.number().positive().describe("Observed dirty price"),
        base_rate: z.coerce.number().describe("Treasury base rate as decimal"),
      }),
      z.object({
        type: z.literal("DefaultProbability"),
        credit_spread_bps: z.coerce.number().describe("Credit spread in basis points"),
        recovery_rate: z.coerce.number().min(0).lt(1).default(0.4).describe("Recovery rate as decimal"),
      }),
    ])
    .describe("Credit analytic selection"),
});

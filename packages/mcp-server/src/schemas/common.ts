import { z } from "zod";

export const BondTermsShape = {
  coupon_rate: z.coerce.number().min(0).describe("Annual coupon rate as decimal (0.0125 = 1.25%)"),
  face_value: z.coerce.number().positive().default(100).describe("Face/par value"),
  payments_per_year: z.coerce.number().int().positive().default(2).describe("Coupons per year (1, 2, 4, 12)"),
  years_to_maturity: z.coerce.number().positive().describe("Years to maturity"),
  stub_convention: z
    .enum(["reject", "short-first"])
    .optional()
    .describe("How a maturity that is not a whole number of periods is handled (default reject)"),
};

export const BondTermsSchema = z.object(BondTermsShape);

const IndexationShape = {
  base_index_level: z.coerce.number().positive().describe("Reference index level at issue (e.g. base CPI)"),
  current_index_level: z.coerce.number().positive().describe("Current index level"),
  lag_months: z.coerce.number().int().min(0).optional().describe("Indexation lag in months (default 3); each flow uses the index projected to its date less the lag"),
};

/** Bond with a full yield basis: enough to price it. */
export const PricedBondSchema = z
  .discriminatedUnion("type", [
    z.object({
      type: z.literal("Nominal"),
      ...BondTermsShape,
      yield: z.coerce.number().describe("Yield to maturity as decimal"),
    }),
    z.object({
      type: z.literal("Corporate"),
      ...BondTermsShape,
      base_rate: z.coerce.number().describe("Treasury base rate as decimal"),
      credit_spread_bps: z.coerce.number().describe("Credit spread over the base rate in basis points"),
    }),
    z.object({
      type: z.literal("InflationLinked"),
      ...BondTermsShape,
      ...IndexationShape,
      real_yield: z.coerce.number().describe("Real yield as decimal"),
      inflation_accrual: z.coerce.number().default(0).describe("Assumed flat annual inflation as decimal"),
    }),
  ])
  .describe("Bond variant with its yield basis");

/** Bond without its discount yield: the part a market price determines. */
export const MarketBondSchema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("Nominal"), ...BondTermsShape }),
    z.object({
      type: z.literal("Corporate"),
      ...BondTermsShape,
      base_rate: z.coerce.number().default(0).describe("Treasury base rate as decimal; the spread is solved over it"),
    }),
    z.object({
      type: z.literal("InflationLinked"),
      ...BondTermsShape,
      ...IndexationShape,
      inflation_accrual: z.coerce.number().default(0).describe("Assumed flat annual inflation as decimal"),
    }),
  ])
  .describe("Bond variant without its discount yield");

export const CorporateBondSchema = z.object({
  ...BondTermsShape,
  base_rate: z.coerce.number().describe("Treasury base rate as decimal"),
  credit_spread_bps: z.coerce.number().describe("Credit spread over the base rate in basis points"),
});

export const InflationLinkedTermsSchema = z.object({
  ...BondTermsShape,
  ...IndexationShape,
});

export const EngineOverridesShape = {
  sensitivity_method: z
    .enum(["analytic", "finite-difference"])
    .optional()
    .describe("Duration/convexity method (default analytic)"),
  bump_size: z.coerce.number().positive().optional().describe("Finite-difference bump as decimal (default 0.0001)"),
};

export const ShockListSchema = z
  .array(z.coerce.number())
  .min(1)
  .describe("Signed shocks as decimals (0.01 = +100bp)");

export type PricedBond = z.infer<typeof PricedBondSchema>;
export type MarketBond = z.infer<typeof MarketBondSchema>;
export type BondTermsInput = z.infer<typeof BondTermsSchema>;

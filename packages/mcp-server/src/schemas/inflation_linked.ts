import { z } from "zod";
import { InflationLinkedTermsSchema } from "./common.js";

export const BreakevenInflationSchema = z.object({
  nominal_yield: z.coerce.number().describe("Nominal yield as decimal"),
  real_yield: z.coerce.number().describe("Real yield as decimal"),
  method: z
    .enum(["simple", "fisher", "solved"])
    .default("simple")
    .describe("simple: nominal - real; fisher: (1+n)/(1+r) - 1; solved: root-find against a linked bond"),
  bond: InflationLinkedTermsSchema.optional().describe("Inflation-linked bond; required for the solved method"),
});

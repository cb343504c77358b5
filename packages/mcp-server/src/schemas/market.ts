import { z } from "zod";

export const HistoricalVolatilitySchema = z.object({
  prices: z.array(z.coerce.number().positive()).min(2).describe("Price series, oldest first"),
  window: z.coerce.number().int().min(2).default(30).describe("Rolling window in returns"),
  periods_per_year: z.coerce.number().positive().default(252).describe("Observations per year for annualising"),
});

export const BondPresetsSchema = z.object({
  name: z.string().optional().describe("Preset name; omit to list all presets"),
});

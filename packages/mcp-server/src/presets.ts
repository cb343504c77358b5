// Named sample bonds. Pure data: each preset is a ready-made `bond` input for the pricing tools.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { PricedBondSchema } from "./schemas/common.js";

export const BondPresetSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  bond: PricedBondSchema,
});

export type BondPreset = z.infer<typeof BondPresetSchema>;

export const DEFAULT_PRESETS_PATH = fileURLToPath(new URL("../data/bond-presets.json", import.meta.url));

let cached: { path: string; presets: BondPreset[] } | null = null;

export function loadPresets(path = DEFAULT_PRESETS_PATH): BondPreset[] {
  if (cached && cached.path === path) return cached.presets;
  let presets: BondPreset[];
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
    presets = z.array(BondPresetSchema).parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid presets file ${path}: ${message}`, { cause: err });
  }
  cached = { path, presets };
  return presets;
}

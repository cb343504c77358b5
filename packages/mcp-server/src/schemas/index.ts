export {
  BondTermsSchema,
  PricedBondSchema,
  MarketBondSchema,
  CorporateBondSchema,
  InflationLinkedTermsSchema,
  ShockListSchema,
} from "./common.js";
export type { PricedBond, MarketBond, BondTermsInput } from "./common.js";

export { BondPriceSchema, BondYieldSchema, BondSensitivitySchema, PriceYieldPathSchema } from "./fixed_income.js";

export { BondScenarioSchema, SpreadRateGridSchema } from "./scenarios.js";

export { BreakevenInflationSchema } from "./inflation_linked.js";

export { CreditAnalyticsSchema } from "./credit.js";

export { HistoricalVolatilitySchema, BondPresetsSchema } from "./market.js";

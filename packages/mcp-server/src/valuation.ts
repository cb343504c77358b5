// Maps tool inputs onto engine bond variants. The variant is chosen here once;
// tool bodies are written against the generic BondVariant surface.

import {
  corporateBond,
  inflationLinkedBond,
  nominalBond,
  spreadFromBps,
  type BondTerms,
  type BondVariant,
  type InflationLinkedBond,
  type YieldSpec,
} from "bond-engine";
import type { BondTermsInput, MarketBond, PricedBond } from "./schemas/index.js";

export interface BondVisitor<R> {
  <S extends YieldSpec>(bond: BondVariant<S>, spec: S): R;
}

export function toTerms(input: BondTermsInput): BondTerms {
  return {
    couponRate: input.coupon_rate,
    faceValue: input.face_value,
    paymentsPerYear: input.payments_per_year,
    yearsToMaturity: input.years_to_maturity,
    stubConvention: input.stub_convention,
  };
}

interface LinkedInput extends BondTermsInput {
  base_index_level: number;
  current_index_level: number;
  lag_months?: number;
}

export function linkedBondFrom(input: LinkedInput): InflationLinkedBond {
  return inflationLinkedBond({
    ...toTerms(input),
    indexation: {
      baseIndexLevel: input.base_index_level,
      currentIndexLevel: input.current_index_level,
      lagMonths: input.lag_months,
    },
  });
}

/** Builds the bond and its full yield basis, then hands both to `visit`. */
export function withPricedBond<R>(input: PricedBond, visit: BondVisitor<R>): R {
  switch (input.type) {
    case "Nominal":
      return visit(nominalBond(toTerms(input)), { kind: "Nominal", yield: input.yield });
    case "Corporate":
      return visit(corporateBond(toTerms(input)), {
        kind: "Corporate",
        baseRate: input.base_rate,
        creditSpread: spreadFromBps(input.credit_spread_bps),
      });
    case "InflationLinked":
      return visit(linkedBondFrom(input), {
        kind: "InflationLinked",
        realYield: input.real_yield,
        inflationAccrual: input.inflation_accrual,
      });
  }
}

/**
 * Builds the bond and a basis carrying everything but the discount yield
 * (base rate, inflation accrual), which a solve or a yield path supplies.
 */
export function withMarketBond<R>(input: MarketBond, visit: BondVisitor<R>): R {
  switch (input.type) {
    case "Nominal":
      return visit(nominalBond(toTerms(input)), { kind: "Nominal", yield: 0 });
    case "Corporate":
      return visit(corporateBond(toTerms(input)), { kind: "Corporate", baseRate: input.base_rate, creditSpread: 0 });
    case "InflationLinked":
      return visit(linkedBondFrom(input), {
        kind: "InflationLinked",
        realYield: 0,
        inflationAccrual: input.inflation_accrual,
      });
  }
}

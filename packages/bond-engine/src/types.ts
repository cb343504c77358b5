// Core records: bond terms, cash flows, yield bases, risk outputs
// All rates and yields are annual fractions (0.05 = 5%); bps only at the edges

export type BondKind = 'Nominal' | 'InflationLinked' | 'Corporate';

/** How a maturity that is not a whole number of coupon periods is treated. */
export type StubConvention = 'reject' | 'short-first';

/** Component of the discounting basis a shock can be applied to. */
export type RiskFactor = 'rate' | 'spread' | 'inflation';

export interface BondTerms {
  readonly couponRate: number;        // annual, fraction of face
  readonly faceValue: number;         // > 0
  readonly paymentsPerYear: number;   // integer >= 1
  readonly yearsToMaturity: number;   // > 0
  readonly stubConvention?: StubConvention;
}

export interface ResolvedTerms extends BondTerms {
  readonly stubConvention: StubConvention;
  readonly periods: number;           // number of coupon dates remaining
  readonly regular: boolean;          // false when the first period is a short stub
}

export interface CashFlow {
  readonly timeYears: number;         // > 0, strictly increasing within a schedule
  readonly amount: number;
}

export interface Indexation {
  readonly baseIndexLevel: number;
  readonly currentIndexLevel: number;
  readonly lagMonths: number;         // observation lag the current level was read under
}

export interface NominalYield {
  readonly kind: 'Nominal';
  readonly yield: number;
}

export interface CorporateYield {
  readonly kind: 'Corporate';
  readonly baseRate: number;          // treasury / risk-free yield
  readonly creditSpread: number;      // fraction, not bps
}

export interface InflationLinkedYield {
  readonly kind: 'InflationLinked';
  readonly realYield: number;
  readonly inflationAccrual: number;  // flat assumed annual inflation used to project the index
}

export type YieldSpec = NominalYield | CorporateYield | InflationLinkedYield;

/**
 * A bond variant. The variant is chosen once by its constructor and owns every
 * kind-specific rule; pricing, solving and scenario code only talk to this surface.
 */
export interface BondVariant<S extends YieldSpec> {
  readonly kind: S['kind'];
  readonly terms: ResolvedTerms;
  /** Contractual (unindexed) schedule, built once. */
  readonly schedule: readonly CashFlow[];
  /** Risk factors `shift` accepts for this variant. */
  readonly factors: readonly RiskFactor[];
  buildCashFlows(spec: S): readonly CashFlow[];
  discountBasis(spec: S): number;
  accruedInterest(spec: S): number;
  shift(spec: S, factor: RiskFactor, delta: number): S;
  /** A spec whose discount basis is `discountYield`, keeping the non-yield parts of `basis`. */
  specAt(discountYield: number, basis?: S): S;
}

export type NominalBond = BondVariant<NominalYield>;
export type CorporateBond = BondVariant<CorporateYield>;

export interface InflationLinkedBond extends BondVariant<InflationLinkedYield> {
  readonly indexation: Indexation;
  readonly indexRatio: number;
  indexedPrincipal(spec: InflationLinkedYield): number;
}

export type AnyBond = NominalBond | CorporateBond | InflationLinkedBond;

export interface PriceResult {
  readonly dirtyPrice: number;
  readonly cleanPrice: number;
  readonly accruedInterest: number;
  readonly discountYield: number;
  readonly cashFlows: readonly CashFlow[];
}

export interface SensitivityResult {
  readonly price: number;
  readonly macaulayDuration: number;
  readonly modifiedDuration: number;
  readonly convexity: number;
  readonly dv01: number;                     // price change for a 1bp fall in yield
  readonly creditSpreadDuration?: number;    // Corporate only
  readonly inflationDuration?: number;       // InflationLinked only; negative, price rises with inflation
}

export interface FactorSensitivity {
  readonly factor: RiskFactor;
  readonly duration: number;   // -(1/P) dP/dx
  readonly convexity: number;  //  (1/P) d2P/dx2
}

export interface ScenarioRow {
  readonly shockAmount: number;
  readonly linearApproxPrice: number;
  readonly convexityApproxPrice: number;
  readonly exactPrice: number;
  readonly percentChange: number;   // fraction
}

export interface GridRow extends ScenarioRow {
  readonly rateShock: number;
  readonly spreadShock: number;
}

export interface CurvePoint {
  readonly tenor: number;   // years
  readonly rate: number;    // fraction
}

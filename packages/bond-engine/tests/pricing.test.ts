import { describe, it, expect } from 'vitest';
import { nominalBond, corporateBond, inflationLinkedBond } from '../src/bond.js';
import { discountFactor, presentValue, price, priceBond } from '../src/pricing.js';
import { DomainError, InvalidInputError } from '../src/errors.js';

const tenYear = nominalBond({ couponRate: 0.05, faceValue: 100, paymentsPerYear: 2, yearsToMaturity: 10 });

describe('price', () => {
  it('matches the zero-coupon closed form', () => {
    const zero = nominalBond({ couponRate: 0, faceValue: 100, paymentsPerYear: 2, yearsToMaturity: 10 });
    const y = 0.04;
    expect(price(zero, { kind: 'Nominal', yield: y })).toBeCloseTo(100 * Math.pow(1 + y / 2, -20), 12);
    expect(price(zero, { kind: 'Nominal', yield: y })).toBeCloseTo(67.29713331080575, 10);
  });

  it('prices a bond at par when coupon equals yield', () => {
    expect(price(tenYear, { kind: 'Nominal', yield: 0.05 })).toBeCloseTo(100, 10);
  });

  it('is strictly decreasing in yield', () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let y = -0.05; y <= 0.3; y += 0.005) {
      const p = price(tenYear, { kind: 'Nominal', yield: y });
      expect(p).toBeLessThan(previous);
      previous = p;
    }
  });

  it('is pure', () => {
    const spec = { kind: 'Nominal', yield: 0.0437 } as const;
    expect(price(tenYear, spec)).toBe(price(tenYear, spec));
  });

  it('raises DomainError when the discount base is not positive', () => {
    expect(() => price(tenYear, { kind: 'Nominal', yield: -2 })).toThrow(DomainError);
    expect(() => price(tenYear, { kind: 'Nominal', yield: -2.5 })).toThrow(DomainError);
    expect(() => discountFactor(-4, 4, 1)).toThrow(DomainError);
  });

  it('raises DomainError when a small positive base overflows the present value', () => {
    const monthly = nominalBond({ couponRate: 0.05, faceValue: 100, paymentsPerYear: 12, yearsToMaturity: 30 });
    let caught: unknown;
    try {
      price(monthly, { kind: 'Nominal', yield: -11 });
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof DomainError)) throw caught;
    expect(caught.value).toBeCloseTo(1 / 12, 12);
    expect(() => presentValue(monthly.buildCashFlows({ kind: 'Nominal', yield: 0 }), -11, 12)).toThrow(DomainError);
  });

  it('rejects a non-finite yield', () => {
    expect(() => price(tenYear, { kind: 'Nominal', yield: Number.NaN })).toThrow(InvalidInputError);
  });
});

describe('variant agreement at zero shock', () => {
  it('corporate with zero spread equals nominal at the base rate', () => {
    const terms = { couponRate: 0.0225, faceValue: 100, paymentsPerYear: 2, yearsToMaturity: 36 };
    const nominal = price(nominalBond(terms), { kind: 'Nominal', yield: 0.0479 });
    const corporate = price(corporateBond(terms), { kind: 'Corporate', baseRate: 0.0479, creditSpread: 0 });
    expect(corporate).toBe(nominal);
  });

  it('linked bond with unit ratio and no inflation equals nominal at the real yield', () => {
    const terms = { couponRate: 0.00125, faceValue: 100, paymentsPerYear: 2, yearsToMaturity: 49 };
    const linked = inflationLinkedBond({ ...terms, indexation: { baseIndexLevel: 250, currentIndexLevel: 250 } });
    const nominal = price(nominalBond(terms), { kind: 'Nominal', yield: -0.0175 });
    expect(price(linked, { kind: 'InflationLinked', realYield: -0.0175, inflationAccrual: 0 })).toBeCloseTo(nominal, 10);
  });
});

describe('presentValue', () => {
  it('discounts each flow at (1 + y/f)^(-t*f)', () => {
    const flows = [
      { timeYears: 1, amount: 10 },
      { timeYears: 2, amount: 110 },
    ];
    expect(presentValue(flows, 0.1, 1)).toBeCloseTo(10 / 1.1 + 110 / 1.21, 12);
  });
});

describe('priceBond', () => {
  it('splits dirty price into clean price and accrued interest', () => {
    const stub = nominalBond({
      couponRate: 0.04,
      faceValue: 100,
      paymentsPerYear: 2,
      yearsToMaturity: 2.25,
      stubConvention: 'short-first',
    });
    const result = priceBond(stub, { kind: 'Nominal', yield: 0.04 });
    const expectedDirty = [0.25, 0.75, 1.25, 1.75].reduce((s, t) => s + 2 * Math.pow(1.02, -2 * t), 0) +
      102 * Math.pow(1.02, -4.5);
    expect(result.dirtyPrice).toBeCloseTo(expectedDirty, 10);
    expect(result.accruedInterest).toBeCloseTo(1, 12);
    expect(result.cleanPrice).toBeCloseTo(expectedDirty - 1, 10);
    expect(result.discountYield).toBe(0.04);
    expect(result.cashFlows).toHaveLength(5);
  });

  it('reports the all-in discount yield for a corporate bond', () => {
    const corp = corporateBond({ couponRate: 0.03, faceValue: 100, paymentsPerYear: 2, yearsToMaturity: 5 });
    const result = priceBond(corp, { kind: 'Corporate', baseRate: 0.04, creditSpread: 0.0085 });
    expect(result.discountYield).toBeCloseTo(0.0485, 14);
    expect(result.accruedInterest).toBe(0);
    expect(result.cleanPrice).toBe(result.dirtyPrice);
  });
});

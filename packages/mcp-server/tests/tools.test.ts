import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createServer } from '../src/server.js';
import { createLogger } from '../src/logger.js';

const badPresetsPath = fileURLToPath(new URL('./fixtures/bad-presets.json', import.meta.url));

const BodySchema = z.record(z.unknown());
const RowSchema = z.object({
  shock: z.number(),
  linear_approx_price: z.number(),
  convexity_approx_price: z.number(),
  exact_price: z.number(),
  percent_change: z.number(),
});

const treasury = {
  type: 'Nominal',
  coupon_rate: 0.0125,
  face_value: 100,
  payments_per_year: 2,
  years_to_maturity: 26,
  yield: 0.047897,
};

const server = createServer(
  { name: 'bond-risk-mcp-test', version: '0.0.0', logLevel: 'silent', engine: {} },
  createLogger('silent'),
);
const client = new Client({ name: 'tools-test', version: '0.0.0' });

async function call(name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first.type !== 'text') throw new Error(`expected text content from ${name}`);
  return { isError: result.isError ?? false, body: BodySchema.parse(JSON.parse(first.text)) };
}

beforeAll(async () => {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterAll(async () => {
  await client.close();
  await server.close();
});

describe('MCP tools', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'bond_presets',
      'bond_price',
      'bond_scenario',
      'bond_sensitivities',
      'bond_yield',
      'breakeven_inflation',
      'credit_analytics',
      'historical_volatility',
      'price_yield_path',
      'spread_rate_grid',
    ]);
  });

  describe('bond_price', () => {
    it('prices a nominal bond', async () => {
      const { isError, body } = await call('bond_price', { bond: treasury });
      expect(isError).toBe(false);
      expect(body.type).toBe('Nominal');
      expect(body.dirty_price).toBeCloseTo(47.68486261045532, 10);
      expect(body.accrued_interest).toBe(0);
      expect(body.periods).toBe(52);
      expect(body.cash_flows).toBeUndefined();
    });

    it('returns discounted cash flows on request', async () => {
      const { body } = await call('bond_price', {
        bond: { type: 'Nominal', coupon_rate: 0.05, years_to_maturity: 1, yield: 0.05 },
        include_cash_flows: true,
      });
      const flows = z.array(z.object({ time_years: z.number(), amount: z.number(), present_value: z.number() }))
        .parse(body.cash_flows);
      expect(flows.map((f) => [f.time_years, f.amount])).toEqual([[0.5, 2.5], [1, 102.5]]);
      expect(flows[0].present_value).toBeCloseTo(2.5 / 1.025, 12);
    });

    it('converts a corporate spread from basis points', async () => {
      const { body } = await call('bond_price', {
        bond: { type: 'Corporate', coupon_rate: 0.0225, years_to_maturity: 36, base_rate: 0.0479, credit_spread_bps: 85 },
      });
      expect(body.discount_yield).toBeCloseTo(0.0564, 12);
      expect(body.dirty_price).toBeCloseTo(48.00945611407909, 9);
    });

    it('reports index ratio and indexed principal for linked bonds', async () => {
      const { body } = await call('bond_price', {
        bond: {
          type: 'InflationLinked',
          coupon_rate: 0.0125,
          years_to_maturity: 10,
          base_index_level: 250,
          current_index_level: 300,
          real_yield: 0.01,
          inflation_accrual: 0.025,
        },
      });
      expect(body.dirty_price).toBeCloseTo(154.29098693993126, 9);
      expect(body.index_ratio).toBe(1.2);
      expect(body.lag_months).toBe(3);
      expect(body.indexed_principal).toBeCloseTo(152.66480721205005, 10);
    });

    it('prices a linked bond differently under two observation lags', async () => {
      const linked = {
        type: 'InflationLinked',
        coupon_rate: 0.0125,
        years_to_maturity: 10,
        base_index_level: 250,
        current_index_level: 300,
        real_yield: 0.01,
        inflation_accrual: 0.03,
      };
      const lagZero = await call('bond_price', { bond: { ...linked, lag_months: 0 } });
      const lagEight = await call('bond_price', { bond: { ...linked, lag_months: 8 } });
      expect(lagZero.body.lag_months).toBe(0);
      expect(lagEight.body.lag_months).toBe(8);
      expect(lagZero.body.dirty_price).toBeCloseTo(162.61026281333358, 9);
      expect(lagEight.body.dirty_price).toBeCloseTo(159.43725255192157, 9);
    });

    it('returns a Domain error result outside the discounting domain', async () => {
      const { isError, body } = await call('bond_price', { bond: { ...treasury, yield: -2.5 } });
      expect(isError).toBe(true);
      expect(body.kind).toBe('Domain');
      expect(body.value).toBeCloseTo(-0.25, 12);
    });

    it('returns an InvalidInput error result for a fractional period count', async () => {
      const { isError, body } = await call('bond_price', { bond: { ...treasury, years_to_maturity: 10.25 } });
      expect(isError).toBe(true);
      expect(body.kind).toBe('InvalidInput');
      expect(body.field).toBe('yearsToMaturity');
    });
  });

  describe('bond_yield', () => {
    it('solves a par bond', async () => {
      const { body } = await call('bond_yield', {
        bond: { type: 'Nominal', coupon_rate: 0.05, years_to_maturity: 10 },
        market_price: 100,
      });
      expect(body.yield).toBeCloseTo(0.05, 10);
      expect(body.method).toBe('newton');
    });

    it('reports the implied spread for a corporate bond', async () => {
      const { body } = await call('bond_yield', {
        bond: { type: 'Corporate', coupon_rate: 0.05, years_to_maturity: 10, base_rate: 0.03 },
        market_price: 100,
      });
      expect(body.yield).toBeCloseTo(0.05, 10);
      expect(body.credit_spread_bps).toBeCloseTo(200, 6);
    });

    it('returns a Convergence error result when the fallback is disabled', async () => {
      const { isError, body } = await call('bond_yield', {
        bond: { type: 'Nominal', coupon_rate: 0.05, years_to_maturity: 10 },
        market_price: 100,
        initial_guess: 0.5,
        fallback: 'none',
      });
      expect(isError).toBe(true);
      expect(body.kind).toBe('Convergence');
      expect(body.reason).toBe('domain');
    });
  });

  describe('bond_sensitivities', () => {
    it('returns duration, convexity, dv01 and the par shift', async () => {
      const { body } = await call('bond_sensitivities', { bond: treasury });
      expect(body.macaulay_duration).toBeCloseTo(20.05281648074269, 10);
      expect(body.modified_duration).toBeCloseTo(19.58381352259678, 10);
      expect(body.convexity).toBeCloseTo(465.74833307089483, 8);
      expect(body.dv01).toBeCloseTo(0.09338514572138046, 12);
      expect(body.par_yield_shift).toBeCloseTo(0.0125 - 0.047897, 9);
      expect(body.credit_spread_duration).toBeUndefined();
    });

    it('switches to finite differences on request', async () => {
      const { body } = await call('bond_sensitivities', { bond: treasury, sensitivity_method: 'finite-difference' });
      expect(body.modified_duration).toBeCloseTo(19.583833193989403, 6);
    });
  });

  describe('price_yield_path', () => {
    it('prices each yield in order', async () => {
      const { body } = await call('price_yield_path', {
        bond: { type: 'Nominal', coupon_rate: 0.05, years_to_maturity: 10 },
        yields: [0.06, 0.05],
      });
      const points = z.array(z.object({ yield: z.number(), price: z.number() })).parse(body.points);
      expect(points[0].yield).toBe(0.06);
      expect(points[0].price).toBeCloseTo(92.5612625697722, 9);
      expect(points[1].price).toBeCloseTo(100, 9);
    });
  });

  describe('bond_scenario', () => {
    it('returns rows in shock order', async () => {
      const { body } = await call('bond_scenario', { bond: treasury, shocks: [-0.03, 0.01] });
      const rows = z.array(RowSchema).parse(body.rows);
      expect(rows.map((r) => r.shock)).toEqual([-0.03, 0.01]);
      expect(rows[0].exact_price).toBeCloseTo(88.81921486998334, 9);
      expect(rows[0].percent_change).toBeCloseTo(0.8626291449251017, 10);
      expect(body.base_price).toBeCloseTo(47.68486261045532, 10);
    });

    it('rejects a factor the bond does not carry', async () => {
      const { isError, body } = await call('bond_scenario', { bond: treasury, shocks: [0.01], factor: 'spread' });
      expect(isError).toBe(true);
      expect(body.field).toBe('factor');
    });
  });

  describe('spread_rate_grid', () => {
    it('lists rows rate-major', async () => {
      const { body } = await call('spread_rate_grid', {
        bond: { coupon_rate: 0.0225, years_to_maturity: 36, base_rate: 0.0479, credit_spread_bps: 85 },
        rate_shocks: [-0.01, 0.01],
        spread_shocks: [0, 0.005],
      });
      const rows = z.array(RowSchema.extend({ rate_shock: z.number(), spread_shock: z.number() })).parse(body.rows);
      expect(rows.map((r) => [r.rate_shock, r.spread_shock])).toEqual([[-0.01, 0], [-0.01, 0.005], [0.01, 0], [0.01, 0.005]]);
    });
  });

  describe('breakeven_inflation', () => {
    it('applies the Fisher relation', async () => {
      const { body } = await call('breakeven_inflation', { nominal_yield: 0.045, real_yield: 0.015, method: 'fisher' });
      expect(body.breakeven_inflation).toBeCloseTo(0.029556650246305383, 14);
      expect(body.implied_nominal_yield).toBeCloseTo(0.045, 14);
    });

    it('solves against a linked bond', async () => {
      const { body } = await call('breakeven_inflation', {
        nominal_yield: 0.045,
        real_yield: 0.015,
        method: 'solved',
        bond: { coupon_rate: 0.0125, years_to_maturity: 10, base_index_level: 250, current_index_level: 300 },
      });
      expect(body.breakeven_inflation).toBeCloseTo(0.030828275200561417, 8);
      expect(body.linked_value).toBeCloseTo(117.22379704594486, 9);
    });

    it('requires a bond for the solved method', async () => {
      const { isError, body } = await call('breakeven_inflation', { nominal_yield: 0.045, real_yield: 0.015, method: 'solved' });
      expect(isError).toBe(true);
      expect(body).toEqual({ error: 'bond is required for the solved method', kind: 'InvalidInput', field: 'bond' });
    });
  });

  describe('credit_analytics', () => {
    it('computes a default probability from basis points', async () => {
      const { body } = await call('credit_analytics', { model: { type: 'DefaultProbability', credit_spread_bps: 85 } });
      expect(body.credit_spread).toBe(0.0085);
      expect(body.default_probability).toBeCloseTo(0.014166666666666666, 15);
    });

    it('solves the z-spread over a flat curve', async () => {
      const { body } = await call('credit_analytics', {
        model: {
          type: 'ZSpread',
          coupon_rate: 0.05,
          years_to_maturity: 10,
          market_price: 92.5612625697722,
          curve: [{ tenor: 1, rate: 0.04 }, { tenor: 30, rate: 0.04 }],
        },
      });
      expect(body.z_spread).toBeCloseTo(0.02, 8);
      expect(body.z_spread_bps).toBeCloseTo(200, 4);
    });

    it('implies the spread over a base rate', async () => {
      const { body } = await call('credit_analytics', {
        model: { type: 'ImpliedSpread', coupon_rate: 0.05, years_to_maturity: 10, market_price: 100, base_rate: 0.03 },
      });
      expect(body.credit_spread).toBeCloseTo(0.02, 10);
      expect(body.all_in_yield).toBeCloseTo(0.05, 10);
    });
  });

  describe('historical_volatility', () => {
    it('returns the rolling series and the latest value', async () => {
      const { body } = await call('historical_volatility', { prices: [100, 101, 99.5, 100.5, 102], window: 2 });
      const vols = z.array(z.number().nullable()).parse(body.volatility);
      expect(vols.slice(0, 2)).toEqual([null, null]);
      expect(vols[2]).toBeCloseTo(0.2796500160473397, 12);
      expect(body.latest).toBeCloseTo(0.05404826845938686, 12);
    });
  });

  describe('bond_presets', () => {
    it('lists the sample bonds', async () => {
      const { body } = await call('bond_presets', {});
      const presets = z.array(z.object({ name: z.string() })).parse(body.presets);
      expect(presets.map((p) => p.name)).toEqual([
        'us-treasury-1.25-26y',
        'alphabet-2.25-2060',
        'uk-gilt-0.5-2061',
        'uk-index-linked-0.125-2073',
      ]);
    });

    it('returns a preset usable as a bond input', async () => {
      const preset = await call('bond_presets', { name: 'alphabet-2.25-2060' });
      const { isError, body } = await call('bond_price', { bond: preset.body.bond });
      expect(isError).toBe(false);
      expect(body.periods).toBe(73);
      expect(body.type).toBe('Corporate');
    });

    it('reports an unknown preset', async () => {
      const { isError, body } = await call('bond_presets', { name: 'missing' });
      expect(isError).toBe(true);
      expect(body.error).toMatch(/^Unknown preset "missing"/);
      expect(body.kind).toBe('InvalidInput');
      expect(body.field).toBe('name');
    });

    it('logs a malformed presets file as a tool failure', async () => {
      const lines: string[] = [];
      const badServer = createServer(
        { name: 'bond-risk-mcp-test', version: '0.0.0', logLevel: 'error', engine: {}, presetsPath: badPresetsPath },
        createLogger('error', 'bond-risk-mcp', (line) => lines.push(line)),
      );
      const badClient = new Client({ name: 'tools-test', version: '0.0.0' });
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await Promise.all([badClient.connect(clientTransport), badServer.connect(serverTransport)]);
      try {
        const result = CallToolResultSchema.parse(await badClient.callTool({ name: 'bond_presets', arguments: {} }));
        expect(result.isError).toBe(true);
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatch(/^\[bond-risk-mcp:ERROR\] bond_presets failed \{"error":"Invalid presets file /);
      } finally {
        await badClient.close();
        await badServer.close();
      }
    });
  });
});

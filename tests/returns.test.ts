import { describe, it, expect } from 'vitest';
import {
  logReturns,
  toReturnSeries,
  reconstructPrices,
  realizedVolatility,
  buildReturnPanel,
  panelColumn,
  portfolioReturns,
  InsufficientDataError,
} from '../src/index.js';
import { factorPricePanel } from './helpers.js';

describe('logReturns', () => {
  it('should compute ln(p_t / p_t-1)', () => {
    const r = logReturns([100, 110, 99]);
    expect(r).toHaveLength(2);
    expect(r[0]).toBeCloseTo(Math.log(1.1), 12);
    expect(r[1]).toBeCloseTo(Math.log(0.9), 12);
  });

  it('should reject non-positive prices', () => {
    expect(() => logReturns([100, 110, 0])).toThrow('Invalid price at index 2');
    expect(() => logReturns([-1, 110])).toThrow('Invalid price at index 1');
  });

  it('should round-trip prices through returns', () => {
    const prices = factorPricePanel(1, 250)[0].prices;
    const rebuilt = reconstructPrices(prices[0], logReturns(prices));
    expect(rebuilt).toHaveLength(prices.length);
    rebuilt.forEach((p, i) => expect(p).toBeCloseTo(prices[i], 8));
  });
});

describe('toReturnSeries', () => {
  it('should drop the first timestamp', () => {
    const series = toReturnSeries({ asset: 'X', timestamps: [10, 11, 12], prices: [1, 2, 4] });
    expect(series.timestamps).toEqual([11, 12]);
    expect(series.returns[0]).toBeCloseTo(Math.LN2, 12);
    expect(series.returns[1]).toBeCloseTo(Math.LN2, 12);
  });

  it('should reject unordered timestamps', () => {
    expect(() => toReturnSeries({ asset: 'X', timestamps: [1, 3, 2], prices: [1, 1, 1] }))
      .toThrow('X: timestamps must be strictly increasing (index 2)');
  });
});

describe('realizedVolatility', () => {
  const series = { asset: 'X', timestamps: [1, 2, 3, 4], returns: [0.01, -0.02, 0.03, 0.01] };

  it('should take the root mean square over the trailing window', () => {
    const rv = realizedVolatility(series, 2, 1);
    expect(rv.map(e => e.timestamp)).toEqual([2, 3, 4]);
    const sigmas = rv.map(e => (e.value.kind === 'scalar' ? e.value.sigma : NaN));
    expect(sigmas[0]).toBeCloseTo(Math.sqrt(2.5e-4), 12);
    expect(sigmas[1]).toBeCloseTo(Math.sqrt(6.5e-4), 12);
    expect(sigmas[2]).toBeCloseTo(Math.sqrt(5e-4), 12);
  });

  it('should annualize by 252 by default', () => {
    const [first] = realizedVolatility(series, 2);
    expect(first.value.kind).toBe('scalar');
    if (first.value.kind === 'scalar') {
      expect(first.value.sigma).toBeCloseTo(Math.sqrt(252 * 2.5e-4), 12);
    }
  });

  it('should date each estimate at its last return', () => {
    for (const e of realizedVolatility(series, 3, 1)) {
      expect(e.informationTime).toBe(e.timestamp);
      expect(e.source).toBe('realized');
    }
  });

  it('should throw InsufficientDataError when the window is longer than the series', () => {
    expect(() => realizedVolatility(series, 5, 1)).toThrow(InsufficientDataError);
    expect(() => realizedVolatility(series, 5, 1)).toThrow('need at least 6 observations, got 5');
  });

  it('should reject windows below 2', () => {
    expect(() => realizedVolatility(series, 1)).toThrow(RangeError);
  });
});

describe('buildReturnPanel', () => {
  const a = { asset: 'A', timestamps: [1, 2, 3, 4], prices: [100, 101, 102, 103] };
  const b = { asset: 'B', timestamps: [1, 2, 4], prices: [50, 51, 53] };

  it('should fail on a missing price by default', () => {
    expect(() => buildReturnPanel([a, b])).toThrow('Missing or invalid price at timestamp 3');
  });

  it('should drop incomplete dates when asked', () => {
    const { panel, dropped } = buildReturnPanel([a, b], 'drop');
    expect(dropped).toEqual([3]);
    expect(panel.assets).toEqual(['A', 'B']);
    expect(panel.timestamps).toEqual([2, 4]);
    expect(panel.rows[0][0]).toBeCloseTo(Math.log(101 / 100), 12);
    expect(panel.rows[0][1]).toBeCloseTo(Math.log(51 / 50), 12);
    expect(panel.rows[1][0]).toBeCloseTo(Math.log(103 / 101), 12);
    expect(panel.rows[1][1]).toBeCloseTo(Math.log(53 / 51), 12);
  });

  it('should treat a non-positive price as missing', () => {
    const c = { asset: 'C', timestamps: [1, 2, 3, 4], prices: [10, 0, 11, 12] };
    const { panel, dropped } = buildReturnPanel([a, c], 'drop');
    expect(dropped).toEqual([2]);
    expect(panel.timestamps).toEqual([3, 4]);
  });
});

describe('panelColumn / portfolioReturns', () => {
  const { panel } = buildReturnPanel(factorPricePanel(3, 20));

  it('should extract one asset', () => {
    const column = panelColumn(panel, 'A1');
    expect(column.returns).toEqual(panel.rows.map(row => row[1]));
    expect(() => panelColumn(panel, 'ZZ')).toThrow('Unknown asset ZZ');
  });

  it('should average asset returns with equal weights', () => {
    const portfolio = portfolioReturns(panel);
    expect(portfolio.asset).toBe('portfolio');
    portfolio.returns.forEach((r, t) => {
      const row = panel.rows[t];
      expect(r).toBeCloseTo((row[0] + row[1] + row[2]) / 3, 14);
    });
  });

  it('should reject weights of the wrong length', () => {
    expect(() => portfolioReturns(panel, [0.5, 0.5])).toThrow('Expected 3 weights, got 2');
  });
});

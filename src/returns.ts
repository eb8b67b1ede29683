import { InsufficientDataError } from './errors.js';
import type {
  MissingDataPolicy,
  PanelBuildResult,
  PriceSeries,
  ReturnPanel,
  ReturnSeries,
  VolatilityEstimate,
} from './types.js';

function isValidPrice(p: number): boolean {
  return p > 0 && Number.isFinite(p);
}

export function assertIncreasing(timestamps: number[], label: string): void {
  for (let i = 1; i < timestamps.length; i++) {
    if (!(timestamps[i] > timestamps[i - 1])) {
      throw new Error(`${label}: timestamps must be strictly increasing (index ${i})`);
    }
  }
}

/**
 * Calculate log returns from price array: rₜ = ln(pₜ / pₜ₋₁), t ≥ 1.
 */
export function logReturns(prices: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (!isValidPrice(prices[i]) || !isValidPrice(prices[i - 1])) {
      throw new Error(`Invalid price at index ${i}`);
    }
    returns.push(Math.log(prices[i] / prices[i - 1]));
  }
  return returns;
}

/**
 * Log returns keyed by the later of the two prices. The first observation
 * has no return and is dropped.
 */
export function toReturnSeries(series: PriceSeries): ReturnSeries {
  if (series.timestamps.length !== series.prices.length) {
    throw new Error(`${series.asset}: ${series.timestamps.length} timestamps for ${series.prices.length} prices`);
  }
  assertIncreasing(series.timestamps, series.asset);
  return {
    asset: series.asset,
    timestamps: series.timestamps.slice(1),
    returns: logReturns(series.prices),
  };
}

/**
 * Invert log returns: pₜ = p₀·exp(r₁ + … + rₜ).
 */
export function reconstructPrices(initialPrice: number, returns: number[]): number[] {
  if (!isValidPrice(initialPrice)) {
    throw new Error(`Invalid initial price ${initialPrice}`);
  }
  const logP0 = Math.log(initialPrice);
  const prices = [initialPrice];
  let cumulative = 0;
  for (const r of returns) {
    cumulative += r;
    prices.push(Math.exp(logP0 + cumulative));
  }
  return prices;
}

/**
 * Realized volatility of the `window` returns ending at index `end`:
 *
 * RV = √(annualization · mean(r²))
 */
export function trailingRealizedVolatility(
  returns: readonly number[],
  end: number,
  window: number,
  annualization: number,
): number {
  let sum = 0;
  for (let i = end - window + 1; i <= end; i++) {
    sum += returns[i] * returns[i];
  }
  return Math.sqrt((annualization * sum) / window);
}

/**
 * Rolling realized volatility, one estimate per return date with a full window.
 * A window of W returns needs W+1 prices.
 */
export function realizedVolatility(
  series: ReturnSeries,
  window: number,
  annualization = 252,
): VolatilityEstimate[] {
  if (!Number.isInteger(window) || window < 2) {
    throw new RangeError(`window must be an integer >= 2, got ${window}`);
  }
  const n = series.returns.length;
  if (n < window) {
    throw new InsufficientDataError(window + 1, n + 1, `${series.asset} realized volatility`);
  }

  const out: VolatilityEstimate[] = [];
  for (let t = window - 1; t < n; t++) {
    out.push(Object.freeze({
      timestamp: series.timestamps[t],
      informationTime: series.timestamps[t],
      source: 'realized' as const,
      value: Object.freeze({
        kind: 'scalar' as const,
        sigma: trailingRealizedVolatility(series.returns, t, window, annualization),
      }),
    }));
  }
  return out;
}

/**
 * Align several price series on a common timeline and take log returns.
 *
 * `error` requires identical timelines and valid prices everywhere. `drop`
 * keeps only dates where every asset has a valid price; the removed dates are
 * listed in `dropped`, and returns across a removed date span the gap.
 */
export function buildReturnPanel(
  series: PriceSeries[],
  missing: MissingDataPolicy = 'error',
): PanelBuildResult {
  if (series.length === 0) {
    throw new RangeError('Need at least one price series');
  }
  for (const s of series) {
    if (s.timestamps.length !== s.prices.length) {
      throw new Error(`${s.asset}: ${s.timestamps.length} timestamps for ${s.prices.length} prices`);
    }
    assertIncreasing(s.timestamps, s.asset);
  }

  const lookups = series.map(s => new Map(s.timestamps.map((ts, i) => [ts, s.prices[i]])));
  const allTimestamps = [...new Set(series.flatMap(s => s.timestamps))].sort((a, b) => a - b);

  const kept: number[] = [];
  const dropped: number[] = [];
  for (const ts of allTimestamps) {
    const complete = lookups.every(lookup => {
      const price = lookup.get(ts);
      return price !== undefined && isValidPrice(price);
    });
    if (complete) {
      kept.push(ts);
    } else if (missing === 'drop') {
      dropped.push(ts);
    } else {
      throw new Error(`Missing or invalid price at timestamp ${ts}`);
    }
  }

  const columns = lookups.map(lookup => logReturns(kept.map(ts => lookup.get(ts) ?? NaN)));
  const rows = kept.slice(1).map((_, t) => columns.map(col => col[t]));

  return {
    panel: {
      assets: series.map(s => s.asset),
      timestamps: kept.slice(1),
      rows,
    },
    dropped,
  };
}

export function panelColumn(panel: ReturnPanel, asset: string): ReturnSeries {
  const j = panel.assets.indexOf(asset);
  if (j < 0) {
    throw new Error(`Unknown asset ${asset}`);
  }
  return {
    asset,
    timestamps: [...panel.timestamps],
    returns: panel.rows.map(row => row[j]),
  };
}

/**
 * Weighted sum of asset log returns; equal weights unless given.
 */
export function portfolioReturns(panel: ReturnPanel, weights?: number[]): ReturnSeries {
  const k = panel.assets.length;
  const w = weights ?? new Array<number>(k).fill(1 / k);
  if (w.length !== k) {
    throw new RangeError(`Expected ${k} weights, got ${w.length}`);
  }
  return {
    asset: 'portfolio',
    timestamps: [...panel.timestamps],
    returns: panel.rows.map(row => row.reduce((sum, r, j) => sum + w[j] * r, 0)),
  };
}

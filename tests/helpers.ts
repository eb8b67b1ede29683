import type { PriceSeries, ReturnSeries } from '../src/index.js';

// 32-bit LCG (Numerical Recipes constants), uniform on (0, 1)
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return (state + 0.5) / 4294967296;
  };
}

// Box-Muller
export function normals(random: () => number): () => number {
  return () => {
    const u1 = random();
    const u2 = random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

export function dailyTimestamps(n: number, start = 1): number[] {
  return Array.from({ length: n }, (_, i) => start + i);
}

export function gaussianReturns(n: number, sigma: number, seed = 7): ReturnSeries {
  const randn = normals(lcg(seed));
  return {
    asset: 'synthetic',
    timestamps: dailyTimestamps(n),
    returns: Array.from({ length: n }, () => sigma * randn()),
  };
}

/**
 * One-factor price panel: rᵢ = βᵢ·f + eᵢ, so assets are positively correlated
 * but never collinear.
 */
export function factorPricePanel(assets: number, days: number, seed = 11): PriceSeries[] {
  const randn = normals(lcg(seed));
  const timestamps = dailyTimestamps(days + 1);
  const prices = Array.from({ length: assets }, () => [100]);
  const betas = Array.from({ length: assets }, (_, i) => 0.5 + i / assets);

  for (let t = 0; t < days; t++) {
    const factor = 0.01 * randn();
    for (let i = 0; i < assets; i++) {
      const r = betas[i] * factor + 0.008 * randn();
      const row = prices[i];
      row.push(row[row.length - 1] * Math.exp(r));
    }
  }

  return prices.map((p, i) => ({ asset: `A${i}`, timestamps, prices: p }));
}

/**
 * GARCH(1,1) returns with Gaussian innovations, started at the
 * unconditional variance.
 */
export function garchReturns(n: number, omega: number, alpha: number, beta: number, seed = 42): ReturnSeries {
  const randn = normals(lcg(seed));
  const returns: number[] = [];
  let variance = omega / (1 - alpha - beta);
  for (let i = 0; i < n; i++) {
    const r = Math.sqrt(variance) * randn();
    returns.push(r);
    variance = omega + alpha * r * r + beta * variance;
  }
  return { asset: 'garch', timestamps: dailyTimestamps(n), returns };
}

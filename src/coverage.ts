import { chi2Survival } from './utils.js';
import type { CoverageTestResult, ExceedanceEntry, RollingRate } from './types.js';

export interface KupiecInput {
  observations: number;
  exceedances: number;
  alpha: number;
  significance?: number;
}

/**
 * k·ln(p) with the convention 0·ln(0) = 0.
 */
function xlogy(k: number, p: number): number {
  return k === 0 ? 0 : k * Math.log(p);
}

/**
 * Kupiec (1995) unconditional coverage test.
 *
 * LR = −2·ln[ (1−α)^(N−x)·α^x / ((1−π̂)^(N−x)·π̂^x) ],  π̂ = x/N
 *
 * LR ~ χ²(1) under H₀: exceedance rate = α. At x = 0 or x = N the unrestricted
 * likelihood is 1 in the limit, so LR stays finite.
 */
export function kupiecTest(input: KupiecInput): CoverageTestResult {
  const { observations: n, exceedances: x, alpha } = input;
  const significance = input.significance ?? 0.05;

  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`observations must be a positive integer, got ${n}`);
  }
  if (!Number.isInteger(x) || x < 0 || x > n) {
    throw new RangeError(`exceedances must be an integer in [0, ${n}], got ${x}`);
  }
  if (!(alpha > 0 && alpha < 1)) {
    throw new RangeError(`alpha must be in (0, 1), got ${alpha}`);
  }

  const pHat = x / n;
  const restricted = xlogy(n - x, 1 - alpha) + xlogy(x, alpha);
  const unrestricted = xlogy(n - x, 1 - pHat) + xlogy(x, pHat);
  // the unrestricted maximum can undercut the restricted one only by rounding
  const statistic = Math.max(0, -2 * (restricted - unrestricted));
  const pValue = chi2Survival(statistic, 1);

  return Object.freeze({
    test: 'kupiec-uc' as const,
    statistic,
    pValue,
    significance,
    rejectNull: pValue < significance,
    observations: n,
    exceedances: x,
    expectedRate: alpha,
    observedRate: pHat,
  });
}

/**
 * Share of violations over the trailing `window` entries, one value per entry
 * with a full window.
 *
 * Descriptive only: it shows where exceedances bunch together, but it is not an
 * independence test and carries no significance level.
 */
export function rollingExceedanceRate(entries: readonly ExceedanceEntry[], window = 63): RollingRate[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`window must be a positive integer, got ${window}`);
  }

  const out: RollingRate[] = [];
  let count = 0;
  for (let i = 0; i < entries.length; i++) {
    if (entries[i].violated) count++;
    if (i >= window && entries[i - window].violated) count--;
    if (i >= window - 1) {
      out.push({ timestamp: entries[i].timestamp, rate: count / window });
    }
  }
  return out;
}

export interface ExceedanceSummary {
  observations: number;
  exceedances: number;
  exceedanceRate: number;
  kupiec: CoverageTestResult | null;
}

export function summarizeExceedances(
  entries: readonly ExceedanceEntry[],
  alpha: number,
  significance = 0.05,
): ExceedanceSummary {
  const exceedances = entries.filter(e => e.violated).length;
  const observations = entries.length;
  return {
    observations,
    exceedances,
    exceedanceRate: observations > 0 ? exceedances / observations : 0,
    kupiec: observations > 0 ? kupiecTest({ observations, exceedances, alpha, significance }) : null,
  };
}

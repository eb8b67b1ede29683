import { mean, median, quantile } from 'simple-statistics';
import type { ConditionDiagnostic, VolatilityEstimate } from './types.js';
import { toSigma } from './volatility.js';

export interface RegimeLabel {
  timestamp: number;
  volatility: number;
  highVol: boolean;
}

export interface RegimeLabels {
  threshold: number;
  labels: RegimeLabel[];
}

export interface RegimeConditioningRow extends RegimeLabel {
  minEigenvalue: number;
  maxEigenvalue: number;
  conditionNumber: number;
}

export interface RegimeConditionSummary {
  days: number;
  meanConditionNumber: number;
  medianConditionNumber: number;
}

export interface RegimeConditioning {
  rows: RegimeConditioningRow[];
  highVol: RegimeConditionSummary | null;
  normal: RegimeConditionSummary | null;
}

/**
 * Flag dates whose volatility is above the empirical `q` quantile of the
 * whole series, linearly interpolated between order statistics. The label
 * for date t describes the regime that applies to the return at t+1.
 *
 * The threshold uses the full sample, so this is an ex-post description,
 * not an input to forecasting.
 */
export function labelVolatilityRegimes(estimates: VolatilityEstimate[], q = 0.7): RegimeLabels {
  if (estimates.length === 0) {
    throw new RangeError('Need at least one volatility estimate');
  }
  const vols = estimates.map(e => toSigma(e));
  const threshold = quantile(vols, q);
  return {
    threshold,
    labels: estimates.map((e, i) => ({
      timestamp: e.timestamp,
      volatility: vols[i],
      highVol: vols[i] > threshold,
    })),
  };
}

function summarize(rows: RegimeConditioningRow[]): RegimeConditionSummary | null {
  const finite = rows.map(r => r.conditionNumber).filter(c => Number.isFinite(c));
  if (finite.length === 0) return null;
  return {
    days: rows.length,
    meanConditionNumber: mean(finite),
    medianConditionNumber: median(finite),
  };
}

/**
 * Inner join of regime labels and covariance diagnostics on timestamp, with
 * condition-number statistics per regime (infinite condition numbers are
 * counted in `days` but left out of the averages).
 */
export function regimeConditioning(regimes: RegimeLabels, diagnostics: ConditionDiagnostic[]): RegimeConditioning {
  const byTimestamp = new Map(diagnostics.map(d => [d.timestamp, d]));
  const rows: RegimeConditioningRow[] = [];
  for (const label of regimes.labels) {
    const diagnostic = byTimestamp.get(label.timestamp);
    if (!diagnostic) continue;
    rows.push({
      ...label,
      minEigenvalue: diagnostic.minEigenvalue,
      maxEigenvalue: diagnostic.maxEigenvalue,
      conditionNumber: diagnostic.conditionNumber,
    });
  }

  return {
    rows,
    highVol: summarize(rows.filter(r => r.highVol)),
    normal: summarize(rows.filter(r => !r.highVol)),
  };
}

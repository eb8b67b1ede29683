import { describe, it, expect } from 'vitest';
import {
  labelVolatilityRegimes,
  regimeConditioning,
  type ConditionDiagnostic,
  type VolatilityEstimate,
} from '../src/index.js';

function rv(timestamp: number, sigma: number): VolatilityEstimate {
  return { timestamp, informationTime: timestamp, source: 'realized', value: { kind: 'scalar', sigma } };
}

function diagnostic(timestamp: number, conditionNumber: number): ConditionDiagnostic {
  return {
    timestamp,
    minEigenvalue: Number.isFinite(conditionNumber) ? 1 : 0,
    maxEigenvalue: Number.isFinite(conditionNumber) ? conditionNumber : 1,
    conditionNumber,
    rankDeficient: !Number.isFinite(conditionNumber),
  };
}

const estimates = [1, 2, 3, 4, 5, 6, 7, 8].map((sigma, i) => rv(i + 1, sigma));

describe('labelVolatilityRegimes', () => {
  it('should flag dates above the interpolated empirical quantile', () => {
    const { threshold, labels } = labelVolatilityRegimes(estimates, 0.75);
    // 1 + 0.75·7 = 6.25
    expect(threshold).toBeCloseTo(6.25, 12);
    expect(labels.filter(l => l.highVol).map(l => l.timestamp)).toEqual([7, 8]);
    expect(labels[0]).toEqual({ timestamp: 1, volatility: 1, highVol: false });
  });

  it('should use the 70th percentile by default', () => {
    const { threshold, labels } = labelVolatilityRegimes(estimates);
    expect(threshold).toBeCloseTo(5.9, 12);
    expect(labels.filter(l => l.highVol).map(l => l.timestamp)).toEqual([6, 7, 8]);
  });

  it('should need at least one estimate', () => {
    expect(() => labelVolatilityRegimes([])).toThrow(RangeError);
  });
});

describe('regimeConditioning', () => {
  const regimes = labelVolatilityRegimes(estimates, 0.75);
  const diagnostics = [
    diagnostic(3, 10),
    diagnostic(4, 20),
    diagnostic(5, Infinity),
    diagnostic(6, 30),
    diagnostic(7, 100),
    diagnostic(8, 300),
    diagnostic(9, 5),
  ];

  it('should join on timestamp', () => {
    const { rows } = regimeConditioning(regimes, diagnostics);
    expect(rows.map(r => r.timestamp)).toEqual([3, 4, 5, 6, 7, 8]);
    expect(rows[4]).toEqual({
      timestamp: 7,
      volatility: 7,
      highVol: true,
      minEigenvalue: 1,
      maxEigenvalue: 100,
      conditionNumber: 100,
    });
  });

  it('should summarize condition numbers per regime', () => {
    const { highVol, normal } = regimeConditioning(regimes, diagnostics);
    expect(highVol).toEqual({ days: 2, meanConditionNumber: 200, medianConditionNumber: 200 });
    // the infinite date counts as a day but not in the averages
    expect(normal).toEqual({ days: 4, meanConditionNumber: 20, medianConditionNumber: 20 });
  });

  it('should return null for a regime without finite condition numbers', () => {
    const { highVol } = regimeConditioning(regimes, [diagnostic(7, Infinity)]);
    expect(highVol).toBeNull();
  });
});

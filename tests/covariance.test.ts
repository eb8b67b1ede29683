import { describe, it, expect } from 'vitest';
import {
  RollingCovarianceEngine,
  sampleCovariance,
  covarianceSnapshot,
  conditionDiagnostic,
  buildReturnPanel,
  parseConfig,
  InsufficientDataError,
} from '../src/index.js';
import { factorPricePanel } from './helpers.js';

describe('sampleCovariance', () => {
  it('should centre on the window mean and divide by n - 1', () => {
    expect(sampleCovariance([[1, 2], [3, 6]])).toEqual([[2, 4], [4, 8]]);
  });

  it('should need two observations', () => {
    expect(() => sampleCovariance([[1, 2]])).toThrow(InsufficientDataError);
  });
});

describe('conditionDiagnostic', () => {
  it('should report the spectrum extremes and their ratio', () => {
    const d = conditionDiagnostic(covarianceSnapshot([[2, 0], [0, 0.5]], 7));
    expect(d.timestamp).toBe(7);
    expect(d.minEigenvalue).toBeCloseTo(0.5, 12);
    expect(d.maxEigenvalue).toBeCloseTo(2, 12);
    expect(d.conditionNumber).toBeCloseTo(4, 10);
    expect(d.rankDeficient).toBe(false);
  });

  it('should flag a singular matrix as rank deficient', () => {
    const snapshot = covarianceSnapshot([[2, 4], [4, 8]], 1);
    const d = conditionDiagnostic(snapshot);
    expect(Math.abs(snapshot.eigenvalues[0])).toBeLessThan(1e-12);
    expect(snapshot.eigenvalues[1]).toBeCloseTo(10, 12);
    expect(d.minEigenvalue).toBe(0);
    expect(d.maxEigenvalue).toBeCloseTo(10, 12);
    expect(d.conditionNumber).toBe(Infinity);
    expect(d.rankDeficient).toBe(true);
  });

  it('should report a negative raw eigenvalue as 0 and leave the snapshot raw', () => {
    const snapshot = covarianceSnapshot([[0.25, 0.75], [0.75, 0.25]], 2);
    const d = conditionDiagnostic(snapshot);
    expect(snapshot.eigenvalues[0]).toBeCloseTo(-0.5, 12);
    expect(d.minEigenvalue).toBe(0);
    expect(d.maxEigenvalue).toBeCloseTo(1, 12);
    expect(d.conditionNumber).toBe(Infinity);
    expect(d.rankDeficient).toBe(true);
  });
});

describe('covarianceSnapshot', () => {
  it('should keep an indefinite matrix as estimated', () => {
    const snapshot = covarianceSnapshot([[0.25, 0.75], [0.75, 0.25]], 3);
    expect(snapshot.values).toEqual([[0.25, 0.75], [0.75, 0.25]]);
    expect(snapshot.eigenvalues[0]).toBeCloseTo(-0.5, 12);
    expect(snapshot.eigenvalues[1]).toBeCloseTo(1, 12);
    expect(Object.isFrozen(snapshot.values[0])).toBe(true);
  });
});

describe('RollingCovarianceEngine', () => {
  const { panel } = buildReturnPanel(factorPricePanel(5, 40));

  it('should produce one matrix per full window', () => {
    const windows = new RollingCovarianceEngine(10).run(panel);
    expect(windows).toHaveLength(40 - 10 + 1);
    expect(windows[0].matrix.timestamp).toBe(panel.timestamps[9]);
    expect(windows[windows.length - 1].matrix.timestamp).toBe(panel.timestamps[39]);
  });

  it('should only read rows inside the window', () => {
    const engine = new RollingCovarianceEngine(10);
    const before = engine.at(panel, 20);
    const altered = {
      ...panel,
      rows: panel.rows.map((row, t) => (t > 20 || t < 11 ? row.map(v => v * 5) : row)),
    };
    const after = engine.at(altered, 20);
    expect(after.matrix.values).toEqual(before.matrix.values);
  });

  it('should match sampleCovariance on the trailing rows', () => {
    const { matrix } = new RollingCovarianceEngine(10).at(panel, 15);
    const direct = sampleCovariance(panel.rows.slice(6, 16));
    matrix.values.forEach((row, i) => row.forEach((v, j) => expect(v).toBeCloseTo(direct[i][j], 15)));
  });

  it('should report rank deficiency when the window is shorter than assets + 1', () => {
    const windows = new RollingCovarianceEngine(3).run(panel);
    for (const { diagnostic } of windows) {
      expect(diagnostic.rankDeficient).toBe(true);
      expect(diagnostic.minEigenvalue).toBe(0);
      expect(diagnostic.conditionNumber).toBe(Infinity);
    }
  });

  it('should have finite condition numbers with enough observations', () => {
    const windows = new RollingCovarianceEngine(30).run(panel);
    for (const { diagnostic } of windows) {
      expect(diagnostic.rankDeficient).toBe(false);
      expect(Number.isFinite(diagnostic.conditionNumber)).toBe(true);
      expect(diagnostic.conditionNumber).toBeGreaterThanOrEqual(1);
    }
  });

  it('should throw when the panel is shorter than the window', () => {
    expect(() => new RollingCovarianceEngine(41).run(panel)).toThrow(InsufficientDataError);
    expect(() => new RollingCovarianceEngine(10).at(panel, 8)).toThrow(InsufficientDataError);
  });

  it('should read its window from configuration', () => {
    const engine = RollingCovarianceEngine.fromConfig(parseConfig({ covariance: { window: 25 } }));
    expect(engine.window).toBe(25);
    expect(() => new RollingCovarianceEngine(1)).toThrow(RangeError);
  });
});

import type { RiskConfig } from './config.js';
import { InsufficientDataError } from './errors.js';
import { eigenTolerance, freezeMatrix, symmetricEigen, symmetrize } from './linalg.js';
import { createLogger } from './logger.js';
import type { ConditionDiagnostic, CovarianceMatrix, Matrix, ReturnPanel } from './types.js';

const logger = createLogger('covariance');

export interface CovarianceWindow {
  matrix: CovarianceMatrix;
  diagnostic: ConditionDiagnostic;
}

/**
 * Sample covariance of the rows (observations × assets), centred on the
 * window's own mean, divisor n − 1.
 */
export function sampleCovariance(rows: number[][]): Matrix {
  const n = rows.length;
  if (n < 2) {
    throw new InsufficientDataError(2, n, 'sample covariance');
  }
  const k = rows[0].length;
  const means = new Array<number>(k).fill(0);
  for (const row of rows) {
    for (let j = 0; j < k; j++) means[j] += row[j] / n;
  }

  const cov: Matrix = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  for (const row of rows) {
    for (let i = 0; i < k; i++) {
      const di = row[i] - means[i];
      for (let j = i; j < k; j++) {
        cov[i][j] += di * (row[j] - means[j]);
      }
    }
  }
  for (let i = 0; i < k; i++) {
    for (let j = i; j < k; j++) {
      cov[i][j] /= n - 1;
      cov[j][i] = cov[i][j];
    }
  }
  return cov;
}

/**
 * Symmetrize a matrix and cache its eigen-decomposition. The values are kept
 * as estimated, indefinite or not.
 */
export function covarianceSnapshot(values: Matrix, timestamp: number): CovarianceMatrix {
  const sym = symmetrize(values);
  const { values: eigenvalues, vectors } = symmetricEigen(sym);
  Object.freeze(eigenvalues);
  return Object.freeze({
    timestamp,
    values: freezeMatrix(sym),
    eigenvalues,
    eigenvectors: freezeMatrix(vectors),
  });
}

/**
 * Conditioning of a PSD-by-construction matrix. Negative eigenvalues and
 * those within solver tolerance of zero are reported as 0; the snapshot
 * itself keeps the raw spectrum.
 */
export function conditionDiagnostic(matrix: CovarianceMatrix): ConditionDiagnostic {
  const tol = eigenTolerance(matrix.eigenvalues);
  const clamped = matrix.eigenvalues.map(v => (v <= tol ? 0 : v));
  const minEigenvalue = clamped[0];
  const maxEigenvalue = clamped[clamped.length - 1];

  return Object.freeze({
    timestamp: matrix.timestamp,
    minEigenvalue,
    maxEigenvalue,
    conditionNumber: minEigenvalue > 0 ? maxEigenvalue / minEigenvalue : Infinity,
    rankDeficient: minEigenvalue === 0,
  });
}

/**
 * Rolling sample covariance over a trailing window of W observations.
 *
 * The window ending at t reads rows t−W+1..t only. With W < k+1 every
 * matrix is rank deficient; that shows up in the diagnostics, not as an error.
 */
export class RollingCovarianceEngine {
  readonly window: number;

  constructor(window: number) {
    if (!Number.isInteger(window) || window < 2) {
      throw new RangeError(`window must be an integer >= 2, got ${window}`);
    }
    this.window = window;
  }

  static fromConfig(config: RiskConfig): RollingCovarianceEngine {
    return new RollingCovarianceEngine(config.covariance.window);
  }

  /**
   * Covariance window ending at row `t`.
   */
  at(panel: ReturnPanel, t: number): CovarianceWindow {
    if (t < this.window - 1 || t >= panel.rows.length) {
      throw new InsufficientDataError(this.window, Math.min(t + 1, panel.rows.length), `covariance window ending at row ${t}`);
    }
    const rows = panel.rows.slice(t - this.window + 1, t + 1);
    const matrix = covarianceSnapshot(sampleCovariance(rows), panel.timestamps[t]);
    return { matrix, diagnostic: conditionDiagnostic(matrix) };
  }

  run(panel: ReturnPanel): CovarianceWindow[] {
    const n = panel.rows.length;
    if (n < this.window) {
      throw new InsufficientDataError(this.window, n, 'rolling covariance');
    }

    const k = panel.assets.length;
    if (this.window < k + 1) {
      logger.warn('Window shorter than assets + 1, matrices will be rank deficient', {
        window: this.window,
        assets: k,
      });
    }

    const out: CovarianceWindow[] = [];
    for (let t = this.window - 1; t < n; t++) {
      out.push(this.at(panel, t));
    }

    logger.debug('Rolling covariance computed', {
      windows: out.length,
      rankDeficient: out.filter(w => w.diagnostic.rankDeficient).length,
    });
    return out;
  }
}

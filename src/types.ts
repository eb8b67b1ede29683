export type Matrix = number[][];

export interface PriceSeries {
  asset: string;
  timestamps: number[];
  prices: number[];
}

export interface ReturnSeries {
  asset: string;
  timestamps: number[];
  returns: number[];
}

/**
 * Multi-asset log returns on a shared timeline. `rows[t][j]` is the return of
 * `assets[j]` dated `timestamps[t]`.
 */
export interface ReturnPanel {
  assets: string[];
  timestamps: number[];
  rows: number[][];
}

export type MissingDataPolicy = 'error' | 'drop';

export interface PanelBuildResult {
  panel: ReturnPanel;
  dropped: number[];
}

/**
 * Symmetric covariance snapshot with its eigen-decomposition.
 * Eigenvalues ascend; `eigenvectors[i][j]` is component i of the vector for `eigenvalues[j]`.
 * Not assumed positive definite.
 */
export interface CovarianceMatrix {
  timestamp: number;
  values: Matrix;
  eigenvalues: number[];
  eigenvectors: Matrix;
}

export interface ConditionDiagnostic {
  timestamp: number;
  minEigenvalue: number;
  maxEigenvalue: number;
  conditionNumber: number;
  rankDeficient: boolean;
}

export type RepairMethod = 'jitter' | 'clip';

interface RegularizedBase {
  timestamp: number | null;
  values: Matrix;
  eigenvalues: number[];
  cholesky: Matrix;
  floor: number;
  attempts: number;
  escalated: boolean;
}

export interface JitterRepair extends RegularizedBase {
  method: 'jitter';
  delta: number;
}

export interface ClipRepair extends RegularizedBase {
  method: 'clip';
  clipped: number;
}

export type RegularizedCovarianceMatrix = JitterRepair | ClipRepair;

export type VolatilitySource = 'realized' | 'garch' | 'var-innovation';

export type VolatilityValue =
  | { kind: 'scalar'; sigma: number }
  | { kind: 'vector'; sigmas: number[] }
  | { kind: 'covariance'; matrix: Matrix };

/**
 * Volatility known at the close of `timestamp`. `informationTime` is the
 * latest date whose data went into it; it equals `timestamp` for filters
 * and may be later for anything fitted on a longer sample.
 */
export interface VolatilityEstimate {
  timestamp: number;
  informationTime: number;
  source: VolatilitySource;
  value: VolatilityValue;
}

export type Distribution =
  | { family: 'gaussian' }
  | { family: 'student-t'; nu: number };

export interface VaRForecast {
  timestamp: number;
  basedOn: number;
  alpha: number;
  distribution: Distribution;
  sigma: number;
  mu: number;
  value: number;
}

export interface ExceedanceEntry {
  timestamp: number;
  realized: number;
  forecast: number;
  violated: boolean;
}

export interface CoverageTestResult {
  test: 'kupiec-uc';
  statistic: number;
  pValue: number;
  significance: number;
  rejectNull: boolean;
  observations: number;
  exceedances: number;
  expectedRate: number;
  observedRate: number;
}

export interface RollingRate {
  timestamp: number;
  rate: number;
}

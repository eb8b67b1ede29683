import type { RiskConfig } from './config.js';
import { AlignmentError, InsufficientDataError } from './errors.js';
import { assertSquare, quadraticForm } from './linalg.js';
import { assertIncreasing, trailingRealizedVolatility } from './returns.js';
import type { Matrix, VolatilityEstimate, VolatilitySource } from './types.js';

/**
 * Returns observed through the close of the last timestamp. This is all a
 * model ever sees when asked for an estimate.
 */
export interface ReturnHistory {
  readonly asset: string;
  readonly timestamps: readonly number[];
  readonly returns: readonly number[];
}

/**
 * Anything that turns past returns into a volatility estimate dated at the
 * last observation. Fitting procedures live outside; implementations only
 * apply what was fitted.
 */
export interface VolatilityModel {
  readonly source: VolatilitySource;
  readonly name: string;
  /** Returns needed before the first estimate. */
  readonly minHistory: number;
  estimate(history: ReturnHistory): VolatilityEstimate | undefined;
}

/**
 * Throws AlignmentError unless the estimate, and everything it was computed
 * from, predates the forecast date.
 */
export function assertCausal(estimate: VolatilityEstimate, forecastTimestamp: number): void {
  if (!(estimate.timestamp < forecastTimestamp) || !(estimate.informationTime < forecastTimestamp)) {
    throw new AlignmentError(estimate.timestamp, estimate.informationTime, forecastTimestamp);
  }
}

function equalWeights(k: number): number[] {
  return new Array<number>(k).fill(1 / k);
}

/**
 * Collapse an estimate to a single σ.
 *
 * - scalar: as is
 * - vector: √Σ wᵢ²σᵢ² (uncorrelated assets)
 * - covariance: √(wᵀΣw)
 */
export function toSigma(estimate: VolatilityEstimate, weights?: number[]): number {
  const { value } = estimate;
  switch (value.kind) {
    case 'scalar':
      return value.sigma;
    case 'vector': {
      const w = weights ?? equalWeights(value.sigmas.length);
      if (w.length !== value.sigmas.length) {
        throw new RangeError(`Expected ${value.sigmas.length} weights, got ${w.length}`);
      }
      return Math.sqrt(value.sigmas.reduce((sum, s, i) => sum + (w[i] * s) ** 2, 0));
    }
    case 'covariance': {
      const w = weights ?? equalWeights(value.matrix.length);
      if (w.length !== value.matrix.length) {
        throw new RangeError(`Expected ${value.matrix.length} weights, got ${w.length}`);
      }
      const variance = quadraticForm(value.matrix, w);
      if (variance < 0) {
        throw new RangeError(`Portfolio variance is negative (${variance}); repair the covariance first`);
      }
      return Math.sqrt(variance);
    }
  }
}

/**
 * Timestamp-keyed lookup over an externally produced volatility series
 * (realized, GARCH conditional volatility, VAR innovation covariance).
 */
export class VolatilityAdapter {
  readonly source: VolatilitySource;
  private readonly estimates = new Map<number, VolatilityEstimate>();

  constructor(source: VolatilitySource, estimates: VolatilityEstimate[]) {
    this.source = source;
    assertIncreasing(estimates.map(e => e.timestamp), `${source} estimates`);
    for (const estimate of estimates) {
      if (estimate.source !== source) {
        throw new Error(`Estimate at ${estimate.timestamp} is tagged ${estimate.source}, expected ${source}`);
      }
      if (estimate.informationTime < estimate.timestamp) {
        throw new Error(`Estimate at ${estimate.timestamp} claims information time ${estimate.informationTime}`);
      }
      this.estimates.set(estimate.timestamp, Object.freeze({ ...estimate }));
    }
  }

  /**
   * Scalar σ series (realized or GARCH conditional volatility).
   * `informationTimes` defaults to the timestamps themselves.
   */
  static fromScalarSeries(
    source: 'realized' | 'garch',
    timestamps: number[],
    sigmas: number[],
    informationTimes: number[] = timestamps,
  ): VolatilityAdapter {
    if (timestamps.length !== sigmas.length || informationTimes.length !== timestamps.length) {
      throw new RangeError('Series lengths differ');
    }
    return new VolatilityAdapter(
      source,
      timestamps.map((timestamp, i): VolatilityEstimate => {
        if (!(sigmas[i] >= 0 && Number.isFinite(sigmas[i]))) {
          throw new RangeError(`Invalid volatility ${sigmas[i]} at ${timestamp}`);
        }
        return {
          timestamp,
          informationTime: informationTimes[i],
          source,
          value: { kind: 'scalar', sigma: sigmas[i] },
        };
      }),
    );
  }

  /**
   * Innovation covariance series, e.g. rolling VAR(1) residual covariance.
   */
  static fromCovarianceSeries(
    timestamps: number[],
    matrices: Matrix[],
    informationTimes: number[] = timestamps,
  ): VolatilityAdapter {
    if (timestamps.length !== matrices.length || informationTimes.length !== timestamps.length) {
      throw new RangeError('Series lengths differ');
    }
    return new VolatilityAdapter(
      'var-innovation',
      timestamps.map((timestamp, i): VolatilityEstimate => {
        assertSquare(matrices[i]);
        return {
          timestamp,
          informationTime: informationTimes[i],
          source: 'var-innovation',
          value: { kind: 'covariance', matrix: matrices[i] },
        };
      }),
    );
  }

  get size(): number {
    return this.estimates.size;
  }

  get(timestamp: number): VolatilityEstimate | undefined {
    return this.estimates.get(timestamp);
  }

  /**
   * Estimate dated `estimateTimestamp`, checked for use on `forecastTimestamp`.
   * Undefined when there is no estimate for that date.
   */
  resolve(estimateTimestamp: number, forecastTimestamp: number): VolatilityEstimate | undefined {
    const estimate = this.estimates.get(estimateTimestamp);
    if (estimate) {
      assertCausal(estimate, forecastTimestamp);
    }
    return estimate;
  }
}

function lastTimestamp(history: ReturnHistory): number {
  return history.timestamps[history.timestamps.length - 1];
}

/**
 * RV over the trailing `window` returns, dated at the last one.
 */
export class RealizedVolatilityModel implements VolatilityModel {
  readonly source = 'realized' as const;
  readonly name: string;
  readonly minHistory: number;
  private readonly annualization: number;

  constructor(window: number, annualization = 1) {
    if (!Number.isInteger(window) || window < 2) {
      throw new RangeError(`window must be an integer >= 2, got ${window}`);
    }
    this.minHistory = window;
    this.annualization = annualization;
    this.name = `rv${window}`;
  }

  static fromConfig(config: RiskConfig): RealizedVolatilityModel {
    return new RealizedVolatilityModel(config.returns.realizedWindow, config.returns.annualization);
  }

  estimate(history: ReturnHistory): VolatilityEstimate {
    const n = history.returns.length;
    if (n < this.minHistory) {
      throw new InsufficientDataError(this.minHistory, n, `${this.name} on ${history.asset}`);
    }
    const timestamp = lastTimestamp(history);
    return Object.freeze({
      timestamp,
      informationTime: timestamp,
      source: this.source,
      value: Object.freeze({
        kind: 'scalar' as const,
        sigma: trailingRealizedVolatility(history.returns, n - 1, this.minHistory, this.annualization),
      }),
    });
  }
}

export interface GarchParameters {
  omega: number;
  alpha: number;
  beta: number;
}

export interface GarchModelOptions {
  /** σ² before the first return; defaults to ω / (1 − α − β). */
  initialVariance?: number;
  /** Last date of the sample the parameters were fitted on. */
  fittedThrough?: number;
  annualization?: number;
}

/**
 * GARCH(1,1) filter with externally fitted parameters
 *
 * σ²ₜ₊₁ = ω + α·r²ₜ + β·σ²ₜ
 *
 * The estimate dated t is the one-step-ahead σₜ₊₁ built from returns through t.
 * Parameters fitted on a sample that runs past t taint it: `fittedThrough`
 * becomes its information time and the causality check rejects it.
 */
export class GarchVolatilityModel implements VolatilityModel {
  readonly source = 'garch' as const;
  readonly name = 'garch11';
  readonly minHistory = 1;
  private readonly params: GarchParameters;
  private readonly initialVariance: number;
  private readonly fittedThrough: number;
  private readonly annualization: number;

  constructor(params: GarchParameters, options: GarchModelOptions = {}) {
    const { omega, alpha, beta } = params;
    if (!(omega > 0)) throw new RangeError(`omega must be positive, got ${omega}`);
    if (!(alpha >= 0) || !(beta >= 0)) throw new RangeError('alpha and beta must be non-negative');
    if (alpha + beta >= 1) throw new RangeError(`alpha + beta must be < 1, got ${alpha + beta}`);

    this.params = { omega, alpha, beta };
    this.initialVariance = options.initialVariance ?? omega / (1 - alpha - beta);
    this.fittedThrough = options.fittedThrough ?? -Infinity;
    this.annualization = options.annualization ?? 1;
  }

  /**
   * Conditional variance series: entry i is σ² for return i, entry n the
   * forecast past the last return.
   */
  varianceSeries(returns: readonly number[]): number[] {
    const { omega, alpha, beta } = this.params;
    const variance = [this.initialVariance];
    for (let i = 0; i < returns.length; i++) {
      variance.push(omega + alpha * returns[i] ** 2 + beta * variance[i]);
    }
    return variance;
  }

  estimate(history: ReturnHistory): VolatilityEstimate {
    if (history.returns.length < this.minHistory) {
      throw new InsufficientDataError(this.minHistory, history.returns.length, `${this.name} on ${history.asset}`);
    }
    const variance = this.varianceSeries(history.returns);
    const timestamp = lastTimestamp(history);
    return Object.freeze({
      timestamp,
      informationTime: Math.max(timestamp, this.fittedThrough),
      source: this.source,
      value: Object.freeze({
        kind: 'scalar' as const,
        sigma: Math.sqrt(variance[variance.length - 1] * this.annualization),
      }),
    });
  }
}

/**
 * Reads a precomputed external series by the date of the last observation.
 */
export class ExternalVolatilityModel implements VolatilityModel {
  readonly minHistory = 1;
  readonly source: VolatilitySource;
  readonly name: string;
  private readonly adapter: VolatilityAdapter;

  constructor(adapter: VolatilityAdapter, name: string = adapter.source) {
    this.adapter = adapter;
    this.source = adapter.source;
    this.name = name;
  }

  estimate(history: ReturnHistory): VolatilityEstimate | undefined {
    return this.adapter.get(lastTimestamp(history));
  }
}

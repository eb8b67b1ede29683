import type { RiskConfig, VarConfig } from './config.js';
import { normalQuantile, studentTQuantile } from './utils.js';
import type { Distribution, VaRForecast, VolatilityEstimate } from './types.js';

export function distributionFromConfig(config: VarConfig): Distribution {
  return config.distribution === 'student-t'
    ? { family: 'student-t', nu: config.nu }
    : { family: 'gaussian' };
}

/**
 * α-quantile of the unit-variance distribution.
 *
 * Student-t(ν) has variance ν/(ν−2), so its quantile is scaled by √((ν−2)/ν).
 */
export function standardizedQuantile(alpha: number, distribution: Distribution): number {
  if (distribution.family === 'gaussian') {
    return normalQuantile(alpha);
  }
  const { nu } = distribution;
  if (!(nu > 2)) {
    throw new RangeError(`Student-t needs nu > 2 for a finite variance, got ${nu}`);
  }
  return studentTQuantile(alpha, nu) * Math.sqrt((nu - 2) / nu);
}

/**
 * VaR = −(μ + σ·q(α)), a positive loss magnitude for α < ½.
 */
export function parametricVaR(sigma: number, alpha: number, distribution: Distribution, mu = 0): number {
  if (!(alpha > 0 && alpha < 1)) {
    throw new RangeError(`alpha must be in (0, 1), got ${alpha}`);
  }
  if (!(sigma >= 0 && Number.isFinite(sigma))) {
    throw new RangeError(`sigma must be finite and non-negative, got ${sigma}`);
  }
  return -(mu + sigma * standardizedQuantile(alpha, distribution));
}

/**
 * A realized return breaches the forecast when it is below −VaR.
 */
export function isViolation(realized: number, varValue: number): boolean {
  return realized < -varValue;
}

export interface ForecastRequest {
  /** The date being forecast. */
  timestamp: number;
  estimate: VolatilityEstimate;
  sigma: number;
  alpha: number;
  distribution?: Distribution;
}

/**
 * One-step-ahead parametric VaR. The distribution and μ come from
 * configuration; ν is fixed there, never estimated.
 */
export class VaRForecastEngine {
  readonly distribution: Distribution;
  readonly mu: number;

  constructor(config: VarConfig) {
    this.distribution = distributionFromConfig(config);
    this.mu = config.mu;
  }

  static fromConfig(config: RiskConfig): VaRForecastEngine {
    return new VaRForecastEngine(config.var);
  }

  forecast(request: ForecastRequest): VaRForecast {
    const distribution = request.distribution ?? this.distribution;
    return Object.freeze({
      timestamp: request.timestamp,
      basedOn: request.estimate.timestamp,
      alpha: request.alpha,
      distribution: Object.freeze({ ...distribution }),
      sigma: request.sigma,
      mu: this.mu,
      value: parametricVaR(request.sigma, request.alpha, distribution, this.mu),
    });
  }
}

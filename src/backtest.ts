import type { RiskConfig } from './config.js';
import { rollingExceedanceRate, summarizeExceedances } from './coverage.js';
import { InsufficientDataError } from './errors.js';
import { createLogger } from './logger.js';
import { assertIncreasing } from './returns.js';
import type {
  CoverageTestResult,
  Distribution,
  ExceedanceEntry,
  ReturnSeries,
  RollingRate,
  VaRForecast,
  VolatilityEstimate,
} from './types.js';
import { VaRForecastEngine, distributionFromConfig, isViolation } from './var.js';
import { assertCausal, toSigma, type ReturnHistory, type VolatilityModel } from './volatility.js';

const logger = createLogger('backtest');

export type BacktestState = 'WARMUP' | 'FORECASTING' | 'DONE';

/**
 * Append-only exceedance log. Entries must arrive in date order.
 */
export class ExceedanceRecord {
  private readonly entries: ExceedanceEntry[] = [];

  append(entry: ExceedanceEntry): void {
    const last = this.entries[this.entries.length - 1];
    if (last && !(entry.timestamp > last.timestamp)) {
      throw new Error(`Exceedance at ${entry.timestamp} is not after ${last.timestamp}`);
    }
    this.entries.push(Object.freeze({ ...entry }));
  }

  get length(): number {
    return this.entries.length;
  }

  get violations(): number {
    return this.entries.filter(e => e.violated).length;
  }

  toArray(): readonly ExceedanceEntry[] {
    return Object.freeze([...this.entries]);
  }
}

export interface SkippedDate {
  /** Date whose forecast was skipped. */
  timestamp: number;
  reason: string;
}

export interface BacktestOptions {
  alpha: number;
  distribution?: Distribution;
  /** Portfolio weights for vector or covariance estimates. */
  weights?: number[];
}

export interface BacktestResult {
  asset: string;
  model: string;
  alpha: number;
  distribution: Distribution;
  forecasts: readonly VaRForecast[];
  exceedances: readonly ExceedanceEntry[];
  skipped: readonly SkippedDate[];
  kupiec: CoverageTestResult | null;
  clustering: RollingRate[];
}

/**
 * Walk-forward VaR backtest over one return series.
 *
 * WARMUP: fewer than `model.minHistory` returns seen, no forecasts.
 * FORECASTING: at day t the model sees returns[0..t] only, the forecast for
 * t+1 is made, then returns[t+1] is read and scored.
 * DONE: no day left to forecast.
 */
export class WalkForwardBacktester {
  private state: BacktestState = 'WARMUP';
  private cursor = 0;
  private readonly record = new ExceedanceRecord();
  private readonly forecasts: VaRForecast[] = [];
  private readonly skipped: SkippedDate[] = [];
  private readonly engine: VaRForecastEngine;
  private readonly distribution: Distribution;
  private readonly series: ReturnSeries;

  constructor(
    series: ReturnSeries,
    private readonly model: VolatilityModel,
    private readonly config: RiskConfig,
    private readonly options: BacktestOptions,
  ) {
    if (series.timestamps.length !== series.returns.length) {
      throw new Error(`${series.asset}: ${series.timestamps.length} timestamps for ${series.returns.length} returns`);
    }
    assertIncreasing(series.timestamps, series.asset);
    if (series.returns.length < model.minHistory + 1) {
      throw new InsufficientDataError(model.minHistory + 1, series.returns.length, `${model.name} backtest on ${series.asset}`);
    }

    this.series = {
      asset: series.asset,
      timestamps: [...series.timestamps],
      returns: [...series.returns],
    };
    this.engine = new VaRForecastEngine(config.var);
    this.distribution = options.distribution ?? distributionFromConfig(config.var);
  }

  getState(): BacktestState {
    return this.state;
  }

  /**
   * Advance one day.
   */
  step(): BacktestState {
    if (this.state === 'DONE') return this.state;

    const t = this.cursor;
    const last = this.series.returns.length - 1;

    if (t >= last) {
      this.state = 'DONE';
      return this.state;
    }

    if (t + 1 >= this.model.minHistory) {
      this.state = 'FORECASTING';
      this.forecastAndScore(t);
    }

    this.cursor = t + 1;
    if (this.cursor >= last) {
      this.state = 'DONE';
    }
    return this.state;
  }

  run(): BacktestResult {
    logger.debug('Backtest started', {
      asset: this.series.asset,
      model: this.model.name,
      alpha: this.options.alpha,
      distribution: this.distribution.family,
    });

    let state = this.getState();
    while (state !== 'DONE') {
      state = this.step();
    }

    const exceedances = this.record.toArray();
    const summary = summarizeExceedances(exceedances, this.options.alpha, this.config.backtest.significance);

    if (this.skipped.length > 0) {
      logger.warn('Backtest skipped dates', { model: this.model.name, skipped: this.skipped.length });
    }
    logger.info('Backtest finished', {
      asset: this.series.asset,
      model: this.model.name,
      alpha: this.options.alpha,
      observations: summary.observations,
      exceedances: summary.exceedances,
      pValue: summary.kupiec?.pValue,
    });

    return {
      asset: this.series.asset,
      model: this.model.name,
      alpha: this.options.alpha,
      distribution: this.distribution,
      forecasts: Object.freeze([...this.forecasts]),
      exceedances,
      skipped: Object.freeze([...this.skipped]),
      kupiec: summary.kupiec,
      clustering: rollingExceedanceRate(exceedances, this.config.backtest.clusteringWindow),
    };
  }

  /**
   * Copy of the returns up to and including index t.
   */
  private historyThrough(t: number): ReturnHistory {
    return Object.freeze({
      asset: this.series.asset,
      timestamps: Object.freeze(this.series.timestamps.slice(0, t + 1)),
      returns: Object.freeze(this.series.returns.slice(0, t + 1)),
    });
  }

  private estimateAt(t: number, forecastTimestamp: number): VolatilityEstimate | undefined {
    const { strict } = this.config.backtest;
    let estimate: VolatilityEstimate | undefined;
    try {
      estimate = this.model.estimate(this.historyThrough(t));
    } catch (error) {
      if (error instanceof InsufficientDataError && !strict) {
        this.skipped.push({ timestamp: forecastTimestamp, reason: error.message });
        return undefined;
      }
      throw error;
    }

    if (!estimate) {
      if (strict) {
        throw new InsufficientDataError(1, 0, `${this.model.name} estimate for ${this.series.timestamps[t]}`);
      }
      this.skipped.push({ timestamp: forecastTimestamp, reason: 'no volatility estimate' });
    }
    return estimate;
  }

  private forecastAndScore(t: number): void {
    const forecastTimestamp = this.series.timestamps[t + 1];
    const estimate = this.estimateAt(t, forecastTimestamp);
    if (!estimate) return;

    assertCausal(estimate, forecastTimestamp);

    const forecast = this.engine.forecast({
      timestamp: forecastTimestamp,
      estimate,
      sigma: toSigma(estimate, this.options.weights ?? this.config.portfolio.weights),
      alpha: this.options.alpha,
      distribution: this.distribution,
    });
    this.forecasts.push(forecast);

    const realized = this.series.returns[t + 1];
    this.record.append({
      timestamp: forecastTimestamp,
      realized,
      forecast: forecast.value,
      violated: isViolation(realized, forecast.value),
    });
  }
}

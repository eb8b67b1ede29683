import type { RiskConfig } from './config.js';
import { RollingCovarianceEngine } from './covariance.js';
import { RegularizationFailure } from './errors.js';
import { createLogger } from './logger.js';
import { labelVolatilityRegimes, regimeConditioning, type RegimeConditioning } from './regime.js';
import { portfolioReturns, realizedVolatility } from './returns.js';
import { SpdRegularizer } from './spd.js';
import { WalkForwardBacktester, type BacktestResult } from './backtest.js';
import type {
  ConditionDiagnostic,
  CoverageTestResult,
  Distribution,
  RegularizedCovarianceMatrix,
  ReturnPanel,
  ReturnSeries,
} from './types.js';
import type { VolatilityModel } from './volatility.js';

const logger = createLogger('pipeline');

export interface RepairFailure {
  timestamp: number;
  error: RegularizationFailure;
}

export interface CovariancePipelineResult {
  diagnostics: ConditionDiagnostic[];
  regularized: RegularizedCovarianceMatrix[];
  failures: RepairFailure[];
}

/**
 * diagnose → regularize → validate for every rolling window.
 *
 * A window whose repair fails is listed in `failures` and has no regularized
 * matrix; with `spd.strict` the failure is thrown instead.
 */
export function runCovariancePipeline(panel: ReturnPanel, config: RiskConfig): CovariancePipelineResult {
  const engine = RollingCovarianceEngine.fromConfig(config);
  const regularizer = SpdRegularizer.fromConfig(config);

  const diagnostics: ConditionDiagnostic[] = [];
  const regularized: RegularizedCovarianceMatrix[] = [];
  const failures: RepairFailure[] = [];

  for (const { matrix, diagnostic } of engine.run(panel)) {
    diagnostics.push(diagnostic);
    try {
      regularized.push(regularizer.regularize(matrix));
    } catch (error) {
      if (error instanceof RegularizationFailure && !config.spd.strict) {
        failures.push({ timestamp: matrix.timestamp, error });
        continue;
      }
      throw error;
    }
  }

  logger.info('Covariance pipeline finished', {
    windows: diagnostics.length,
    method: config.spd.method,
    escalated: regularized.filter(r => r.escalated).length,
    failures: failures.length,
  });

  return { diagnostics, regularized, failures };
}

export interface RegimeDiagnosticResult extends RegimeConditioning {
  threshold: number;
  covariance: CovariancePipelineResult;
}

/**
 * Portfolio realized volatility (`returns` window and annualization,
 * `portfolio.weights`) labelled at `regime.quantile`, joined with the
 * covariance pipeline's condition diagnostics.
 */
export function runRegimeDiagnostic(panel: ReturnPanel, config: RiskConfig): RegimeDiagnosticResult {
  const covariance = runCovariancePipeline(panel, config);
  const { realizedWindow, annualization } = config.returns;
  const rv = realizedVolatility(portfolioReturns(panel, config.portfolio.weights), realizedWindow, annualization);
  const { threshold, labels } = labelVolatilityRegimes(rv, config.regime.quantile);
  const conditioning = regimeConditioning({ threshold, labels }, covariance.diagnostics);

  logger.info('Regime diagnostic finished', {
    threshold,
    highVolDays: conditioning.highVol?.days ?? 0,
    normalDays: conditioning.normal?.days ?? 0,
  });

  return { ...conditioning, threshold, covariance };
}

export interface VarGridRow {
  model: string;
  source: VolatilityModel['source'];
  distribution: Distribution['family'];
  alpha: number;
  observations: number;
  exceedances: number;
  exceedanceRate: number;
  kupiec: CoverageTestResult | null;
  result: BacktestResult;
}

/**
 * Backtest every model × distribution × α on one series. Distributions are
 * Gaussian and Student-t with the configured ν.
 */
export function runVarBacktestGrid(
  series: ReturnSeries,
  models: VolatilityModel[],
  config: RiskConfig,
): VarGridRow[] {
  const distributions: Distribution[] = [
    { family: 'gaussian' },
    { family: 'student-t', nu: config.var.nu },
  ];

  const rows: VarGridRow[] = [];
  for (const model of models) {
    for (const distribution of distributions) {
      for (const alpha of config.var.alphas) {
        const result = new WalkForwardBacktester(series, model, config, { alpha, distribution }).run();
        const exceedances = result.exceedances.filter(e => e.violated).length;
        const observations = result.exceedances.length;
        rows.push({
          model: model.name,
          source: model.source,
          distribution: distribution.family,
          alpha,
          observations,
          exceedances,
          exceedanceRate: observations > 0 ? exceedances / observations : 0,
          kupiec: result.kupiec,
          result,
        });
      }
    }
  }
  return rows;
}

// Returns
export {
  logReturns,
  toReturnSeries,
  reconstructPrices,
  realizedVolatility,
  trailingRealizedVolatility,
  buildReturnPanel,
  panelColumn,
  portfolioReturns,
} from './returns.js';

// Covariance
export {
  RollingCovarianceEngine,
  sampleCovariance,
  covarianceSnapshot,
  conditionDiagnostic,
  type CovarianceWindow,
} from './covariance.js';

// SPD repair
export {
  SpdRegularizer,
  type SpdValidation,
  type RepairEffect,
  type RepairComparison,
} from './spd.js';

// Volatility
export {
  VolatilityAdapter,
  RealizedVolatilityModel,
  GarchVolatilityModel,
  ExternalVolatilityModel,
  assertCausal,
  toSigma,
  type ReturnHistory,
  type VolatilityModel,
  type GarchParameters,
  type GarchModelOptions,
} from './volatility.js';

// VaR
export {
  VaRForecastEngine,
  parametricVaR,
  standardizedQuantile,
  distributionFromConfig,
  isViolation,
  type ForecastRequest,
} from './var.js';

// Backtest
export {
  WalkForwardBacktester,
  ExceedanceRecord,
  type BacktestState,
  type BacktestOptions,
  type BacktestResult,
  type SkippedDate,
} from './backtest.js';

// Coverage
export {
  kupiecTest,
  rollingExceedanceRate,
  summarizeExceedances,
  type KupiecInput,
  type ExceedanceSummary,
} from './coverage.js';

// Regimes and pipelines
export {
  labelVolatilityRegimes,
  regimeConditioning,
  type RegimeLabel,
  type RegimeLabels,
  type RegimeConditioning,
  type RegimeConditioningRow,
  type RegimeConditionSummary,
} from './regime.js';
export {
  runCovariancePipeline,
  runVarBacktestGrid,
  runRegimeDiagnostic,
  type CovariancePipelineResult,
  type RegimeDiagnosticResult,
  type RepairFailure,
  type VarGridRow,
} from './pipeline.js';

// Numerics
export {
  logGamma,
  normalCdf,
  normalQuantile,
  regularizedIncompleteBeta,
  studentTCdf,
  studentTQuantile,
  regularizedGammaQ,
  chi2Survival,
} from './utils.js';
export {
  symmetricEigen,
  cholesky,
  symmetrize,
  reconstruct,
  eigenTolerance,
  EIGEN_PRECISION,
  type SymmetricEigen,
} from './linalg.js';

// Config, errors, logging
export {
  parseConfig,
  defaultConfig,
  riskConfigSchema,
  type RiskConfig,
  type RiskConfigInput,
  type SpdConfig,
  type VarConfig,
  type BacktestConfig,
} from './config.js';
export {
  RiskError,
  InsufficientDataError,
  AlignmentError,
  RegularizationFailure,
  ConfigError,
  type RiskErrorCode,
} from './errors.js';
export { createLogger, type Logger } from './logger.js';

// Types
export type {
  Matrix,
  PriceSeries,
  ReturnSeries,
  ReturnPanel,
  MissingDataPolicy,
  PanelBuildResult,
  CovarianceMatrix,
  ConditionDiagnostic,
  RepairMethod,
  JitterRepair,
  ClipRepair,
  RegularizedCovarianceMatrix,
  VolatilitySource,
  VolatilityValue,
  VolatilityEstimate,
  Distribution,
  VaRForecast,
  ExceedanceEntry,
  CoverageTestResult,
  RollingRate,
} from './types.js';

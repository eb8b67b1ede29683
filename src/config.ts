import { z } from 'zod';
import { ConfigError } from './errors.js';

const probability = z.number().gt(0).lt(1);

const returnsSchema = z
  .object({
    realizedWindow: z.number().int().min(2).default(252),
    annualization: z.number().positive().default(1),
  })
  .default({});

const covarianceSchema = z
  .object({
    window: z.number().int().min(2).default(60),
  })
  .default({});

const jitterSchema = z
  .object({
    initialDelta: z.number().positive().default(1e-10),
    factor: z.number().gt(1).default(10),
    maxEscalations: z.number().int().min(0).default(8),
  })
  .default({});

const spdSchema = z
  .object({
    method: z.enum(['jitter', 'clip']).default('clip'),
    floor: z.number().positive().default(1e-6),
    jitter: jitterSchema,
    strict: z.boolean().default(false),
  })
  .default({});

const varSchema = z
  .object({
    alphas: z.array(probability).min(1).default([0.01, 0.05]),
    distribution: z.enum(['gaussian', 'student-t']).default('gaussian'),
    nu: z.number().gt(2).default(8),
    mu: z.number().finite().default(0),
  })
  .default({});

const backtestSchema = z
  .object({
    strict: z.boolean().default(false),
    clusteringWindow: z.number().int().min(1).default(63),
    significance: probability.default(0.05),
  })
  .default({});

const regimeSchema = z
  .object({
    quantile: z.number().min(0).max(1).default(0.7),
  })
  .default({});

const portfolioSchema = z
  .object({
    weights: z.array(z.number().finite()).min(1).optional(),
  })
  .default({});

export const riskConfigSchema = z.object({
  returns: returnsSchema,
  covariance: covarianceSchema,
  spd: spdSchema,
  var: varSchema,
  backtest: backtestSchema,
  regime: regimeSchema,
  portfolio: portfolioSchema,
});

export type RiskConfig = z.infer<typeof riskConfigSchema>;
export type RiskConfigInput = z.input<typeof riskConfigSchema>;
export type SpdConfig = RiskConfig['spd'];
export type VarConfig = RiskConfig['var'];
export type BacktestConfig = RiskConfig['backtest'];

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a configuration block and fill defaults. The result is frozen and
 * meant to be passed explicitly to every component.
 */
export function parseConfig(input: unknown = {}): RiskConfig {
  const parsed = riskConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  return deepFreeze(parsed.data);
}

export function defaultConfig(): RiskConfig {
  return parseConfig({});
}

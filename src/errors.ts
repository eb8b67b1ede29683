import type { RepairMethod } from './types.js';

export type RiskErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'ALIGNMENT'
  | 'REGULARIZATION_FAILURE'
  | 'CONFIGURATION';

export class RiskError extends Error {
  constructor(
    public readonly code: RiskErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'RiskError';
  }
}

/**
 * A window asked for more history than exists. Recoverable per date.
 */
export class InsufficientDataError extends RiskError {
  constructor(
    public readonly required: number,
    public readonly available: number,
    context: string,
  ) {
    super('INSUFFICIENT_DATA', `${context}: need at least ${required} observations, got ${available}`, {
      required,
      available,
    });
    this.name = 'InsufficientDataError';
  }
}

/**
 * A volatility estimate was about to forecast a date it already knows about.
 * Always a pipeline bug; never recovered.
 */
export class AlignmentError extends RiskError {
  constructor(
    public readonly estimateTimestamp: number,
    public readonly informationTime: number,
    public readonly forecastTimestamp: number,
  ) {
    super(
      'ALIGNMENT',
      `Estimate dated ${estimateTimestamp} (information through ${informationTime}) ` +
        `cannot forecast ${forecastTimestamp}`,
      { estimateTimestamp, informationTime, forecastTimestamp },
    );
    this.name = 'AlignmentError';
  }
}

export class RegularizationFailure extends RiskError {
  constructor(
    public readonly method: RepairMethod,
    public readonly parameters: Record<string, number>,
    public readonly attempts: number,
    reason: string,
  ) {
    super('REGULARIZATION_FAILURE', `${method} repair failed after ${attempts} attempt(s): ${reason}`, {
      method,
      parameters,
      attempts,
    });
    this.name = 'RegularizationFailure';
  }
}

export class ConfigError extends RiskError {
  constructor(public readonly issues: string[]) {
    super('CONFIGURATION', `Invalid configuration: ${issues.join('; ')}`, { issues });
    this.name = 'ConfigError';
  }
}

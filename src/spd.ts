import type { RiskConfig, SpdConfig } from './config.js';
import { RegularizationFailure } from './errors.js';
import {
  addDiagonal,
  assertSquare,
  cholesky,
  eigenTolerance,
  freezeMatrix,
  frobeniusNorm,
  reconstruct,
  subtract,
  symmetricEigen,
  symmetrize,
  type SymmetricEigen,
} from './linalg.js';
import { createLogger } from './logger.js';
import type {
  ClipRepair,
  CovarianceMatrix,
  JitterRepair,
  Matrix,
  RegularizedCovarianceMatrix,
  RepairMethod,
} from './types.js';

const logger = createLogger('spd');

// Rounding slack on the floor never exceeds this fraction of it.
const FLOOR_SLACK = 1e-3;

export interface SpdValidation {
  valid: boolean;
  minEigenvalue: number;
  eigenvalues: number[];
  cholesky: Matrix | null;
}

export interface RepairEffect {
  result: RegularizedCovarianceMatrix;
  frobeniusDistance: number;
  maxDiagonalShift: number;
  maxOffDiagonalChange: number;
  eigenvalueShift: number[];
}

export interface RepairComparison {
  timestamp: number | null;
  eigenvalues: number[];
  jitter: RepairEffect;
  clip: RepairEffect;
}

type RepairInput = Matrix | CovarianceMatrix;

interface NormalizedInput {
  timestamp: number | null;
  values: Matrix;
  eigen: SymmetricEigen;
}

function normalize(input: RepairInput): NormalizedInput {
  if (Array.isArray(input)) {
    assertSquare(input);
    const values = symmetrize(input);
    return { timestamp: null, values, eigen: symmetricEigen(values) };
  }
  return {
    timestamp: input.timestamp,
    values: input.values,
    eigen: { values: input.eigenvalues, vectors: input.eigenvectors },
  };
}

function describeEffect(before: NormalizedInput, result: RegularizedCovarianceMatrix): RepairEffect {
  const diff = subtract(result.values, before.values);
  let maxDiagonalShift = 0;
  let maxOffDiagonalChange = 0;
  diff.forEach((row, i) =>
    row.forEach((v, j) => {
      if (i === j) {
        maxDiagonalShift = Math.max(maxDiagonalShift, Math.abs(v));
      } else {
        maxOffDiagonalChange = Math.max(maxOffDiagonalChange, Math.abs(v));
      }
    }),
  );

  return {
    result,
    frobeniusDistance: frobeniusNorm(diff),
    maxDiagonalShift,
    maxOffDiagonalChange,
    eigenvalueShift: result.eigenvalues.map((v, i) => v - before.eigen.values[i]),
  };
}

/**
 * Repairs symmetric matrices into SPD ones.
 *
 * Every returned matrix has passed validation: a Cholesky factor exists and
 * λ_min ≥ floor (within solver tolerance). Anything else is a
 * RegularizationFailure; there is no fallback to an unvalidated matrix.
 */
export class SpdRegularizer {
  private readonly config: SpdConfig;

  constructor(config: SpdConfig) {
    this.config = config;
  }

  static fromConfig(config: RiskConfig): SpdRegularizer {
    return new SpdRegularizer(config.spd);
  }

  get floor(): number {
    return this.config.floor;
  }

  /**
   * Cholesky succeeds and every eigenvalue clears the floor. The solver's
   * rounding slack scales with the spectrum but is capped at a small fraction
   * of the floor, so a large leading eigenvalue cannot waive it.
   */
  validate(m: Matrix): SpdValidation {
    const eigenvalues = symmetricEigen(m).values;
    const minEigenvalue = eigenvalues[0];
    const factor = cholesky(m);
    const floor = this.config.floor;
    const slack = Math.min(eigenTolerance(eigenvalues), FLOOR_SLACK * floor);
    const valid = factor !== null && minEigenvalue >= floor - slack;
    return { valid, minEigenvalue, eigenvalues, cholesky: factor };
  }

  regularize(input: RepairInput, method: RepairMethod = this.config.method): RegularizedCovarianceMatrix {
    return method === 'jitter' ? this.jitter(input) : this.clip(input);
  }

  /**
   * M′ = M + δI, δ = δ₀·factorᵏ for the first k ≤ maxEscalations that validates.
   * Shifts the whole spectrum by δ and leaves off-diagonals untouched.
   */
  jitter(input: RepairInput): JitterRepair {
    return this.applyJitter(normalize(input));
  }

  /**
   * M′ = Q·max(Λ, ε)·Qᵀ, re-symmetrized. Only modes below the floor move.
   */
  clip(input: RepairInput): ClipRepair {
    return this.applyClip(normalize(input));
  }

  /**
   * Run both repairs on the same input and measure how each one moved it.
   */
  compare(input: RepairInput): RepairComparison {
    const source = normalize(input);
    return {
      timestamp: source.timestamp,
      eigenvalues: source.eigen.values,
      jitter: describeEffect(source, this.applyJitter(source)),
      clip: describeEffect(source, this.applyClip(source)),
    };
  }

  private applyJitter(source: NormalizedInput): JitterRepair {
    const { initialDelta, factor, maxEscalations } = this.config.jitter;
    const floor = this.config.floor;

    let delta = initialDelta;
    for (let escalation = 0; escalation <= maxEscalations; escalation++) {
      const candidate = addDiagonal(source.values, delta);
      const check = this.validate(candidate);

      if (check.valid && check.cholesky) {
        if (escalation > 0) {
          logger.debug('Jitter escalated', { timestamp: source.timestamp, escalation, delta });
        }
        return Object.freeze({
          method: 'jitter' as const,
          timestamp: source.timestamp,
          values: freezeMatrix(candidate),
          eigenvalues: check.eigenvalues,
          cholesky: freezeMatrix(check.cholesky),
          floor,
          attempts: escalation + 1,
          escalated: escalation > 0,
          delta,
        });
      }

      delta *= factor;
    }

    logger.warn('Jitter repair exhausted escalations', { timestamp: source.timestamp, maxEscalations });
    throw new RegularizationFailure(
      'jitter',
      { initialDelta, factor, maxEscalations, floor, lastDelta: delta / factor },
      maxEscalations + 1,
      `smallest eigenvalue ${source.eigen.values[0]} could not be lifted above ${floor}`,
    );
  }

  private applyClip(source: NormalizedInput): ClipRepair {
    const floor = this.config.floor;
    const { values: eigenvalues, vectors } = source.eigen;

    const clippedValues = eigenvalues.map(v => Math.max(v, floor));
    const clipped = eigenvalues.filter(v => v < floor).length;
    const candidate = symmetrize(reconstruct(vectors, clippedValues));
    const check = this.validate(candidate);

    if (!check.valid || !check.cholesky) {
      logger.warn('Eigenvalue clipping failed validation', {
        timestamp: source.timestamp,
        minEigenvalue: check.minEigenvalue,
      });
      throw new RegularizationFailure(
        'clip',
        { floor },
        1,
        `reconstructed minimum eigenvalue ${check.minEigenvalue}`,
      );
    }

    return Object.freeze({
      method: 'clip' as const,
      timestamp: source.timestamp,
      values: freezeMatrix(candidate),
      eigenvalues: check.eigenvalues,
      cholesky: freezeMatrix(check.cholesky),
      floor,
      attempts: 1,
      escalated: false,
      clipped,
    });
  }
}

import { eigs, isMatrix, type MathCollection } from 'mathjs';
import type { Matrix } from './types.js';

/**
 * Relative tolerance of the eigen solver; eigenvalues within
 * `n · EIGEN_PRECISION · max|λ|` of zero are numerically zero.
 */
export const EIGEN_PRECISION = 1e-12;

export interface SymmetricEigen {
  values: number[];
  vectors: Matrix;
}

export function assertSquare(m: Matrix): number {
  const n = m.length;
  if (n === 0) {
    throw new RangeError('Matrix must be non-empty');
  }
  for (const row of m) {
    if (row.length !== n) {
      throw new RangeError(`Matrix must be square, got ${n}x${row.length}`);
    }
    for (const v of row) {
      if (!Number.isFinite(v)) {
        throw new RangeError('Matrix entries must be finite');
      }
    }
  }
  return n;
}

export function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)));
}

export function symmetrize(m: Matrix): Matrix {
  const n = m.length;
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? m[i][i] : 0.5 * (m[i][j] + m[j][i]))),
  );
}

export function addDiagonal(m: Matrix, delta: number): Matrix {
  return m.map((row, i) => row.map((v, j) => (i === j ? v + delta : v)));
}

export function subtract(a: Matrix, b: Matrix): Matrix {
  return a.map((row, i) => row.map((v, j) => v - b[i][j]));
}

export function frobeniusNorm(m: Matrix): number {
  let sum = 0;
  for (const row of m) {
    for (const v of row) sum += v * v;
  }
  return Math.sqrt(sum);
}

/**
 * wᵀ·M·w
 */
export function quadraticForm(m: Matrix, w: number[]): number {
  let sum = 0;
  for (let i = 0; i < w.length; i++) {
    for (let j = 0; j < w.length; j++) {
      sum += w[i] * m[i][j] * w[j];
    }
  }
  return sum;
}

export function freezeMatrix(m: Matrix): Matrix {
  for (const row of m) Object.freeze(row);
  Object.freeze(m);
  return m;
}

export function eigenTolerance(values: number[]): number {
  const scale = values.reduce((acc, v) => Math.max(acc, Math.abs(v)), 0);
  return values.length * EIGEN_PRECISION * scale;
}

function toNumbers(x: MathCollection): number[] {
  const raw: unknown = isMatrix(x) ? x.toArray() : x;
  if (!Array.isArray(raw)) {
    throw new TypeError('Expected a vector from the eigen solver');
  }
  return raw.map((v: unknown) => {
    if (typeof v !== 'number') {
      throw new TypeError('Eigen solver returned a non-real component');
    }
    return v;
  });
}

/**
 * Eigen-decomposition of a symmetric matrix: M = Q·diag(λ)·Qᵀ.
 *
 * The input is symmetrized and scaled to unit max-entry before the Jacobi
 * solver runs, so its convergence threshold is relative. Eigenvalues ascend and
 * `vectors[i][j]` is component i of eigenvector j.
 */
export function symmetricEigen(m: Matrix): SymmetricEigen {
  const n = assertSquare(m);
  const sym = symmetrize(m);
  const scale = sym.reduce((acc, row) => row.reduce((a, v) => Math.max(a, Math.abs(v)), acc), 0);

  if (n === 1 || scale === 0) {
    const values = sym.map((row, i) => row[i]);
    const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b]);
    const basis = identity(n);
    return {
      values: order.map(i => values[i]),
      vectors: basis.map(row => order.map(i => row[i])),
    };
  }

  const scaled = sym.map(row => row.map(v => v / scale));
  const { eigenvectors } = eigs(scaled);

  const pairs = eigenvectors.map(({ value, vector }) => {
    if (typeof value !== 'number') {
      throw new TypeError('Eigen solver returned a non-real eigenvalue');
    }
    return { value: value * scale, vector: toNumbers(vector) };
  });
  pairs.sort((a, b) => a.value - b.value);

  return {
    values: pairs.map(p => p.value),
    vectors: Array.from({ length: n }, (_, i) => pairs.map(p => p.vector[i])),
  };
}

/**
 * Q·diag(λ)·Qᵀ
 */
export function reconstruct(vectors: Matrix, values: number[]): Matrix {
  const n = vectors.length;
  const out: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    for (let j = i; j < n; j++) {
      let sum = 0;
      for (let k = 0; k < values.length; k++) {
        sum += vectors[i][k] * values[k] * vectors[j][k];
      }
      out[i][j] = sum;
      out[j][i] = sum;
    }
  }
  return out;
}

/**
 * Cholesky factor L with M = L·Lᵀ, or null when M is not positive definite.
 */
export function cholesky(m: Matrix): Matrix | null {
  const n = m.length;
  const L: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let j = 0; j < n; j++) {
    let diag = m[j][j];
    for (let k = 0; k < j; k++) diag -= L[j][k] * L[j][k];
    if (!(diag > 0) || !Number.isFinite(diag)) return null;
    const ljj = Math.sqrt(diag);
    L[j][j] = ljj;

    for (let i = j + 1; i < n; i++) {
      let sum = m[i][j];
      for (let k = 0; k < j; k++) sum -= L[i][k] * L[j][k];
      L[i][j] = sum / ljj;
    }
  }

  return L;
}

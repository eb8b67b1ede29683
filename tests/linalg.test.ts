import { describe, it, expect } from 'vitest';
import { symmetricEigen, cholesky, symmetrize, reconstruct, eigenTolerance } from '../src/index.js';

function expectMatrixClose(actual: number[][], expected: number[][], digits = 10): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((row, i) => row.forEach((v, j) => expect(v).toBeCloseTo(expected[i][j], digits)));
}

describe('symmetricEigen', () => {
  it('should return ascending eigenvalues', () => {
    const { values } = symmetricEigen([[2, 1], [1, 2]]);
    expect(values[0]).toBeCloseTo(1, 10);
    expect(values[1]).toBeCloseTo(3, 10);
  });

  it('should reconstruct the input from its eigenpairs', () => {
    const m = [
      [4, 1, 0.5],
      [1, 3, 0.2],
      [0.5, 0.2, 2],
    ];
    const { values, vectors } = symmetricEigen(m);
    expectMatrixClose(reconstruct(vectors, values), m);
  });

  it('should return orthonormal eigenvector columns', () => {
    const { vectors } = symmetricEigen([
      [1e-4, 2e-5, 0],
      [2e-5, 3e-4, 1e-5],
      [0, 1e-5, 2e-4],
    ]);
    for (let a = 0; a < 3; a++) {
      for (let b = 0; b < 3; b++) {
        const dot = vectors.reduce((sum, row) => sum + row[a] * row[b], 0);
        expect(dot).toBeCloseTo(a === b ? 1 : 0, 10);
      }
    }
  });

  it('should sort a diagonal matrix', () => {
    const { values } = symmetricEigen([[3, 0, 0], [0, 1, 0], [0, 0, 2]]);
    expect(values[0]).toBeCloseTo(1, 12);
    expect(values[1]).toBeCloseTo(2, 12);
    expect(values[2]).toBeCloseTo(3, 12);
  });

  it('should handle 1x1 and zero matrices', () => {
    expect(symmetricEigen([[4]])).toEqual({ values: [4], vectors: [[1]] });
    expect(symmetricEigen([[0, 0], [0, 0]]).values).toEqual([0, 0]);
  });

  it('should reject non-square input', () => {
    expect(() => symmetricEigen([[1, 2]])).toThrow('Matrix must be square, got 1x2');
    expect(() => symmetricEigen([])).toThrow('Matrix must be non-empty');
  });
});

describe('cholesky', () => {
  it('should factor a positive definite matrix', () => {
    const L = cholesky([[4, 2], [2, 3]]);
    expect(L).not.toBeNull();
    expectMatrixClose(L ?? [], [[2, 0], [1, Math.SQRT2]], 14);
  });

  it('should return null for an indefinite matrix', () => {
    expect(cholesky([[1, 2], [2, 1]])).toBeNull();
  });

  it('should return null for a singular matrix', () => {
    expect(cholesky([[1, 1], [1, 1]])).toBeNull();
  });
});

describe('helpers', () => {
  it('should average off-diagonal pairs', () => {
    expect(symmetrize([[1, 2], [4, 3]])).toEqual([[1, 3], [3, 3]]);
  });

  it('should scale the eigen tolerance by size and spectrum', () => {
    expect(eigenTolerance([-1, 2, 0.5])).toBeCloseTo(6e-12, 24);
  });
});

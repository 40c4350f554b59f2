/**
 * Linear Algebra Helpers
 *
 * Thin layer over ml-matrix for the readonly vectors and matrices carried by
 * messages. Inversions go through the Moore-Penrose pseudo-inverse so that a
 * singular precision or covariance yields a finite result instead of throwing.
 *
 * @module math/linear-algebra
 */

import { Matrix, pseudoInverse } from "ml-matrix";
import type { SquareMatrix, Vector } from "../messages/types.ts";

export function toMatrix(data: SquareMatrix): Matrix {
  return new Matrix(data.map((row) => [...row]));
}

export function toColumn(data: Vector): Matrix {
  return Matrix.columnVector([...data]);
}

export function fromMatrix(matrix: Matrix): number[][] {
  return matrix.to2DArray();
}

export function fromColumn(matrix: Matrix): number[] {
  return matrix.getColumn(0);
}

/**
 * Pseudo-inverse of a scalar: 1/x, or 0 for x = 0
 */
export function pinvScalar(x: number): number {
  return x === 0 ? 0 : 1 / x;
}

export function pinv(data: SquareMatrix): number[][] {
  return fromMatrix(pseudoInverse(toMatrix(data)));
}

export function addMatrices(a: SquareMatrix, b: SquareMatrix): number[][] {
  return fromMatrix(toMatrix(a).add(toMatrix(b)));
}

export function subtractVectors(a: Vector, b: Vector): number[] {
  return a.map((x, i) => x - b[i]);
}

export function addVectors(a: Vector, b: Vector): number[] {
  return a.map((x, i) => x + b[i]);
}

export function multiply(a: SquareMatrix, b: SquareMatrix): number[][] {
  return fromMatrix(toMatrix(a).mmul(toMatrix(b)));
}

export function multiplyVector(a: SquareMatrix, v: Vector): number[] {
  return fromColumn(toMatrix(a).mmul(toColumn(v)));
}

export function transpose(a: SquareMatrix): number[][] {
  return fromMatrix(toMatrix(a).transpose());
}

/**
 * A·X·Aᵀ
 */
export function congruence(a: SquareMatrix, x: SquareMatrix): number[][] {
  const A = toMatrix(a);
  return fromMatrix(A.mmul(toMatrix(x)).mmul(A.transpose()));
}

export function identity(dimension: number, scale = 1): number[][] {
  return fromMatrix(Matrix.eye(dimension, dimension).mul(scale));
}

export function zeros(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

export function isSquare(data: SquareMatrix): boolean {
  return data.length > 0 && data.every((row) => row.length === data.length);
}

export function hasFiniteEntries(data: Vector | SquareMatrix): boolean {
  const entries: readonly (number | Vector)[] = data;
  return entries.every((entry) =>
    typeof entry === "number" ? Number.isFinite(entry) : entry.every((x) => Number.isFinite(x))
  );
}

/**
 * Multivariate Gaussian Messages
 *
 * Same parameterisations as the univariate case, on vectors and square
 * matrices. Inversions use the pseudo-inverse (ml-matrix).
 *
 * @module messages/mv-gaussian
 */

import { PreconditionError } from "../errors/error-types.ts";
import { hasFiniteEntries, isSquare, multiplyVector, pinv } from "../math/linear-algebra.ts";
import {
  GAUSSIAN_FORM_FIELDS,
  GAUSSIAN_FORMS,
  type GaussianForm,
  type MvGaussianMessage,
  type SquareMatrix,
  type Vector,
} from "./types.ts";

export interface MvGaussianParams {
  m?: Vector;
  V?: SquareMatrix;
  xi?: Vector;
  W?: SquareMatrix;
}

interface MutableMvGaussian {
  family: "mv-gaussian";
  m?: Vector;
  V?: SquareMatrix;
  xi?: Vector;
  W?: SquareMatrix;
}

export function freezeVector(v: Vector): Vector {
  return Object.freeze([...v]);
}

export function freezeMatrix(a: SquareMatrix): SquareMatrix {
  return Object.freeze(a.map((row) => Object.freeze([...row])));
}

/**
 * Create a multivariate Gaussian message from any complete subset of (m, V, xi, W)
 *
 * @throws PreconditionError on non-finite entries, non-square matrices,
 *   inconsistent dimensions, or when no complete pair is given
 */
export function mvGaussian(params: MvGaussianParams): MvGaussianMessage {
  const message: MutableMvGaussian = { family: "mv-gaussian" };
  const dimensions = new Set<number>();

  for (const field of ["m", "xi"] as const) {
    const value = params[field];
    if (value === undefined) continue;
    if (value.length === 0 || !hasFiniteEntries(value)) {
      throw new PreconditionError(`Gaussian parameter ${field} must be a non-empty finite vector`);
    }
    dimensions.add(value.length);
    message[field] = freezeVector(value);
  }

  for (const field of ["V", "W"] as const) {
    const value = params[field];
    if (value === undefined) continue;
    if (!isSquare(value) || !hasFiniteEntries(value)) {
      throw new PreconditionError(`Gaussian parameter ${field} must be a finite square matrix`);
    }
    dimensions.add(value.length);
    message[field] = freezeMatrix(value);
  }

  if (dimensions.size > 1) {
    throw new PreconditionError(
      `Gaussian parameters have inconsistent dimensions: ${[...dimensions].join(", ")}`,
    );
  }
  if (!GAUSSIAN_FORMS.some((form) => hasMvGaussianForm(message, form))) {
    throw new PreconditionError(
      "Gaussian message needs one of (m,V), (xi,W), (m,W) or (xi,V)",
    );
  }

  return Object.freeze(message);
}

export function hasMvGaussianForm(
  message: Omit<MvGaussianMessage, "family">,
  form: GaussianForm,
): boolean {
  const [location, spread] = GAUSSIAN_FORM_FIELDS[form];
  return message[location] !== undefined && message[spread] !== undefined;
}

export function mvGaussianDimension(message: MvGaussianMessage): number {
  return (message.m ?? message.xi ?? message.V ?? message.W ?? []).length;
}

export function mvGaussianMoments(message: MvGaussianMessage): { m: Vector; V: SquareMatrix } {
  const V = message.V ?? pinv(requireField(message.W, "W"));
  const m = message.m ?? multiplyVector(V, requireField(message.xi, "xi"));
  return { m, V };
}

export function mvGaussianCanonical(message: MvGaussianMessage): { xi: Vector; W: SquareMatrix } {
  const W = message.W ?? pinv(requireField(message.V, "V"));
  const xi = message.xi ?? multiplyVector(W, requireField(message.m, "m"));
  return { xi, W };
}

/**
 * Return a message holding exactly the requested parameterisation
 */
export function convertMvGaussian(
  message: MvGaussianMessage,
  form: GaussianForm,
): MvGaussianMessage {
  const [location, spread] = GAUSSIAN_FORM_FIELDS[form];
  if (hasMvGaussianForm(message, form) && Object.keys(message).length === 3) {
    return message;
  }

  const moments = mvGaussianMoments(message);
  const canonical = mvGaussianCanonical(message);
  const vectors = { m: moments.m, xi: canonical.xi };
  const matrices = { V: moments.V, W: canonical.W };

  const params: MvGaussianParams = {};
  params[location] = vectors[location];
  params[spread] = matrices[spread];
  return mvGaussian(params);
}

function requireField<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new PreconditionError(`Gaussian message is missing ${field}`);
  }
  return value;
}

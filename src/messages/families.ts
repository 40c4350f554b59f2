/**
 * Non-Gaussian Message Families
 *
 * Constructors for gamma, beta, bernoulli, wishart and general messages,
 * plus the value helpers the general family needs.
 *
 * @module messages/families
 */

import { PreconditionError } from "../errors/error-types.ts";
import { hasFiniteEntries, isSquare } from "../math/linear-algebra.ts";
import { freezeMatrix } from "./mv-gaussian.ts";
import type {
  BernoulliMessage,
  BetaMessage,
  GammaMessage,
  GeneralMessage,
  GeneralValue,
  SquareMatrix,
  WishartMessage,
} from "./types.ts";

function requireFinite(family: string, field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new PreconditionError(`${family} parameter ${field}=${value} must be finite`);
  }
}

export function gamma(params: { a: number; b: number; inverted?: boolean }): GammaMessage {
  requireFinite("Gamma", "a", params.a);
  requireFinite("Gamma", "b", params.b);
  return Object.freeze({
    family: "gamma",
    a: params.a,
    b: params.b,
    inverted: params.inverted ?? false,
  });
}

export function beta(params: { a: number; b: number }): BetaMessage {
  requireFinite("Beta", "a", params.a);
  requireFinite("Beta", "b", params.b);
  return Object.freeze({ family: "beta", a: params.a, b: params.b });
}

export function bernoulli(params: { p: number }): BernoulliMessage {
  if (!(params.p >= 0 && params.p <= 1)) {
    throw new PreconditionError(`Bernoulli parameter p=${params.p} must be in [0, 1]`);
  }
  return Object.freeze({ family: "bernoulli", p: params.p });
}

export function wishart(params: { V: SquareMatrix; nu: number }): WishartMessage {
  if (!isSquare(params.V) || !hasFiniteEntries(params.V)) {
    throw new PreconditionError("Wishart scale V must be a finite square matrix");
  }
  requireFinite("Wishart", "nu", params.nu);
  return Object.freeze({ family: "wishart", V: freezeMatrix(params.V), nu: params.nu });
}

export function general(value: GeneralValue): GeneralMessage {
  assertNumericValue(value);
  return Object.freeze({ family: "general", value: freezeValue(value) });
}

// =============================================================================
// General value helpers
// =============================================================================

function assertNumericValue(value: GeneralValue): void {
  if (typeof value === "number") {
    if (Number.isNaN(value)) {
      throw new PreconditionError("General message value must not be NaN");
    }
    return;
  }
  value.forEach(assertNumericValue);
}

function freezeValue(value: GeneralValue): GeneralValue {
  if (typeof value === "number") return value;
  return Object.freeze(value.map(freezeValue));
}

/**
 * Deep, exact equality of two general values (same shape, same entries)
 */
export function generalValuesEqual(a: GeneralValue, b: GeneralValue): boolean {
  if (typeof a === "number" || typeof b === "number") {
    return a === b;
  }
  return a.length === b.length && a.every((entry, i) => generalValuesEqual(entry, b[i]));
}

/**
 * Zero of the same shape: 0 for a scalar, a zero-filled array otherwise
 */
export function zerosLike(value: GeneralValue): GeneralValue {
  if (typeof value === "number") return 0;
  return value.map(zerosLike);
}

export function sameShape(a: GeneralValue, b: GeneralValue): boolean {
  if (typeof a === "number" || typeof b === "number") {
    return typeof a === typeof b;
  }
  return a.length === b.length && a.every((entry, i) => sameShape(entry, b[i]));
}

/**
 * Elementwise combination of two values of the same shape
 */
export function combineValues(
  a: GeneralValue,
  b: GeneralValue,
  op: (x: number, y: number) => number,
): GeneralValue {
  if (typeof a === "number" && typeof b === "number") return op(a, b);
  if (typeof a === "number" || typeof b === "number" || a.length !== b.length) {
    throw new PreconditionError("General values must have the same shape");
  }
  return a.map((entry, i) => combineValues(entry, b[i], op));
}

/**
 * Message Comparison
 *
 * Tolerance-based equality of two messages. Gaussian messages are compared
 * in canonical form, so two messages holding different parameterisations of
 * the same distribution compare equal.
 *
 * @module messages/compare
 */

import { gaussianCanonical } from "./gaussian.ts";
import { mvGaussianCanonical } from "./mv-gaussian.ts";
import type { GeneralValue, Message } from "./types.ts";

export const DEFAULT_TOLERANCE = 1e-9;

/**
 * Relative/absolute closeness: |x - y| <= tolerance * max(1, |x|, |y|)
 */
export function approxEqual(x: number, y: number, tolerance = DEFAULT_TOLERANCE): boolean {
  return Math.abs(x - y) <= tolerance * Math.max(1, Math.abs(x), Math.abs(y));
}

export function valuesApproxEqual(
  a: GeneralValue,
  b: GeneralValue,
  tolerance = DEFAULT_TOLERANCE,
): boolean {
  if (typeof a === "number" || typeof b === "number") {
    return typeof a === "number" && typeof b === "number" && approxEqual(a, b, tolerance);
  }
  return a.length === b.length && a.every((entry, i) => valuesApproxEqual(entry, b[i], tolerance));
}

export function messagesApproxEqual(
  a: Message,
  b: Message,
  tolerance = DEFAULT_TOLERANCE,
): boolean {
  const close = (x: GeneralValue, y: GeneralValue) => valuesApproxEqual(x, y, tolerance);

  switch (a.family) {
    case "gaussian": {
      if (b.family !== "gaussian") return false;
      const [ca, cb] = [gaussianCanonical(a), gaussianCanonical(b)];
      return close(ca.xi, cb.xi) && close(ca.W, cb.W);
    }
    case "mv-gaussian": {
      if (b.family !== "mv-gaussian") return false;
      const [ca, cb] = [mvGaussianCanonical(a), mvGaussianCanonical(b)];
      return close(ca.xi, cb.xi) && close(ca.W, cb.W);
    }
    case "gamma":
      return b.family === "gamma" && a.inverted === b.inverted && close(a.a, b.a) &&
        close(a.b, b.b);
    case "beta":
      return b.family === "beta" && close(a.a, b.a) && close(a.b, b.b);
    case "bernoulli":
      return b.family === "bernoulli" && close(a.p, b.p);
    case "wishart":
      return b.family === "wishart" && close(a.nu, b.nu) && close(a.V, b.V);
    case "general":
      return b.family === "general" && close(a.value, b.value);
  }
}

/**
 * Univariate Gaussian Messages
 *
 * Construction and parameterisation conversion for `gaussian` messages.
 *
 * @module messages/gaussian
 */

import { PreconditionError } from "../errors/error-types.ts";
import { pinvScalar } from "../math/linear-algebra.ts";
import {
  GAUSSIAN_FORM_FIELDS,
  GAUSSIAN_FORMS,
  type GaussianForm,
  type GaussianMessage,
} from "./types.ts";

export interface GaussianParams {
  m?: number;
  V?: number;
  xi?: number;
  W?: number;
}

/**
 * Create a univariate Gaussian message from any complete subset of (m, V, xi, W)
 *
 * @throws PreconditionError on NaN/infinite parameters or when no complete pair is given
 */
export function gaussian(params: GaussianParams): GaussianMessage {
  const message: { family: "gaussian"; m?: number; V?: number; xi?: number; W?: number } = {
    family: "gaussian",
  };

  for (const field of ["m", "V", "xi", "W"] as const) {
    const value = params[field];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      throw new PreconditionError(`Gaussian parameter ${field}=${value} must be finite`);
    }
    message[field] = value;
  }

  if (!GAUSSIAN_FORMS.some((form) => hasGaussianForm(message, form))) {
    throw new PreconditionError(
      "Gaussian message needs one of (m,V), (xi,W), (m,W) or (xi,V)",
    );
  }

  return Object.freeze(message);
}

export function hasGaussianForm(
  message: Omit<GaussianMessage, "family">,
  form: GaussianForm,
): boolean {
  const [location, spread] = GAUSSIAN_FORM_FIELDS[form];
  return message[location] !== undefined && message[spread] !== undefined;
}

/**
 * Mean and variance of a Gaussian message, whatever it holds
 */
export function gaussianMoments(message: GaussianMessage): { m: number; V: number } {
  const V = message.V ?? pinvScalar(requireField(message.W, "W"));
  const m = message.m ?? V * requireField(message.xi, "xi");
  return { m, V };
}

/**
 * Precision-weighted mean and precision of a Gaussian message
 */
export function gaussianCanonical(message: GaussianMessage): { xi: number; W: number } {
  const W = message.W ?? pinvScalar(requireField(message.V, "V"));
  const xi = message.xi ?? W * requireField(message.m, "m");
  return { xi, W };
}

/**
 * Return a message holding exactly the requested parameterisation
 */
export function convertGaussian(message: GaussianMessage, form: GaussianForm): GaussianMessage {
  const [location, spread] = GAUSSIAN_FORM_FIELDS[form];
  if (hasGaussianForm(message, form) && Object.keys(message).length === 3) {
    return message;
  }

  const moments = gaussianMoments(message);
  const canonical = gaussianCanonical(message);
  const values = { ...moments, ...canonical };

  const params: GaussianParams = {};
  params[location] = values[location];
  params[spread] = values[spread];
  return gaussian(params);
}

function requireField(value: number | undefined, field: string): number {
  if (value === undefined) {
    throw new PreconditionError(`Gaussian message is missing ${field}`);
  }
  return value;
}

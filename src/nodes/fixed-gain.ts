/**
 * Fixed Gain Node
 *
 *   in          out
 *  ----->[A]----->
 *
 *   f(in, out) = δ(out - A·in)
 *
 * Interfaces: 0 in, 1 out. A scalar gain acts on univariate Gaussian
 * messages, a square matrix gain on multivariate ones. Forward messages are
 * produced in moment form, backward messages in canonical form, so neither
 * direction needs to invert A.
 *
 * @module nodes/fixed-gain
 */

import { PreconditionError } from "../errors/error-types.ts";
import { FactorNode } from "../graph/factor-node.ts";
import type { SlotTag } from "../graph/types.ts";
import { gaussian, gaussianCanonical, gaussianMoments } from "../messages/gaussian.ts";
import {
  freezeMatrix,
  mvGaussian,
  mvGaussianCanonical,
  mvGaussianDimension,
  mvGaussianMoments,
} from "../messages/mv-gaussian.ts";
import type {
  GaussianMessage,
  Message,
  MvGaussianMessage,
  SquareMatrix,
} from "../messages/types.ts";
import {
  congruence,
  hasFiniteEntries,
  identity,
  isSquare,
  multiplyVector,
  transpose,
  zeros,
} from "../math/linear-algebra.ts";
import {
  allInboundOf,
  inboundAt,
  type ResolvedRule,
  resolveRule,
  type UpdateRule,
} from "../rules/update-rule.ts";

export type Gain = number | SquareMatrix;

export const FIXED_GAIN_PORTS = ["in", "out"] as const;

export function validateGain(gain: Gain): Gain {
  if (typeof gain === "number") {
    if (!Number.isFinite(gain)) {
      throw new PreconditionError(`Gain ${gain} must be finite`);
    }
    return gain;
  }
  if (!isSquare(gain) || !hasFiniteEntries(gain)) {
    throw new PreconditionError("Gain matrix must be a finite square matrix");
  }
  return freezeMatrix(gain);
}

/**
 * Shape of the Gaussian message a gain of this kind acts on
 */
export function gainTemplate(gain: Gain): Message {
  if (typeof gain === "number") {
    return gaussian({ m: 0, V: 1 });
  }
  return mvGaussian({ m: zeros(gain.length), V: identity(gain.length) });
}

export class FixedGainNode extends FactorNode {
  override readonly kind = "fixed-gain";
  readonly gain: Gain;

  constructor(gain: Gain = 1, options: { id?: string } = {}) {
    super("fixed-gain", options.id, FIXED_GAIN_PORTS);
    this.gain = validateGain(gain);
  }

  override resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule {
    return resolveRule(this, FIXED_GAIN_RULES, outboundPort, tags);
  }

  override portTemplate(_port: number): Message {
    return gainTemplate(this.gain);
  }
}

// =============================================================================
// Gain arithmetic
// =============================================================================

/**
 * A·x for x ~ N(m, V): N(A·m, A·V·Aᵀ)
 */
export function gainForwardGaussian(a: number, message: GaussianMessage): GaussianMessage {
  const { m, V } = gaussianMoments(message);
  return gaussian({ m: a * m, V: a * a * V });
}

/**
 * Backward through A from canonical (xi, W): (Aᵀ·xi, Aᵀ·W·A)
 */
export function gainBackwardGaussian(a: number, message: GaussianMessage): GaussianMessage {
  const { xi, W } = gaussianCanonical(message);
  return gaussian({ xi: a * xi, W: a * a * W });
}

function requireGainDimension(A: SquareMatrix, message: MvGaussianMessage): void {
  const dimension = mvGaussianDimension(message);
  if (A.length !== dimension) {
    throw new PreconditionError(
      `Gain of dimension ${A.length} cannot act on a message of dimension ${dimension}`,
    );
  }
}

export function gainForwardMvGaussian(
  A: SquareMatrix,
  message: MvGaussianMessage,
): MvGaussianMessage {
  requireGainDimension(A, message);
  const { m, V } = mvGaussianMoments(message);
  return mvGaussian({ m: multiplyVector(A, m), V: congruence(A, V) });
}

export function gainBackwardMvGaussian(
  A: SquareMatrix,
  message: MvGaussianMessage,
): MvGaussianMessage {
  requireGainDimension(A, message);
  const { xi, W } = mvGaussianCanonical(message);
  const At = transpose(A);
  return mvGaussian({ xi: multiplyVector(At, xi), W: congruence(At, W) });
}

// =============================================================================
// Rules
// =============================================================================

export const SP_FIXED_GAIN_GAUSSIAN: UpdateRule<FixedGainNode> = {
  name: "sp-fixed-gain-gaussian",
  isApplicable: (port, tags, node) =>
    typeof node.gain === "number" && tags.length === 2 && port >= 0 && port <= 1 &&
    allInboundOf(tags, port, "gaussian"),
  apply: (node, port, inbound) => {
    if (typeof node.gain !== "number") {
      throw new PreconditionError("sp-fixed-gain-gaussian needs a scalar gain");
    }
    return port === 1
      ? gainForwardGaussian(node.gain, inboundAt(inbound, 0, "gaussian"))
      : gainBackwardGaussian(node.gain, inboundAt(inbound, 1, "gaussian"));
  },
};

export const SP_FIXED_GAIN_MV_GAUSSIAN: UpdateRule<FixedGainNode> = {
  name: "sp-fixed-gain-mv-gaussian",
  isApplicable: (port, tags, node) =>
    typeof node.gain !== "number" && tags.length === 2 && port >= 0 && port <= 1 &&
    allInboundOf(tags, port, "mv-gaussian"),
  apply: (node, port, inbound) => {
    if (typeof node.gain === "number") {
      throw new PreconditionError("sp-fixed-gain-mv-gaussian needs a gain matrix");
    }
    return port === 1
      ? gainForwardMvGaussian(node.gain, inboundAt(inbound, 0, "mv-gaussian"))
      : gainBackwardMvGaussian(node.gain, inboundAt(inbound, 1, "mv-gaussian"));
  },
};

export const FIXED_GAIN_RULES: readonly UpdateRule<FixedGainNode>[] = [
  SP_FIXED_GAIN_GAUSSIAN,
  SP_FIXED_GAIN_MV_GAUSSIAN,
];

/**
 * Equality Node
 *
 * Equality constraint with a variable number (N ≥ 3) of symmetrical,
 * unnamed interfaces: every port carries the same variable.
 *
 *   EqualityNode()        // 3 interfaces
 *   EqualityNode(5)       // 5 interfaces
 *
 * Supported inbound families: gaussian, mv-gaussian, general (any N) and
 * inverted gamma (N = 3 only).
 *
 * Gaussian rules follow Korl (2005), "A factor graph approach to signal
 * modelling, system identification and filtering", table 4.1; the gamma rule
 * follows table 5.2.
 *
 * @module nodes/equality
 */

import { PreconditionError } from "../errors/error-types.ts";
import { FactorNode } from "../graph/factor-node.ts";
import type { SlotTag } from "../graph/types.ts";
import { generalValuesEqual, gamma, general, zerosLike } from "../messages/families.ts";
import { gaussian, gaussianCanonical } from "../messages/gaussian.ts";
import {
  mvGaussian,
  mvGaussianCanonical,
  mvGaussianDimension,
} from "../messages/mv-gaussian.ts";
import type {
  GammaMessage,
  GaussianMessage,
  GeneralMessage,
  MvGaussianMessage,
} from "../messages/types.ts";
import {
  addMatrices,
  addVectors,
  multiply,
  multiplyVector,
  pinv,
  pinvScalar,
} from "../math/linear-algebra.ts";
import {
  allInboundOf,
  inboundOfFamily,
  type ResolvedRule,
  resolveRule,
  type UpdateRule,
} from "../rules/update-rule.ts";

export class EqualityNode extends FactorNode {
  override readonly kind = "equality";

  constructor(numInterfaces = 3, options: { id?: string } = {}) {
    if (!Number.isInteger(numInterfaces) || numInterfaces < 3) {
      throw new PreconditionError(
        `An equality node needs at least 3 interfaces, got ${numInterfaces}`,
      );
    }
    super("equality", options.id, numInterfaces);
  }

  override resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule {
    if (this.arity !== 3 && allInboundOf(tags, outboundPort, "gamma")) {
      throw new PreconditionError(
        `Equality rule for gamma messages is only defined for 3 interfaces (node ${this.id} has ${this.arity})`,
      );
    }
    return resolveRule(this, EQUALITY_RULES, outboundPort, tags);
  }
}

// =============================================================================
// Gaussian
// =============================================================================

/**
 * Combine two univariate Gaussian messages. The parameterisation is chosen to
 * avoid inversions: (m,W) if both hold it, then (xi,V), else canonical.
 */
export function equalityGaussianPair(x: GaussianMessage, y: GaussianMessage): GaussianMessage {
  if (x.m !== undefined && x.W !== undefined && y.m !== undefined && y.W !== undefined) {
    const W = x.W + y.W;
    return gaussian({ m: pinvScalar(W) * (x.W * x.m + y.W * y.m), W });
  }
  if (x.xi !== undefined && x.V !== undefined && y.xi !== undefined && y.V !== undefined) {
    return gaussian({ xi: x.xi + y.xi, V: x.V * pinvScalar(x.V + y.V) * y.V });
  }
  const [cx, cy] = [gaussianCanonical(x), gaussianCanonical(y)];
  return gaussian({ xi: cx.xi + cy.xi, W: cx.W + cy.W });
}

/**
 * Sum of the canonical parameters of all messages
 */
export function equalityGaussianCanonicalSum(messages: readonly GaussianMessage[]): GaussianMessage {
  let xi = 0;
  let W = 0;
  for (const message of messages) {
    const canonical = gaussianCanonical(message);
    xi += canonical.xi;
    W += canonical.W;
  }
  return gaussian({ xi, W });
}

function requireDimensions(messages: readonly MvGaussianMessage[]): void {
  const dimensions = new Set(messages.map(mvGaussianDimension));
  if (dimensions.size > 1) {
    throw new PreconditionError(
      `Equality rule needs inbound messages of one dimension, got ${[...dimensions].join(", ")}`,
    );
  }
}

export function equalityMvGaussianPair(
  x: MvGaussianMessage,
  y: MvGaussianMessage,
): MvGaussianMessage {
  requireDimensions([x, y]);
  if (x.m !== undefined && x.W !== undefined && y.m !== undefined && y.W !== undefined) {
    const W = addMatrices(x.W, y.W);
    const weighted = addVectors(multiplyVector(x.W, x.m), multiplyVector(y.W, y.m));
    return mvGaussian({ m: multiplyVector(pinv(W), weighted), W });
  }
  if (x.xi !== undefined && x.V !== undefined && y.xi !== undefined && y.V !== undefined) {
    const V = multiply(multiply(x.V, pinv(addMatrices(x.V, y.V))), y.V);
    return mvGaussian({ xi: addVectors(x.xi, y.xi), V });
  }
  const [cx, cy] = [mvGaussianCanonical(x), mvGaussianCanonical(y)];
  return mvGaussian({ xi: addVectors(cx.xi, cy.xi), W: addMatrices(cx.W, cy.W) });
}

export function equalityMvGaussianCanonicalSum(
  messages: readonly MvGaussianMessage[],
): MvGaussianMessage {
  requireDimensions(messages);
  const canonicals = messages.map(mvGaussianCanonical);
  const [first, ...rest] = canonicals;
  let xi = first.xi;
  let W = first.W;
  for (const canonical of rest) {
    xi = addVectors(xi, canonical.xi);
    W = addMatrices(W, canonical.W);
  }
  return mvGaussian({ xi, W });
}

function requireCount<T>(messages: T[], count: number, rule: string): T[] {
  if (messages.length !== count) {
    throw new PreconditionError(`${rule} needs ${count} inbound messages, got ${messages.length}`);
  }
  return messages;
}

export const SP_EQUALITY_GAUSSIAN: UpdateRule<EqualityNode> = {
  name: "sp-equality-gaussian",
  isApplicable: (port, tags) => tags.length === 3 && allInboundOf(tags, port, "gaussian"),
  apply: (_node, _port, inbound) => {
    const [x, y] = requireCount(inboundOfFamily(inbound, "gaussian"), 2, "sp-equality-gaussian");
    return equalityGaussianPair(x, y);
  },
};

export const SP_EQUALITY_GAUSSIAN_NARY: UpdateRule<EqualityNode> = {
  name: "sp-equality-gaussian-nary",
  isApplicable: (port, tags) => tags.length > 3 && allInboundOf(tags, port, "gaussian"),
  apply: (_node, _port, inbound) =>
    equalityGaussianCanonicalSum(inboundOfFamily(inbound, "gaussian")),
};

export const SP_EQUALITY_MV_GAUSSIAN: UpdateRule<EqualityNode> = {
  name: "sp-equality-mv-gaussian",
  isApplicable: (port, tags) => tags.length === 3 && allInboundOf(tags, port, "mv-gaussian"),
  apply: (_node, _port, inbound) => {
    const [x, y] = requireCount(
      inboundOfFamily(inbound, "mv-gaussian"),
      2,
      "sp-equality-mv-gaussian",
    );
    return equalityMvGaussianPair(x, y);
  },
};

export const SP_EQUALITY_MV_GAUSSIAN_NARY: UpdateRule<EqualityNode> = {
  name: "sp-equality-mv-gaussian-nary",
  isApplicable: (port, tags) => tags.length > 3 && allInboundOf(tags, port, "mv-gaussian"),
  apply: (_node, _port, inbound) =>
    equalityMvGaussianCanonicalSum(inboundOfFamily(inbound, "mv-gaussian")),
};

// =============================================================================
// General
// =============================================================================

/**
 * Pass-through when all values agree; otherwise a zero of the first value's
 * shape, signalling the disagreement
 */
export function equalityGeneral(messages: readonly GeneralMessage[]): GeneralMessage {
  const [first, ...rest] = messages;
  if (rest.every((message) => generalValuesEqual(message.value, first.value))) {
    return first;
  }
  return general(zerosLike(first.value));
}

export const SP_EQUALITY_GENERAL: UpdateRule<EqualityNode> = {
  name: "sp-equality-general",
  isApplicable: (port, tags) => tags.length >= 3 && allInboundOf(tags, port, "general"),
  apply: (_node, _port, inbound) => {
    const messages = inboundOfFamily(inbound, "general");
    if (messages.length < 2) {
      throw new PreconditionError("sp-equality-general needs at least 2 inbound messages");
    }
    return equalityGeneral(messages);
  },
};

// =============================================================================
// Gamma
// =============================================================================

export function equalityGamma(messages: readonly GammaMessage[]): GammaMessage {
  let a = 1;
  let b = 0;
  for (const message of messages) {
    if (!message.inverted) {
      throw new PreconditionError(
        "Equality rule for gamma messages is only defined for inverted gamma messages",
      );
    }
    a += message.a;
    b += message.b;
  }
  return gamma({ a, b, inverted: true });
}

export const SP_EQUALITY_GAMMA: UpdateRule<EqualityNode> = {
  name: "sp-equality-gamma",
  isApplicable: (port, tags) => tags.length === 3 && allInboundOf(tags, port, "gamma"),
  apply: (_node, _port, inbound) => {
    if (inbound.length !== 3) {
      throw new PreconditionError(
        `Equality rule for gamma messages is only defined for 3 interfaces, got ${inbound.length}`,
      );
    }
    return equalityGamma(requireCount(inboundOfFamily(inbound, "gamma"), 2, "sp-equality-gamma"));
  },
};

export const EQUALITY_RULES: readonly UpdateRule<EqualityNode>[] = [
  SP_EQUALITY_GAUSSIAN,
  SP_EQUALITY_GAUSSIAN_NARY,
  SP_EQUALITY_MV_GAUSSIAN,
  SP_EQUALITY_MV_GAUSSIAN_NARY,
  SP_EQUALITY_GENERAL,
  SP_EQUALITY_GAMMA,
];

/**
 * Gain-Equality Node
 *
 * Composite of an equality node and a fixed gain: A⁻¹·out = in1 = in2.
 *
 *        _________
 *    in1 |       | in2
 *   -----|->[=]<-|-----
 *        |   |   |
 *        |   v   |
 *        |  [A]  |
 *        |___|___|
 *            | out
 *            v
 *
 *   f(in1, in2, out) = δ(A·in1 - out)·δ(A·in2 - out)
 *
 * Interfaces: 0 in1, 1 in2, 2 out.
 *
 * @module nodes/gain-equality
 */

import { FactorNode } from "../graph/factor-node.ts";
import type { SlotTag } from "../graph/types.ts";
import type { Message } from "../messages/types.ts";
import { PreconditionError } from "../errors/error-types.ts";
import {
  allInboundOf,
  inboundAt,
  type ResolvedRule,
  resolveRule,
  type UpdateRule,
} from "../rules/update-rule.ts";
import {
  equalityGaussianCanonicalSum,
  equalityGaussianPair,
  equalityMvGaussianCanonicalSum,
  equalityMvGaussianPair,
} from "./equality.ts";
import {
  type Gain,
  gainBackwardGaussian,
  gainBackwardMvGaussian,
  gainForwardGaussian,
  gainForwardMvGaussian,
  gainTemplate,
  validateGain,
} from "./fixed-gain.ts";

export const GAIN_EQUALITY_PORTS = ["in1", "in2", "out"] as const;
const OUT = 2;

export class GainEqualityNode extends FactorNode {
  override readonly kind = "gain-equality";
  readonly gain: Gain;

  constructor(gain: Gain = 1, options: { id?: string } = {}) {
    super("gain-equality", options.id, GAIN_EQUALITY_PORTS);
    this.gain = validateGain(gain);
  }

  override resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule {
    return resolveRule(this, GAIN_EQUALITY_RULES, outboundPort, tags);
  }

  override portTemplate(_port: number): Message {
    return gainTemplate(this.gain);
  }
}

function portInRange(port: number): boolean {
  return port >= 0 && port <= OUT;
}

/**
 * Forward (towards out): equality of in1 and in2, then through the gain.
 * Backward (towards in1 or in2): the other input combined with the
 * out message taken back through the gain, in canonical form.
 */
export const SP_GAIN_EQUALITY_GAUSSIAN: UpdateRule<GainEqualityNode> = {
  name: "sp-gain-equality-gaussian",
  isApplicable: (port, tags, node) =>
    typeof node.gain === "number" && tags.length === 3 && portInRange(port) &&
    allInboundOf(tags, port, "gaussian"),
  apply: (node, port, inbound) => {
    if (typeof node.gain !== "number") {
      throw new PreconditionError("sp-gain-equality-gaussian needs a scalar gain");
    }
    if (port === OUT) {
      const combined = equalityGaussianPair(
        inboundAt(inbound, 0, "gaussian"),
        inboundAt(inbound, 1, "gaussian"),
      );
      return gainForwardGaussian(node.gain, combined);
    }
    return equalityGaussianCanonicalSum([
      inboundAt(inbound, 1 - port, "gaussian"),
      gainBackwardGaussian(node.gain, inboundAt(inbound, OUT, "gaussian")),
    ]);
  },
};

export const SP_GAIN_EQUALITY_MV_GAUSSIAN: UpdateRule<GainEqualityNode> = {
  name: "sp-gain-equality-mv-gaussian",
  isApplicable: (port, tags, node) =>
    typeof node.gain !== "number" && tags.length === 3 && portInRange(port) &&
    allInboundOf(tags, port, "mv-gaussian"),
  apply: (node, port, inbound) => {
    if (typeof node.gain === "number") {
      throw new PreconditionError("sp-gain-equality-mv-gaussian needs a gain matrix");
    }
    if (port === OUT) {
      const combined = equalityMvGaussianPair(
        inboundAt(inbound, 0, "mv-gaussian"),
        inboundAt(inbound, 1, "mv-gaussian"),
      );
      return gainForwardMvGaussian(node.gain, combined);
    }
    return equalityMvGaussianCanonicalSum([
      inboundAt(inbound, 1 - port, "mv-gaussian"),
      gainBackwardMvGaussian(node.gain, inboundAt(inbound, OUT, "mv-gaussian")),
    ]);
  },
};

export const GAIN_EQUALITY_RULES: readonly UpdateRule<GainEqualityNode>[] = [
  SP_GAIN_EQUALITY_GAUSSIAN,
  SP_GAIN_EQUALITY_MV_GAUSSIAN,
];

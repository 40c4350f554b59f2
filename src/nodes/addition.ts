/**
 * Addition Node
 *
 *        in2
 *         |
 *   in1   v   out
 *  ----->[+]----->
 *
 *   f(in1, in2, out) = δ(out - in1 - in2)
 *
 * Interfaces: 0 in1, 1 in2, 2 out. Gaussian rules work on moments
 * (Korl 2005, table 4.1); general messages are added or subtracted
 * elementwise.
 *
 * @module nodes/addition
 */

import { FactorNode } from "../graph/factor-node.ts";
import type { InboundSlot, SlotTag } from "../graph/types.ts";
import { combineValues, general } from "../messages/families.ts";
import { gaussian, gaussianMoments } from "../messages/gaussian.ts";
import { mvGaussian, mvGaussianDimension, mvGaussianMoments } from "../messages/mv-gaussian.ts";
import type { Message, MessageFamily } from "../messages/types.ts";
import { PreconditionError } from "../errors/error-types.ts";
import { addMatrices, addVectors, subtractVectors } from "../math/linear-algebra.ts";
import {
  allInboundOf,
  inboundAt,
  type ResolvedRule,
  resolveRule,
  type UpdateRule,
} from "../rules/update-rule.ts";

export const ADDITION_PORTS = ["in1", "in2", "out"] as const;
const OUT = 2;

export class AdditionNode extends FactorNode {
  override readonly kind = "addition";

  constructor(options: { id?: string } = {}) {
    super("addition", options.id, ADDITION_PORTS);
  }

  override resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule {
    return resolveRule(this, ADDITION_RULES, outboundPort, tags);
  }
}

/**
 * The two inbound operands seen from `outboundPort`:
 * towards out both summands; towards in1/in2 the sum and the other summand
 */
function operands<F extends MessageFamily>(
  inbound: readonly InboundSlot[],
  outboundPort: number,
  family: F,
) {
  if (outboundPort === OUT) {
    return {
      forward: true,
      first: inboundAt(inbound, 0, family),
      second: inboundAt(inbound, 1, family),
    };
  }
  return {
    forward: false,
    first: inboundAt(inbound, OUT, family),
    second: inboundAt(inbound, 1 - outboundPort, family),
  };
}

function applicableFor(family: MessageFamily) {
  return (port: number, tags: readonly SlotTag[]) =>
    tags.length === 3 && port >= 0 && port <= OUT && allInboundOf(tags, port, family);
}

export const SP_ADDITION_GAUSSIAN: UpdateRule<AdditionNode> = {
  name: "sp-addition-gaussian",
  isApplicable: applicableFor("gaussian"),
  apply: (_node, port, inbound) => {
    const { forward, first, second } = operands(inbound, port, "gaussian");
    const x = gaussianMoments(first);
    const y = gaussianMoments(second);
    return gaussian({ m: forward ? x.m + y.m : x.m - y.m, V: x.V + y.V });
  },
};

export const SP_ADDITION_MV_GAUSSIAN: UpdateRule<AdditionNode> = {
  name: "sp-addition-mv-gaussian",
  isApplicable: applicableFor("mv-gaussian"),
  apply: (_node, port, inbound) => {
    const { forward, first, second } = operands(inbound, port, "mv-gaussian");
    if (mvGaussianDimension(first) !== mvGaussianDimension(second)) {
      throw new PreconditionError("Addition rule needs inbound messages of one dimension");
    }
    const x = mvGaussianMoments(first);
    const y = mvGaussianMoments(second);
    return mvGaussian({
      m: forward ? addVectors(x.m, y.m) : subtractVectors(x.m, y.m),
      V: addMatrices(x.V, y.V),
    });
  },
};

export const SP_ADDITION_GENERAL: UpdateRule<AdditionNode> = {
  name: "sp-addition-general",
  isApplicable: applicableFor("general"),
  apply: (_node, port, inbound): Message => {
    const { forward, first, second } = operands(inbound, port, "general");
    return general(
      combineValues(first.value, second.value, forward ? (x, y) => x + y : (x, y) => x - y),
    );
  },
};

export const ADDITION_RULES: readonly UpdateRule<AdditionNode>[] = [
  SP_ADDITION_GAUSSIAN,
  SP_ADDITION_MV_GAUSSIAN,
  SP_ADDITION_GENERAL,
];

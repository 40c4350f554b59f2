/**
 * Constant Node
 *
 * Single-interface node that always sends out its predefined message.
 *
 *   ConstantNode(gaussian({ m: 0, V: 1 }))
 *
 * @module nodes/constant
 */

import { FactorNode } from "../graph/factor-node.ts";
import type { SlotTag } from "../graph/types.ts";
import { general } from "../messages/families.ts";
import type { Message } from "../messages/types.ts";
import { elidedOnlyAt, type ResolvedRule, resolveRule, type UpdateRule } from "../rules/update-rule.ts";

export class ConstantNode extends FactorNode {
  override readonly kind = "constant";

  constructor(
    readonly constant: Message = general(1),
    options: { id?: string } = {},
  ) {
    super("constant", options.id, ["out"]);
  }

  override resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule {
    return resolveRule(this, CONSTANT_RULES, outboundPort, tags);
  }

  override portTemplate(_port: number): Message {
    return this.constant;
  }
}

export const CONSTANT_PASS_THROUGH: UpdateRule<ConstantNode> = {
  name: "constant-pass-through",
  isApplicable: (port, tags) => tags.length === 1 && elidedOnlyAt(tags, port),
  apply: (node) => node.constant,
};

export const CONSTANT_RULES: readonly UpdateRule<ConstantNode>[] = [CONSTANT_PASS_THROUGH];

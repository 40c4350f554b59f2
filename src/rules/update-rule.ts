/**
 * Update-Rule Dispatch Contract
 *
 * Every node kind exposes a finite set of update rules. A rule maps
 * (outbound port, inbound messages in port order with the outbound slot
 * elided) to an outbound message. Rules are pure: they read their arguments
 * (including the node's static parameters) and nothing else.
 *
 * Resolution picks the single rule whose applicability predicate accepts the
 * (outbound port, inbound family tags) tuple.
 *
 * @module rules/update-rule
 */

import {
  AmbiguousRuleError,
  PreconditionError,
  RuleNotFoundError,
} from "../errors/error-types.ts";
import type { FactorNode } from "../graph/factor-node.ts";
import { type InboundSlot, isElided, type SlotTag } from "../graph/types.ts";
import type { Message, MessageFamily, MessageOf } from "../messages/types.ts";

export interface UpdateRule<TNode extends FactorNode> {
  /** Stable rule name, e.g. "sp-equality-gaussian" */
  readonly name: string;
  isApplicable(outboundPort: number, tags: readonly SlotTag[], node: TNode): boolean;
  apply(node: TNode, outboundPort: number, inbound: readonly InboundSlot[]): Message;
}

/**
 * A rule bound to the node it was resolved on
 */
export interface ResolvedRule {
  readonly name: string;
  invoke(inbound: readonly InboundSlot[]): Message;
}

/**
 * Pick the single applicable rule for (outboundPort, tags)
 *
 * @throws RuleNotFoundError when nothing applies
 * @throws AmbiguousRuleError when several rules apply
 */
export function resolveRule<TNode extends FactorNode>(
  node: TNode,
  rules: readonly UpdateRule<TNode>[],
  outboundPort: number,
  tags: readonly SlotTag[],
): ResolvedRule {
  const candidates = rules.filter((rule) => rule.isApplicable(outboundPort, tags, node));

  if (candidates.length === 0) {
    throw new RuleNotFoundError(node.kind, outboundPort, tags);
  }
  if (candidates.length > 1) {
    throw new AmbiguousRuleError(
      node.kind,
      outboundPort,
      tags,
      candidates.map((rule) => rule.name),
    );
  }

  const [rule] = candidates;
  return {
    name: rule.name,
    invoke: (inbound) => rule.apply(node, outboundPort, inbound),
  };
}

// =============================================================================
// Applicability helpers
// =============================================================================

/**
 * True when exactly one slot is elided and it is the outbound one
 */
export function elidedOnlyAt(tags: readonly SlotTag[], outboundPort: number): boolean {
  return tags[outboundPort] === "elided" &&
    tags.filter((tag) => tag === "elided").length === 1;
}

/**
 * True when the outbound slot is the only elided one and every other slot
 * carries `family`
 */
export function allInboundOf(
  tags: readonly SlotTag[],
  outboundPort: number,
  family: MessageFamily,
): boolean {
  return elidedOnlyAt(tags, outboundPort) &&
    tags.every((tag, port) => port === outboundPort || tag === family);
}

// =============================================================================
// Inbound access
// =============================================================================

export function isFamily<F extends MessageFamily>(
  message: Message,
  family: F,
): message is MessageOf<F> {
  return message.family === family;
}

/**
 * Inbound messages of one family, in port order, outbound slot skipped
 *
 * @throws PreconditionError when an inbound slot holds another family
 */
export function inboundOfFamily<F extends MessageFamily>(
  inbound: readonly InboundSlot[],
  family: F,
): MessageOf<F>[] {
  const messages: MessageOf<F>[] = [];
  for (const slot of inbound) {
    if (isElided(slot)) continue;
    if (!isFamily(slot, family)) {
      throw new PreconditionError(`Expected ${family} inbound message, got ${slot.family}`);
    }
    messages.push(slot);
  }
  return messages;
}

/**
 * The inbound message at `port`, which must carry `family`
 */
export function inboundAt<F extends MessageFamily>(
  inbound: readonly InboundSlot[],
  port: number,
  family: F,
): MessageOf<F> {
  const slot = inbound[port];
  if (slot === undefined || isElided(slot) || !isFamily(slot, family)) {
    throw new PreconditionError(
      `Expected ${family} inbound message on port ${port}, got ${slot?.family ?? "nothing"}`,
    );
  }
  return slot;
}

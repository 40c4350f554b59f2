/**
 * Marginal Combiner
 *
 * The marginal on an edge is the product of its forward and backward
 * messages, computed by the equality rule of a transient 3-port equality
 * node.
 *
 * @module engine/marginal
 */

import { MissingMessageError, TypeMismatchError } from "../errors/error-types.ts";
import type { Edge } from "../graph/edge.ts";
import type { FactorGraph } from "../graph/factor-graph.ts";
import { ELIDED, type InboundSlot, slotTags } from "../graph/types.ts";
import type { Message } from "../messages/types.ts";
import { EqualityNode } from "../nodes/equality.ts";

/**
 * Combine a forward and a backward message into a marginal
 *
 * @throws TypeMismatchError when the messages are of different families
 * @throws RuleNotFoundError when the equality node has no rule for the family
 */
export function calculateMarginal(forward: Message, backward: Message): Message {
  if (forward.family !== backward.family) {
    throw new TypeMismatchError(forward.family, backward.family, "Marginal");
  }
  const combiner = new EqualityNode(3, { id: "marginal" });
  const inbound: InboundSlot[] = [forward, backward, ELIDED];
  return combiner.resolveRule(2, slotTags(inbound)).invoke(inbound);
}

/**
 * Marginal on an edge from the messages currently held on both sides,
 * valid or not
 *
 * @throws MissingMessageError when either side holds no message
 */
export function calculateEdgeMarginal(graph: FactorGraph, edge: Edge): Message {
  const forward = graph.interfaceAt(edge.tail).message;
  if (forward === undefined) {
    throw new MissingMessageError(edge.tail);
  }
  const backward = graph.interfaceAt(edge.head).message;
  if (backward === undefined) {
    throw new MissingMessageError(edge.head);
  }
  return calculateMarginal(forward, backward);
}

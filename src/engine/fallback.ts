/**
 * Depth-Budget Fallback
 *
 * When recursion runs out of budget the evaluator stores an uninformative
 * message on the target instead of descending further. The message takes
 * the family and shape of the first template found:
 *
 * 1. the target's own (stale) message
 * 2. the partner's message
 * 3. the owning node's `portTemplate(port)`
 * 4. the node's other interfaces, in port order: the message arriving there
 *    (the partner's message, else the partner node's port template), then
 *    the message held there
 *
 * With no template at all a univariate vague Gaussian is used.
 *
 * @module engine/fallback
 */

import type { FactorGraph } from "../graph/factor-graph.ts";
import type { FactorNode } from "../graph/factor-node.ts";
import type { NodeInterface } from "../graph/interface.ts";
import { gaussian } from "../messages/gaussian.ts";
import { DEFAULT_VAGUE_SETTINGS, type Message, type VagueSettings } from "../messages/types.ts";
import { vagueMessage } from "../messages/vague.ts";
import type { FallbackPolicy } from "./types.ts";

function inboundTemplate(graph: FactorGraph, iface: NodeInterface): Message | undefined {
  if (iface.partner === undefined) return undefined;
  const partner = graph.interfaceAt(iface.partner);
  return partner.message ?? graph.getNode(partner.node).portTemplate(partner.port);
}

function neighbourTemplate(
  graph: FactorGraph,
  node: FactorNode,
  target: NodeInterface,
): Message | undefined {
  for (const iface of node.interfaces) {
    if (iface === target) continue;
    const template = inboundTemplate(graph, iface) ?? iface.message;
    if (template !== undefined) return template;
  }
  return undefined;
}

export function defaultFallbackPolicy(
  settings: VagueSettings = DEFAULT_VAGUE_SETTINGS,
): FallbackPolicy {
  return ({ graph, node, target, partner, logger }) => {
    const template = target.message ??
      partner?.message ??
      node.portTemplate(target.port) ??
      neighbourTemplate(graph, node, target);
    if (template === undefined) {
      logger.warn(
        `No message family known for ${target.node}[${target.port}], falling back to a vague univariate Gaussian`,
      );
      return gaussian({ m: 0, V: settings.variance });
    }
    return vagueMessage(template, settings);
  };
}

/**
 * Message Evaluator
 *
 * Demand-driven, memoizing computation of outbound messages. Asking for the
 * message on an interface recursively produces every inbound message it
 * needs; interfaces whose message is already valid are reused as-is.
 *
 * Recursion depth is bounded by an explicit budget, decremented once per
 * recursive call. When it is exhausted the fallback policy provides the
 * message instead (a degraded result, not an error), which is how
 * evaluation terminates on cyclic graphs.
 *
 * @module engine/evaluator
 */

import { OwnershipError, PreconditionError, UpstreamUnavailableError } from "../errors/error-types.ts";
import type { Edge } from "../graph/edge.ts";
import type { FactorGraph } from "../graph/factor-graph.ts";
import type { FactorNode } from "../graph/factor-node.ts";
import type { NodeInterface } from "../graph/interface.ts";
import { ELIDED, type InboundSlot, type InterfaceHandle, slotTags } from "../graph/types.ts";
import type { Message } from "../messages/types.ts";
import { type EvaluationStats, recordRule } from "../telemetry/evaluation-stats.ts";
import { getLogger, type Logger } from "../telemetry/logger.ts";
import { defaultFallbackPolicy } from "./fallback.ts";
import {
  DEFAULT_DEPTH_BUDGET,
  type EvaluatorOptions,
  type FallbackPolicy,
} from "./types.ts";

const defaultLogger = getLogger("engine");
const defaultFallback = defaultFallbackPolicy();

interface EvaluationContext {
  graph: FactorGraph;
  fallback: FallbackPolicy;
  logger: Logger;
  stats: EvaluationStats | undefined;
}

function createContext(graph: FactorGraph, options: EvaluatorOptions): EvaluationContext {
  return {
    graph,
    fallback: options.fallback ?? defaultFallback,
    logger: options.logger ?? defaultLogger,
    stats: options.stats,
  };
}

// =============================================================================
// Core recursion
// =============================================================================

function fallBack(
  context: EvaluationContext,
  node: FactorNode,
  target: NodeInterface,
): Message {
  const partner = target.partner === undefined
    ? undefined
    : context.graph.interfaceAt(target.partner);
  const message = context.fallback({
    graph: context.graph,
    node,
    target,
    partner,
    logger: context.logger,
  });
  if (context.stats !== undefined) context.stats.fallbacks++;
  context.logger.warn(
    `Depth budget exhausted at ${target.node}[${target.port}], storing ${message.family} fallback`,
  );
  return target.store(message);
}

/**
 * Make sure `partner` holds a valid message, recursing when it does not
 */
function requireInbound(
  context: EvaluationContext,
  partner: NodeInterface,
  budget: number,
): Message {
  if (partner.valid) {
    if (context.stats !== undefined) context.stats.reused++;
  } else {
    context.logger.debug(
      `Recursing into ${partner.node}[${partner.port}] (budget ${budget - 1})`,
    );
    try {
      evaluate(context, partner, budget - 1);
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw error;
      }
      throw new UpstreamUnavailableError(partner, error);
    }
  }

  const message = partner.message;
  if (!partner.valid || message === undefined) {
    throw new UpstreamUnavailableError(partner);
  }
  return message;
}

function evaluate(context: EvaluationContext, target: NodeInterface, budget: number): Message {
  const node = context.graph.getNode(target.node);

  if (budget <= 0) {
    return fallBack(context, node, target);
  }

  const inbound: InboundSlot[] = node.interfaces.map((iface) => {
    if (iface === target) {
      return ELIDED;
    }
    return requireInbound(context, context.graph.partnerOf(iface), budget);
  });

  const rule = node.resolveRule(target.port, slotTags(inbound));
  const message = rule.invoke(inbound);
  if (context.stats !== undefined) recordRule(context.stats, rule.name);
  context.logger.debug(
    `${rule.name} computed ${message.family} message on ${target.node}[${target.port}]`,
  );
  return target.store(message);
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Compute the outbound message on `target`, store it there and mark it
 * valid. The target is always recomputed; valid inbound messages are reused.
 *
 * @throws PreconditionError when `options.depthBudget` is not a non-negative integer
 * @throws OwnershipError when `options.node` does not own the target
 * @throws DisconnectedInterfaceError when an interface of the node has no partner
 * @throws UpstreamUnavailableError when an inbound message could not be produced
 * @throws RuleNotFoundError when the node has no rule for the inbound families
 */
export function calculateMessage(
  graph: FactorGraph,
  target: InterfaceHandle,
  options: EvaluatorOptions = {},
): Message {
  const budget = options.depthBudget ?? DEFAULT_DEPTH_BUDGET;
  if (!Number.isInteger(budget) || budget < 0) {
    throw new PreconditionError(`Depth budget must be a non-negative integer, got ${budget}`);
  }
  const iface = graph.interfaceAt(target);
  if (options.node !== undefined && !options.node.interfaces.includes(iface)) {
    throw new OwnershipError(target, options.node.id);
  }
  return evaluate(createContext(graph, options), iface, budget);
}

/**
 * Compute the outbound messages on every interface of `node`, in port order
 */
export function calculateMessages(
  graph: FactorGraph,
  node: FactorNode,
  options: EvaluatorOptions = {},
): Message[] {
  return node.interfaces.map((iface) => calculateMessage(graph, iface, { ...options, node }));
}

/**
 * Message in the edge direction (computed on the tail interface)
 */
export function calculateForwardMessage(
  graph: FactorGraph,
  edge: Edge,
  options: EvaluatorOptions = {},
): Message {
  return calculateMessage(graph, edge.tail, options);
}

/**
 * Message against the edge direction (computed on the head interface)
 */
export function calculateBackwardMessage(
  graph: FactorGraph,
  edge: Edge,
  options: EvaluatorOptions = {},
): Message {
  return calculateMessage(graph, edge.head, options);
}

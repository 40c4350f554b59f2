/**
 * Engine Types
 *
 * @module engine/types
 */

import type { FactorGraph } from "../graph/factor-graph.ts";
import type { FactorNode } from "../graph/factor-node.ts";
import type { NodeInterface } from "../graph/interface.ts";
import type { Message } from "../messages/types.ts";
import type { EvaluationStats } from "../telemetry/evaluation-stats.ts";
import type { Logger } from "../telemetry/logger.ts";

/**
 * Recursion depth allowed per `calculateMessage` call
 */
export const DEFAULT_DEPTH_BUDGET = 10;

/**
 * What the fallback policy knows about the interface whose budget ran out
 */
export interface FallbackContext {
  graph: FactorGraph;
  node: FactorNode;
  target: NodeInterface;
  /** Partner of the target, when connected */
  partner: NodeInterface | undefined;
  logger: Logger;
}

/**
 * Produces the message stored on an interface when the depth budget is
 * exhausted
 */
export type FallbackPolicy = (context: FallbackContext) => Message;

export interface EvaluatorOptions {
  /** Expected owner of the target interface */
  node?: FactorNode;
  depthBudget?: number;
  fallback?: FallbackPolicy;
  logger?: Logger;
  stats?: EvaluationStats;
}

export interface InvalidationOptions {
  logger?: Logger;
}

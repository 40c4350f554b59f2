/**
 * Invalidation Propagator
 *
 * Marks a message invalid together with every message that (conservatively)
 * depends on it: a message a node sends out depends on all of that node's
 * other inbound messages. Propagation stops at interfaces that are already
 * invalid, so it terminates on cyclic graphs.
 *
 * Messages are kept (stale) after invalidation; only `valid` changes.
 *
 * @module engine/invalidation
 */

import type { FactorGraph } from "../graph/factor-graph.ts";
import type { NodeInterface } from "../graph/interface.ts";
import type { InterfaceHandle } from "../graph/types.ts";
import { getLogger, type Logger } from "../telemetry/logger.ts";
import type { InvalidationOptions } from "./types.ts";

const defaultLogger = getLogger("invalidation");

function propagate(graph: FactorGraph, iface: NodeInterface, logger: Logger): void {
  iface.valid = false;
  if (iface.partner === undefined) return;

  const partner = graph.interfaceAt(iface.partner);
  const node = graph.getNode(partner.node);
  for (const other of node.interfaces) {
    if (other === partner) continue;
    const wasCurrent = other.valid && other.message !== undefined;
    other.valid = false;
    if (wasCurrent) {
      logger.debug(`Invalidated ${other.node}[${other.port}]`);
      propagate(graph, other, logger);
    }
  }
}

/**
 * Invalidate the message on `handle` and every message downstream of it
 */
export function invalidate(
  graph: FactorGraph,
  handle: InterfaceHandle,
  options: InvalidationOptions = {},
): void {
  const logger = options.logger ?? defaultLogger;
  const iface = graph.interfaceAt(handle);
  logger.debug(`Invalidating ${iface.node}[${iface.port}]`);
  propagate(graph, iface, logger);
}

export const pushMessageInvalidations = invalidate;

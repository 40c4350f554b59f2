/**
 * Edge
 *
 * Directed pairing of two interfaces on different nodes. The direction
 * (tail → head, "forward") is a naming convention for forward/backward
 * messages only; it does not constrain evaluation order.
 *
 * @module graph/edge
 */

import type { InterfaceHandle } from "./types.ts";

export interface Edge {
  readonly id: string;
  readonly tail: InterfaceHandle;
  readonly head: InterfaceHandle;
}

export function edgeId(tail: InterfaceHandle, head: InterfaceHandle): string {
  return `${tail.node}:${tail.port}->${head.node}:${head.port}`;
}

export function createEdge(tail: InterfaceHandle, head: InterfaceHandle): Edge {
  return Object.freeze({
    id: edgeId(tail, head),
    tail: Object.freeze({ node: tail.node, port: tail.port }),
    head: Object.freeze({ node: head.node, port: head.port }),
  });
}

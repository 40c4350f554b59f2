/**
 * Graph Model
 *
 * @module graph
 */

export { FactorGraph, type Endpoint } from "./factor-graph.ts";
export { FactorNode, generateNodeId } from "./factor-node.ts";
export { handleKey, NodeInterface } from "./interface.ts";
export { createEdge, type Edge, edgeId } from "./edge.ts";
export {
  ELIDED,
  type Elided,
  type InboundSlot,
  type InterfaceHandle,
  type InterfaceState,
  isElided,
  type NodeKind,
  type SlotTag,
  slotTags,
} from "./types.ts";

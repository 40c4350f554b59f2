/**
 * Factor Graph
 *
 * Arena owning the nodes of one model. Nodes are addressed by id, interfaces
 * by `{ node, port }` handles and edges by id. The topology is mirrored in a
 * directed Graphology multigraph (one graph node per factor node, one graph
 * edge per connected interface pair) for neighbourhood queries.
 *
 * Connecting two interfaces is the only operation that sets `partner`.
 *
 * @module graph/factor-graph
 */

import Graph from "graphology";
import {
  AlreadyConnectedError,
  DisconnectedInterfaceError,
  DuplicateNodeError,
  NoFreeInterfaceError,
  NodeNotFoundError,
  SelfLoopError,
  TypeMismatchError,
} from "../errors/error-types.ts";
import { createEdge, type Edge } from "./edge.ts";
import { FactorNode } from "./factor-node.ts";
import { handleKey, type NodeInterface } from "./interface.ts";
import type { InterfaceHandle, InterfaceState, NodeKind } from "./types.ts";

/**
 * Graphology node attributes
 */
type FactorNodeAttributes = {
  kind: NodeKind;
};

/**
 * Graphology edge attributes
 */
type FactorEdgeAttributes = {
  tailPort: number;
  headPort: number;
};

/**
 * One side of a `connect` call: a specific interface, or a node whose first
 * free interface (in port order) is used
 */
export type Endpoint = InterfaceHandle | FactorNode;

export class FactorGraph {
  private readonly topology = new Graph<FactorNodeAttributes, FactorEdgeAttributes>({
    multi: true,
    type: "directed",
    allowSelfLoops: false,
  });
  private readonly nodeIndex = new Map<string, FactorNode>();
  private readonly edgeIndex = new Map<string, Edge>();
  private readonly edgeByInterface = new Map<string, Edge>();

  // ===========================================================================
  // Nodes
  // ===========================================================================

  /**
   * @throws DuplicateNodeError when another node with the same id is registered
   */
  addNode<T extends FactorNode>(node: T): T {
    const existing = this.nodeIndex.get(node.id);
    if (existing !== undefined) {
      throw new DuplicateNodeError(node.id);
    }
    this.nodeIndex.set(node.id, node);
    this.topology.addNode(node.id, { kind: node.kind });
    return node;
  }

  addNodes(...nodes: FactorNode[]): void {
    for (const node of nodes) {
      this.addNode(node);
    }
  }

  hasNode(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  /**
   * @throws NodeNotFoundError
   */
  getNode(id: string): FactorNode {
    const node = this.nodeIndex.get(id);
    if (node === undefined) {
      throw new NodeNotFoundError(id);
    }
    return node;
  }

  nodes(): FactorNode[] {
    return [...this.nodeIndex.values()];
  }

  get nodeCount(): number {
    return this.topology.order;
  }

  /**
   * Ids of the nodes sharing an edge with `id`
   */
  neighbors(id: string): string[] {
    this.getNode(id);
    return this.topology.neighbors(id);
  }

  // ===========================================================================
  // Interfaces
  // ===========================================================================

  /**
   * @throws NodeNotFoundError | InterfaceNotFoundError
   */
  interfaceAt(handle: InterfaceHandle): NodeInterface {
    return this.getNode(handle.node).interfaceAt(handle.port);
  }

  /**
   * The interface at the other end of `handle`'s edge
   *
   * @throws DisconnectedInterfaceError when the interface has no partner
   */
  partnerOf(handle: InterfaceHandle): NodeInterface {
    const iface = this.interfaceAt(handle);
    if (iface.partner === undefined) {
      throw new DisconnectedInterfaceError(iface);
    }
    return this.interfaceAt(iface.partner);
  }

  interfaceState(handle: InterfaceHandle): InterfaceState {
    return this.interfaceAt(handle).state();
  }

  // ===========================================================================
  // Edges
  // ===========================================================================

  /**
   * Pair two interfaces on different nodes. Nodes passed as objects are
   * registered when they are not part of the graph yet.
   *
   * Nothing is mutated when a check fails.
   *
   * @throws SelfLoopError when both sides belong to the same node
   * @throws NoFreeInterfaceError | AlreadyConnectedError
   * @throws TypeMismatchError when both interfaces hold messages of different families
   */
  connect(tail: Endpoint, head: Endpoint): Edge {
    const tailNodeId = tail instanceof FactorNode ? tail.id : tail.node;
    const headNodeId = head instanceof FactorNode ? head.id : head.node;
    if (tailNodeId === headNodeId) {
      throw new SelfLoopError(tailNodeId);
    }

    const tailInterface = this.resolveEndpoint(tail);
    const headInterface = this.resolveEndpoint(head);

    const tailMessage = tailInterface.message;
    const headMessage = headInterface.message;
    if (
      tailMessage !== undefined && headMessage !== undefined &&
      tailMessage.family !== headMessage.family
    ) {
      throw new TypeMismatchError(
        tailMessage.family,
        headMessage.family,
        `Connecting ${tailInterface} to ${headInterface}`,
      );
    }

    for (const endpoint of [tail, head]) {
      if (endpoint instanceof FactorNode && !this.nodeIndex.has(endpoint.id)) {
        this.addNode(endpoint);
      }
    }

    tailInterface.partner = Object.freeze({ node: headInterface.node, port: headInterface.port });
    headInterface.partner = Object.freeze({ node: tailInterface.node, port: tailInterface.port });

    const edge = createEdge(tailInterface, headInterface);
    this.topology.addEdgeWithKey(edge.id, tailInterface.node, headInterface.node, {
      tailPort: tailInterface.port,
      headPort: headInterface.port,
    });
    this.edgeIndex.set(edge.id, edge);
    this.edgeByInterface.set(handleKey(tailInterface), edge);
    this.edgeByInterface.set(handleKey(headInterface), edge);
    return edge;
  }

  private resolveEndpoint(endpoint: Endpoint): NodeInterface {
    if (endpoint instanceof FactorNode) {
      const registered = this.nodeIndex.get(endpoint.id);
      if (registered !== undefined && registered !== endpoint) {
        throw new DuplicateNodeError(endpoint.id);
      }
      const free = endpoint.firstFreeInterface();
      if (free === undefined) {
        throw new NoFreeInterfaceError(endpoint.id);
      }
      return free;
    }

    const iface = this.interfaceAt(endpoint);
    if (iface.isConnected) {
      throw new AlreadyConnectedError(iface);
    }
    return iface;
  }

  edges(): Edge[] {
    return [...this.edgeIndex.values()];
  }

  get edgeCount(): number {
    return this.topology.size;
  }

  getEdge(id: string): Edge | undefined {
    return this.edgeIndex.get(id);
  }

  /**
   * The edge attached to an interface, if it is connected
   */
  edgeOf(handle: InterfaceHandle): Edge | undefined {
    return this.edgeByInterface.get(handleKey(handle));
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  /**
   * Drop the messages held on every interface of a node, or on both sides of
   * an edge
   */
  clearMessages(target: FactorNode | Edge): void {
    if (target instanceof FactorNode) {
      for (const iface of this.getNode(target.id).interfaces) {
        iface.clear();
      }
      return;
    }
    this.interfaceAt(target.tail).clear();
    this.interfaceAt(target.head).clear();
  }
}

/**
 * Factor Node
 *
 * Base class of every node kind. A node owns an ordered, fixed set of
 * interfaces and implements the update-rule dispatch contract through
 * `resolveRule`.
 *
 * @module graph/factor-node
 */

import { InterfaceNotFoundError } from "../errors/error-types.ts";
import type { Message } from "../messages/types.ts";
import type { ResolvedRule } from "../rules/update-rule.ts";
import { NodeInterface } from "./interface.ts";
import type { NodeKind, SlotTag } from "./types.ts";

const idCounters = new Map<string, number>();

/**
 * Generate a node id of the form `<kind>_<n>`
 */
export function generateNodeId(kind: NodeKind): string {
  const next = (idCounters.get(kind) ?? 0) + 1;
  idCounters.set(kind, next);
  return `${kind}_${next}`;
}

export abstract class FactorNode {
  abstract readonly kind: NodeKind;
  readonly id: string;
  readonly interfaces: readonly NodeInterface[];

  /**
   * @param id - Node id; generated from the kind when omitted
   * @param ports - Port count, or port names in port order
   */
  protected constructor(kind: NodeKind, id: string | undefined, ports: number | readonly string[]) {
    this.id = id ?? generateNodeId(kind);
    this.interfaces = typeof ports === "number"
      ? Array.from({ length: ports }, (_, port) => new NodeInterface(this.id, port))
      : ports.map((name, port) => new NodeInterface(this.id, port, name));
  }

  get arity(): number {
    return this.interfaces.length;
  }

  /**
   * Resolve the update rule producing `outboundPort` from inbound messages
   * with the given family tags (outbound slot tagged "elided")
   *
   * @throws RuleNotFoundError when no rule matches
   */
  abstract resolveRule(outboundPort: number, tags: readonly SlotTag[]): ResolvedRule;

  /**
   * Message whose family and shape the port is known to carry, if any.
   * Used to shape the depth-budget fallback.
   */
  portTemplate(_port: number): Message | undefined {
    return undefined;
  }

  interfaceAt(port: number): NodeInterface {
    const iface = this.interfaces[port];
    if (iface === undefined) {
      throw new InterfaceNotFoundError(this.id, port);
    }
    return iface;
  }

  /**
   * Interface by port name (e.g. "out")
   */
  i(name: string): NodeInterface {
    const iface = this.interfaces.find((candidate) => candidate.name === name);
    if (iface === undefined) {
      throw new InterfaceNotFoundError(this.id, name);
    }
    return iface;
  }

  firstFreeInterface(): NodeInterface | undefined {
    return this.interfaces.find((iface) => !iface.isConnected);
  }

  toString(): string {
    return `${this.kind} node ${this.id}`;
  }
}

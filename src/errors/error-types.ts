/**
 * Error Types
 *
 * Error taxonomy for the message-passing engine. Every error is fatal to the
 * requested operation and is surfaced to the caller unchanged; nothing in the
 * engine retries.
 *
 * - StructuralError: the graph itself cannot support the operation
 * - RuleNotFoundError: no update rule matches a port/type combination
 * - PreconditionError: a rule or constructor received values it cannot use
 * - UpstreamUnavailableError: an inbound message could not be produced
 *
 * @module errors/error-types
 */

import type { InterfaceHandle, SlotTag } from "../graph/types.ts";

/**
 * Base class for all engine errors
 */
export abstract class InferenceError extends Error {
  abstract readonly code: string;
  readonly recoverable: boolean = false;

  constructor(
    message: string,
    public readonly suggestion?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

function describeHandle(handle: InterfaceHandle): string {
  return `${handle.node}[${handle.port}]`;
}

// =============================================================================
// Structural errors
// =============================================================================

export class StructuralError extends InferenceError {
  override readonly code: string = "STRUCTURAL";
}

export class SelfLoopError extends StructuralError {
  override readonly code = "SELF_LOOP";

  constructor(public readonly nodeId: string) {
    super(`Cannot connect two interfaces of the same node: ${nodeId}`);
  }
}

export class TypeMismatchError extends StructuralError {
  override readonly code = "TYPE_MISMATCH";

  constructor(
    public readonly expected: string,
    public readonly actual: string,
    context: string,
  ) {
    super(`${context}: message families do not match (${expected} and ${actual})`);
  }
}

export class NoFreeInterfaceError extends StructuralError {
  override readonly code = "NO_FREE_INTERFACE";

  constructor(public readonly nodeId: string) {
    super(`No free interface on node ${nodeId}`);
  }
}

export class AlreadyConnectedError extends StructuralError {
  override readonly code = "ALREADY_CONNECTED";

  constructor(public readonly handle: InterfaceHandle) {
    super(`Interface ${describeHandle(handle)} is already connected`);
  }
}

export class DisconnectedInterfaceError extends StructuralError {
  override readonly code = "DISCONNECTED_INTERFACE";

  constructor(public readonly handle: InterfaceHandle) {
    super(
      `Cannot receive messages on disconnected interface ${describeHandle(handle)}`,
      "Connect every interface of the node before requesting one of its messages",
    );
  }
}

export class OwnershipError extends StructuralError {
  override readonly code = "OWNERSHIP";

  constructor(
    public readonly handle: InterfaceHandle,
    public readonly nodeId: string,
  ) {
    super(`Interface ${describeHandle(handle)} does not belong to node ${nodeId}`);
  }
}

export class MissingMessageError extends StructuralError {
  override readonly code = "MISSING_MESSAGE";

  constructor(public readonly handle: InterfaceHandle) {
    super(
      `Interface ${describeHandle(handle)} does not hold a message`,
      "Calculate the forward and backward messages of the edge first",
    );
  }
}

export class NodeNotFoundError extends StructuralError {
  override readonly code = "NODE_NOT_FOUND";

  constructor(public readonly nodeId: string) {
    super(`Unknown node: ${nodeId}`);
  }
}

export class InterfaceNotFoundError extends StructuralError {
  override readonly code = "INTERFACE_NOT_FOUND";

  constructor(
    public readonly nodeId: string,
    public readonly port: number | string,
  ) {
    super(`Unknown interface: ${nodeId}[${port}]`);
  }
}

export class DuplicateNodeError extends StructuralError {
  override readonly code = "DUPLICATE_NODE";

  constructor(public readonly nodeId: string) {
    super(`A node with id ${nodeId} is already part of the graph`);
  }
}

// =============================================================================
// Rule resolution
// =============================================================================

export class RuleNotFoundError extends InferenceError {
  override readonly code: string = "RULE_NOT_FOUND";

  constructor(
    public readonly nodeKind: string,
    public readonly outboundPort: number,
    public readonly tags: readonly SlotTag[],
    message?: string,
  ) {
    super(
      message ??
        `No update rule on ${nodeKind} for outbound port ${outboundPort} with inbound (${
          tags.join(", ")
        })`,
    );
  }
}

export class AmbiguousRuleError extends RuleNotFoundError {
  override readonly code = "AMBIGUOUS_RULE";

  constructor(
    nodeKind: string,
    outboundPort: number,
    tags: readonly SlotTag[],
    public readonly candidates: readonly string[],
  ) {
    super(
      nodeKind,
      outboundPort,
      tags,
      `Several update rules on ${nodeKind} match outbound port ${outboundPort}: ${
        candidates.join(", ")
      }`,
    );
  }
}

// =============================================================================
// Preconditions and upstream failures
// =============================================================================

export class PreconditionError extends InferenceError {
  override readonly code = "PRECONDITION";
}

export class UpstreamUnavailableError extends InferenceError {
  override readonly code = "UPSTREAM_UNAVAILABLE";

  constructor(
    public readonly handle: InterfaceHandle,
    cause?: unknown,
  ) {
    super(
      `Could not calculate required inbound message on interface ${describeHandle(handle)}`,
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }

  /**
   * The error that made the upstream message unavailable, if any
   */
  get rootCause(): unknown {
    return this.cause;
  }
}

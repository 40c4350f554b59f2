/**
 * Graph Model Types
 *
 * @module graph/types
 */

import type { Message, MessageFamily } from "../messages/types.ts";

/**
 * Stable address of an interface inside a graph: owning node id + port index.
 * A NodeInterface is itself a valid handle.
 */
export interface InterfaceHandle {
  readonly node: string;
  readonly port: number;
}

/**
 * Marker for the inbound slot a node is being asked to produce
 */
export interface Elided {
  readonly family: "elided";
}

export const ELIDED: Elided = Object.freeze({ family: "elided" });

/**
 * One inbound slot of an update rule, in port order
 */
export type InboundSlot = Message | Elided;

export type SlotTag = MessageFamily | "elided";

export type NodeKind =
  | "equality"
  | "constant"
  | "addition"
  | "fixed-gain"
  | "gain-equality";

/**
 * Snapshot of an interface's cached outbound message
 */
export interface InterfaceState {
  message: Message | undefined;
  valid: boolean;
}

export function isElided(slot: InboundSlot): slot is Elided {
  return slot.family === "elided";
}

export function slotTags(inbound: readonly InboundSlot[]): SlotTag[] {
  return inbound.map((slot) => slot.family);
}

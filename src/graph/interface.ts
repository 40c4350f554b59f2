/**
 * Node Interface
 *
 * A port of a factor node. Holds the node's outbound message on that port and
 * the handle of its partner interface (the other end of its edge).
 *
 * @module graph/interface
 */

import type { Message } from "../messages/types.ts";
import type { InterfaceHandle, InterfaceState } from "./types.ts";

export class NodeInterface implements InterfaceHandle {
  /** Other end of the edge; set once, when the edge is created */
  partner: InterfaceHandle | undefined = undefined;
  message: Message | undefined = undefined;
  /** The message, if present, reflects the current upstream state */
  valid = false;

  constructor(
    readonly node: string,
    readonly port: number,
    readonly name?: string,
  ) {}

  get isConnected(): boolean {
    return this.partner !== undefined;
  }

  /**
   * Replace the held message and mark it valid
   */
  store(message: Message): Message {
    this.message = message;
    this.valid = true;
    return message;
  }

  clear(): void {
    this.message = undefined;
    this.valid = false;
  }

  state(): InterfaceState {
    return { message: this.message, valid: this.valid };
  }

  toString(): string {
    const label = this.name ?? String(this.port);
    return `${this.node}.${label} (${this.valid ? "VALID" : "INVALID"} ${
      this.message?.family ?? "no message"
    })`;
  }
}

export function handleKey(handle: InterfaceHandle): string {
  return `${handle.node}#${handle.port}`;
}

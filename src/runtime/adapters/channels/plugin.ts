import { EventEmitter } from "node:events";
import type { ChannelStatus, InboundMessage, OutboundMessage } from "./types";

export interface ChannelPlugin extends EventEmitter {
  readonly id: string;

  // Lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** The bot's own user id once connected. */
  getSelfId(): string | null;

  // Messaging
  send(peerId: string, message: OutboundMessage): Promise<string>; // Returns message ID

  // Events (via EventEmitter)
  // 'message' - (msg: InboundMessage) => void
  // 'error' - (error: Error) => void
}

// Base class with common functionality
export abstract class BaseChannelPlugin extends EventEmitter implements ChannelPlugin {
  abstract readonly id: string;
  protected status: ChannelStatus = "disconnected";

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract send(peerId: string, message: OutboundMessage): Promise<string>;
  abstract getSelfId(): string | null;

  protected emitMessage(msg: InboundMessage): void {
    this.emit("message", msg);
  }

  protected emitError(error: Error): void {
    if (this.listenerCount("error") === 0) {
      return;
    }
    this.emit("error", error);
  }
}

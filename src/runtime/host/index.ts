import { logger } from "../../logger";
import { toError } from "../../utils/result";
import type { ChannelPlugin } from "../adapters/channels/plugin";
import type { InboundMessage } from "../adapters/channels/types";
import type { CommandContext } from "./commands/context";
import { dispatchMessage } from "./commands/dispatch";
import type { CommandRegistry } from "./commands/registry";
import { toIncomingText } from "./gating";

export interface GamelistHostOptions {
  channel: ChannelPlugin;
  registry: CommandRegistry;
  context: CommandContext;
}

/** Connects one chat channel to the command dispatcher. */
export class GamelistHost {
  private running = false;
  private inFlight = new Set<Promise<void>>();
  private readonly onMessage = (msg: InboundMessage) => {
    const task = this.handleInbound(msg).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  };
  private readonly onError = (error: Error) => {
    logger.error({ err: error, channelId: this.options.channel.id }, "Channel plugin error");
  };

  constructor(private options: GamelistHostOptions) {}

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const { channel } = this.options;
    logger.info({ channelId: channel.id }, "Starting game list bot...");

    channel.on("message", this.onMessage);
    channel.on("error", this.onError);
    try {
      await channel.connect();
    } catch (error) {
      channel.off("message", this.onMessage);
      channel.off("error", this.onError);
      throw error;
    }

    this.running = true;
    logger.info(
      { channelId: channel.id, commands: this.options.registry.listAll().length },
      "Game list bot started",
    );
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    const { channel } = this.options;
    logger.info("Shutting down...");

    channel.off("message", this.onMessage);
    await Promise.allSettled(this.inFlight);
    try {
      await channel.disconnect();
    } catch (error) {
      logger.warn({ err: toError(error), channelId: channel.id }, "Error disconnecting channel");
    } finally {
      channel.off("error", this.onError);
    }

    this.running = false;
    logger.info("Game list bot stopped cleanly.");
  }

  /** Handles one message end to end. Never rejects. */
  async handleInbound(msg: InboundMessage): Promise<void> {
    const { channel, registry, context } = this.options;
    const incoming = toIncomingText(msg, channel.getSelfId());
    if (!incoming) {
      return;
    }

    let reply: string | null;
    try {
      reply = await dispatchMessage({ message: incoming, registry, context });
    } catch (error) {
      logger.error({ err: toError(error), messageId: msg.id }, "Error handling inbound message");
      return;
    }
    if (reply === null) {
      return;
    }

    try {
      await channel.send(msg.peerId, { text: reply, replyToId: msg.id });
    } catch (error) {
      logger.error(
        { err: toError(error), channelId: channel.id, peerId: msg.peerId, messageId: msg.id },
        "Failed to send reply",
      );
    }
  }
}

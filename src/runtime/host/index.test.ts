import { beforeEach, describe, expect, it, vi } from "vitest";
import { makeCatalog } from "../../gamelist/test-fixtures";
import { logger } from "../../logger";
import { BaseChannelPlugin } from "../adapters/channels/plugin";
import type { InboundMessage, OutboundMessage } from "../adapters/channels/types";
import { createCommandRegistry } from "./commands/handlers";
import { MemoryIdentityStore, StaticCatalogSource, makeContext } from "./commands/test-harness";
import { GamelistHost } from "./index";

vi.mock("../../logger", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

class FakeChannel extends BaseChannelPlugin {
  readonly id = "fake";
  readonly sent: Array<{ peerId: string; message: OutboundMessage }> = [];
  failSends = false;
  connects = 0;
  disconnects = 0;

  async connect(): Promise<void> {
    this.connects += 1;
  }

  async disconnect(): Promise<void> {
    this.disconnects += 1;
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    if (this.failSends) {
      throw new Error("Missing Access");
    }
    this.sent.push({ peerId, message });
    return `sent-${this.sent.length}`;
  }

  getSelfId(): string | null {
    return "999";
  }

  deliver(msg: InboundMessage): void {
    this.emitMessage(msg);
  }
}

function inbound(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: "msg-1",
    peerId: "chan-1",
    peerType: "group",
    senderId: "111",
    text,
    mentionsSelf: false,
    ...overrides,
  };
}

describe("GamelistHost", () => {
  let channel: FakeChannel;
  let host: GamelistHost;

  beforeEach(() => {
    vi.clearAllMocks();
    channel = new FakeChannel();
    host = new GamelistHost({
      channel,
      registry: createCommandRegistry(),
      context: makeContext({
        identities: new MemoryIdentityStore({ "111": "Alice" }),
        catalog: new StaticCatalogSource(
          makeCatalog(["Alice"], [{ title: "Go", owns: { Alice: true } }]),
        ),
      }),
    });
  });

  it("connects once and stops listening after stop", async () => {
    await host.start();
    await host.start();
    expect(channel.connects).toBe(1);

    await host.stop();
    expect(channel.disconnects).toBe(1);

    channel.deliver(inbound("!whoami"));
    await Promise.resolve();
    expect(channel.sent).toEqual([]);
  });

  it("replies in the same channel, threaded on the command", async () => {
    await host.handleInbound(inbound("!whoami"));
    expect(channel.sent).toEqual([
      { peerId: "chan-1", message: { text: "<@111> You're Alice.", replyToId: "msg-1" } },
    ]);
  });

  it("answers a ping with no command with the help nudge", async () => {
    await host.handleInbound(inbound("<@999>", { mentionsSelf: true }));
    expect(channel.sent[0]?.message.text).toBe("<@111> Say !help to see what I can do.");
  });

  it("stays quiet for guild chatter", async () => {
    await host.handleInbound(inbound("good game everyone"));
    expect(channel.sent).toEqual([]);
  });

  it("logs a failed send and keeps serving", async () => {
    channel.failSends = true;
    await expect(host.handleInbound(inbound("!sheet"))).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ peerId: "chan-1", messageId: "msg-1" }),
      "Failed to send reply",
    );

    channel.failSends = false;
    await host.handleInbound(inbound("!whohas go"));
    expect(channel.sent[0]?.message.text).toBe("<@111> Who owns Go? <@111>.");
  });

  it("handles messages the channel emits once started", async () => {
    await host.start();
    channel.deliver(inbound("!roll 2", { peerType: "dm" }));
    await host.stop();

    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]?.message.text).toBe("<@111> You rolled 1 (1-2).");
  });
});

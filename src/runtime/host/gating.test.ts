import { describe, expect, it } from "vitest";
import type { InboundMessage } from "../adapters/channels/types";
import { toIncomingText } from "./gating";

function inbound(overrides: Partial<InboundMessage>): InboundMessage {
  return {
    id: "msg-1",
    peerId: "chan-1",
    peerType: "group",
    senderId: "111",
    text: "",
    mentionsSelf: false,
    ...overrides,
  };
}

describe("toIncomingText", () => {
  it("dispatches every direct message as addressed to the bot", () => {
    expect(toIncomingText(inbound({ peerType: "dm", text: "hello" }), "999")).toEqual({
      text: "hello",
      senderId: "111",
      mentionsSelf: true,
    });
  });

  it("passes guild commands that start with a bang", () => {
    expect(toIncomingText(inbound({ text: "!roll 6" }), "999")).toEqual({
      text: "!roll 6",
      senderId: "111",
      mentionsSelf: false,
    });
  });

  it("ignores guild chatter that neither pings the bot nor starts with a bang", () => {
    expect(toIncomingText(inbound({ text: "anyone up for games?" }), "999")).toBeNull();
    expect(toIncomingText(inbound({ text: "roll 6" }), "999")).toBeNull();
  });

  it("strips a leading ping of the bot", () => {
    const msg = inbound({ text: "<@!999>   games <@222>", mentionsSelf: true });
    expect(toIncomingText(msg, "999")).toEqual({
      text: "games <@222>",
      senderId: "111",
      mentionsSelf: true,
    });
  });

  it("leaves the text alone before the bot knows its own id", () => {
    const msg = inbound({ text: "<@999> help", mentionsSelf: true });
    expect(toIncomingText(msg, null)?.text).toBe("<@999> help");
  });
});

import type { InboundMessage } from "../adapters/channels/types";
import type { IncomingText } from "./commands/dispatch";
import { stripLeadingMention } from "./commands/parser";

/**
 * Decides whether an inbound message is addressed to the bot and, if so, what the dispatcher sees.
 * Direct messages always are. Guild messages must start with `!` or ping the bot.
 */
export function toIncomingText(msg: InboundMessage, selfId: string | null): IncomingText | null {
  const text = selfId ? stripLeadingMention(msg.text, selfId) : msg.text;

  if (msg.peerType === "dm") {
    return { text, senderId: msg.senderId, mentionsSelf: true };
  }
  if (!msg.mentionsSelf && !text.startsWith("!")) {
    return null;
  }
  return { text, senderId: msg.senderId, mentionsSelf: msg.mentionsSelf };
}

// Normalized message format (platform-agnostic)
export interface InboundMessage {
  id: string;
  peerId: string; // Channel ID replies go to
  peerType: "dm" | "group";
  senderId: string;
  text: string;
  mentionsSelf: boolean;
}

export interface OutboundMessage {
  text: string;
  replyToId?: string;
}

export type ChannelStatus = "connected" | "connecting" | "disconnected" | "error";

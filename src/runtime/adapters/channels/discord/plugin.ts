import { Client, MessageCreateListener, ReadyListener } from "@buape/carbon";
import { GatewayIntents, GatewayPlugin } from "@buape/carbon/gateway";
import { Routes } from "discord-api-types/v10";
import { EventEmitter } from "node:events";
import type { DiscordConfig } from "../../../../config/schema";
import { logger } from "../../../../logger";
import { toError } from "../../../../utils/result";
import type { InboundMessage, OutboundMessage } from "../types";
import { BaseChannelPlugin } from "../plugin";

const READY_TIMEOUT_MS = 20_000;
const MAX_GATEWAY_RECONNECT_ATTEMPTS = 20;
const MAX_MESSAGE_LENGTH = 2000;

type CarbonMessageCreateEvent = Parameters<MessageCreateListener["handle"]>[0];
type CarbonReadyEvent = Parameters<ReadyListener["handle"]>[0];
type ReadyResult = { tag?: string; userId?: string; error?: Error };

class CarbonReadyBridge extends ReadyListener {
  constructor(private readonly onReady: (data: CarbonReadyEvent) => void) {
    super();
  }

  async handle(data: CarbonReadyEvent, _client: Client): Promise<void> {
    this.onReady(data);
  }
}

class CarbonMessageBridge extends MessageCreateListener {
  constructor(private readonly onMessage: (data: CarbonMessageCreateEvent) => Promise<void>) {
    super();
  }

  async handle(data: CarbonMessageCreateEvent, _client: Client): Promise<void> {
    await this.onMessage(data);
  }
}

export class DiscordPlugin extends BaseChannelPlugin {
  readonly id = "discord";

  private client: Client | null = null;
  private gateway: GatewayPlugin | null = null;
  private config: DiscordConfig;
  private selfId: string | null = null;
  private disabledReason?: string;
  private connectInFlight: Promise<void> | null = null;

  constructor(config: DiscordConfig) {
    super();
    this.config = {
      ...config,
      botToken: normalizeDiscordToken(config.botToken),
    };
  }

  /** The bot's own user id, known once the gateway is ready. */
  getSelfId(): string | null {
    return this.selfId;
  }

  async connect(): Promise<void> {
    if (this.connectInFlight) {
      return this.connectInFlight;
    }

    const run = this.connectInternal();
    this.connectInFlight = run;
    return run.finally(() => {
      this.connectInFlight = null;
    });
  }

  private async connectInternal(): Promise<void> {
    if (this.status === "connecting" || this.status === "connected") {
      return;
    }
    if (this.disabledReason) {
      throw new Error(this.disabledReason);
    }
    this.status = "connecting";

    let readyTimeout: ReturnType<typeof setTimeout> | null = null;
    let settleReady: ((result: ReadyResult) => void) | null = null;

    try {
      const readyPromise = new Promise<ReadyResult>((resolve) => {
        settleReady = resolve;
      });

      const listeners = [
        new CarbonReadyBridge((event) => {
          settleReady?.({
            tag: formatUserTag(event.user?.username, event.user?.discriminator),
            userId: event.user?.id,
          });
        }),
        new CarbonMessageBridge(async (event) => {
          this.handleMessage(event);
        }),
      ];

      const gateway = new GatewayPlugin({
        intents:
          GatewayIntents.Guilds |
          GatewayIntents.GuildMessages |
          GatewayIntents.MessageContent |
          GatewayIntents.DirectMessages,
        reconnect: { maxAttempts: MAX_GATEWAY_RECONNECT_ATTEMPTS },
      });

      const applicationId = await fetchApplicationId(this.config.botToken);

      const client = new Client(
        {
          baseUrl: "http://localhost",
          clientId: applicationId,
          publicKey: "unused",
          token: this.config.botToken,
          disableDeployRoute: true,
          disableEventsRoute: true,
          disableInteractionsRoute: true,
        },
        { listeners },
        [gateway],
      );

      const gatewayEmitter = getGatewayEmitter(gateway);
      const onGatewayError = (err: unknown) => {
        const error = toError(err);
        if (this.isAuthFailureError(error)) {
          this.handleAuthFailure("gatewayError", error);
        }
        logger.error({ err: error }, "Discord gateway error");
        this.emitError(error);
        settleReady?.({ error });
      };
      gatewayEmitter?.on("error", onGatewayError);

      this.client = client;
      this.gateway = gateway;

      readyTimeout = setTimeout(() => {
        settleReady?.({ error: new Error("Discord gateway ready timeout") });
      }, READY_TIMEOUT_MS);

      const readyResult = await readyPromise;
      if (readyResult.error) {
        throw readyResult.error;
      }

      this.selfId = readyResult.userId ?? null;
      this.status = "connected";
      logger.info({ selfId: this.selfId }, `Discord bot ready as ${readyResult.tag ?? "unknown"}`);

      if (readyTimeout) {
        clearTimeout(readyTimeout);
        readyTimeout = null;
      }
      gatewayEmitter?.removeListener("error", onGatewayError);
    } catch (err) {
      if (readyTimeout) {
        clearTimeout(readyTimeout);
      }
      this.status = "error";
      await this.disconnect().catch((disconnectErr: unknown) => {
        logger.warn({ err: toError(disconnectErr) }, "Discord disconnect after failed connect errored");
      });
      throw err;
    }
  }

  async disconnect(): Promise<void> {
    try {
      disableReconnect(this.gateway);
      this.gateway?.disconnect();
    } finally {
      this.gateway = null;
      this.client = null;
      this.status = "disconnected";
      logger.info("Discord bot disconnected");
    }
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    if (!this.client) {
      throw new Error("Discord client is not connected");
    }

    let content = message.text.trim();
    if (!content) {
      throw new Error("Discord outbound message is empty");
    }
    if (content.length > MAX_MESSAGE_LENGTH) {
      logger.warn({ peerId, length: content.length }, "Discord reply truncated");
      content = `${truncateAt(content, MAX_MESSAGE_LENGTH - 1)}…`;
    }

    const body: {
      content: string;
      message_reference?: { message_id: string; fail_if_not_exists: boolean };
    } = { content };

    if (message.replyToId) {
      body.message_reference = {
        message_id: message.replyToId,
        fail_if_not_exists: false,
      };
    }

    const sent = (await this.client.rest.post(Routes.channelMessages(peerId), {
      body,
    })) as { id?: string };

    return sent.id ?? "unknown";
  }

  private handleMessage(event: CarbonMessageCreateEvent): void {
    const author = event.author;
    const msg = event.message;

    if (!author || author.bot) {
      return;
    }

    const guildId = event.guild_id ?? event.guild?.id;
    const channelId = msg.channelId;

    if (this.config.allowedGuilds && guildId && !this.config.allowedGuilds.includes(guildId)) {
      return;
    }

    if (this.config.allowedChannels && !this.config.allowedChannels.includes(channelId)) {
      return;
    }

    const mentionsSelf = (msg.mentions ?? []).some(
      (mention: { id?: string }) => this.selfId !== null && mention.id === this.selfId,
    );

    const inbound: InboundMessage = {
      id: msg.id,
      peerId: channelId,
      peerType: guildId ? "group" : "dm",
      senderId: author.id,
      text: msg.content,
      mentionsSelf,
    };

    this.emitMessage(inbound);
  }

  private isAuthFailureError(error: unknown): boolean {
    const message = toError(error).message.toLowerCase();
    return (
      message.includes("4004") ||
      message.includes("authentication failed") ||
      message.includes("invalid token")
    );
  }

  private handleAuthFailure(source: string, error: unknown): void {
    if (this.disabledReason) {
      return;
    }
    this.disabledReason =
      "Discord authentication failed (token invalid/reset). Please update botToken and restart.";
    logger.error(
      { source, err: toError(error) },
      "Discord authentication failed; disabling reconnect",
    );
    disableReconnect(this.gateway);
    this.status = "error";
    this.emitError(new Error(this.disabledReason));
    void this.disconnect()
      .catch((err: unknown) => {
        logger.warn({ err: toError(err) }, "Discord disconnect after auth failure errored");
      })
      .finally(() => {
        this.status = "error";
      });
  }
}

/** Cuts `text` to at most `limit` UTF-16 units without splitting a surrogate pair. */
export function truncateAt(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  const lastKept = text.charCodeAt(limit - 1);
  const end = lastKept >= 0xd800 && lastKept <= 0xdbff ? limit - 1 : limit;
  return text.slice(0, end);
}

function normalizeDiscordToken(raw: string): string {
  return raw.trim().replace(/^Bot\s+/i, "");
}

function formatUserTag(username: string | undefined, discriminator: string | undefined): string {
  const safeName = username?.trim() || "unknown";
  if (!discriminator || discriminator === "0") {
    return safeName;
  }
  return `${safeName}#${discriminator}`;
}

function getGatewayEmitter(gateway?: GatewayPlugin | null): EventEmitter | undefined {
  return (gateway as unknown as { emitter?: EventEmitter } | undefined)?.emitter;
}

// Carbon exposes no public switch for this; zeroing maxAttempts stops the reconnect loop.
function disableReconnect(gateway: GatewayPlugin | null): void {
  if (!gateway) {
    return;
  }
  const options = (gateway as unknown as { options?: { reconnect?: { maxAttempts: number } } })
    .options;
  if (options) {
    options.reconnect = { maxAttempts: 0 };
  }
}

async function fetchApplicationId(token: string): Promise<string> {
  const response = await fetch("https://discord.com/api/v10/oauth2/applications/@me", {
    headers: {
      Authorization: `Bot ${token}`,
    },
  });

  if (!response.ok) {
    throw new Error(`Discord API /oauth2/applications/@me failed (${response.status})`);
  }

  const data = (await response.json()) as { id?: string };
  if (!data.id) {
    throw new Error("Discord API returned no application id");
  }

  return data.id;
}

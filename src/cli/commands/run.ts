import { configureLogger, logger } from "../../logger";
import { GoogleSheetsCatalogSource } from "../../gamelist/sheets";
import { DiscordPlugin } from "../../runtime/adapters/channels/discord/plugin";
import type { CommandContext } from "../../runtime/host/commands/context";
import { createCommandRegistry } from "../../runtime/host/commands/handlers";
import { GamelistHost } from "../../runtime/host";
import { registerProcessErrorHandlers } from "../../runtime/host/process-error-handlers";
import { closeDb, initDb } from "../../storage/db";
import { createSqliteIdentityStore } from "../../storage/identity-store";
import { requireConfig } from "./config";

export async function runBot(options: { config?: string }): Promise<void> {
  const config = requireConfig(options.config);
  configureLogger(config.logging?.level);
  registerProcessErrorHandlers();

  initDb(config.paths?.database);

  const context: CommandContext = {
    spreadsheetId: config.sheet.spreadsheetId,
    identities: createSqliteIdentityStore(),
    catalog: new GoogleSheetsCatalogSource({ credentialsFile: config.sheet.credentialsFile }),
    random: Math.random,
  };
  const host = new GamelistHost({
    channel: new DiscordPlugin(config.discord),
    registry: createCommandRegistry(),
    context,
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    try {
      await host.stop();
    } finally {
      closeDb();
    }
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  try {
    await host.start();
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start the bot");
    closeDb();
    process.exit(1);
  }
}

import type { CatalogSource } from "../../../gamelist/types";
import type { IdentityStore } from "../../../storage/identity-store";
import type { Result } from "../../../utils/result";

/** Everything a handler may touch. Built once per process and shared by all requests. */
export interface CommandContext {
  spreadsheetId: string;
  identities: IdentityStore;
  catalog: CatalogSource;
  /** Uniform in [0, 1). */
  random: () => number;
}

export interface CommandReply {
  body: string;
  /** Users pinged after the sender. */
  mentionIds?: string[];
}

export type CommandHandler = (
  context: CommandContext,
  senderId: string,
  args: string,
) => Promise<Result<CommandReply>>;

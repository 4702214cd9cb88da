import { z } from "zod";
import { DiscordConfigSchema } from "./discord";
import { LoggingSchema } from "./logging";
import { PathsSchema } from "./paths";
import { SheetConfigSchema } from "./sheet";

export const GamelistConfigSchema = z
  .object({
    $schema: z.string().optional(),
    paths: PathsSchema.optional(),
    logging: LoggingSchema.optional(),
    discord: DiscordConfigSchema,
    sheet: SheetConfigSchema,
  })
  .strict();

export type GamelistConfig = z.infer<typeof GamelistConfigSchema>;
export type { DiscordConfig } from "./discord";
export type { SheetConfig } from "./sheet";

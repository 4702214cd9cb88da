import { z } from "zod";
import { hasUnresolvedEnvVar } from "../env";

const IdListSchema = z
  .array(z.union([z.string(), z.number()]))
  .transform((items) => items.map((item) => item.toString()));

export const DiscordConfigSchema = z
  .object({
    botToken: z
      .string()
      .min(1)
      .refine((value) => !hasUnresolvedEnvVar(value), {
        message: "botToken references an environment variable that is not set",
      }),
    allowedGuilds: IdListSchema.optional(),
    allowedChannels: IdListSchema.optional(),
  })
  .strict();

export type DiscordConfig = z.infer<typeof DiscordConfigSchema>;

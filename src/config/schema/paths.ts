import { z } from "zod";

export const PathsSchema = z
  .object({
    baseDir: z.string().optional(),
    database: z.string().optional(),
  })
  .strict();

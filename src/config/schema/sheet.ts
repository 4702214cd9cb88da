import { z } from "zod";

export const SheetConfigSchema = z
  .object({
    spreadsheetId: z.string().min(1),
    credentialsFile: z.string().min(1),
  })
  .strict();

export type SheetConfig = z.infer<typeof SheetConfigSchema>;

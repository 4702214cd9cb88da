import { ok } from "../../../../utils/result";
import type { CommandHandler } from "../context";
import type { CommandRegistry } from "../registry";

export function renderHelp(registry: CommandRegistry): string {
  return registry
    .listAll()
    .map(([name, entry]) =>
      entry.argHint ? `!${name} ${entry.argHint}: ${entry.helpText}` : `!${name}: ${entry.helpText}`,
    )
    .join("\n");
}

export function createHelpHandler(registry: CommandRegistry): CommandHandler {
  return async () => ok({ body: renderHelp(registry) });
}

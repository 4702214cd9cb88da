import { CommandRegistry } from "../registry";
import { roll } from "./dice";
import { deets, game, games, sheet, whohas } from "./games";
import { createHelpHandler } from "./help";
import { forgetme, iam, whoami } from "./identity";

export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry
    .register("iam", {
      handler: iam,
      argHint: "<name>",
      helpText: "Tell me which spreadsheet column is yours.",
    })
    .register("whoami", { handler: whoami, helpText: "Show which column I think is yours." })
    .register("forgetme", { handler: forgetme, helpText: "Forget which column is yours." })
    .register("sheet", { handler: sheet, helpText: "Link the game list spreadsheet." })
    .register("games", {
      handler: games,
      argHint: "<@player> ...",
      helpText: "List games you and the mentioned players can all play.",
    })
    .register("game", {
      handler: game,
      argHint: "<@player> ...",
      helpText: "Pick one game you and the mentioned players can all play.",
    })
    .register("deets", {
      handler: deets,
      argHint: "<title>",
      helpText: "Show the platform and player counts of a game.",
    })
    .register("whohas", {
      handler: whohas,
      argHint: "<title>",
      helpText: "Show who owns a game.",
    })
    .register("roll", {
      handler: roll,
      argHint: "[sides]",
      helpText: "Roll a die with 100 sides, or as many as you say.",
    })
    .register("help", { handler: createHelpHandler(registry), helpText: "Show this message." });
  return registry;
}

export { loadConfig, resolveConfigPath, expandHomePath, type ConfigLoadResult } from "./loader";
export {
  GamelistConfigSchema,
  type GamelistConfig,
  type DiscordConfig,
  type SheetConfig,
} from "./schema";
